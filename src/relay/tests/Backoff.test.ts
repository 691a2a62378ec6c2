import { describe, it, expect } from "vitest";
import { ExponentialBackoff } from "../Backoff";

describe("ExponentialBackoff", () => {
  it("should double from the initial delay up to the cap", () => {
    const backoff = new ExponentialBackoff(1_000, 30_000);
    const delays = Array.from({ length: 8 }, () => backoff.nextDelay());

    expect(delays).toEqual([
      1_000, 2_000, 4_000, 8_000, 16_000, 30_000, 30_000, 30_000,
    ]);
    expect(backoff.attempts).toBe(8);
  });

  it("should restart from the initial delay after reset", () => {
    const backoff = new ExponentialBackoff(1_000, 30_000);
    backoff.nextDelay();
    backoff.nextDelay();
    backoff.nextDelay();

    backoff.reset();

    expect(backoff.peek()).toBe(1_000);
    expect(backoff.nextDelay()).toBe(1_000);
    expect(backoff.attempts).toBe(1);
  });

  it("should reject inverted bounds", () => {
    expect(() => new ExponentialBackoff(5_000, 1_000)).toThrow(RangeError);
  });
});
