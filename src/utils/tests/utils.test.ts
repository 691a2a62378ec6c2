import { describe, it, expect } from "vitest";
import { chunk } from "../utils";

describe("chunk", () => {
  it("should split into chunks of the given size", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("should return no chunks for an empty array", () => {
    expect(chunk([], 30)).toEqual([]);
  });

  it("should reject a non-positive size", () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
  });
});
