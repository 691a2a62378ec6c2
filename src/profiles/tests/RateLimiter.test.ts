import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { RateLimiter } from "../RateLimiter";
import { Logger, LogLevel } from "../../utils/Logger";

describe("RateLimiter", () => {
  let rateLimiter: RateLimiter;

  beforeEach(() => {
    vi.useFakeTimers();
    rateLimiter = new RateLimiter(3, 1_000);
  });

  afterEach(() => {
    rateLimiter.clear();
    vi.useRealTimers();
  });

  describe("constructor", () => {
    it("should use default values when not provided", () => {
      const limiter = new RateLimiter();
      expect(limiter.getLimit()).toBe(10);
      expect(limiter.getWindowMs()).toBe(1_000);
      expect(limiter.getRemainingSlots()).toBe(10);
    });

    it("should reject a non-positive limit", () => {
      expect(() => new RateLimiter(0)).toThrow(RangeError);
    });
  });

  describe("acquire", () => {
    it("should allow requests within the limit", () => {
      expect(rateLimiter.acquire()).toBe(true);
      expect(rateLimiter.acquire()).toBe(true);
      expect(rateLimiter.acquire()).toBe(true);
      expect(rateLimiter.acquire()).toBe(false);
    });

    it("should free slots once they leave the window", () => {
      rateLimiter.acquire();
      vi.advanceTimersByTime(400);
      rateLimiter.acquire();
      rateLimiter.acquire();

      vi.advanceTimersByTime(599);
      expect(rateLimiter.acquire()).toBe(false);

      vi.advanceTimersByTime(1);
      expect(rateLimiter.getRemainingSlots()).toBe(1);
      expect(rateLimiter.acquire()).toBe(true);
      expect(rateLimiter.acquire()).toBe(false);
    });
  });

  describe("schedule", () => {
    it("should defer tasks over the limit instead of dropping them", () => {
      const ran: number[] = [];
      for (let i = 0; i < 5; i++) rateLimiter.schedule(() => ran.push(i));

      expect(ran).toEqual([0, 1, 2]);
      expect(rateLimiter.getQueuedCount()).toBe(2);

      vi.advanceTimersByTime(999);
      expect(ran).toEqual([0, 1, 2]);

      vi.advanceTimersByTime(1);
      expect(ran).toEqual([0, 1, 2, 3, 4]);
      expect(rateLimiter.getQueuedCount()).toBe(0);
    });

    it("should never start more than the limit within one window", () => {
      const startedAt: number[] = [];
      for (let i = 0; i < 10; i++) {
        rateLimiter.schedule(() => startedAt.push(Date.now()));
      }

      vi.advanceTimersByTime(5_000);

      expect(startedAt).toHaveLength(10);
      for (let i = 3; i < startedAt.length; i++) {
        const current = startedAt[i] ?? 0;
        const windowStart = startedAt[i - 3] ?? 0;
        expect(current - windowStart).toBeGreaterThanOrEqual(1_000);
      }
    });

    it("should keep order behind queued tasks even when a slot frees up", () => {
      const ran: string[] = [];
      rateLimiter.schedule(() => ran.push("a"));
      rateLimiter.schedule(() => ran.push("b"));
      rateLimiter.schedule(() => ran.push("c"));
      rateLimiter.schedule(() => ran.push("d"));
      rateLimiter.schedule(() => ran.push("e"));

      vi.advanceTimersByTime(1_000);

      expect(ran).toEqual(["a", "b", "c", "d", "e"]);
    });

    it("should log failing tasks and keep draining", () => {
      const logger = new Logger({ level: LogLevel.ERROR, service: "test" });
      const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => undefined);
      const limiter = new RateLimiter(1, 1_000, logger);
      const ran: string[] = [];

      limiter.schedule(() => {
        throw new Error("lookup failed");
      });
      limiter.schedule(() => ran.push("next"));
      vi.advanceTimersByTime(1_000);

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(ran).toEqual(["next"]);
    });

    it("should drop queued tasks on clear", () => {
      const ran: number[] = [];
      for (let i = 0; i < 4; i++) rateLimiter.schedule(() => ran.push(i));

      rateLimiter.clear();
      vi.advanceTimersByTime(2_000);

      expect(ran).toEqual([0, 1, 2]);
    });
  });
});
