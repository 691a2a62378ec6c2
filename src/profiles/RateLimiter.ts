import { Logger } from "../utils/Logger";
import { nowMs } from "../utils/utils";

/**
 * Sliding-window rate limiter for outbound relay requests. At most
 * `limit` requests start within any `windowMs` window; scheduled tasks
 * over the limit wait for a free slot instead of being dropped.
 */
export class RateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly logger: Logger;
  private timestamps: number[] = [];
  private queue: Array<() => void> = [];
  private drainTimer: NodeJS.Timeout | null = null;

  /**
   * @param limit - Requests allowed per window
   * @param windowMs - Window length in milliseconds
   */
  constructor(limit: number = 10, windowMs: number = 1_000, logger?: Logger) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError(`Rate limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
    this.windowMs = windowMs;
    this.logger = logger ?? new Logger({ service: "rate-limiter" });
  }

  /**
   * Take a slot if one is free in the current window
   * @returns true if a slot was taken, false if rate limited
   */
  acquire(): boolean {
    this.prune();
    if (this.timestamps.length >= this.limit) return false;
    this.timestamps.push(nowMs());
    return true;
  }

  /**
   * Run `task` now if a slot is free and nothing is waiting, otherwise
   * queue it behind earlier tasks.
   */
  schedule(task: () => void): void {
    if (this.queue.length === 0 && this.acquire()) {
      this.run(task);
      return;
    }
    this.queue.push(task);
    this.scheduleDrain();
  }

  /**
   * Slots left in the current window (for monitoring)
   */
  getRemainingSlots(): number {
    this.prune();
    return this.limit - this.timestamps.length;
  }

  getQueuedCount(): number {
    return this.queue.length;
  }

  getLimit(): number {
    return this.limit;
  }

  getWindowMs(): number {
    return this.windowMs;
  }

  /** Drop every queued task and cancel the pending drain. */
  clear(): void {
    this.queue = [];
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
  }

  private prune(): void {
    const now = nowMs();
    while (
      this.timestamps.length > 0 &&
      now - (this.timestamps[0] ?? now) >= this.windowMs
    ) {
      this.timestamps.shift();
    }
  }

  private scheduleDrain(): void {
    if (this.drainTimer || this.queue.length === 0) return;
    this.prune();
    const oldest = this.timestamps[0];
    const wait = oldest === undefined ? 0 : oldest + this.windowMs - nowMs();
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      this.drain();
    }, Math.max(0, wait));
  }

  private drain(): void {
    while (this.queue.length > 0 && this.acquire()) {
      const task = this.queue.shift();
      if (task) this.run(task);
    }
    this.scheduleDrain();
  }

  private run(task: () => void): void {
    try {
      task();
    } catch (error) {
      this.logger.error("❌ Rate-limited task failed:", error);
    }
  }
}
