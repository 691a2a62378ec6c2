/**
 * Exponential reconnect delay: starts at `initialMs`, doubles per attempt
 * and stays at `maxMs` once reached.
 */
export class ExponentialBackoff {
  private delay: number;
  private attempt = 0;

  constructor(
    private readonly initialMs: number = 1_000,
    private readonly maxMs: number = 30_000,
  ) {
    if (initialMs <= 0 || maxMs < initialMs) {
      throw new RangeError(
        `Invalid backoff bounds: initial=${initialMs} max=${maxMs}`,
      );
    }
    this.delay = initialMs;
  }

  /** Delay for the next attempt; advances the sequence. */
  nextDelay(): number {
    const current = this.delay;
    this.delay = Math.min(this.delay * 2, this.maxMs);
    this.attempt += 1;
    return current;
  }

  /** Delay the next call to nextDelay() will return. */
  peek(): number {
    return this.delay;
  }

  get attempts(): number {
    return this.attempt;
  }

  reset(): void {
    this.delay = this.initialMs;
    this.attempt = 0;
  }
}
