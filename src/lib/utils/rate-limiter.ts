/**
 * Simple rate limiter that keeps a minimum delay between operations.
 */
export class RateLimiter {
  private minIntervalMs: number;
  private lastOpTime: number = 0;

  constructor(minIntervalMs: number) {
    this.minIntervalMs = minIntervalMs;
  }

  /**
   * Waits until at least `minIntervalMs` has passed since the previous call.
   * The first call never waits.
   */
  async throttle(): Promise<void> {
    if (this.minIntervalMs <= 0) return;

    const now = Date.now();
    const elapsed = now - this.lastOpTime;

    if (this.lastOpTime !== 0 && elapsed < this.minIntervalMs) {
      const delay = this.minIntervalMs - elapsed;
      await new Promise((resolve) => setTimeout(resolve, delay));
      this.lastOpTime = Date.now();
    } else {
      this.lastOpTime = now;
    }
  }
}
