/**
 * Per-connection token bucket for inbound audio frames. Starts with one
 * second of budget so the first burst after `start` is not dropped.
 */
export class FrameRateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly perSecond: number,
    private readonly now: () => number = Date.now,
  ) {
    this.tokens = perSecond;
    this.lastRefill = now();
  }

  tryTake(): boolean {
    const t = this.now();
    const elapsed = t - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.perSecond, this.tokens + (elapsed / 1000) * this.perSecond);
      this.lastRefill = t;
    }
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }
}
