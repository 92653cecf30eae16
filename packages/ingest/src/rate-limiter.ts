export interface RateLimiterConfig {
  requests: number;
  perSeconds: number;
}

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillIntervalMs: number;
  private readonly refillAmount: number;

  constructor(
    config: RateLimiterConfig,
    private readonly now: () => number = Date.now
  ) {
    this.maxTokens = config.requests;
    this.tokens = config.requests;
    this.refillAmount = config.requests;
    this.refillIntervalMs = config.perSeconds * 1000;
    this.lastRefill = this.now();
  }

  private refill(): void {
    const elapsed = this.now() - this.lastRefill;
    const refillCycles = Math.floor(elapsed / this.refillIntervalMs);

    if (refillCycles > 0) {
      this.tokens = Math.min(this.maxTokens, this.tokens + refillCycles * this.refillAmount);
      this.lastRefill += refillCycles * this.refillIntervalMs;
    }
  }

  /** Takes a token if one is free; otherwise returns how long to wait for the next refill. */
  tryAcquire(): number {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    return Math.max(0, this.refillIntervalMs - (this.now() - this.lastRefill));
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const waitTime = this.tryAcquire();
      if (waitTime === 0) return;
      await this.delay(waitTime, signal);
    }
  }

  private delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
