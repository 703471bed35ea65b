/**
 * Token bucket rate limiter for SEC EDGAR requests.
 * SEC allows 10 requests per second per user-agent.
 *
 * Tokens are reserved synchronously inside acquire(), so the balance can go
 * negative: each waiter sleeps until its own reservation is covered. One
 * instance shared by several workers therefore caps their combined rate.
 */

export interface RateLimiterOptions {
  requestsPerSecond?: number;
  /** Bucket capacity: how many requests may go out back to back */
  burst?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly requestsPerSecond: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions = {}) {
    const { requestsPerSecond = 10, burst = 1 } = options;
    if (!(requestsPerSecond > 0)) {
      throw new RangeError(`requestsPerSecond must be positive, got ${requestsPerSecond}`);
    }
    if (!(burst >= 1)) {
      throw new RangeError(`burst must be at least 1, got ${burst}`);
    }
    this.requestsPerSecond = requestsPerSecond;
    this.maxTokens = burst;
    this.tokens = burst;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.lastRefill = this.now();
  }

  get rate(): number {
    return this.requestsPerSecond;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.maxTokens, this.tokens + (elapsed * this.requestsPerSecond) / 1000);
      this.lastRefill = now;
    }
  }

  async acquire(): Promise<void> {
    this.refill();
    this.tokens -= 1;

    if (this.tokens >= 0) return;

    // Wait until this reservation is paid back
    const waitMs = Math.ceil((-this.tokens * 1000) / this.requestsPerSecond);
    await this.sleep(waitMs);
  }
}
