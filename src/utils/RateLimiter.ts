/**
 * Rate Limiter - Token bucket for pacing API writes
 *
 * Wikidata bot policy expects edits to be spread out; the edit submitter
 * takes one token per wbeditentity call.
 */

export interface RateLimiterOptions {
  /** Clock in milliseconds, replaceable in tests */
  now?: () => number;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Token bucket rate limiter
 */
export class RateLimiter {
  private tokens: number;
  private readonly capacity: number;
  private readonly refillRate: number; // tokens per second
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  /**
   * @param capacity - Maximum tokens (burst capacity)
   * @param refillRate - Tokens per second
   */
  constructor(capacity: number, refillRate: number, options: RateLimiterOptions = {}) {
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.tokens = capacity;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.lastRefill = this.now();
  }

  /**
   * Acquire a token, waiting for the bucket to refill if it is empty
   *
   * @returns Milliseconds spent waiting
   */
  async acquire(): Promise<number> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    const waitTime = Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
    await this.sleep(waitTime);

    this.refill();
    this.tokens = Math.max(0, this.tokens - 1);
    return waitTime;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = (now - this.lastRefill) / 1000; // seconds
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
