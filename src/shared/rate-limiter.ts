import { TooManyRequestsError } from './errors';

interface RateLimiterOptions {
  maxRequestsPerMinute: number;
  maxWaitMs?: number;
}

/**
 * In-memory rate limiter using the token bucket algorithm.
 * Limits are per process.
 */
export class RateLimiter {
  private tokens: number;
  private maxTokens: number;
  private refillRate: number; // tokens per ms
  private lastRefill: number;
  private maxWaitMs: number;

  constructor(options: RateLimiterOptions) {
    this.maxTokens = options.maxRequestsPerMinute;
    this.tokens = this.maxTokens;
    this.refillRate = options.maxRequestsPerMinute / 60000; // per ms
    this.lastRefill = Date.now();
    this.maxWaitMs = options.maxWaitMs ?? 30000;
  }

  /**
   * Acquire a token, waiting if necessary.
   * Throws TooManyRequestsError if the wait would exceed maxWaitMs.
   */
  async acquire(): Promise<void> {
    const waitMs = this.reserve();
    if (waitMs === 0) return;

    await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
  }

  /**
   * Try to acquire a token without waiting
   */
  tryAcquire(): boolean {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }

    return false;
  }

  getAvailableTokens(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens));
  }

  /**
   * Estimated wait time in ms for the next token
   */
  getWaitTime(): number {
    this.refill();

    if (this.tokens >= 1) {
      return 0;
    }

    return Math.ceil((1 - this.tokens) / this.refillRate);
  }

  /**
   * Take a token now, borrowing against future refills when the bucket is
   * empty. Returns how long the caller must wait before using it.
   */
  private reserve(): number {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
    if (waitMs > this.maxWaitMs) {
      const retryAfter = Math.ceil(waitMs / 1000);
      throw new TooManyRequestsError(`Rate limit exceeded. Try again in ${retryAfter} seconds`, retryAfter);
    }

    this.tokens -= 1;
    return waitMs;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;

    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
