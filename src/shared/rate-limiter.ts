import { TooManyRequestsError } from './errors';

interface RateLimiterOptions {
  maxRequestsPerMinute: number;
  maxWaitMs?: number;
  now?: () => number;
}

/**
 * In-memory token bucket limiting calls to the language service.
 */
export class RateLimiter {
  private tokens: number;
  private maxTokens: number;
  private refillRate: number; // tokens per ms
  private lastRefill: number;
  private maxWaitMs: number;
  private now: () => number;

  constructor(options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.maxTokens = options.maxRequestsPerMinute;
    this.tokens = this.maxTokens;
    this.refillRate = options.maxRequestsPerMinute / 60000;
    this.lastRefill = this.now();
    this.maxWaitMs = options.maxWaitMs ?? 30000;
  }

  /**
   * Acquire a token, waiting if necessary.
   * Throws TooManyRequestsError if the wait would exceed maxWaitMs.
   */
  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    const waitMs = this.getWaitTime();

    if (waitMs > this.maxWaitMs) {
      throw new TooManyRequestsError(
        `Rate limit exceeded. Try again in ${Math.ceil(waitMs / 1000)} seconds`,
        waitMs
      );
    }

    // Reserve the token now so concurrent callers queue behind it
    this.tokens -= 1;
    await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
  }

  /**
   * Estimated wait time in ms for the next token
   */
  getWaitTime(): number {
    this.refill();

    if (this.tokens >= 1) {
      return 0;
    }

    const tokensNeeded = 1 - this.tokens;
    return Math.ceil(tokensNeeded / this.refillRate);
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;

    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
