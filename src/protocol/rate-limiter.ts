export interface RateLimiterOptions {
  requestsPerMinute: number;
  burstSize: number;
  /** Milliseconds clock, injectable for tests. */
  now?: () => number;
}

interface Bucket {
  tokens: number;
  lastRefill: number;
}

export interface BucketStats {
  key: string;
  tokensRemaining: number;
  requestsPerMinute: number;
  burstSize: number;
}

/**
 * Token bucket per key. `isAllowed` is synchronous: refill, check and
 * decrement happen without yielding, so concurrent requests on the same key
 * cannot both spend the last token.
 */
export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly now: () => number;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
  }

  isAllowed(key = "default"): boolean {
    const bucket = this.refill(key);
    if (bucket.tokens < 1) return false;
    bucket.tokens -= 1;
    return true;
  }

  stats(key = "default"): BucketStats {
    return {
      key,
      tokensRemaining: this.refill(key).tokens,
      requestsPerMinute: this.options.requestsPerMinute,
      burstSize: this.options.burstSize,
    };
  }

  reset(key: string): void {
    this.buckets.delete(key);
  }

  private refill(key: string): Bucket {
    const now = this.now();
    const bucket = this.buckets.get(key);
    if (!bucket) {
      const fresh = { tokens: this.options.burstSize, lastRefill: now };
      this.buckets.set(key, fresh);
      return fresh;
    }

    const elapsed = Math.max(0, now - bucket.lastRefill);
    bucket.tokens = Math.min(this.options.burstSize, bucket.tokens + (elapsed * this.options.requestsPerMinute) / 60_000);
    bucket.lastRefill = now;
    return bucket;
  }
}
