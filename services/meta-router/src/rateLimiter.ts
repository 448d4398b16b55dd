// ============================================================================
// Rate Limiter
// Token bucket per source: capacity N, refilled continuously at N per minute.
// Never waits: an empty bucket is reported back with the time to next token.
// ============================================================================

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };

interface TokenBucket {
  tokens: number;
  lastRefill: number;
  capacity: number;
}

const MINUTE_MS = 60_000;

export class RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Takes one token from the source's bucket. `perMinute <= 0` disables the
   * limit. A changed limit (registry reload) resizes the bucket in place.
   */
  tryAcquire(sourceId: string, perMinute: number): RateLimitDecision {
    if (perMinute <= 0) {
      return { allowed: true, remaining: Number.POSITIVE_INFINITY };
    }

    const now = this.now();
    let bucket = this.buckets.get(sourceId);
    if (!bucket) {
      bucket = { tokens: perMinute, lastRefill: now, capacity: perMinute };
      this.buckets.set(sourceId, bucket);
    } else if (bucket.capacity !== perMinute) {
      bucket.capacity = perMinute;
      bucket.tokens = Math.min(bucket.tokens, perMinute);
    }

    this.refill(bucket, now);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: Math.floor(bucket.tokens) };
    }

    const missing = 1 - bucket.tokens;
    const retryAfterMs = Math.ceil(missing * (MINUTE_MS / bucket.capacity));
    return { allowed: false, retryAfterMs: Math.max(1, retryAfterMs) };
  }

  /** Tokens currently available, without consuming any. */
  available(sourceId: string): number | undefined {
    const bucket = this.buckets.get(sourceId);
    if (!bucket) return undefined;
    this.refill(bucket, this.now());
    return Math.floor(bucket.tokens);
  }

  private refill(bucket: TokenBucket, now: number): void {
    const elapsed = now - bucket.lastRefill;
    if (elapsed <= 0) return;

    bucket.tokens = Math.min(bucket.capacity, bucket.tokens + (elapsed * bucket.capacity) / MINUTE_MS);
    bucket.lastRefill = now;
  }
}
