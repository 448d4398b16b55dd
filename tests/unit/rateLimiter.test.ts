/**
 * Rate Limiter Unit Test
 *
 * Requirement: per-source token bucket that never waits and reports how long
 * until the next token
 */

import { describe, expect, it } from "vitest";
import { RateLimiter } from "../../services/meta-router/src/rateLimiter";

function clock(start = 0): { now: () => number; advance: (ms: number) => void } {
  let t = start;
  return {
    now: () => t,
    advance: (ms) => {
      t += ms;
    },
  };
}

describe("RateLimiter", () => {
  it("starts full and denies once the bucket is empty", () => {
    const time = clock();
    const limiter = new RateLimiter(time.now);

    expect(limiter.tryAcquire("ext", 2)).toEqual({ allowed: true, remaining: 1 });
    expect(limiter.tryAcquire("ext", 2)).toEqual({ allowed: true, remaining: 0 });
    expect(limiter.tryAcquire("ext", 2)).toEqual({ allowed: false, retryAfterMs: 30000 });
  });

  it("refills continuously at capacity per minute", () => {
    const time = clock();
    const limiter = new RateLimiter(time.now);
    limiter.tryAcquire("ext", 2);
    limiter.tryAcquire("ext", 2);

    time.advance(15000);
    expect(limiter.tryAcquire("ext", 2)).toEqual({ allowed: false, retryAfterMs: 15000 });

    time.advance(15000);
    expect(limiter.tryAcquire("ext", 2)).toEqual({ allowed: true, remaining: 0 });
  });

  it("allows one call per minute at a limit of 1", () => {
    const time = clock();
    const limiter = new RateLimiter(time.now);

    expect(limiter.tryAcquire("ext", 1).allowed).toBe(true);
    time.advance(30000);
    expect(limiter.tryAcquire("ext", 1)).toEqual({ allowed: false, retryAfterMs: 30000 });
    time.advance(30000);
    expect(limiter.tryAcquire("ext", 1).allowed).toBe(true);
  });

  it("never refills past capacity", () => {
    const time = clock();
    const limiter = new RateLimiter(time.now);
    limiter.tryAcquire("ext", 3);

    time.advance(10 * 60000);
    expect(limiter.available("ext")).toBe(3);
  });

  it("keeps buckets per source", () => {
    const limiter = new RateLimiter(clock().now);
    limiter.tryAcquire("one", 1);

    expect(limiter.tryAcquire("one", 1).allowed).toBe(false);
    expect(limiter.tryAcquire("two", 1).allowed).toBe(true);
  });

  it("treats a zero limit as unlimited", () => {
    const limiter = new RateLimiter(clock().now);
    for (let i = 0; i < 100; i++) {
      expect(limiter.tryAcquire("dex", 0).allowed).toBe(true);
    }
    expect(limiter.available("dex")).toBeUndefined();
  });

  it("shrinks the bucket when the limit is lowered", () => {
    const limiter = new RateLimiter(clock().now);
    limiter.tryAcquire("ext", 10);

    expect(limiter.tryAcquire("ext", 1)).toEqual({ allowed: true, remaining: 0 });
    expect(limiter.tryAcquire("ext", 1).allowed).toBe(false);
  });
});
