import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RateLimiter } from "../../src/shared/rate-limiter";
import { TooManyRequestsError } from "../../src/shared/errors";

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("hands out a minute's worth of tokens, then refills", () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 60 });

    for (let i = 0; i < 60; i++) {
      expect(limiter.tryAcquire()).toBe(true);
    }
    expect(limiter.tryAcquire()).toBe(false);
    expect(limiter.getAvailableTokens()).toBe(0);
    expect(limiter.getWaitTime()).toBe(1000);

    vi.advanceTimersByTime(1001);
    expect(limiter.tryAcquire()).toBe(true);
  });

  it("waits for the next token inside the allowed window", async () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 60, maxWaitMs: 5000 });
    for (let i = 0; i < 60; i++) limiter.tryAcquire();

    let acquired = false;
    const pending = limiter.acquire().then(() => {
      acquired = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(acquired).toBe(true);
  });

  it("rejects when the wait would exceed the allowed window", async () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 60, maxWaitMs: 100 });
    for (let i = 0; i < 60; i++) await limiter.acquire();

    const rejection = limiter.acquire();
    await expect(rejection).rejects.toBeInstanceOf(TooManyRequestsError);
    await expect(rejection).rejects.toMatchObject({ retryAfter: 1 });
  });
});
