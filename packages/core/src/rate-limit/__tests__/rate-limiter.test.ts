import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CancelledError, ErrorCode } from "../../errors/index.js";
import { RateLimiter } from "../rate-limiter.js";
import { bucketConfigFor } from "../types.js";

describe("bucketConfigFor", () => {
  it("converts requests per minute to a refill rate", () => {
    expect(bucketConfigFor({ requestsPerMinute: 30, burst: 5 })).toEqual({
      capacity: 5,
      refillRate: 0.5,
    });
    expect(bucketConfigFor({ requestsPerMinute: 120 })).toEqual({ capacity: 120, refillRate: 2 });
  });
});

describe("RateLimiter", () => {
  let limiter: RateLimiter;

  beforeEach(() => {
    vi.useFakeTimers();
    limiter = new RateLimiter({
      providers: { anthropic: { requestsPerMinute: 60, burst: 1 } },
      maxWaitMs: 5_000,
    });
  });

  afterEach(() => {
    limiter.dispose();
    vi.useRealTimers();
  });

  it("passes unconfigured providers straight through", async () => {
    await expect(limiter.acquire("local")).resolves.toBeUndefined();
    expect(limiter.tryAcquire("local")).toBe(true);
    expect(limiter.isLimited("local")).toBe(false);
    expect(limiter.getStats().activeBuckets).toBe(0);
  });

  it("throttles a provider past its burst", async () => {
    await limiter.acquire("anthropic");

    let acquired = false;
    const pending = limiter.acquire("anthropic").then(() => {
      acquired = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(limiter.getStats()).toMatchObject({
      activeBuckets: 1,
      totalRequests: 2,
      throttledRequests: 1,
      rejectedRequests: 0,
    });
  });

  it("rejects when the wait would exceed maxWaitMs", async () => {
    const strict = new RateLimiter({
      providers: { anthropic: { requestsPerMinute: 60, burst: 1 } },
      maxWaitMs: 500,
    });
    await strict.acquire("anthropic");

    await expect(strict.acquire("anthropic")).rejects.toMatchObject({
      code: ErrorCode.WORKER_RATE_LIMITED,
      retryDelay: 1000,
    });
    expect(strict.getStats().rejectedRequests).toBe(1);
    strict.dispose();
  });

  it("reports tryAcquire failures", () => {
    expect(limiter.tryAcquire("anthropic")).toBe(true);
    expect(limiter.tryAcquire("anthropic")).toBe(false);
    expect(limiter.getStats().rejectedRequests).toBe(1);
  });

  it("cancels a waiting acquire", async () => {
    await limiter.acquire("anthropic");
    const controller = new AbortController();

    const pending = limiter.acquire("anthropic", 1, controller.signal);
    const assertion = expect(pending).rejects.toBeInstanceOf(CancelledError);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await assertion;
    expect(limiter.getStats().keys[0]?.pendingRequests).toBe(0);
  });

  it("refuses work after dispose", async () => {
    limiter.dispose();
    await expect(limiter.acquire("anthropic")).rejects.toThrow("RateLimiter is disposed");
  });
});
