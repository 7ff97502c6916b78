import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { abortableSleep, withDeadline, withRetry } from "../retry.js";
import { CancelledError, ErrorCode, PersistenceError, QuillworkError, TimeoutError } from "../types.js";

describe("withRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.runOnlyPendingTimers();
    vi.useRealTimers();
  });

  it("succeeds on first try", async () => {
    const fn = vi.fn().mockResolvedValue("stored");

    await expect(withRetry(fn)).resolves.toBe("stored");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries a recoverable error", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new PersistenceError(1, "transient"))
      .mockResolvedValue("stored");

    const promise = withRetry(fn);
    await vi.advanceTimersByTimeAsync(1000);

    await expect(promise).resolves.toBe("stored");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("gives up after maxRetries with the last error", async () => {
    const failure = new PersistenceError(2, "still failing");
    const fn = vi.fn().mockRejectedValue(failure);

    const promise = withRetry(fn, { maxRetries: 2, baseDelay: 100 });
    const assertion = expect(promise).rejects.toBe(failure);

    await vi.advanceTimersByTimeAsync(100);
    await vi.advanceTimersByTimeAsync(200);

    await assertion;
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("uses exponential backoff", async () => {
    const fn = vi.fn().mockRejectedValue(new PersistenceError(3, "nope"));
    const onRetry = vi.fn();

    const promise = withRetry(fn, { maxRetries: 3, baseDelay: 100, onRetry });
    const assertion = expect(promise).rejects.toThrow("nope");

    await vi.advanceTimersByTimeAsync(100);
    await vi.advanceTimersByTimeAsync(200);
    await vi.advanceTimersByTimeAsync(400);

    await assertion;
    expect(onRetry.mock.calls.map((call) => call[2])).toEqual([100, 200, 400]);
  });

  it("prefers the error's retryDelay", async () => {
    const throttled = new QuillworkError("slow down", ErrorCode.WORKER_RATE_LIMITED, {
      retryDelay: 50,
    });
    const fn = vi.fn().mockRejectedValueOnce(throttled).mockResolvedValue("ok");
    const onRetry = vi.fn();

    const promise = withRetry(fn, { onRetry });
    await vi.advanceTimersByTimeAsync(50);

    await expect(promise).resolves.toBe("ok");
    expect(onRetry).toHaveBeenCalledWith(throttled, 1, 50);
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("plain"));

    await expect(withRetry(fn)).rejects.toThrow("plain");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops when the signal aborts during backoff", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(new PersistenceError(4, "flaky"));

    const promise = withRetry(fn, { signal: controller.signal });
    const assertion = expect(promise).rejects.toBeInstanceOf(CancelledError);

    await vi.advanceTimersByTimeAsync(10);
    controller.abort();

    await assertion;
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("abortableSleep", () => {
  it("rejects immediately on an aborted signal", async () => {
    await expect(abortableSleep(1000, AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });

  it("resolves after the delay", async () => {
    await expect(abortableSleep(5)).resolves.toBeUndefined();
  });
});

describe("withDeadline", () => {
  const onDeadline = (): Error => new TimeoutError("worker.composer.request", 20);

  it("resolves when work finishes first", async () => {
    const result = await withDeadline(async () => "draft", Date.now() + 1000, { onDeadline });
    expect(result).toBe("draft");
  });

  it("rejects with the deadline error and aborts the work signal", async () => {
    let observed: AbortSignal | undefined;

    const promise = withDeadline(
      (signal) => {
        observed = signal;
        return new Promise<string>(() => undefined);
      },
      Date.now() + 20,
      { onDeadline }
    );

    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    expect(observed?.aborted).toBe(true);
  });

  it("rejects with CancelledError when the parent aborts", async () => {
    const parent = new AbortController();

    const promise = withDeadline(() => new Promise<string>(() => undefined), Date.now() + 1000, {
      parent: parent.signal,
      onDeadline,
    });
    parent.abort();

    await expect(promise).rejects.toBeInstanceOf(CancelledError);
  });

  it("propagates errors from the work itself", async () => {
    await expect(
      withDeadline(() => Promise.reject(new Error("provider exploded")), Date.now() + 1000, {
        onDeadline,
      })
    ).rejects.toThrow("provider exploded");
  });
});
