// ============================================
// Retry and Deadline Utilities
// ============================================

import { CancelledError, isRetryableError, QuillworkError } from "./types.js";

/**
 * Options for the withRetry function.
 */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds before first retry (default: 1000) */
  baseDelay?: number;
  /** Maximum delay in milliseconds between retries (default: 30000) */
  maxDelay?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Custom function to determine if error should be retried */
  shouldRetry?: (error: unknown) => boolean;
  /** Callback called before each retry attempt */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** AbortSignal to cancel retry attempts */
  signal?: AbortSignal;
}

type BackoffOptions = Required<Omit<RetryOptions, "shouldRetry" | "onRetry" | "signal">>;

const DEFAULT_RETRY_OPTIONS: BackoffOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Sleeps for the specified duration with abort signal support.
 *
 * @throws CancelledError if the signal is aborted
 */
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new CancelledError();
  }

  return new Promise((resolve, reject) => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    let abortHandler: (() => void) | undefined;

    const cleanup = (): void => {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
      if (signal && abortHandler) {
        signal.removeEventListener("abort", abortHandler);
      }
    };

    timeoutId = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    if (signal) {
      abortHandler = (): void => {
        cleanup();
        reject(new CancelledError());
      };

      signal.addEventListener("abort", abortHandler, { once: true });
    }
  });
}

/**
 * Exponential backoff, honouring QuillworkError.retryDelay when present.
 */
function calculateDelay(attempt: number, options: BackoffOptions, error: unknown): number {
  if (error instanceof QuillworkError && error.retryDelay !== undefined) {
    return Math.min(error.retryDelay, options.maxDelay);
  }

  const exponentialDelay = options.baseDelay * options.backoffMultiplier ** (attempt - 1);
  return Math.min(exponentialDelay, options.maxDelay);
}

/**
 * Wraps an async function with retry logic using exponential backoff.
 *
 * @example
 * ```typescript
 * await withRetry(() => store.commit(7, snapshot), {
 *   maxRetries: 2,
 *   shouldRetry: (err) => err instanceof PersistenceError,
 * });
 * ```
 *
 * @throws The last error if all retries are exhausted
 * @throws CancelledError if the signal is aborted
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const opts: BackoffOptions = {
    maxRetries: options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    baseDelay: options?.baseDelay ?? DEFAULT_RETRY_OPTIONS.baseDelay,
    maxDelay: options?.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay,
    backoffMultiplier: options?.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier,
  };

  const shouldRetryFn = options?.shouldRetry ?? isRetryableError;
  const onRetryFn = options?.onRetry;
  const signal = options?.signal;

  let attempt = 0;

  while (true) {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await fn();
    } catch (error) {
      attempt++;

      if (attempt > opts.maxRetries || !shouldRetryFn(error)) {
        throw error;
      }

      const delay = calculateDelay(attempt, opts, error);
      onRetryFn?.(error, attempt, delay);

      await abortableSleep(delay, signal);
    }
  }
}

/**
 * Runs `fn` until `deadline` (epoch ms). The signal handed to `fn` aborts on
 * deadline or when `parent` aborts, so cooperative work can stop early.
 *
 * @throws the error produced by `onDeadline` when the deadline passes first
 * @throws CancelledError when `parent` aborts first
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  deadline: number,
  options: { parent?: AbortSignal; onDeadline: (remainingMs: number) => Error }
): Promise<T> {
  const controller = new AbortController();
  const { parent, onDeadline } = options;

  if (parent?.aborted) {
    throw new CancelledError();
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const remaining = Math.max(0, deadline - Date.now());

    const finish = (action: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
      action();
    };

    const onParentAbort = (): void => {
      controller.abort();
      finish(() => reject(new CancelledError()));
    };

    const timeoutId = setTimeout(() => {
      controller.abort();
      finish(() => reject(onDeadline(remaining)));
    }, remaining);

    parent?.addEventListener("abort", onParentAbort, { once: true });

    fn(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}
