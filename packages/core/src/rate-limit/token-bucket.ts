// ============================================
// Token Bucket
// ============================================

import { CancelledError, ErrorCode, QuillworkError } from "../errors/index.js";
import type { TokenBucketConfig, TokenBucketState } from "./types.js";

/**
 * Token bucket with lazy refill. Tokens accrue continuously from elapsed time,
 * so no background timer is needed.
 *
 * @example
 * ```typescript
 * const bucket = new TokenBucket({ capacity: 10, refillRate: 1 });
 *
 * // Wait for a token (blocking)
 * await bucket.waitForTokens(1, signal);
 *
 * // Try immediate acquisition (non-blocking)
 * if (bucket.tryConsume()) {
 *   // Token acquired
 * }
 * ```
 */
export class TokenBucket {
  private readonly config: Required<TokenBucketConfig>;
  private tokens: number;
  private lastRefillTime: number;
  private totalConsumed = 0;
  private totalWaited = 0;
  private readonly sleepers = new Set<() => void>();
  private disposed = false;

  constructor(config: TokenBucketConfig) {
    if (config.capacity <= 0) {
      throw new Error("TokenBucket capacity must be positive");
    }
    if (config.refillRate <= 0) {
      throw new Error("TokenBucket refillRate must be positive");
    }

    this.config = {
      capacity: config.capacity,
      refillRate: config.refillRate,
      initialTokens: config.initialTokens ?? config.capacity,
    };
    this.tokens = this.config.initialTokens;
    this.lastRefillTime = Date.now();
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Consume tokens if available right now.
   */
  tryConsume(tokens = 1): boolean {
    this.ensureNotDisposed();

    if (tokens <= 0) {
      return true;
    }
    if (tokens > this.config.capacity) {
      return false;
    }

    this.refill();

    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      this.totalConsumed += tokens;
      return true;
    }
    return false;
  }

  /**
   * Wait until `tokens` are available and consume them.
   *
   * @throws QuillworkError (WORKER_RATE_LIMITED) if `tokens` exceeds capacity
   * @throws CancelledError if the signal aborts or the bucket is disposed while waiting
   */
  async waitForTokens(tokens = 1, signal?: AbortSignal): Promise<void> {
    this.ensureNotDisposed();

    if (tokens > this.config.capacity) {
      throw new QuillworkError(
        `Requested ${tokens} tokens exceeds bucket capacity ${this.config.capacity}`,
        ErrorCode.WORKER_RATE_LIMITED,
        { isRetryable: false }
      );
    }

    while (!this.tryConsume(tokens)) {
      if (signal?.aborted) {
        throw new CancelledError("Token acquisition aborted");
      }
      const waitTime = this.calculateWaitTime(tokens);
      this.totalWaited += waitTime;
      await this.sleep(waitTime, signal);
    }
  }

  /**
   * Milliseconds until `tokens` would be available; 0 if available now.
   */
  calculateWaitTime(tokens = 1): number {
    this.ensureNotDisposed();
    this.refill();

    if (this.tokens >= tokens) {
      return 0;
    }

    const deficit = tokens - this.tokens;
    return Math.ceil((deficit / this.config.refillRate) * 1000);
  }

  getState(): TokenBucketState {
    if (!this.disposed) {
      this.refill();
    }
    return {
      tokens: Math.floor(this.tokens),
      lastRefillTime: this.lastRefillTime,
      totalConsumed: this.totalConsumed,
      totalWaited: this.totalWaited,
    };
  }

  get capacity(): number {
    return this.config.capacity;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Wakes every waiter with CancelledError.
   */
  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    for (const wake of [...this.sleepers]) {
      wake();
    }
    this.sleepers.clear();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefillTime;
    if (elapsed <= 0) return;

    this.tokens = Math.min(this.config.capacity, this.tokens + (elapsed / 1000) * this.config.refillRate);
    this.lastRefillTime = now;
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const finish = (error?: Error): void => {
        clearTimeout(timer);
        this.sleepers.delete(onDispose);
        signal?.removeEventListener("abort", onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onAbort = (): void => finish(new CancelledError("Token acquisition aborted"));
      const onDispose = (): void => finish(new CancelledError("TokenBucket disposed"));
      const timer = setTimeout(() => finish(), ms);

      this.sleepers.add(onDispose);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new CancelledError("TokenBucket is disposed");
    }
  }
}
