// ============================================
// Rate Limiter Service
// ============================================

import { CancelledError, ErrorCode, QuillworkError } from "../errors/index.js";
import type { Logger } from "../logger/index.js";
import { TokenBucket } from "./token-bucket.js";
import {
  bucketConfigFor,
  DEFAULT_MAX_WAIT_MS,
  type ProviderRateLimit,
  type RateLimiterConfig,
  type RateLimiterKeyState,
  type RateLimiterStats,
} from "./types.js";

interface BucketEntry {
  bucket: TokenBucket;
  pendingRequests: number;
}

/**
 * One token bucket per provider. Only worker adapters call acquire(); the
 * time spent waiting counts against the call's deadline because the adapter
 * passes the deadline-bound signal through.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({
 *   providers: { anthropic: { requestsPerMinute: 50, burst: 5 } },
 * });
 *
 * await limiter.acquire("anthropic", 1, signal);
 * ```
 */
export class RateLimiter {
  private readonly providers: Record<string, ProviderRateLimit>;
  private readonly maxWaitMs: number;
  private readonly buckets = new Map<string, BucketEntry>();
  private readonly logger?: Logger;
  private disposed = false;
  private totalRequests = 0;
  private throttledRequests = 0;
  private rejectedRequests = 0;

  constructor(config: RateLimiterConfig = {}, logger?: Logger) {
    this.providers = { ...config.providers };
    this.maxWaitMs = config.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
    this.logger = logger;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Acquire tokens for a provider, waiting if necessary. Providers without a
   * configured budget pass straight through.
   *
   * @throws QuillworkError (WORKER_RATE_LIMITED) if the wait would exceed maxWaitMs
   * @throws CancelledError if the signal aborts while waiting
   */
  async acquire(providerId: string, tokens = 1, signal?: AbortSignal): Promise<void> {
    this.ensureNotDisposed();
    this.totalRequests++;

    const entry = this.entryFor(providerId);
    if (!entry) {
      return;
    }

    entry.pendingRequests++;
    try {
      const waitTime = entry.bucket.calculateWaitTime(tokens);

      if (waitTime > this.maxWaitMs) {
        this.rejectedRequests++;
        throw new QuillworkError(
          `Rate limit wait for "${providerId}" (${waitTime}ms) exceeds maximum (${this.maxWaitMs}ms)`,
          ErrorCode.WORKER_RATE_LIMITED,
          { retryDelay: waitTime, context: { providerId } }
        );
      }

      if (waitTime > 0) {
        this.throttledRequests++;
        this.logger?.debug(`Throttling ${providerId}`, { waitMs: waitTime });
      }

      await entry.bucket.waitForTokens(tokens, signal);
    } finally {
      entry.pendingRequests--;
    }
  }

  /**
   * Acquire without waiting.
   */
  tryAcquire(providerId: string, tokens = 1): boolean {
    this.ensureNotDisposed();
    this.totalRequests++;

    const entry = this.entryFor(providerId);
    if (!entry) {
      return true;
    }

    const acquired = entry.bucket.tryConsume(tokens);
    if (!acquired) {
      this.rejectedRequests++;
    }
    return acquired;
  }

  isLimited(providerId: string): boolean {
    return providerId in this.providers;
  }

  getStats(): RateLimiterStats {
    const keys: RateLimiterKeyState[] = [];
    for (const [key, entry] of this.buckets) {
      keys.push({ key, bucket: entry.bucket.getState(), pendingRequests: entry.pendingRequests });
    }

    return {
      activeBuckets: this.buckets.size,
      totalRequests: this.totalRequests,
      throttledRequests: this.throttledRequests,
      rejectedRequests: this.rejectedRequests,
      keys,
    };
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Dispose all buckets; waiters reject with CancelledError.
   */
  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    for (const entry of this.buckets.values()) {
      entry.bucket.dispose();
    }
    this.buckets.clear();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private entryFor(providerId: string): BucketEntry | undefined {
    const existing = this.buckets.get(providerId);
    if (existing) {
      return existing;
    }

    const limit = this.providers[providerId];
    if (!limit) {
      return undefined;
    }

    const entry: BucketEntry = { bucket: new TokenBucket(bucketConfigFor(limit)), pendingRequests: 0 };
    this.buckets.set(providerId, entry);
    return entry;
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new CancelledError("RateLimiter is disposed");
    }
  }
}
