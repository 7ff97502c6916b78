// ============================================
// Rate Limiting Type Definitions
// ============================================

/**
 * Configuration for a single token bucket.
 */
export interface TokenBucketConfig {
  /** Maximum tokens in bucket (capacity) */
  readonly capacity: number;
  /** Tokens added per second */
  readonly refillRate: number;
  /** Initial token count (defaults to capacity) */
  readonly initialTokens?: number;
}

/**
 * Token bucket state snapshot for monitoring.
 */
export interface TokenBucketState {
  /** Current available tokens */
  readonly tokens: number;
  /** Timestamp of last refill */
  readonly lastRefillTime: number;
  /** Total tokens consumed since creation */
  readonly totalConsumed: number;
  /** Total milliseconds waited for tokens */
  readonly totalWaited: number;
}

/**
 * Per-provider request budget, as providers publish it.
 */
export interface ProviderRateLimit {
  readonly requestsPerMinute: number;
  /** Requests allowed back to back (default: requestsPerMinute) */
  readonly burst?: number;
}

/**
 * Configuration for the rate limiter service.
 */
export interface RateLimiterConfig {
  /** Budgets keyed by provider id. Providers not listed are not limited. */
  readonly providers?: Record<string, ProviderRateLimit>;
  /** Maximum wait time in ms before giving up (default: 60000) */
  readonly maxWaitMs?: number;
}

/**
 * Rate limiter state for a specific provider.
 */
export interface RateLimiterKeyState {
  readonly key: string;
  readonly bucket: TokenBucketState;
  /** Callers currently waiting on this bucket */
  readonly pendingRequests: number;
}

/**
 * Overall rate limiter statistics.
 */
export interface RateLimiterStats {
  readonly activeBuckets: number;
  readonly totalRequests: number;
  /** Requests that had to wait */
  readonly throttledRequests: number;
  readonly rejectedRequests: number;
  readonly keys: RateLimiterKeyState[];
}

export const DEFAULT_MAX_WAIT_MS = 60_000;

/**
 * Convert a provider budget into bucket settings.
 *
 * @example
 * ```typescript
 * bucketConfigFor({ requestsPerMinute: 30, burst: 5 });
 * // => { capacity: 5, refillRate: 0.5 }
 * ```
 */
export function bucketConfigFor(limit: ProviderRateLimit): TokenBucketConfig {
  return {
    capacity: limit.burst ?? limit.requestsPerMinute,
    refillRate: limit.requestsPerMinute / 60,
  };
}
