// ============================================
// Rate Limiting Module
// ============================================

export { RateLimiter } from "./rate-limiter.js";
export { TokenBucket } from "./token-bucket.js";
export type {
  ProviderRateLimit,
  RateLimiterConfig,
  RateLimiterKeyState,
  RateLimiterStats,
  TokenBucketConfig,
  TokenBucketState,
} from "./types.js";
export { bucketConfigFor, DEFAULT_MAX_WAIT_MS } from "./types.js";
