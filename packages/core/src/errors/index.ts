// ============================================
// Quillwork Errors - Barrel Export
// ============================================

export type { RetryOptions } from "./retry.js";
export { abortableSleep, withDeadline, withRetry } from "./retry.js";
export type { ConfigurationIssue, QuillworkErrorOptions, WorkerFailureKind } from "./types.js";
export {
  AssemblyError,
  CancelledError,
  ConfigurationError,
  DuplicateSubscriptionError,
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isFatalError,
  isRetryableError,
  PersistenceError,
  QuillworkError,
  TimeoutError,
  toError,
  WorkerFailure,
} from "./types.js";
