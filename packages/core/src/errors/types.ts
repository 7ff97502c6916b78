// ============================================
// Quillwork Error Types
// ============================================

/**
 * Categorized error codes.
 *
 * Categories:
 * - 1xxx: Configuration errors
 * - 2xxx: Message bus errors
 * - 3xxx: Worker errors
 * - 4xxx: Pipeline errors
 * - 5xxx: Persistence errors
 */
export enum ErrorCode {
  // 1xxx - Configuration errors
  CONFIG_INVALID = 1001,
  CONFIG_NOT_FOUND = 1002,
  CONFIG_PARSE_ERROR = 1003,
  CONFIG_MISSING_WORKER = 1004,

  // 2xxx - Message bus errors
  BUS_REQUEST_TIMEOUT = 2001,
  BUS_REQUEST_CANCELLED = 2002,
  BUS_DUPLICATE_SUBSCRIPTION = 2003,
  BUS_NO_SUBSCRIBER = 2004,

  // 3xxx - Worker errors
  WORKER_PROVIDER_ERROR = 3001,
  WORKER_RATE_LIMITED = 3002,
  WORKER_INVALID_RESPONSE = 3003,
  WORKER_DEADLINE_EXCEEDED = 3004,
  WORKER_INVALID_REQUEST = 3005,
  WORKER_CANCELLED = 3006,

  // 4xxx - Pipeline errors
  PIPELINE_ASSEMBLY_MISMATCH = 4001,
  PIPELINE_DEPENDENCY_CYCLE = 4002,

  // 5xxx - Persistence errors
  PERSISTENCE_FAILED = 5001,
}

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Surfaced as a stage issue; the chapter may continue */
  RECOVERABLE = "recoverable",
  /** Someone has to fix configuration or data */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.BUS_REQUEST_TIMEOUT:
    case ErrorCode.WORKER_PROVIDER_ERROR:
    case ErrorCode.WORKER_RATE_LIMITED:
    case ErrorCode.WORKER_INVALID_RESPONSE:
    case ErrorCode.WORKER_DEADLINE_EXCEEDED:
    case ErrorCode.PERSISTENCE_FAILED:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.CONFIG_MISSING_WORKER:
    case ErrorCode.BUS_DUPLICATE_SUBSCRIPTION:
    case ErrorCode.BUS_NO_SUBSCRIBER:
    case ErrorCode.WORKER_INVALID_REQUEST:
    case ErrorCode.PIPELINE_DEPENDENCY_CYCLE:
      return ErrorSeverity.USER_ACTION;

    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating a QuillworkError.
 */
export interface QuillworkErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Whether this error can be retried */
  isRetryable?: boolean;
  /** Suggested delay before retry in milliseconds */
  retryDelay?: number;
}

/**
 * Base error class for all Quillwork errors.
 */
export class QuillworkError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;
  private readonly _retryDelay?: number;

  constructor(message: string, code: ErrorCode, options?: QuillworkErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "QuillworkError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;
    this._retryDelay = options?.retryDelay;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Defaults to true for RECOVERABLE severity unless set explicitly.
   */
  get isRetryable(): boolean {
    if (this._isRetryable !== undefined) {
      return this._isRetryable;
    }
    return this.severity === ErrorSeverity.RECOVERABLE;
  }

  get retryDelay(): number | undefined {
    if (!this.isRetryable) {
      return undefined;
    }
    return this._retryDelay;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      isRetryable: this.isRetryable,
      retryDelay: this.retryDelay,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

// ============================================
// Taxonomy
// ============================================

/**
 * A request/response call exceeded its deadline.
 */
export class TimeoutError extends QuillworkError {
  readonly timeoutMs: number;
  readonly topic: string;

  constructor(topic: string, timeoutMs: number, options?: QuillworkErrorOptions) {
    super(`No response on "${topic}" within ${timeoutMs}ms`, ErrorCode.BUS_REQUEST_TIMEOUT, {
      ...options,
      context: { topic, timeoutMs, ...options?.context },
    });
    this.name = "TimeoutError";
    this.topic = topic;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Explicit or inherited cancellation. Never retried automatically.
 */
export class CancelledError extends QuillworkError {
  constructor(message = "Operation cancelled", options?: QuillworkErrorOptions) {
    super(message, ErrorCode.BUS_REQUEST_CANCELLED, { ...options, isRetryable: false });
    this.name = "CancelledError";
  }
}

/**
 * Raised when a bus enforcing single-handler topics gets a second handler.
 */
export class DuplicateSubscriptionError extends QuillworkError {
  readonly topic: string;

  constructor(topic: string) {
    super(`Topic "${topic}" already has a handler`, ErrorCode.BUS_DUPLICATE_SUBSCRIPTION, {
      context: { topic },
    });
    this.name = "DuplicateSubscriptionError";
    this.topic = topic;
  }
}

/**
 * How a worker collaborator failed.
 */
export type WorkerFailureKind =
  | "provider_error"
  | "rate_limited"
  | "invalid_response"
  | "deadline_exceeded"
  | "invalid_request"
  | "cancelled";

const WORKER_FAILURE_CODES: Record<WorkerFailureKind, ErrorCode> = {
  provider_error: ErrorCode.WORKER_PROVIDER_ERROR,
  rate_limited: ErrorCode.WORKER_RATE_LIMITED,
  invalid_response: ErrorCode.WORKER_INVALID_RESPONSE,
  deadline_exceeded: ErrorCode.WORKER_DEADLINE_EXCEEDED,
  invalid_request: ErrorCode.WORKER_INVALID_REQUEST,
  cancelled: ErrorCode.WORKER_CANCELLED,
};

/**
 * A collaborator reported an error. Recoverable; becomes a stage issue.
 */
export class WorkerFailure extends QuillworkError {
  readonly kind: WorkerFailureKind;
  readonly worker: string;

  constructor(
    worker: string,
    kind: WorkerFailureKind,
    message: string,
    options?: QuillworkErrorOptions
  ) {
    super(message, WORKER_FAILURE_CODES[kind], {
      ...options,
      context: { worker, kind, ...options?.context },
    });
    this.name = "WorkerFailure";
    this.kind = kind;
    this.worker = worker;
  }
}

/**
 * A single configuration problem.
 */
export interface ConfigurationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Missing adapter, unknown topic or invalid settings. Fatal at startup.
 */
export class ConfigurationError extends QuillworkError {
  readonly issues: readonly ConfigurationIssue[];

  constructor(
    message: string,
    issues: readonly ConfigurationIssue[] = [],
    code: ErrorCode = ErrorCode.CONFIG_INVALID
  ) {
    super(message, code, { context: { issues } });
    this.name = "ConfigurationError";
    this.issues = Object.freeze([...issues]);
  }
}

/**
 * Finalize failed. The snapshot is kept by the caller for a retry.
 */
export class PersistenceError extends QuillworkError {
  readonly chapterNumber: number;

  constructor(chapterNumber: number, message: string, options?: QuillworkErrorOptions) {
    super(message, ErrorCode.PERSISTENCE_FAILED, {
      ...options,
      context: { chapterNumber, ...options?.context },
    });
    this.name = "PersistenceError";
    this.chapterNumber = chapterNumber;
  }
}

/**
 * Composed scenes do not line up with the outline.
 */
export class AssemblyError extends QuillworkError {
  constructor(expected: number, actual: number) {
    super(
      `Expected ${expected} composed scenes, got ${actual}`,
      ErrorCode.PIPELINE_ASSEMBLY_MISMATCH,
      { context: { expected, actual } }
    );
    this.name = "AssemblyError";
  }
}

/**
 * Type guard to check if an error is a QuillworkError with FATAL severity.
 */
export function isFatalError(error: unknown): error is QuillworkError {
  return error instanceof QuillworkError && error.severity === ErrorSeverity.FATAL;
}

/**
 * Returns true if error is a QuillworkError with isRetryable=true.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof QuillworkError && error.isRetryable;
}

/**
 * Normalise an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
