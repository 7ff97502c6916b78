export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Higher is more severe */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * Structured context a logger stamps on every entry. The named keys are the
 * ones the pipeline scopes by; anything else rides along unchanged.
 */
export interface LogContext {
  /** Set by createLogger */
  logger?: string;
  component?: string;
  chapter?: number;
  worker?: string;
  stage?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
  data?: unknown;
  /** From the active OpenTelemetry span */
  traceId?: string;
  spanId?: string;
}

/**
 * Handle returned by Logger.time().
 */
export interface TimerResult {
  /** 0 until end() */
  readonly duration: number;
  /** Log the elapsed time at debug level and return it in ms */
  end(message?: string, data?: Record<string, unknown>): number;
}

export interface LogTransport {
  log(entry: LogEntry): void;
  flush?(): Promise<void>;
  dispose?(): void;
}

export interface LoggerOptions {
  /** Default: "info" */
  level?: LogLevel;
  context?: LogContext;
  transports?: LogTransport[];
}
