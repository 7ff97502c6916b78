import { context as otelContext, trace } from "@opentelemetry/api";
import type { LogContext, LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Leveled logger fanning entries out to transports. Scoped loggers
 * (`forChapter`, `forWorker`, ...) share the parent's transports, so one
 * JSONL sink receives the whole run with each line tagged by where it came
 * from.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "info", transports: [new ConsoleTransport()] });
 * const chapterLog = logger.forChapter(3);
 * chapterLog.info("Entering PLANNING");
 * // [..] [INFO ] Entering PLANNING (chapter=3)
 * ```
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: LogContext;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  // ============================================
  // Scoping
  // ============================================

  child(context: LogContext): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  forChapter(chapter: number): Logger {
    return this.child({ chapter });
  }

  forWorker(worker: string): Logger {
    return this.child({ worker });
  }

  forStage(stage: string): Logger {
    return this.child({ stage });
  }

  forComponent(component: string): Logger {
    return this.child({ component });
  }

  /**
   * Measure a stage or call. `label` is the default end() message suffix.
   */
  time(label: string): TimerResult {
    const startedAt = performance.now();
    let duration = 0;

    return {
      get duration() {
        return duration;
      },
      end: (message, data) => {
        duration = performance.now() - startedAt;
        this.log("debug", message ?? `${label} completed`, { ...data, durationMs: Math.round(duration) });
        return duration;
      },
    };
  }

  // ============================================
  // Transports
  // ============================================

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  async flush(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.flush?.()));
  }

  dispose(): void {
    for (const transport of this.transports) {
      transport.dispose?.();
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.enabled(level)) return;

    const span = trace.getSpan(otelContext.active());
    const ids = span ? span.spanContext() : undefined;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
      ...(ids && { traceId: ids.traceId, spanId: ids.spanId }),
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}
