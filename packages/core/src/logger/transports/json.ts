import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Custom output function (default: console.log) */
  output?: (line: string) => void;
}

/**
 * Single-line JSON per entry.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * logger.addTransport(new JsonTransport({ output: (line) => lines.push(line) }));
 * // {"time":"2026-01-05T10:00:00.000Z","level":"info","message":"Chapter 3 done"}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? console.log;
  }

  log(entry: LogEntry): void {
    const obj: Record<string, unknown> = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      obj.context = entry.context;
    }

    obj.message = entry.message;

    if (entry.data !== undefined) {
      obj.data = entry.data instanceof Error ? serializeError(entry.data) : entry.data;
    }
    if (entry.traceId) {
      obj.traceId = entry.traceId;
      obj.spanId = entry.spanId;
    }

    this.output(JSON.stringify(obj));
  }
}

function serializeError(error: Error): Record<string, unknown> {
  return { name: error.name, message: error.message };
}
