import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel, LogTransport } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'quillwork') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Output JSON lines instead of human-readable text (default: false) */
  json?: boolean;
  /** Enable colored console output (default: auto-detect) */
  colors?: boolean;
  /** Extra transports appended after the console one */
  transports?: LogTransport[];
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * const silent = createLogger({ console: false, transports: [memory] });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "quillwork" },
  });

  if (options.console ?? true) {
    logger.addTransport(
      options.json ? new JsonTransport() : new ConsoleTransport({ colors: options.colors })
    );
  }

  for (const transport of options.transports ?? []) {
    logger.addTransport(transport);
  }

  return logger;
}
