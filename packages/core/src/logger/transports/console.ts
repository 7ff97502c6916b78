import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const RESET = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
}

/**
 * Colors are off when NO_COLOR or CI is set, or stdout is not a TTY.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return Boolean(process.stdout.isTTY);
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

function formatContext(context: Record<string, unknown> | undefined): string {
  if (!context) return "";
  const parts = Object.entries(context).map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` (${parts.join(" ")})` : "";
}

/**
 * Human-readable console output; errors and fatals go to stderr.
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
  }

  /**
   * Render an entry as a single line. Exposed for tests.
   */
  format(entry: LogEntry): string {
    const timestamp = formatTimestamp(entry.timestamp);
    const level = entry.level.toUpperCase().padEnd(5);
    const tag = this.useColors ? `${LEVEL_COLORS[entry.level]}[${level}]${RESET}` : `[${level}]`;

    let output = `[${timestamp}] ${tag} ${entry.message}${formatContext(entry.context)}`;

    if (entry.data !== undefined) {
      output += ` ${typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data)}`;
    }
    return output;
  }

  log(entry: LogEntry): void {
    const output = this.format(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(output);
    } else {
      console.log(output);
    }
  }
}
