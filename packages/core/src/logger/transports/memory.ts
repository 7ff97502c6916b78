import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * Keeps entries in an array. Used by tests and by embedders that surface
 * pipeline logs in their own UI.
 */
export class MemoryTransport implements LogTransport {
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  filter(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
