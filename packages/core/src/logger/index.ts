export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger } from "./logger.js";
export type { ConsoleTransportOptions, JsonTransportOptions } from "./transports/index.js";
export { ConsoleTransport, JsonTransport, MemoryTransport } from "./transports/index.js";
export type { LogContext, LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
export { LOG_LEVEL_PRIORITY } from "./types.js";
