export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger } from "./logger.js";
export { formatData, serializeError } from "./serialize.js";
export type {
  ConsoleTransportOptions,
  FileTransportOptions,
  JsonTransportOptions,
} from "./transports/index.js";
export { ConsoleTransport, FileTransport, JsonTransport } from "./transports/index.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
export { LOG_LEVEL_PRIORITY } from "./types.js";
