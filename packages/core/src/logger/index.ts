/**
 * Logging: leveled logger, file and console transports, and the factory the
 * CLI uses.
 *
 * @module logger
 */

export { type CreateLoggerOptions, createLogger } from "./factory.js";
export { Logger } from "./logger.js";
export {
  ConsoleTransport,
  type ConsoleTransportOptions,
  FileTransport,
  type FileTransportOptions,
  formatLogLine,
} from "./transports/index.js";
export {
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  type LogEntry,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
  type TimerResult,
} from "./types.js";
