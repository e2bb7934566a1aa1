import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { FileTransport } from "./transports/file.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'rewind') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable stderr output (default: false; the interface owns the terminal) */
  console?: boolean;
  /** Enable colored console output (auto-detected when omitted) */
  colors?: boolean;
  /** File transport configuration */
  file?: {
    /** Enable file logging */
    enabled: boolean;
    /** Path to log file */
    path: string;
    /** Flush interval in milliseconds */
    flushInterval?: number;
  };
}

/**
 * Factory function to create a Logger with the transports Rewind uses.
 *
 * @example
 * ```typescript
 * // Debug session: everything at debug level goes to ./debug.log
 * const logger = createLogger({
 *   level: "debug",
 *   file: { enabled: true, path: "debug.log" },
 * });
 *
 * // Normal session: entries are dropped
 * const quiet = createLogger();
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "rewind" },
  });

  if (options.console) {
    logger.addTransport(new ConsoleTransport({ colors: options.colors }));
  }

  if (options.file?.enabled) {
    logger.addTransport(
      new FileTransport({
        path: options.file.path,
        flushInterval: options.file.flushInterval,
      })
    );
  }

  return logger;
}
