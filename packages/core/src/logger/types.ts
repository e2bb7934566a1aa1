/**
 * Severity levels, least severe first.
 */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Rank of each level; an entry is written when its rank is at least the
 * logger's.
 */
export const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Logger name and component, merged down the child chain */
  context?: Record<string, unknown>;
  data?: unknown;
  /** Set when logged inside an active OpenTelemetry span */
  traceId?: string;
  spanId?: string;
}

/**
 * Handle returned by `Logger.time()`.
 */
export interface TimerResult {
  /** Milliseconds measured by the last `end()` or `stop()`, 0 before */
  readonly duration: number;
  /** Measures and logs `<label> completed` at debug level */
  end(message?: string): void;
  /** Measures without logging */
  stop(): number;
}

/**
 * Destination for entries. A transport with buffered output implements
 * `flush`; one holding timers or handles implements `dispose`.
 */
export interface LogTransport {
  log(entry: LogEntry): void;
  flush?(): Promise<void>;
  dispose?(): void;
}

export interface LoggerOptions {
  /** Default: info */
  level?: LogLevel;
  context?: Record<string, unknown>;
  transports?: LogTransport[];
}
