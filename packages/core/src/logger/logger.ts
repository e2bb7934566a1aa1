import { context, trace } from "@opentelemetry/api";
import {
  LOG_LEVEL_PRIORITY,
  type LogEntry,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
  type TimerResult,
} from "./types.js";

/**
 * Ids of the active span, if any.
 */
function activeSpanIds(): Pick<LogEntry, "traceId" | "spanId"> {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }
  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}

/**
 * Leveled logger fanning entries out to its transports.
 *
 * Without transports every entry is dropped; the CLI runs that way unless
 * debug logging is on. Children share the parent's transports, so one
 * `flush()`/`dispose()` on the root covers the whole tree.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "debug", transports: [new FileTransport({ path: "debug.log" })] });
 * const syncLogger = logger.child({ component: "sync" });
 * syncLogger.debug("Pulling", { remote: "origin", branch: "main" });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  trace(message: string, data?: unknown): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.write("fatal", message, data);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  /**
   * Logger with `context` merged over this one's. Starts at this logger's
   * current level.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  /**
   * Starts measuring an operation such as a sync.
   */
  time(label: string): TimerResult {
    const startedAt = performance.now();
    let duration = 0;
    const measure = (): number => {
      duration = performance.now() - startedAt;
      return duration;
    };

    return {
      get duration() {
        return duration;
      },
      end: (message) => {
        this.write("debug", message ?? `${label} completed`, { label, durationMs: measure() });
      },
      stop: measure,
    };
  }

  async flush(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.flush?.()));
  }

  dispose(): void {
    for (const transport of this.transports) {
      transport.dispose?.();
    }
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
      ...activeSpanIds(),
    };
    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}
