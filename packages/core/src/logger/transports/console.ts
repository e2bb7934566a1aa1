import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * ANSI color codes for each log level.
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

const RESET = "\x1b[0m";

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Output stream (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Colors are disabled when NO_COLOR or CI is set, or stderr is not a TTY.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined || process.env.CI) {
    return false;
  }
  return process.stderr.isTTY === true;
}

/**
 * Console transport writing one line per entry to stderr.
 *
 * Only attached outside the full-screen interface, for startup failures;
 * stdout belongs to the renderer.
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.stream = options.stream ?? process.stderr;
  }

  log(entry: LogEntry): void {
    const timestamp = entry.timestamp.toISOString().replace("T", " ").slice(0, 19);
    const level = `[${entry.level.toUpperCase().padEnd(5)}]`;
    const coloredLevel = this.useColors ? `${LEVEL_COLORS[entry.level]}${level}${RESET}` : level;

    let output = `[${timestamp}] ${coloredLevel} ${entry.message}`;
    if (entry.data !== undefined) {
      output += ` ${typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data)}`;
    }

    this.stream.write(`${output}\n`);
  }
}
