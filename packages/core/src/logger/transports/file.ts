import { appendFileSync } from "node:fs";
import { appendFile } from "node:fs/promises";

import type { LogEntry, LogTransport } from "../types.js";
import { formatLogLine } from "./format.js";

/**
 * Options for FileTransport.
 */
export interface FileTransportOptions {
  /** Path to the log file */
  path: string;
  /** Flush interval in milliseconds (default: 1000) */
  flushInterval?: number;
  /** Maximum buffer size before auto-flush (default: 100) */
  maxBufferSize?: number;
  /** Error callback for write failures */
  onError?: (error: Error) => void;
}

/**
 * File transport with buffered writes.
 * Buffers log entries in memory and flushes periodically or when buffer is full.
 * The flush timer is unref'd so an idle log never keeps the process alive.
 *
 * @example
 * ```typescript
 * const transport = new FileTransport({ path: "debug.log" });
 * logger.addTransport(transport);
 * ```
 */
export class FileTransport implements LogTransport {
  private readonly path: string;
  private readonly maxBufferSize: number;
  private readonly onError?: (error: Error) => void;
  private buffer: string[] = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private flushing = false;

  /** Last error encountered during file write */
  lastError: Error | null = null;

  constructor(options: FileTransportOptions) {
    this.path = options.path;
    this.maxBufferSize = options.maxBufferSize ?? 100;
    this.onError = options.onError;

    this.flushTimer = setInterval(() => {
      void this.flush();
    }, options.flushInterval ?? 1000);
    this.flushTimer.unref();
  }

  log(entry: LogEntry): void {
    this.buffer.push(formatLogLine(entry));

    if (this.buffer.length >= this.maxBufferSize) {
      void this.flush();
    }
  }

  /**
   * Flush buffered entries to file. Entries are put back on failure.
   */
  async flush(): Promise<void> {
    if (this.buffer.length === 0 || this.flushing) {
      return;
    }

    this.flushing = true;
    const entries = this.buffer;
    this.buffer = [];

    try {
      await appendFile(this.path, `${entries.join("\n")}\n`, "utf-8");
      this.lastError = null;
    } catch (error) {
      this.recordFailure(error);
      this.buffer = [...entries, ...this.buffer];
    } finally {
      this.flushing = false;
    }
  }

  /**
   * Stop the flush timer and write whatever is still buffered synchronously,
   * so entries logged right before exit reach the file.
   */
  dispose(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.buffer.length === 0) {
      return;
    }

    const entries = this.buffer;
    this.buffer = [];
    try {
      appendFileSync(this.path, `${entries.join("\n")}\n`, "utf-8");
    } catch (error) {
      this.recordFailure(error);
    }
  }

  private recordFailure(error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.lastError = err;
    this.onError?.(err);
  }
}
