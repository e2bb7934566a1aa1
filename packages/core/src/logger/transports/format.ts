import type { LogEntry } from "../types.js";

/**
 * Format a log entry as a single plain-text line.
 *
 * `[2025-06-01T10:00:00.000Z] [DEBUG] Pull finished context={"component":"sync"} data={"pulled":true}`
 */
export function formatLogLine(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(5);
  let line = `[${entry.timestamp.toISOString()}] [${level}] ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` context=${JSON.stringify(entry.context)}`;
  }

  if (entry.data !== undefined) {
    line += ` data=${typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data)}`;
  }

  return line;
}
