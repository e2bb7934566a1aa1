import { createLogger, type Logger } from "@rewind/core";

/**
 * Logger for failures reported before the interface takes the terminal, or
 * after it has released it. Writes to stderr only.
 */
export function createStartupLogger(): Logger {
  return createLogger({ name: "startup", level: "error", console: true });
}
