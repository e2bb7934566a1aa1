import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../factory.js";
import { ConsoleTransport } from "../transports/console.js";
import { FileTransport } from "../transports/file.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates a logger without transports by default", () => {
    const fileLog = vi.spyOn(FileTransport.prototype, "log");
    const consoleLog = vi.spyOn(ConsoleTransport.prototype, "log");
    const logger = createLogger();

    logger.error("nobody listens");

    expect(logger.getLevel()).toBe("info");
    expect(fileLog).not.toHaveBeenCalled();
    expect(consoleLog).not.toHaveBeenCalled();
  });

  it("attaches a file transport when file logging is enabled", () => {
    const fileLog = vi.spyOn(FileTransport.prototype, "log").mockImplementation(() => {});
    const logger = createLogger({
      name: "rewind-test",
      level: "debug",
      file: { enabled: true, path: "debug.log" },
    });

    logger.debug("Loading status");

    expect(fileLog).toHaveBeenCalledTimes(1);
    expect(fileLog.mock.calls[0]?.[0]).toMatchObject({
      level: "debug",
      message: "Loading status",
      context: { logger: "rewind-test" },
    });
    logger.dispose();
  });

  it("attaches a console transport when requested", () => {
    const consoleLog = vi.spyOn(ConsoleTransport.prototype, "log").mockImplementation(() => {});
    const logger = createLogger({ console: true, colors: false });

    logger.warn("Received SIGTERM");

    expect(consoleLog).toHaveBeenCalledTimes(1);
  });
});
