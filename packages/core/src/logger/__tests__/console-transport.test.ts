import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { ConsoleTransport } from "../transports/console.js";

function readAll(stream: PassThrough): string {
  const chunk: unknown = stream.read();
  return Buffer.isBuffer(chunk) ? chunk.toString("utf-8") : "";
}

describe("ConsoleTransport", () => {
  const timestamp = new Date("2025-06-01T10:00:00.000Z");

  it("writes an uncolored line with data", () => {
    const stream = new PassThrough();
    const transport = new ConsoleTransport({ colors: false, stream });

    transport.log({ level: "error", message: "Startup failed", timestamp, data: "bad config" });

    expect(readAll(stream)).toBe("[2025-06-01 10:00:00] [ERROR] Startup failed bad config\n");
  });

  it("serializes structured data as JSON", () => {
    const stream = new PassThrough();
    const transport = new ConsoleTransport({ colors: false, stream });

    transport.log({ level: "info", message: "Config loaded", timestamp, data: { debug: true } });

    expect(readAll(stream)).toBe('[2025-06-01 10:00:00] [INFO ] Config loaded {"debug":true}\n');
  });

  it("wraps the level in its color", () => {
    const stream = new PassThrough();
    const transport = new ConsoleTransport({ colors: true, stream });

    transport.log({ level: "warn", message: "Signal received", timestamp });

    expect(readAll(stream)).toBe("[2025-06-01 10:00:00] \x1b[33m[WARN ]\x1b[0m Signal received\n");
  });
});
