import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import pino from "pino";
import { PinoLogger, createLogger } from "../src/logger";
import type { TelemetryConfig } from "../src/env";

/** Collect pino JSON output lines via a writable stream. */
function createCapture(): { stream: Writable; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, cb) {
      chunks.push(chunk.toString());
      cb();
    },
  });
  return {
    stream,
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter(Boolean)
        .map((l) => JSON.parse(l) as Record<string, unknown>),
  };
}

const baseConfig: TelemetryConfig = {
  tracingEnabled: false,
  serviceName: "storefront",
  logLevel: "debug",
  logFormat: "json",
  logFilePath: null,
  redactKeys: [],
};

// ---------------------------------------------------------------------------
// PinoLogger
// ---------------------------------------------------------------------------

describe("PinoLogger", () => {
  it("should write the message with its attributes", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    logger.warn("No handler found", { method: "GET", path: "/missing" });

    const line = lines()[0]!;
    expect(line.msg).toBe("No handler found");
    expect(line.method).toBe("GET");
    expect(line.path).toBe("/missing");
    expect(line.level).toBe(40);
  });

  it("should write every level in order", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines().map((l) => l.msg)).toEqual(["d", "i", "w", "e"]);
  });

  it("should nest child names with a dot", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    const dispatcher = logger.child("dispatcher", { requestId: "req-7" });
    const views = dispatcher.child("views");
    views.info("rendering");

    const line = lines()[0]!;
    expect(line.name).toBe("dispatcher.views");
    expect(line.requestId).toBe("req-7");
    expect(line.msg).toBe("rendering");
  });

  it("should keep the name when adding context", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "debug" }, stream));

    logger.child("flash").withContext({ sessionId: "s-1" }).info("saved");

    const line = lines()[0]!;
    expect(line.name).toBe("flash");
    expect(line.sessionId).toBe("s-1");
  });

  it("should read and change the level at runtime", () => {
    const { stream, lines } = createCapture();
    const logger = new PinoLogger(pino({ level: "info" }, stream));

    logger.debug("hidden");
    expect(logger.level).toBe("info");
    expect(lines()).toHaveLength(0);

    logger.level = "debug";
    logger.debug("shown");
    expect(logger.level).toBe("debug");
    expect(lines().map((l) => l.msg)).toEqual(["shown"]);
  });
});

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

describe("createLogger", () => {
  it("should stamp records with the service name and an ISO time", () => {
    const { stream, lines } = createCapture();
    const logger = createLogger(baseConfig, stream);

    logger.info("started");

    const line = lines()[0]!;
    expect(line.service).toBe("storefront");
    expect(line.msg).toBe("started");
    expect(typeof line.time).toBe("string");
    expect(line.pid).toBeUndefined();
  });

  it("should censor the configured redact keys", () => {
    const { stream, lines } = createCapture();
    const logger = createLogger({ ...baseConfig, redactKeys: ["password", "flash.token"] }, stream);

    logger.info("login", {
      password: "test-secret",
      flash: { token: "test-token", message: "Welcome back" },
    });

    const line = lines()[0]!;
    expect(line.password).toBe("[REDACTED]");
    expect(line.flash).toEqual({ token: "[REDACTED]", message: "Welcome back" });
  });

  it("should filter records below the configured level", () => {
    const { stream, lines } = createCapture();
    const logger = createLogger({ ...baseConfig, logLevel: "warn" }, stream);

    logger.info("skip");
    logger.error("keep");

    expect(lines().map((l) => l.msg)).toEqual(["keep"]);
    expect(logger.level).toBe("warn");
  });

  it("should build stdout and file streams without a destination", () => {
    const logger = createLogger({ ...baseConfig, logFilePath: "/tmp/switchyard-test-log.json" });

    expect(logger).toBeInstanceOf(PinoLogger);
    expect(logger.name).toBeUndefined();
  });
});
