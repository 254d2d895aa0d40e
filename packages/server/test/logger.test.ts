/**
 * Tests for the leveled logger.
 */

import { describe, expect, it } from "vitest";
import { createLogger, isLogger, isLogLevel } from "../src/logger.ts";
import type { LoggerConfig } from "../src/types.ts";

function capture(options: LoggerConfig = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger({
    ...options,
    stdout: { write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) },
  });
  return { logger, out, err };
}

function parse(line: string): Record<string, unknown> {
  return JSON.parse(line);
}

describe("createLogger", () => {
  it("should write info to stdout and errors to stderr", () => {
    const { logger, out, err } = capture({ json: true });

    logger.info("started");
    logger.error("crashed");
    logger.fatal("gone");

    expect(out.length).toBe(1);
    expect(err.length).toBe(2);
    expect(parse(out[0]).msg).toBe("started");
    expect(parse(err[1]).level).toBe("fatal");
  });

  it("should default to info level", () => {
    const { logger, out } = capture({ json: true });

    logger.trace("hidden");
    logger.debug("hidden");
    logger.info("shown");
    logger.warn("shown");

    expect(out.length).toBe(2);
  });

  it("should filter below the configured level", () => {
    const { logger, out, err } = capture({ level: "error", json: true });

    logger.info("hidden");
    logger.warn("hidden");
    logger.error("shown");

    expect(out.length).toBe(0);
    expect(err.length).toBe(1);
  });

  it("should log nothing when silent", () => {
    const { logger, out, err } = capture({ level: "silent" });

    logger.fatal("hidden");

    expect(out.length + err.length).toBe(0);
  });

  it("should write one JSON object per line", () => {
    const { logger, out } = capture({ json: true, name: "api" });

    logger.info("listening", { port: 8000 });

    expect(out[0].endsWith("\n")).toBe(true);
    const entry = parse(out[0]);
    expect(entry.level).toBe("info");
    expect(entry.msg).toBe("listening");
    expect(entry.port).toBe(8000);
    expect(entry.name).toBe("api");
    expect(typeof entry.time).toBe("number");
  });

  it("should serialize errors in JSON mode", () => {
    const { logger, err } = capture({ json: true });

    logger.error("failed", { error: new TypeError("bad input") });

    const entry = parse(err[0]);
    expect(entry.error).toMatchObject({
      name: "TypeError",
      message: "bad input",
    });
  });

  it("should format pretty lines", () => {
    const { logger, out } = capture({ timestamp: false, name: "api" });

    logger.info("hello", { user: "ada" });

    expect(out[0]).toBe(
      "\x1b[36m\x1b[1m[api]\x1b[0m \x1b[32mINFO \x1b[0m hello \x1b[2muser=\x1b[0mada\n",
    );
  });

  it("should prefix pretty lines with the time", () => {
    const { logger, out } = capture();

    logger.warn("careful");

    expect(out[0]).toMatch(/^\x1b\[90m\d{2}:\d{2}:\d{2}\.\d{3}\x1b\[0m /);
  });

  describe("child()", () => {
    it("should join names", () => {
      const { logger, out } = capture({ json: true, name: "api" });

      logger.child({ name: "db" }).info("connected");

      expect(parse(out[0]).name).toBe("api:db");
    });

    it("should merge bindings into every entry", () => {
      const { logger, out } = capture({ json: true });

      const child = logger.child({ requestId: "r1" }).child({ route: "/a" });
      child.info("handled");

      const entry = parse(out[0]);
      expect(entry.requestId).toBe("r1");
      expect(entry.route).toBe("/a");
    });

    it("should inherit the level", () => {
      const { logger, out } = capture({ json: true, level: "warn" });

      logger.child({ name: "db" }).info("hidden");

      expect(out.length).toBe(0);
    });
  });
});

describe("isLogger", () => {
  it("should accept loggers", () => {
    expect(isLogger(createLogger())).toBe(true);
  });

  it("should reject other values", () => {
    expect(isLogger(null)).toBe(false);
    expect(isLogger(console)).toBe(false);
    expect(isLogger({ info: 1, error: 2, child: 3 })).toBe(false);
  });
});

describe("isLogLevel", () => {
  it("should recognise levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
