import { describe, expect, it } from "vitest";
import { loadConfig, resolveConfig } from "../src/config.ts";
import { ConfigError } from "../src/errors.ts";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      hostname: "0.0.0.0",
      logLevel: "info",
      logJson: false,
      development: false,
    });
  });

  it("should read and convert environment variables", () => {
    const config = loadConfig({
      PORT: "3000",
      HOST: "127.0.0.1",
      LOG_LEVEL: "DEBUG",
      LOG_JSON: "true",
      NODE_ENV: "development",
    });

    expect(config).toEqual({
      port: 3000,
      hostname: "127.0.0.1",
      logLevel: "debug",
      logJson: true,
      development: true,
    });
  });

  it("should treat other NODE_ENV values as production", () => {
    expect(loadConfig({ NODE_ENV: "production" }).development).toBe(false);
  });

  it("should reject a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(ConfigError);
  });

  it("should reject an out-of-range port", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "70000" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.code).toBe("INVALID_CONFIG");
    expect(caught.issues.map((i) => i.field)).toEqual(["port"]);
  });

  it("should reject unknown log levels", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(
      "Invalid configuration",
    );
  });
});

describe("resolveConfig", () => {
  it("should fill in missing fields", () => {
    expect(resolveConfig({ port: 0 })).toEqual({
      port: 0,
      hostname: "0.0.0.0",
      logLevel: "info",
      logJson: false,
      development: false,
    });
  });

  it("should ignore undefined fields", () => {
    expect(resolveConfig({ hostname: undefined }).hostname).toBe("0.0.0.0");
  });

  it("should reject an empty hostname", () => {
    expect(() => resolveConfig({ hostname: "" })).toThrow(ConfigError);
  });
});
