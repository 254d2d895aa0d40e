/**
 * Server configuration, read from the environment.
 */

import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, type ValidationIssue } from "./errors.ts";

export const ServerConfigSchema = Type.Object({
  port: Type.Integer({ minimum: 0, maximum: 65535, default: 8000 }),
  hostname: Type.String({ minLength: 1, default: "0.0.0.0" }),
  logLevel: Type.Union(
    [
      Type.Literal("trace"),
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
      Type.Literal("fatal"),
      Type.Literal("silent"),
    ],
    { default: "info" },
  ),
  logJson: Type.Boolean({ default: false }),
  development: Type.Boolean({ default: false }),
});

export type ServerConfig = Static<typeof ServerConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Validate a configuration object, filling in defaults and converting
 * string values ("8080", "true") to the declared types.
 *
 * @throws {ConfigError} If a value does not fit the schema
 */
export function resolveConfig(input: Partial<ServerConfig> = {}): ServerConfig {
  return validateConfig({ ...input });
}

function validateConfig(input: Record<string, unknown>): ServerConfig {
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) data[key] = value;
  }

  const withDefaults = Value.Default(ServerConfigSchema, data);
  const converted = Value.Convert(ServerConfigSchema, withDefaults);

  if (Value.Check(ServerConfigSchema, converted)) {
    return converted;
  }

  const issues: ValidationIssue[] = [
    ...Value.Errors(ServerConfigSchema, converted),
  ].map((err) => ({
    field: err.path.replace(/^\//, "").replace(/\//g, ".") || "(root)",
    message: err.message,
  }));

  throw new ConfigError(issues);
}

/**
 * Load configuration from environment variables.
 *
 * | Variable    | Field                                  |
 * | ----------- | -------------------------------------- |
 * | `PORT`      | `port`                                 |
 * | `HOST`      | `hostname`                             |
 * | `LOG_LEVEL` | `logLevel`                             |
 * | `LOG_JSON`  | `logJson`                              |
 * | `NODE_ENV`  | `development` when set to development  |
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const data: Record<string, unknown> = {
    port: env.PORT,
    hostname: env.HOST,
    logLevel: env.LOG_LEVEL?.toLowerCase(),
    logJson: env.LOG_JSON,
    development: env.NODE_ENV === undefined
      ? undefined
      : env.NODE_ENV === "development",
  };

  return validateConfig(data);
}
