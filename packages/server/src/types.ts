import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { RouterError, RouterRequest } from "@waymark/router";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

/**
 * Anything a log line can be written to, e.g. `process.stdout`.
 */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  timestamp?: boolean;
  json?: boolean;
  stdout?: LogStream;
  stderr?: LogStream;
}

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Error transformer function type.
 */
export type ErrorTransformer = (error: unknown) => RouterError;

/**
 * Anything that turns a request into a response, such as a `Router`.
 *
 * Requests whose method cannot be carried by a `Request` (TRACE, TRACK)
 * arrive as a bare `RequestHead` instead.
 */
export interface Dispatcher {
  run(req: RouterRequest): Promise<Response>;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
  onListen?: (params: { hostname: string; port: number }) => void;
}

export interface ServeOptions extends ListenOptions {
  logger?: Logger;
  /** Include error details and stack traces in error responses */
  development?: boolean;
  errorTransformer?: ErrorTransformer;
}

export interface ServerHandle {
  readonly server: Server;
  readonly address: AddressInfo;
  close(): Promise<void>;
}
