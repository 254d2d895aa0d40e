/**
 * Node.js hosting for Waymark routers.
 *
 * @module
 */

export {
  createRequestListener,
  serve,
  toDispatchRequest,
  toRequest,
  writeResponse,
} from "./serve.ts";
export type {
  IncomingRequest,
  OutgoingResponse,
  RequestHead,
} from "./serve.ts";
export { loadConfig, resolveConfig, ServerConfigSchema } from "./config.ts";
export type { ServerConfig } from "./config.ts";
export { createLogger, isLogger, isLogLevel } from "./logger.ts";
export {
  ConfigError,
  defaultErrorTransformer,
  errorToResponse,
  InternalError,
} from "./errors.ts";
export type { ValidationIssue } from "./errors.ts";
export type {
  Dispatcher,
  ErrorTransformer,
  ListenOptions,
  Logger,
  LoggerConfig,
  LogLevel,
  LogStream,
  ServeOptions,
  ServerHandle,
} from "./types.ts";
