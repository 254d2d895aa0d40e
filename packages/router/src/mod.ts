/**
 * Routing engine for Waymark.
 *
 * @module
 */

export { HTTP_METHODS, NOT_FOUND_BODY, notFound, Router } from "./router.ts";
export { path, Pattern } from "./pattern.ts";
export {
  PatternError,
  RouterError,
  UrlParseError,
} from "./errors.ts";
export type { ErrorResponse } from "./errors.ts";
export type {
  Handler,
  HttpMethod,
  PatternMatch,
  Route,
  RouterRequest,
} from "./types.ts";
