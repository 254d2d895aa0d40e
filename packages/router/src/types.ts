/**
 * Type definitions for the router module.
 */

import type { Pattern } from "./pattern.ts";

export type HttpMethod =
  | "HEAD"
  | "GET"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "OPTIONS"
  | "CONNECT"
  | "TRACE";

/**
 * The part of a request the router reads. A WHATWG `Request` satisfies it.
 */
export interface RouterRequest {
  readonly method: string;
  readonly url: string;
}

/**
 * Request handler. Receives the request and the router's shared state.
 *
 * @example
 * ```typescript
 * const getHello: Handler<AppState> = async (_req, _state) => {
 *   return new Response("hello");
 * };
 * ```
 */
export type Handler<State, Req extends RouterRequest = Request> = (
  req: Req,
  state: State,
) => Response | Promise<Response>;

export interface Route<State, Req extends RouterRequest = Request> {
  readonly method: HttpMethod;
  readonly pattern: Pattern;
  readonly handler: Handler<State, Req>;
}

export interface PatternMatch {
  /** The matched pathname */
  pathname: string;
  /** Captured named parameters */
  params: Record<string, string>;
}
