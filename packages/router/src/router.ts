/**
 * First-match HTTP router.
 *
 * Design:
 * - Routes kept in a single array in registration order; that order is
 *   the match priority
 * - Patterns compiled before registration, never at request time
 * - Method compared before the pattern is evaluated
 * - One shared state object handed to every handler
 */

import { UrlParseError } from "./errors.ts";
import type { Pattern } from "./pattern.ts";
import type { Handler, HttpMethod, Route, RouterRequest } from "./types.ts";

export const HTTP_METHODS: readonly HttpMethod[] = [
  "HEAD",
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "OPTIONS",
  "CONNECT",
  "TRACE",
];

export const NOT_FOUND_BODY = "page not found";

/**
 * Response returned when no route matches.
 */
export function notFound(): Response {
  return new Response(NOT_FOUND_BODY, {
    status: 404,
    headers: { "Content-Type": "text/plain; charset=utf-8" },
  });
}

function parseRequestUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (error) {
    throw new UrlParseError(url, error);
  }
}

/**
 * HTTP router.
 *
 * All routes must be registered before the router starts serving;
 * registration is not synchronized with `run`.
 *
 * @example
 * ```typescript
 * interface ServerState {
 *   greeting: string;
 * }
 *
 * const router = Router.withState<ServerState>({ greeting: "hello" })
 *   .get(path("/hello"), (_req, state) => new Response(state.greeting))
 *   .get(path("/users/:id"), (req) => {
 *     const id = path("/users/:id").exec(req.url)?.params.id;
 *     return new Response(`user ${id}`);
 *   });
 *
 * const response = await router.run(new Request("http://localhost/hello"));
 * ```
 */
export class Router<State, Req extends RouterRequest = Request> {
  private readonly sharedState: State;
  private readonly table: Route<State, Req>[] = [];

  /**
   * Create a new router with a `State`.
   * The state will be passed to every request handler.
   */
  constructor(state: State) {
    this.sharedState = state;
  }

  static withState<State, Req extends RouterRequest = Request>(
    state: State,
  ): Router<State, Req> {
    return new Router<State, Req>(state);
  }

  /** The state shared by every handler. */
  get state(): State {
    return this.sharedState;
  }

  /** Registered routes in match order. */
  get routes(): readonly Route<State, Req>[] {
    return this.table;
  }

  /**
   * Register a handler for a method and pattern.
   *
   * Routes are appended; a route shadowed by an earlier one is accepted
   * and never reached.
   */
  insert(
    method: HttpMethod,
    pattern: Pattern,
    handler: Handler<State, Req>,
  ): this {
    this.table.push(Object.freeze({ method, pattern, handler }));
    return this;
  }

  head(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("HEAD", pattern, handler);
  }

  get(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("GET", pattern, handler);
  }

  post(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("POST", pattern, handler);
  }

  put(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("PUT", pattern, handler);
  }

  patch(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("PATCH", pattern, handler);
  }

  delete(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("DELETE", pattern, handler);
  }

  options(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("OPTIONS", pattern, handler);
  }

  connect(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("CONNECT", pattern, handler);
  }

  trace(pattern: Pattern, handler: Handler<State, Req>): this {
    return this.insert("TRACE", pattern, handler);
  }

  /**
   * Dispatch a request to the first route whose method and pattern match.
   *
   * Resolves with the handler's response, or the 404 response when no
   * route matches. Handler failures are passed through untouched.
   *
   * @throws {UrlParseError} If the request URL cannot be parsed
   */
  async run(req: Req): Promise<Response> {
    const url = parseRequestUrl(req.url);
    const method = req.method.toUpperCase();

    for (const route of this.table) {
      if (route.method !== method) continue;

      if (route.pattern.matches(url)) {
        return await route.handler(req, this.sharedState);
      }
    }

    return notFound();
  }

  fetch = (req: Req): Promise<Response> => {
    return this.run(req);
  };
}
