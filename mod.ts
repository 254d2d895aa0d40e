/**
 * Waymark - a small first-match HTTP router for Node.js.
 *
 * @example
 * ```typescript
 * import { path, Router, serve } from "waymark";
 *
 * const router = Router.withState({})
 *   .get(path("/hello"), () => new Response("hello"));
 *
 * await serve(router, { port: 8000 });
 * ```
 *
 * @module
 */

export * from "@waymark/router";
export * from "@waymark/server";
