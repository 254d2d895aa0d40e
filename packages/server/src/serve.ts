/**
 * Serve a router over node:http.
 *
 * Node requests are converted into WHATWG `Request`s, dispatched, and the
 * resulting `Response` is written back.
 */

import { createServer } from "node:http";
import type { IncomingHttpHeaders } from "node:http";
import { Readable, type Writable } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
import { type RouterRequest, UrlParseError } from "@waymark/router";
import {
  defaultErrorTransformer,
  errorToResponse,
  InternalError,
} from "./errors.ts";
import { createLogger } from "./logger.ts";
import type { Dispatcher, ServeOptions, ServerHandle } from "./types.ts";

/**
 * The parts of a `node:http` IncomingMessage the adapter reads.
 */
export interface IncomingRequest extends AsyncIterable<Uint8Array | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  socket?: object;
}

/**
 * The parts of a `node:http` ServerResponse the adapter writes.
 */
export interface OutgoingResponse extends Writable {
  statusCode: number;
  statusMessage: string;
  setHeader(name: string, value: string | string[]): unknown;
}

/**
 * Method, URL and headers of a request whose method a `Request` refuses.
 */
export interface RequestHead extends RouterRequest {
  readonly headers: Headers;
}

const BODYLESS_METHODS = new Set(["GET", "HEAD"]);
const FORBIDDEN_METHODS = new Set(["CONNECT", "TRACE", "TRACK"]);
const ABSOLUTE_FORM = /^[a-z][a-z\d+.-]*:\/\//i;

function toHeaders(raw: IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else {
      headers.append(name, value);
    }
  }
  return headers;
}

async function readBody(incoming: IncomingRequest): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of incoming) {
    chunks.push(
      typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk),
    );
  }
  return Buffer.concat(chunks);
}

// Absolute-form targets (proxy requests) already carry scheme and host.
function requestUrl(incoming: IncomingRequest): URL {
  const target = incoming.url ?? "/";
  let href = target;
  if (!ABSOLUTE_FORM.test(target)) {
    const socket = incoming.socket;
    const encrypted = socket !== undefined && "encrypted" in socket &&
      socket.encrypted === true;
    const scheme = encrypted ? "https" : "http";
    href = `${scheme}://${incoming.headers.host ?? "localhost"}${target}`;
  }

  try {
    return new URL(href);
  } catch (error) {
    throw new UrlParseError(href, error);
  }
}

/**
 * Build a `Request` from a Node request.
 *
 * @throws {UrlParseError} If the Host header and request target do not
 * form a valid URL
 */
export async function toRequest(incoming: IncomingRequest): Promise<Request> {
  const method = (incoming.method ?? "GET").toUpperCase();
  const url = requestUrl(incoming);

  const init: RequestInit = { method, headers: toHeaders(incoming.headers) };
  if (!BODYLESS_METHODS.has(method)) {
    const body = await readBody(incoming);
    if (body.length > 0) init.body = body;
  }

  return new Request(url, init);
}

/**
 * Build what the listener dispatches: a `Request`, or a `RequestHead` for
 * TRACE, TRACK and CONNECT, which `Request` cannot represent. Their body
 * is not read.
 */
export async function toDispatchRequest(
  incoming: IncomingRequest,
): Promise<Request | RequestHead> {
  const method = (incoming.method ?? "GET").toUpperCase();
  if (!FORBIDDEN_METHODS.has(method)) return await toRequest(incoming);

  return {
    method,
    url: requestUrl(incoming).href,
    headers: toHeaders(incoming.headers),
  };
}

/**
 * Write a `Response` to a Node response, streaming the body.
 */
export async function writeResponse(
  response: Response,
  outgoing: OutgoingResponse,
): Promise<void> {
  outgoing.statusCode = response.status;
  if (response.statusText) {
    outgoing.statusMessage = response.statusText;
  }

  const setCookies = response.headers.getSetCookie();
  response.headers.forEach((value, name) => {
    if (name === "set-cookie") return;
    outgoing.setHeader(name, value);
  });
  if (setCookies.length > 0) {
    outgoing.setHeader("set-cookie", setCookies);
  }

  if (response.body === null) {
    outgoing.end();
    await finished(outgoing);
    return;
  }

  await pipeline(Readable.fromWeb(response.body), outgoing);
}

/**
 * Create a `node:http` request listener that dispatches to `router`.
 *
 * Dispatch failures are logged and answered with an error response; the
 * returned promise always resolves.
 */
export function createRequestListener(
  router: Dispatcher,
  options: ServeOptions = {},
): (incoming: IncomingRequest, outgoing: OutgoingResponse) => Promise<void> {
  const logger = options.logger ?? createLogger({ name: "waymark" });
  const development = options.development ?? false;
  const transformer = options.errorTransformer ?? defaultErrorTransformer;

  return async (incoming, outgoing) => {
    const start = performance.now();
    const method = incoming.method ?? "GET";
    const target = incoming.url ?? "/";

    let response: Response;
    try {
      response = await router.run(await toDispatchRequest(incoming));
    } catch (error) {
      logger.error("Request failed", { method, url: target, error });
      response = errorToResponse(error, development, transformer);
    }

    try {
      await writeResponse(response, outgoing);
    } catch (error) {
      logger.error("Failed to write response", { method, url: target, error });
      return;
    }

    logger.debug(`${method} ${target}`, {
      status: response.status,
      ms: Math.round(performance.now() - start),
    });
  };
}

/**
 * Start an HTTP server for `router`.
 *
 * @example
 * ```typescript
 * const router = Router.withState(state).get(path("/hello"), getHello);
 * const handle = await serve(router, { port: 8000 });
 *
 * // later
 * await handle.close();
 * ```
 */
export function serve(
  router: Dispatcher,
  options: ServeOptions = {},
): Promise<ServerHandle> {
  const port = options.port ?? 8000;
  const hostname = options.hostname ?? "0.0.0.0";
  const logger = options.logger ?? createLogger({ name: "waymark" });

  const server = createServer(
    createRequestListener(router, { ...options, logger }),
  );

  const close = (): Promise<void> =>
    new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        logger.info("Server stopped");
        resolve();
      });
    });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, hostname, () => {
      server.off("error", reject);

      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new InternalError("Server is not bound to a TCP address"));
        return;
      }

      logger.info(`Listening on http://${address.address}:${address.port}`);
      options.onListen?.({ hostname: address.address, port: address.port });
      resolve({ server, address, close });
    });
  });
}
