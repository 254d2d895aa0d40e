/**
 * Router error classes.
 */

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    status: number;
    details?: unknown;
    stack?: string[];
  };
}

/**
 * Base class for Waymark errors. `status` is what a host should answer
 * with when the error escapes to it.
 *
 * @example
 * ```typescript
 * throw new RouterError("Quota exceeded", 429, "QUOTA_EXCEEDED");
 * ```
 */
export class RouterError extends Error {
  readonly status: number;
  readonly code: string;
  /** Shown only in development responses */
  readonly details?: unknown;

  constructor(
    message: string,
    status = 500,
    code = "INTERNAL_ERROR",
    details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RouterError";
    this.status = status;
    this.code = code;
    this.details = details;
  }

  /**
   * Body of the error response. Details and stack are included only in
   * development.
   */
  toJSON(development = false): ErrorResponse {
    const { message, code, status } = this;
    const body: ErrorResponse = { error: { message, code, status } };
    if (!development) return body;

    if (this.details !== undefined) body.error.details = this.details;
    if (this.stack) {
      body.error.stack = this.stack.split("\n").map((l) => l.trim());
    }
    return body;
  }

  toResponse(development = false): Response {
    return Response.json(this.toJSON(development), { status: this.status });
  }
}

/**
 * A path template that could not be compiled. Raised while routes are
 * set up, never at request time.
 */
export class PatternError extends RouterError {
  readonly template: string;

  constructor(template: string, reason: string, cause?: unknown) {
    super(
      `failed to parse route pattern "${template}": ${reason}`,
      500,
      "INVALID_PATTERN",
      { template, reason },
      cause === undefined ? undefined : { cause },
    );
    this.name = "PatternError";
    this.template = template;
  }
}

/**
 * 400 for a request URL that cannot be parsed.
 */
export class UrlParseError extends RouterError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(
      `invalid request URL: ${url}`,
      400,
      "INVALID_URL",
      { url },
      cause === undefined ? undefined : { cause },
    );
    this.name = "UrlParseError";
    this.url = url;
  }
}
