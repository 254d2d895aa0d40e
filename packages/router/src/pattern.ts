/**
 * Route pattern compiler.
 *
 * Path templates are compiled into WHATWG URLPatterns over the pathname
 * component only; every other URL component is left as a wildcard.
 */

import { URLPattern } from "urlpattern-polyfill";
import { PatternError, UrlParseError } from "./errors.ts";
import type { PatternMatch } from "./types.ts";

const SLASH = 47; // '/'

function toURL(input: URL | string): URL {
  if (input instanceof URL) return input;
  try {
    return new URL(input);
  } catch (error) {
    throw new UrlParseError(input, error);
  }
}

/**
 * Compiled route pattern.
 *
 * @example
 * ```typescript
 * const pattern = Pattern.compile("/users/:id");
 *
 * pattern.matches("https://example.com/users/42"); // true
 * pattern.exec("https://example.com/users/42")?.params; // { id: "42" }
 * ```
 */
export class Pattern {
  /** The template this pattern was compiled from. */
  readonly template: string;
  private readonly matcher: URLPattern;

  private constructor(template: string, matcher: URLPattern) {
    this.template = template;
    this.matcher = matcher;
    Object.freeze(this);
  }

  /**
   * Compile a path template.
   *
   * @throws {PatternError} If the template does not start with / or is
   * rejected by the URL pattern syntax
   */
  static compile(template: string): Pattern {
    if (template.charCodeAt(0) !== SLASH) {
      throw new PatternError(template, "route path must start with /");
    }

    let matcher: URLPattern;
    try {
      matcher = new URLPattern({ pathname: template });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PatternError(template, reason, error);
    }

    return new Pattern(template, matcher);
  }

  /**
   * Test a URL against this pattern.
   *
   * @throws {UrlParseError} If a string URL cannot be parsed
   */
  matches(url: URL | string): boolean {
    return this.matcher.test(toURL(url).href);
  }

  /**
   * Match a URL and extract the named parameters.
   *
   * @throws {UrlParseError} If a string URL cannot be parsed
   */
  exec(url: URL | string): PatternMatch | null {
    const result = this.matcher.exec(toURL(url).href);
    if (!result) return null;

    const params: Record<string, string> = {};
    for (const [name, value] of Object.entries(result.pathname.groups)) {
      if (typeof value === "string") {
        params[name] = value;
      }
    }

    return { pathname: result.pathname.input, params };
  }

  toString(): string {
    return this.template;
  }
}

/**
 * Construct a route pattern from a URL path.
 *
 * @example
 * ```typescript
 * path("/hello");
 * path("/users/:id");
 * ```
 */
export function path(template: string): Pattern {
  return Pattern.compile(template);
}
