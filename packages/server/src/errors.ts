/**
 * Hosting errors and error-to-response mapping.
 */

import { RouterError } from "@waymark/router";
import type { ErrorTransformer } from "./types.ts";

/**
 * Validation issue structure.
 */
export interface ValidationIssue {
  /** Field path (e.g., "port") */
  field: string;
  /** Error message */
  message: string;
}

/**
 * 500 Internal Server Error.
 */
export class InternalError extends RouterError {
  constructor(message = "Internal Server Error", details?: unknown) {
    super(message, 500, "INTERNAL_ERROR", details);
    this.name = "InternalError";
  }
}

/**
 * Server configuration that failed validation.
 */
export class ConfigError extends RouterError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join(", ");
    super(`Invalid configuration: ${summary}`, 500, "INVALID_CONFIG", issues);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Default error transformer.
 * Converts any error to a RouterError.
 */
export function defaultErrorTransformer(error: unknown): RouterError {
  if (error instanceof RouterError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new InternalError("An unexpected error occurred", {
    value: String(error),
  });
}

/**
 * Create an error response from any error.
 */
export function errorToResponse(
  error: unknown,
  development = false,
  transformer: ErrorTransformer = defaultErrorTransformer,
): Response {
  return transformer(error).toResponse(development);
}
