/**
 * Error Handling Middleware
 *
 * Hono error handler that maps scheduler exceptions to HTTP status codes
 * with `{ error: { code, message } }` JSON bodies.
 */

import type { Context, ErrorHandler } from "hono";
import { ZodError } from "zod";
import type { ErrorCode } from "@cardwise/shared";
import { isSchedulerError } from "../scheduling/errors";
import { createLogger } from "../logger";
import { type RestErrorResponse, formatIssues, jsonError } from "./engine-context";

const log = createLogger("ErrorHandler");

/**
 * Maps ErrorCode values to HTTP status codes.
 *
 * - VALIDATION_ERROR, INVALID_RATING, INVALID_DECK_CONFIG: 400 Bad Request
 * - UNKNOWN_CARD, UNKNOWN_DECK, UNKNOWN_NOTE: 404 Not Found
 * - DUPLICATE_NOTE, INVALID_STATE: 409 Conflict
 * - PERSISTENCE_FAILED, INTERNAL_ERROR: 500 Internal Server Error
 */
export function mapErrorCodeToStatus(code: ErrorCode): 400 | 404 | 409 | 500 {
  switch (code) {
    case "VALIDATION_ERROR":
    case "INVALID_RATING":
    case "INVALID_DECK_CONFIG":
      return 400;
    case "UNKNOWN_CARD":
    case "UNKNOWN_DECK":
    case "UNKNOWN_NOTE":
      return 404;
    case "DUPLICATE_NOTE":
    case "INVALID_STATE":
      return 409;
    case "PERSISTENCE_FAILED":
    case "INTERNAL_ERROR":
      return 500;
  }
}

/**
 * Logs error details server-side with context.
 *
 * Stack traces are logged but never exposed in responses.
 */
function logError(c: Context, error: unknown): void {
  const method = c.req.method;
  const path = c.req.path;

  if (isSchedulerError(error) && mapErrorCodeToStatus(error.code) < 500) {
    // Caller mistakes: warn level
    log.warn(`${method} ${path} - ${error.code}: ${error.message}`);
  } else if (error instanceof Error) {
    log.error(`${method} ${path} - ${error.message}`, {
      stack: error.stack,
    });
  } else {
    log.error(`${method} ${path} - Unknown error type`, { error });
  }
}

/**
 * Hono error handler for REST API routes.
 *
 * Usage:
 * ```typescript
 * app.onError(restErrorHandler);
 * ```
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  logError(c, err);

  if (isSchedulerError(err)) {
    return jsonError(c, mapErrorCodeToStatus(err.code), err.code, err.message);
  }

  if (err instanceof ZodError) {
    return jsonError(c, 400, "VALIDATION_ERROR", formatIssues(err));
  }

  // Return safe error message (no internal details or stack traces)
  return jsonError(c, 500, "INTERNAL_ERROR", "An unexpected error occurred. Please try again later.");
};

export type { RestErrorResponse };
