/**
 * Engine Context Middleware
 *
 * Makes the Scheduler available to every route handler through the Hono
 * context, and provides the shared helpers routes use to read request
 * bodies and write error responses.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { z } from "zod";
import type { ErrorCode } from "@cardwise/shared";
import type { Scheduler } from "../scheduling/scheduler";
import { ValidationError } from "../scheduling/errors";

/**
 * Error response format for REST endpoints.
 */
export interface RestErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
  };
}

/**
 * Hono environment for engine routes.
 */
export interface EngineEnv {
  Variables: {
    scheduler: Scheduler;
  };
}

/**
 * Creates a JSON error response with the proper format.
 *
 * @param c - Hono context
 * @param status - HTTP status code
 * @param code - Error code from ErrorCode enum
 * @param message - Human-readable error message
 */
export function jsonError(
  c: Context,
  status: 400 | 404 | 409 | 500,
  code: ErrorCode,
  message: string
) {
  const body: RestErrorResponse = {
    error: {
      code,
      message,
    },
  };
  return c.json(body, status);
}

/**
 * Middleware that sets the scheduler in context.
 *
 * Usage:
 * ```typescript
 * app.use("/api/*", engineContext(scheduler));
 * ```
 */
export function engineContext(scheduler: Scheduler): MiddlewareHandler<EngineEnv> {
  return async (c, next) => {
    c.set("scheduler", scheduler);
    await next();
  };
}

/**
 * Gets the scheduler from the Hono context.
 */
export function getScheduler(c: Context<EngineEnv>): Scheduler {
  return c.get("scheduler");
}

/**
 * Join zod issues into one line: `field: message; other: message`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Read and validate a JSON request body.
 *
 * An absent body is validated as `{}` so endpoints whose fields are all
 * optional accept bodiless requests.
 *
 * @throws ValidationError for malformed JSON or a body the schema rejects
 */
export async function readJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.infer<T>> {
  const text = await c.req.text();
  let data: unknown = {};
  if (text.trim().length > 0) {
    try {
      data = JSON.parse(text);
    } catch {
      throw new ValidationError("Invalid JSON in request body");
    }
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse an optional epoch-seconds `now` query parameter.
 *
 * @throws ValidationError when present but not a non-negative integer
 */
export function readNowQuery(c: Context): number | undefined {
  const raw = c.req.query("now");
  if (raw === undefined || raw === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`Invalid now: ${raw}`);
  }
  return value;
}
