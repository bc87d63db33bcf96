/**
 * Zod validation middleware for request bodies and query strings.
 *
 * A failed check ends the request with 400 VALIDATION_ERROR and the
 * zod issues under `details.issues`; a passing one stores the parsed
 * value for the handler.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ValidatedEnv, ValidatedQueryEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function rejectWith(c: Context, message: string, error?: ZodError): Response {
  return c.json(
    createErrorEnvelope(
      "VALIDATION_ERROR",
      message,
      error !== undefined ? { issues: formatZodErrors(error) } : undefined,
    ),
    400,
  );
}

/**
 * Parse the JSON body with `schema`; sets `validatedBody`.
 */
export function validateBody<T>(schema: Schema<T>): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err: unknown) {
      // Anything but a parse failure (e.g. the body limit tripping) goes to onError
      if (!(err instanceof SyntaxError)) throw err;
      return rejectWith(c, "Invalid JSON in request body");
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return rejectWith(c, "Request body validation failed", result.error);
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Parse the query string with `schema`; sets `validatedQuery`.
 */
export function validateQuery<Q>(schema: Schema<Q>): MiddlewareHandler<ValidatedQueryEnv<Q>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return rejectWith(c, "Invalid query parameters", result.error);
    }

    c.set("validatedQuery", result.data);
    return next();
  };
}
