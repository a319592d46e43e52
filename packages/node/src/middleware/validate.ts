/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/envelope.js";

/** AppEnv plus the parsed body a route was declared with. */
export type ValidatedEnv<T> = AppEnv & {
  Variables: { validatedBody: T };
};

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` (the schema's output type) in context
 * variables. On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Parse query parameters against a Zod schema, or undefined when invalid.
 */
export function parseQuery<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  query: Record<string, string>,
): T | undefined {
  const result = schema.safeParse(query);
  return result.success ? result.data : undefined;
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
