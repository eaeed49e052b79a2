/**
 * Zod validation helpers.
 *
 * Parse a request body or path parameter against a Zod schema inside the
 * handler, so the handler receives the schema's output type. Failures
 * throw ApiError VALIDATION_ERROR (400), rendered by the error handler.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

/**
 * Validate the JSON request body.
 */
export async function parseBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/**
 * Validate a single path parameter.
 */
export function parseParam<T>(
  c: Context<AppEnv>,
  name: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(c.req.param(name));
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, `Invalid path parameter "${name}"`, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
