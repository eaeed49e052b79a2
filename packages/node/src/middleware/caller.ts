/**
 * Caller identity middleware.
 *
 * Every /api route acts on behalf of the account named in X-Caller-Id.
 * Requests without one are rejected with 401 before reaching a handler.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Id";

const MAX_CALLER_LENGTH = 128;

export function callerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER)?.trim() ?? "";

    if (caller === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${CALLER_HEADER} header`),
        401,
      );
    }
    if (caller.length > MAX_CALLER_LENGTH) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${CALLER_HEADER} exceeds ${MAX_CALLER_LENGTH} characters`),
        401,
      );
    }

    c.set("caller", caller);
    await next();
  };
}
