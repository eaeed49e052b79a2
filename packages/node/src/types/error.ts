/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * HTTP-level error codes. Domain failures keep their own codes
 * (EVENT_NOT_FOUND, OVERBOOKED, ...).
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Api Error
// =============================================================================

/**
 * Thrown by handlers for failures that belong to the HTTP layer
 * (bad input, missing identity). Rendered by the global error handler.
 */
export class ApiError extends Error {
  public readonly code: ApiErrorCode;
  public readonly status: ContentfulStatusCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ApiErrorCode,
    status: ContentfulStatusCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}
