/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Escrow errors map by category; custody, ledger and event store
 * errors map by code. Anything unrecognised is a 500 with a generic
 * message.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { CustodyError, EscrowError } from "@turnout/escrow";
import type { EscrowErrorCategory, EscrowErrorCode } from "@turnout/escrow";
import { LedgerError } from "@turnout/ledger";
import { EventStoreError } from "@turnout/event-store";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const CATEGORY_STATUS: Readonly<Record<EscrowErrorCategory, ContentfulStatusCode>> = {
  "not-found": 404,
  validation: 400,
  "state-conflict": 409,
  "time-window": 409,
  authorization: 403,
  accounting: 409,
};

/** Escrow codes whose status differs from their category's. */
const ESCROW_OVERRIDES: Partial<Record<EscrowErrorCode, ContentfulStatusCode>> = {
  PRICE_NOT_MET: 422,
  INVARIANT_VIOLATION: 500,
};

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Custody errors
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_ESCROW: 422,
  INVALID_AMOUNT: 422,
  INVALID_ACCOUNT: 422,

  // Ledger errors
  EMPTY_TRANSACTION: 400,
  MIXED_CORRELATION_ID: 400,
  DUPLICATE_ENTRY_ID: 409,
  UNKNOWN_ACCOUNT: 404,
  DUPLICATE_ACCOUNT_ID: 409,
  UNBALANCED_TRANSACTION: 400,

  // Event store errors
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

export interface ResolvedError {
  readonly status: ContentfulStatusCode;
  readonly envelope: ErrorEnvelope;
}

function statusForCode(code: string): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

/**
 * Translate any thrown value into a status and error envelope.
 */
export function resolveError(err: unknown): ResolvedError {
  if (err instanceof ApiError) {
    return { status: err.status, envelope: createErrorEnvelope(err.code, err.message, err.details) };
  }

  if (err instanceof EscrowError) {
    const status = ESCROW_OVERRIDES[err.code] ?? CATEGORY_STATUS[err.category];
    return { status, envelope: envelopeFor(status, err.code, err.message) };
  }

  if (err instanceof CustodyError || err instanceof LedgerError || err instanceof EventStoreError) {
    const status = statusForCode(err.code);
    return { status, envelope: envelopeFor(status, err.code, err.message) };
  }

  if (err instanceof ZodError) {
    return {
      status: 400,
      envelope: createErrorEnvelope("VALIDATION_ERROR", "Validation failed", {
        issues: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      }),
    };
  }

  return { status: 500, envelope: createErrorEnvelope("INTERNAL_ERROR", "Internal server error") };
}

function envelopeFor(status: ContentfulStatusCode, code: string, message: string): ErrorEnvelope {
  // Don't leak internal details
  return status === 500
    ? createErrorEnvelope("INTERNAL_ERROR", "Internal server error")
    : createErrorEnvelope(code, message);
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const { status, envelope } = resolveError(err);
  return c.json(envelope, status);
}
