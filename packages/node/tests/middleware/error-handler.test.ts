/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { CustodyError, EscrowError } from "@turnout/escrow";
import { LedgerError } from "@turnout/ledger";
import { EventStoreError } from "@turnout/event-store";
import { resolveError } from "../../src/middleware/error-handler.js";
import { ApiError } from "../../src/types/error.js";
import { callerRequest, createTestApp, jsonRequest, readBody } from "../setup.js";
import type { ErrorBody } from "../setup.js";

describe("resolveError", () => {
  it("maps escrow errors by category", () => {
    const cases: [EscrowError, number][] = [
      [new EscrowError("EVENT_NOT_FOUND", "x"), 404],
      [new EscrowError("MISSING_DURATION", "x"), 400],
      [new EscrowError("OVERBOOKED", "x"), 409],
      [new EscrowError("EVENT_NOT_ENDED", "x"), 409],
      [new EscrowError("NOT_CREATOR", "x"), 403],
      [new EscrowError("NOTHING_TO_WITHDRAW", "x"), 409],
    ];
    for (const [err, status] of cases) {
      expect(resolveError(err).status).toBe(status);
    }
  });

  it("maps PRICE_NOT_MET to 422", () => {
    const resolved = resolveError(new EscrowError("PRICE_NOT_MET", "Event 1 costs 2, received 1"));
    expect(resolved).toEqual({
      status: 422,
      envelope: { error: { code: "PRICE_NOT_MET", message: "Event 1 costs 2, received 1" } },
    });
  });

  it("hides invariant violations behind a generic 500", () => {
    expect(resolveError(new EscrowError("INVARIANT_VIOLATION", "books broken"))).toEqual({
      status: 500,
      envelope: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
    });
  });

  it("maps custody errors to 422", () => {
    expect(resolveError(new CustodyError("INSUFFICIENT_ESCROW", "short")).status).toBe(422);
    expect(resolveError(new CustodyError("INVALID_ACCOUNT", "no owner")).status).toBe(422);
  });

  it("maps ledger and event store errors by code", () => {
    expect(resolveError(new LedgerError("UNKNOWN_ACCOUNT", "no such account")).status).toBe(404);
    expect(resolveError(new EventStoreError("INVALID_STREAM_ID", "bad stream", "")).status).toBe(400);
  });

  it("renders zod errors as validation failures", () => {
    const parsed = z.object({ amount: z.string() }).safeParse({ amount: 1 });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const resolved = resolveError(parsed.error);
    expect(resolved.status).toBe(400);
    expect(resolved.envelope.error.code).toBe("VALIDATION_ERROR");
    expect(resolved.envelope.error.details).toEqual({
      issues: [{ path: "amount", message: "Expected string, received number" }],
    });
  });

  it("passes API errors through with their details", () => {
    expect(resolveError(new ApiError("UNAUTHORIZED", 401, "who are you", { header: "X-Caller-Id" }))).toEqual({
      status: 401,
      envelope: { error: { code: "UNAUTHORIZED", message: "who are you", details: { header: "X-Caller-Id" } } },
    });
  });

  it("turns anything else into a generic 500", () => {
    expect(resolveError(new Error("connection refused"))).toEqual({
      status: 500,
      envelope: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } },
    });
  });
});

describe("error handler in the app", () => {
  it("returns 404 for unknown routes", async () => {
    const { app } = createTestApp();
    const res = await app.request("/nope");
    expect(res.status).toBe(404);
    expect(await readBody(res)).toEqual({ error: { code: "NOT_FOUND", message: "No route for GET /nope" } });
  });

  it("rejects invalid JSON bodies", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/api/v1/events", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Caller-Id": "creator" },
        body: "{not json",
      }),
    );
    expect(res.status).toBe(400);
    expect(await readBody(res)).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid JSON in request body" },
    });
  });

  it("lists every invalid field", async () => {
    const { app } = createTestApp();
    const res = await app.request(callerRequest("creator", "/api/v1/events", "POST", { capacity: -1, price: 2 }));
    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.message).toBe("Request body validation failed");
    expect(body.error.details?.["issues"]).toHaveLength(4);
  });

  it("keeps the request id on error responses", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/events", "GET", undefined, { "X-Request-Id": "req-err" }));
    expect(res.status).toBe(401);
    expect(res.headers.get("X-Request-Id")).toBe("req-err");
  });
});
