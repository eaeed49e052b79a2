/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports the notification chain and custody reconciliation
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { createTestApp, createStandardEvent, fund, jsonRequest, readBody } from "./setup.js";

interface ReadyBody {
  readonly status: string;
  readonly subsystems: {
    readonly notifications: { readonly status: string; readonly detail?: string };
    readonly custody: { readonly status: string; readonly detail?: string };
  };
}

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = await readBody<{ status: string; timestamp: string }>(res);
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("generates an X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an oversized X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "x".repeat(129) }),
    );

    expect(res.headers.get("X-Request-Id")).not.toBe("x".repeat(129));
  });
});

describe("GET /ready", () => {
  it("is ready on a fresh node", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = await readBody<ReadyBody>(res);
    expect(body.status).toBe("ready");
    expect(body.subsystems).toEqual({ notifications: { status: "ok" }, custody: { status: "ok" } });
  });

  it("stays ready through settlement activity", async () => {
    const { app } = createTestApp();
    await createStandardEvent(app, "creator");
    await fund(app, "alice", "10");
    await app.request(jsonRequest("/api/v1/events/1/reservations", "POST", { amount: "2" }, { "X-Caller-Id": "alice" }));

    const res = await app.request("/ready");
    expect(res.status).toBe(200);
  });

  it("reports 503 when custody disagrees with the books", async () => {
    const { app, service } = createTestApp();
    service.custodian.deposit("alice", 5n);
    service.custodian.collect("alice", 1n, { eventId: 1, kind: "stake", account: "alice" });

    const res = await app.request("/ready");
    expect(res.status).toBe(503);
    const body = await readBody<ReadyBody>(res);
    expect(body.status).toBe("not_ready");
    expect(body.subsystems.custody).toEqual({ status: "down", detail: "books=0, custody=1" });
    expect(body.subsystems.notifications).toEqual({ status: "ok" });
  });
});
