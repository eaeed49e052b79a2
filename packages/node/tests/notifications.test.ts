/**
 * Tests for the notification feed.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { callerRequest, createStandardEvent, createTestApp, fund, jsonRequest, readBody } from "./setup.js";
import type { ErrorBody, TestApp } from "./setup.js";

interface FeedBody {
  readonly data: readonly {
    readonly streamId: string;
    readonly globalPosition: number;
    readonly appendedAt: string;
    readonly event: { readonly type: string };
  }[];
  readonly next: number | null;
}

describe("notification feed", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = createTestApp();
    await fund(t.app, "alice", "10");
    await fund(t.app, "bob", "10");
    await createStandardEvent(t.app, "creator");
    await createStandardEvent(t.app, "creator");
    await t.app.request(callerRequest("alice", "/api/v1/events/1/reservations", "POST", { amount: "2" }));
    await t.app.request(callerRequest("bob", "/api/v1/events/2/reservations", "POST", { amount: "2" }));
  });

  it("lists every event's notifications in global order", async () => {
    const res = await t.app.request(callerRequest("anyone", "/api/v1/notifications"));
    expect(res.status).toBe(200);

    const body = await readBody<FeedBody>(res);
    expect(body.data.map((n) => [n.globalPosition, n.streamId, n.event.type])).toEqual([
      [1, "escrow-event-1", "event.created"],
      [2, "escrow-event-2", "event.created"],
      [3, "escrow-event-1", "reservation.staked"],
      [4, "escrow-event-2", "reservation.staked"],
    ]);
    expect(body.next).toBeNull();
  });

  it("stamps notifications with the service clock", async () => {
    t.clock.set(1000);
    await t.app.request(callerRequest("alice", "/api/v1/events/1/check-in", "POST"));

    const body = await readBody<FeedBody>(await t.app.request(callerRequest("anyone", "/api/v1/notifications")));
    expect(body.data.map((n) => n.appendedAt)).toEqual([
      "1970-01-01T00:08:20.000Z",
      "1970-01-01T00:08:20.000Z",
      "1970-01-01T00:08:20.000Z",
      "1970-01-01T00:08:20.000Z",
      "1970-01-01T00:16:40.000Z",
    ]);
  });

  it("pages from a position", async () => {
    const res = await t.app.request(callerRequest("anyone", "/api/v1/notifications?afterPosition=1&limit=2"));
    const body = await readBody<FeedBody>(res);
    expect(body.data.map((n) => n.globalPosition)).toEqual([2, 3]);
    expect(body.next).toBe(3);

    const rest = await readBody<FeedBody>(
      await t.app.request(callerRequest("anyone", "/api/v1/notifications?afterPosition=3&limit=2")),
    );
    expect(rest.data.map((n) => n.globalPosition)).toEqual([4]);
    expect(rest.next).toBeNull();
  });

  it("rejects an out-of-range limit", async () => {
    const res = await t.app.request(callerRequest("anyone", "/api/v1/notifications?limit=0"));
    expect(res.status).toBe(400);
    expect((await readBody<ErrorBody>(res)).error.code).toBe("VALIDATION_ERROR");
  });

  it("requires a caller", async () => {
    const res = await t.app.request(jsonRequest("/api/v1/notifications"));
    expect(res.status).toBe(401);
  });
});
