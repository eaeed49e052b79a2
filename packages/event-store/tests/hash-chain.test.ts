/**
 * Tests for the notification hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@turnout/types";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnhashedStoredEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: "evt-1",
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: "escrow-event-1",
      source: "registry",
    },
    payload,
  };
}

function unhashed(position: number, payload: Record<string, unknown> = {}): UnhashedStoredEvent {
  return {
    event: makeEvent("event.created", payload),
    streamId: "escrow-event-1",
    version: position,
    globalPosition: position,
    appendedAt: "2025-01-01T00:00:00.000Z",
  };
}

/** Build a correctly linked chain of `count` events. */
function chain(count: number): StoredEvent[] {
  const events: StoredEvent[] = [];
  let previousHash = GENESIS_HASH;
  for (let i = 1; i <= count; i++) {
    const base = unhashed(i, { n: i });
    const hash = computeEventHash(base, previousHash);
    events.push({ ...base, hash, previousHash });
    previousHash = hash;
  }
  return events;
}

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(unhashed(1), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic", () => {
    expect(computeEventHash(unhashed(1), GENESIS_HASH)).toBe(
      computeEventHash(unhashed(1), GENESIS_HASH),
    );
  });

  it("ignores payload key order (canonical JSON)", () => {
    const a = unhashed(1, { eventId: 1, owner: "alice" });
    const b = unhashed(1, { owner: "alice", eventId: 1 });
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when the payload or the previous hash changes", () => {
    const base = computeEventHash(unhashed(1, { amount: "2" }), GENESIS_HASH);
    expect(computeEventHash(unhashed(1, { amount: "3" }), GENESIS_HASH)).not.toBe(base);
    expect(computeEventHash(unhashed(1, { amount: "2" }), "other")).not.toBe(base);
  });
});

describe("verifyHashChain", () => {
  it("accepts an intact chain", () => {
    expect(verifyHashChain(chain(3))).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("detects a tampered payload", () => {
    const events = chain(3);
    const second = events[1];
    if (second === undefined) throw new Error("fixture");
    events[1] = { ...second, event: makeEvent("event.created", { n: 99 }) };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]?.position).toBe(2);
  });

  it("detects a broken link", () => {
    const events = chain(2);
    const second = events[1];
    if (second === undefined) throw new Error("fixture");
    events[1] = { ...second, previousHash: "bogus" };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([2, 2]);
  });
});
