/**
 * Tests for SettlementEngine snapshot / fromSnapshot.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SettlementEngine } from "../src/settlement.js";
import { ManualClock } from "../src/clock.js";
import { LedgerCustodian } from "../src/custody.js";
import { EscrowError } from "../src/errors.js";
import type { EscrowSnapshot } from "../src/types.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof EscrowError) return err.code;
    throw err;
  }
  return undefined;
}

/** Serialize and parse, as a snapshot stored on disk would be. */
function roundTrip(value: unknown): EscrowSnapshot {
  return JSON.parse(JSON.stringify(value));
}

describe("SettlementEngine snapshot", () => {
  let clock: ManualClock;
  let custodian: LedgerCustodian;
  let engine: SettlementEngine;

  beforeEach(() => {
    clock = new ManualClock(500);
    custodian = new LedgerCustodian({ now: () => "2025-01-15T10:00:00.000Z" });
    custodian.deposit("alice", 10n);
    custodian.deposit("bob", 10n);
    engine = new SettlementEngine({ custodian, clock });

    engine.createEvent("creator", { name: "launch", capacity: 2, price: 2n, startTime: 1000, duration: 2000 });
    engine.reserve(1, "alice", 2n);
    engine.reserve(1, "bob", 3n);
    clock.set(1000);
    engine.checkIn(1, "alice");
  });

  it("captures registry and reservations with string amounts", () => {
    expect(engine.snapshot()).toEqual({
      version: 1,
      nextEventId: 2,
      events: [
        {
          id: 1,
          owner: "creator",
          name: "launch",
          capacity: 2,
          price: "2",
          startTime: 1000,
          duration: 2000,
          createdAt: 500,
        },
      ],
      accounts: [{ eventId: 1, escrowedBalance: "3", stakedCount: 1, totalSwept: "0" }],
      reservations: [
        {
          eventId: 1,
          participant: "alice",
          status: "settled",
          stake: "2",
          outcome: "refunded",
          stakedAt: 500,
          settledAt: 1000,
        },
        { eventId: 1, participant: "bob", status: "staked", stake: "3", stakedAt: 500 },
      ],
      createdAt: 1000,
    });
  });

  it("restores an engine that carries on where the original stopped", () => {
    const restored = SettlementEngine.fromSnapshot(roundTrip(engine.snapshot()), { custodian, clock });

    expect(restored.getEvent(1)?.price).toBe(2n);
    expect(restored.getEscrow(1)).toEqual({ eventId: 1, escrowedBalance: 3n, stakedCount: 1, totalSwept: 0n });
    expect(restored.getReservation(1, "alice").outcome).toBe("refunded");
    expect(restored.isReconciled()).toBe(true);

    expect(restored.createEvent("creator", { name: "next", capacity: 1, price: 1n, startTime: 5000, duration: 10 })).toBe(2);

    clock.set(3000);
    expect(restored.sweep(1, "creator").amount).toBe(3n);
    expect(custodian.balanceOf("creator")).toBe(3n);
  });

  it("rejects a balance that disagrees with the stakes", () => {
    const snapshot = engine.snapshot();
    const tampered = roundTrip({
      ...snapshot,
      accounts: [{ eventId: 1, escrowedBalance: "9", stakedCount: 1, totalSwept: "0" }],
    });
    expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
      "event 1: escrowedBalance 9 != staked total 3",
    );
  });

  it("rejects malformed amounts", () => {
    const snapshot = engine.snapshot();
    const tampered = roundTrip({
      ...snapshot,
      events: snapshot.events.map((e) => ({ ...e, price: "-2" })),
    });
    expect(codeOf(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock }))).toBe("SNAPSHOT_INVALID");
  });

  it("rejects event ids at or past nextEventId", () => {
    const tampered = roundTrip({ ...engine.snapshot(), nextEventId: 1 });
    expect(codeOf(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock }))).toBe("SNAPSHOT_INVALID");
  });

  it("rejects events without an escrow account", () => {
    const tampered = roundTrip({ ...engine.snapshot(), accounts: [], reservations: [] });
    expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
      "event 1 has no escrow account; 0 escrow accounts for 1 events",
    );
  });

  it("rejects an event whose parameters fail registration", () => {
    const snapshot = engine.snapshot();
    const tampered = roundTrip({
      ...snapshot,
      events: snapshot.events.map((e) => ({ ...e, capacity: 0 })),
    });
    expect(codeOf(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock }))).toBe("SNAPSHOT_INVALID");
    expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
      "Event 1: capacity is required and cannot be zero",
    );
  });

  it("rejects invalid event ids", () => {
    const snapshot = engine.snapshot();
    expect(() => SettlementEngine.fromSnapshot(roundTrip({ ...snapshot, nextEventId: 0 }), { custodian, clock })).toThrow(
      "Invalid next event id 0",
    );

    const tampered = roundTrip({ ...snapshot, events: snapshot.events.map((e) => ({ ...e, id: 0 })) });
    expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow("Invalid event id 0");
  });

  describe("reservation records", () => {
    function tamperBob(patch: Record<string, unknown>): EscrowSnapshot {
      const snapshot = engine.snapshot();
      return roundTrip({
        ...snapshot,
        reservations: snapshot.reservations.map((r) => (r.participant === "bob" ? { ...r, ...patch } : r)),
      });
    }

    it("rejects an unknown status", () => {
      const tampered = tamperBob({ status: "bogus" });
      expect(codeOf(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock }))).toBe("SNAPSHOT_INVALID");
      expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
        'Invalid status "bogus" in reservation of bob for event 1',
      );
    });

    it("rejects a stored status of none", () => {
      const tampered = tamperBob({ status: "none" });
      expect(codeOf(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock }))).toBe("SNAPSHOT_INVALID");
    });

    it("rejects a staked reservation that carries an outcome", () => {
      const tampered = tamperBob({ outcome: "forfeited" });
      expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
        "Staked reservation of bob for event 1 carries a settlement",
      );
    });

    it("rejects a settled reservation without an outcome", () => {
      const tampered = tamperBob({ status: "settled", settledAt: 1000 });
      expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
        "Settled reservation of bob for event 1 lacks an outcome and settlement time",
      );
    });

    it("rejects an outcome outside the known set", () => {
      const tampered = tamperBob({ status: "settled", outcome: "lost", settledAt: 1000 });
      expect(codeOf(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock }))).toBe("SNAPSHOT_INVALID");
    });

    it("rejects a stake below the event price", () => {
      const tampered = tamperBob({ stake: "1" });
      expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
        "Stake 1 of reservation of bob for event 1 is below the price 2",
      );
    });

    it("rejects a reservation for an unknown event", () => {
      const tampered = tamperBob({ eventId: 7 });
      expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
        "reservation of bob for event 7 references an unknown event",
      );
    });
  });

  it("refuses to snapshot a stake that is still being collected", () => {
    const collecting: SettlementEngine = new SettlementEngine({
      clock,
      custodian: {
        collect: (from, amount, reference) => {
          expect(codeOf(() => collecting.snapshot())).toBe("INVARIANT_VIOLATION");
          custodian.collect(from, amount, reference);
        },
        disburse: (to, amount, reference) => custodian.disburse(to, amount, reference),
        escrowed: () => custodian.escrowed(),
      },
    });
    collecting.createEvent("creator", { name: "later", capacity: 1, price: 2n, startTime: 5000, duration: 10 });
    collecting.reserve(1, "alice", 2n);
    expect(collecting.snapshot().reservations).toHaveLength(1);
  });

  it("rejects unknown versions", () => {
    const tampered = roundTrip({ ...engine.snapshot(), version: 2 });
    expect(() => SettlementEngine.fromSnapshot(tampered, { custodian, clock })).toThrow(
      "Unsupported snapshot version 2",
    );
  });
});
