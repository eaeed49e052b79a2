/**
 * Event Registry — registration and lookup of staked events.
 *
 * Rules:
 * - IDs start at 1, strictly increase, and are never reused
 * - A failed registration consumes no ID
 * - Records are immutable once stored
 * - Lookups never throw; the empty owner is the absence sentinel
 */

import type { AccountId, EventId, EventMetadataView, EventParams } from "@turnout/types";
import { EscrowError } from "./errors.js";
import type { EscrowErrorCode } from "./errors.js";
import type { EventRecord } from "./types.js";

// =============================================================================
// Validation
// =============================================================================

function checkPositiveInteger(
  value: number,
  missing: EscrowErrorCode,
  field: string,
): void {
  if (value === 0) {
    throw new EscrowError(missing, `${field} is required and cannot be zero`);
  }
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EscrowError("INVALID_ARGUMENT", `${field} must be a positive integer, got ${value}`);
  }
}

/**
 * Check registration input in a fixed order; the first failure wins.
 *
 * capacity → price → startTime → duration
 */
export function validateEventParams(owner: AccountId, params: EventParams): void {
  if (owner.length === 0) {
    throw new EscrowError("INVALID_ARGUMENT", "Event owner must be a non-empty identifier");
  }

  checkPositiveInteger(params.capacity, "MISSING_CAPACITY", "capacity");

  if (params.price === 0n) {
    throw new EscrowError("MISSING_PRICE", "price is required: free events are not supported");
  }
  if (params.price < 0n) {
    throw new EscrowError("INVALID_ARGUMENT", `price must be positive, got ${params.price.toString()}`);
  }

  checkPositiveInteger(params.startTime, "MISSING_START_TIME", "startTime");
  checkPositiveInteger(params.duration, "MISSING_DURATION", "duration");

  if (!Number.isSafeInteger(params.startTime + params.duration)) {
    throw new EscrowError("INVALID_ARGUMENT", "startTime + duration exceeds the safe integer range");
  }
}

// =============================================================================
// Registry
// =============================================================================

export class EventRegistry {
  private readonly _events: Map<EventId, EventRecord> = new Map();
  private _nextId: EventId = 1;

  /**
   * Validate and store a new event owned by `owner`.
   */
  create(owner: AccountId, params: EventParams, createdAt: number): EventRecord {
    validateEventParams(owner, params);

    const record: EventRecord = {
      id: this._nextId,
      owner,
      name: params.name,
      capacity: params.capacity,
      price: params.price,
      startTime: params.startTime,
      duration: params.duration,
      createdAt,
    };

    this._events.set(record.id, record);
    this._nextId += 1;
    return record;
  }

  get(eventId: EventId): EventRecord | undefined {
    return this._events.get(eventId);
  }

  /**
   * The record, or EVENT_NOT_FOUND. Used by every mutating path.
   */
  require(eventId: EventId): EventRecord {
    const record = this._events.get(eventId);
    if (record === undefined) {
      throw new EscrowError("EVENT_NOT_FOUND", `Event ${eventId} not found`);
    }
    return record;
  }

  exists(eventId: EventId): boolean {
    return this.metadata(eventId).owner !== "";
  }

  metadata(eventId: EventId): EventMetadataView {
    const record = this._events.get(eventId);
    return record === undefined
      ? { name: "", owner: "" }
      : { name: record.name, owner: record.owner };
  }

  list(): readonly EventRecord[] {
    return [...this._events.values()];
  }

  get count(): number {
    return this._events.size;
  }

  get nextId(): EventId {
    return this._nextId;
  }

  // ─── Snapshot support ────────────────────────────────────────────────

  /**
   * Replace the registry contents. Records must be sorted by id and
   * below `nextId`.
   */
  restore(records: readonly EventRecord[], nextId: EventId): void {
    this._events.clear();
    for (const record of records) {
      this._events.set(record.id, record);
    }
    this._nextId = nextId;
  }
}
