/**
 * Settlement Engine — the staking/escrow state machine.
 *
 * Composes:
 * - EventRegistry: who runs which event, for how many, at what price, when
 * - ReservationLedger: who staked what, and what the event holds
 * - Custodian: where the value actually sits
 * - NotificationPublisher: the record of every committed operation
 *
 * Every mutating operation follows the same order:
 *   1. check preconditions (first failure wins, nothing changes)
 *   2. commit bookkeeping
 *   3. move value through the custodian (undo step 2 if it refuses)
 *   4. publish the notification
 *
 * Calls are synchronous, so each one runs to completion before any other
 * starts. A custodian that calls back into the engine during step 3 sees
 * the bookkeeping of step 2 already applied. A stake being collected is
 * the exception: until collect() returns it holds its slot but cannot be
 * checked in or swept.
 */

import type { EventStore, StoredEvent } from "@turnout/event-store";
import { InMemoryEventStore } from "@turnout/event-store";
import type {
  AccountId,
  Amount,
  EventId,
  EventMetadataView,
  EventParams,
} from "@turnout/types";
import { isAmountString, isEventId, isReservationStatus, isSettlementOutcome } from "@turnout/types";
import type { Clock } from "./clock.js";
import { SystemClock, toIsoTimestamp } from "./clock.js";
import type { Custodian } from "./custody.js";
import { EscrowError } from "./errors.js";
import { NOTIFICATION, NotificationPublisher } from "./notifications.js";
import { EventRegistry, validateEventParams } from "./registry.js";
import { ReservationLedger } from "./reservations.js";
import type {
  EscrowAccount,
  EscrowSnapshot,
  EventRecord,
  EventRecordSnapshot,
  Reservation,
  ReservationSnapshot,
  ReservationView,
} from "./types.js";
import { eventEnd } from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface SettlementEngineOptions {
  readonly custodian: Custodian;
  /** Default: SystemClock */
  readonly clock?: Clock;
  /** Default: a fresh InMemoryEventStore stamped by `clock` */
  readonly eventStore?: EventStore;
  /** Notification ID factory. Default: crypto.randomUUID */
  readonly newId?: () => string;
}

/** Result of a successful sweep. */
export interface SweepResult {
  readonly eventId: EventId;
  readonly amount: Amount;
  /** Participants whose stakes were forfeited by this sweep */
  readonly forfeited: readonly AccountId[];
}

// =============================================================================
// Engine
// =============================================================================

export class SettlementEngine {
  readonly registry: EventRegistry = new EventRegistry();
  readonly reservations: ReservationLedger = new ReservationLedger();
  readonly eventStore: EventStore;

  private readonly custodian: Custodian;
  private readonly clock: Clock;
  private readonly publisher: NotificationPublisher;

  constructor(options: SettlementEngineOptions) {
    this.custodian = options.custodian;
    this.clock = options.clock ?? new SystemClock();
    const clock = this.clock;
    this.eventStore =
      options.eventStore ?? new InMemoryEventStore({ now: () => toIsoTimestamp(clock.now()) });
    this.publisher = new NotificationPublisher(this.eventStore, this.clock, options.newId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Event Registry
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register an event owned by `caller` and return its id.
   *
   * Fails with MISSING_CAPACITY, MISSING_PRICE, MISSING_START_TIME or
   * MISSING_DURATION (checked in that order).
   */
  createEvent(caller: AccountId, params: EventParams): EventId {
    const record = this.registry.create(caller, params, this.clock.now());
    this.reservations.open(record.id);

    this.publisher.publish(NOTIFICATION.EVENT_CREATED, caller, {
      eventId: record.id,
      owner: record.owner,
      name: record.name,
      capacity: record.capacity,
      price: record.price.toString(),
      startTime: record.startTime,
      duration: record.duration,
    });

    return record.id;
  }

  /** `{ name: "", owner: "" }` for an unknown id. Never throws. */
  getEventMetadata(eventId: EventId): EventMetadataView {
    return this.registry.metadata(eventId);
  }

  eventExists(eventId: EventId): boolean {
    return this.registry.exists(eventId);
  }

  getEvent(eventId: EventId): EventRecord | undefined {
    return this.registry.get(eventId);
  }

  listEvents(): readonly EventRecord[] {
    return this.registry.list();
  }

  eventCount(): number {
    return this.registry.count;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reserve: none → staked
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Lock `amountSent` for `participant`'s slot.
   *
   * Preconditions, in order:
   * 1. event exists            — EVENT_NOT_FOUND
   * 2. amountSent >= price     — PRICE_NOT_MET
   * 3. no prior reservation    — ALREADY_RESERVED / ALREADY_CHECKED_IN
   * 4. a slot is free          — OVERBOOKED
   *
   * Overpayment is escrowed in full and refunded in full at check-in.
   */
  reserve(eventId: EventId, participant: AccountId, amountSent: Amount): Reservation {
    assertIdentifier(participant, "participant");
    const event = this.registry.require(eventId);

    if (amountSent < event.price) {
      throw new EscrowError(
        "PRICE_NOT_MET",
        `Event ${eventId} costs ${event.price.toString()}, received ${amountSent.toString()}`,
      );
    }

    const status = this.reservations.statusOf(eventId, participant);
    if (status === "staked") {
      throw new EscrowError("ALREADY_RESERVED", `${participant} already reserved event ${eventId}`);
    }
    if (status === "settled") {
      throw new EscrowError("ALREADY_CHECKED_IN", `${participant} already settled event ${eventId}`);
    }

    const account = this.requireAccount(eventId);
    if (account.stakedCount >= event.capacity) {
      throw new EscrowError(
        "OVERBOOKED",
        `Event ${eventId} is full (${account.stakedCount}/${event.capacity})`,
      );
    }

    const reservation = this.reservations.stake(eventId, participant, amountSent, this.clock.now());
    try {
      this.custodian.collect(participant, amountSent, { eventId, kind: "stake", account: participant });
    } catch (err) {
      this.reservations.unstake(eventId, participant);
      throw err;
    }
    this.reservations.confirmStake(eventId, participant);

    this.publisher.publish(NOTIFICATION.RESERVED, participant, {
      eventId,
      participant,
      amount: amountSent.toString(),
    });
    return reservation;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Check-in: staked → settled (refunded)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Prove attendance and take the stake back.
   *
   * Preconditions, in order:
   * 1. event exists                       — EVENT_NOT_FOUND
   * 2. not already settled                — ALREADY_CHECKED_IN
   * 3. holds a collected reservation      — RESERVATION_NOT_FOUND
   * 4. startTime <= now < startTime+duration — EVENT_NOT_IN_PROGRESS
   */
  checkIn(eventId: EventId, participant: AccountId): Reservation {
    assertIdentifier(participant, "participant");
    const event = this.registry.require(eventId);

    const status = this.reservations.statusOf(eventId, participant);
    if (status === "settled") {
      throw new EscrowError("ALREADY_CHECKED_IN", `${participant} already settled event ${eventId}`);
    }
    if (status === "none") {
      throw new EscrowError(
        "RESERVATION_NOT_FOUND",
        `${participant} has no reservation for event ${eventId}`,
      );
    }
    if (this.reservations.isPending(eventId, participant)) {
      throw new EscrowError(
        "RESERVATION_NOT_FOUND",
        `${participant}'s stake for event ${eventId} is still being collected`,
      );
    }

    const now = this.clock.now();
    if (now < event.startTime || now >= eventEnd(event)) {
      throw new EscrowError(
        "EVENT_NOT_IN_PROGRESS",
        `Event ${eventId} runs [${event.startTime}, ${eventEnd(event)}), now is ${now}`,
      );
    }

    const settled = this.reservations.settle(eventId, participant, now);
    try {
      this.custodian.disburse(participant, settled.stake, { eventId, kind: "refund", account: participant });
    } catch (err) {
      this.reservations.unsettle(eventId, participant);
      throw err;
    }
    this.reservations.releaseSlots(eventId, 1);

    this.publisher.publish(NOTIFICATION.CHECKED_IN, participant, {
      eventId,
      participant,
      amount: settled.stake.toString(),
    });
    return settled;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Sweep: forfeit every open stake to the owner
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay the owner everything still escrowed once the event is over.
   *
   * Preconditions, in order:
   * 1. event exists                  — EVENT_NOT_FOUND
   * 2. caller is the owner           — NOT_CREATOR
   * 3. now >= startTime + duration   — EVENT_NOT_ENDED
   * 4. collected stakes to forfeit   — NOTHING_TO_WITHDRAW
   */
  sweep(eventId: EventId, caller: AccountId): SweepResult {
    const event = this.registry.require(eventId);

    if (caller !== event.owner) {
      throw new EscrowError("NOT_CREATOR", `Only the owner of event ${eventId} can withdraw`);
    }

    const now = this.clock.now();
    if (now < eventEnd(event)) {
      throw new EscrowError(
        "EVENT_NOT_ENDED",
        `Event ${eventId} ends at ${eventEnd(event)}, now is ${now}`,
      );
    }

    if (this.reservations.forfeitable(eventId) === 0n) {
      throw new EscrowError("NOTHING_TO_WITHDRAW", `Event ${eventId} holds no funds`);
    }

    const forfeit = this.reservations.forfeitAll(eventId, now);
    try {
      this.custodian.disburse(event.owner, forfeit.amount, { eventId, kind: "proceeds", account: event.owner });
    } catch (err) {
      this.reservations.unforfeit(eventId, forfeit);
      throw err;
    }
    this.reservations.releaseSlots(eventId, forfeit.participants.length);

    this.publisher.publish(NOTIFICATION.WITHDRAWN, caller, {
      eventId,
      owner: event.owner,
      amount: forfeit.amount.toString(),
    });
    return { eventId, amount: forfeit.amount, forfeited: forfeit.participants };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getReservation(eventId: EventId, participant: AccountId): ReservationView {
    return this.reservations.view(eventId, participant);
  }

  listReservations(eventId: EventId): readonly Reservation[] {
    return this.reservations.list(eventId);
  }

  getEscrow(eventId: EventId): EscrowAccount | undefined {
    return this.reservations.account(eventId);
  }

  /** Sum of every event's escrowed balance. */
  totalEscrowed(): Amount {
    return this.reservations.totalEscrowed();
  }

  /** True when the books agree with what the custodian holds. */
  isReconciled(): boolean {
    return this.totalEscrowed() === this.custodian.escrowed();
  }

  notifications(eventId: EventId): readonly StoredEvent[] {
    return this.publisher.history(eventId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  /** @throws EscrowError INVARIANT_VIOLATION while a stake is being collected */
  snapshot(): EscrowSnapshot {
    if (this.reservations.hasPending()) {
      throw new EscrowError("INVARIANT_VIOLATION", "Cannot snapshot while a stake is being collected");
    }
    const events = this.registry.list();
    return {
      version: 1,
      nextEventId: this.registry.nextId,
      events: events.map((e) => ({ ...e, price: e.price.toString() })),
      accounts: events.map((e) => {
        const account = this.requireAccount(e.id);
        return {
          eventId: account.eventId,
          escrowedBalance: account.escrowedBalance.toString(),
          stakedCount: account.stakedCount,
          totalSwept: account.totalSwept.toString(),
        };
      }),
      reservations: events.flatMap((e) =>
        this.reservations.list(e.id).map((r) => ({ ...r, stake: r.stake.toString() })),
      ),
      createdAt: this.clock.now(),
    };
  }

  /**
   * Rebuild an engine from a snapshot, re-checking every invariant.
   * Notifications are not part of the snapshot; pass the original
   * event store in `options` to keep them.
   *
   * @throws EscrowError SNAPSHOT_INVALID
   */
  static fromSnapshot(snapshot: EscrowSnapshot, options: SettlementEngineOptions): SettlementEngine {
    if (snapshot.version !== 1) {
      throw new EscrowError("SNAPSHOT_INVALID", `Unsupported snapshot version ${String(snapshot.version)}`);
    }

    if (!isEventId(snapshot.nextEventId)) {
      throw new EscrowError("SNAPSHOT_INVALID", `Invalid next event id ${String(snapshot.nextEventId)}`);
    }

    const engine = new SettlementEngine(options);
    const records = snapshot.events.map(restoreEventRecord);

    let previousId = 0;
    for (const record of records) {
      if (record.id <= previousId || record.id >= snapshot.nextEventId) {
        throw new EscrowError("SNAPSHOT_INVALID", `Event id ${record.id} is out of order or range`);
      }
      previousId = record.id;
    }

    engine.registry.restore(records, snapshot.nextEventId);
    const prices = new Map(records.map((r) => [r.id, r.price]));
    engine.reservations.restore(
      snapshot.accounts.map((a) => ({
        eventId: a.eventId,
        escrowedBalance: parseSnapshotAmount(a.escrowedBalance, `balance of event ${a.eventId}`),
        stakedCount: parseSnapshotCount(a.stakedCount, `staked count of event ${a.eventId}`),
        totalSwept: parseSnapshotAmount(a.totalSwept, `swept total of event ${a.eventId}`),
      })),
      snapshot.reservations.map((r) => restoreReservation(r, prices)),
    );

    const problems = records.flatMap((record) => engine.reservations.audit(record.id, record.capacity));
    if (snapshot.accounts.length !== records.length) {
      problems.push(`${snapshot.accounts.length} escrow accounts for ${records.length} events`);
    }
    if (problems.length > 0) {
      throw new EscrowError("SNAPSHOT_INVALID", problems.join("; "));
    }

    return engine;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireAccount(eventId: EventId): EscrowAccount {
    const account = this.reservations.account(eventId);
    if (account === undefined) {
      throw new EscrowError("INVARIANT_VIOLATION", `Event ${eventId} has no escrow account`);
    }
    return account;
  }
}

function assertIdentifier(value: AccountId, label: string): void {
  if (value.length === 0) {
    throw new EscrowError("INVALID_ARGUMENT", `${label} must be a non-empty identifier`);
  }
}

function parseSnapshotAmount(value: string, label: string): Amount {
  if (!isAmountString(value)) {
    throw new EscrowError("SNAPSHOT_INVALID", `Invalid ${label}: "${value}"`);
  }
  return BigInt(value);
}

function parseSnapshotCount(value: number, label: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new EscrowError("SNAPSHOT_INVALID", `Invalid ${label}: ${String(value)}`);
  }
  return value;
}

/** Re-run registration checks on a stored event record. */
function restoreEventRecord(e: EventRecordSnapshot): EventRecord {
  if (!isEventId(e.id)) {
    throw new EscrowError("SNAPSHOT_INVALID", `Invalid event id ${String(e.id)}`);
  }
  const record: EventRecord = { ...e, price: parseSnapshotAmount(e.price, `price of event ${e.id}`) };
  try {
    validateEventParams(record.owner, record);
  } catch (err) {
    if (err instanceof EscrowError) {
      throw new EscrowError("SNAPSHOT_INVALID", `Event ${e.id}: ${err.message}`);
    }
    throw err;
  }
  return record;
}

/**
 * Check a stored reservation against its lifecycle: a staked one has no
 * settlement, a settled one has an outcome and a time, and every stake
 * covers the event's price.
 */
function restoreReservation(
  r: ReservationSnapshot,
  prices: ReadonlyMap<EventId, Amount>,
): Reservation {
  const label = `reservation of ${r.participant} for event ${r.eventId}`;
  const price = prices.get(r.eventId);
  if (price === undefined) {
    throw new EscrowError("SNAPSHOT_INVALID", `${label} references an unknown event`);
  }
  if (r.participant.length === 0) {
    throw new EscrowError("SNAPSHOT_INVALID", `Empty participant in ${label}`);
  }

  const stake = parseSnapshotAmount(r.stake, `stake of ${label}`);
  if (stake < price) {
    throw new EscrowError(
      "SNAPSHOT_INVALID",
      `Stake ${stake.toString()} of ${label} is below the price ${price.toString()}`,
    );
  }

  const status: unknown = r.status;
  if (!isReservationStatus(status) || status === "none") {
    throw new EscrowError("SNAPSHOT_INVALID", `Invalid status "${String(status)}" in ${label}`);
  }

  const outcome: unknown = r.outcome;
  const base = { eventId: r.eventId, participant: r.participant, stake, stakedAt: r.stakedAt };
  if (status === "staked") {
    if (outcome !== undefined || r.settledAt !== undefined) {
      throw new EscrowError("SNAPSHOT_INVALID", `Staked ${label} carries a settlement`);
    }
    return { ...base, status };
  }

  if (!isSettlementOutcome(outcome) || r.settledAt === undefined) {
    throw new EscrowError("SNAPSHOT_INVALID", `Settled ${label} lacks an outcome and settlement time`);
  }
  return { ...base, status, outcome, settledAt: r.settledAt };
}
