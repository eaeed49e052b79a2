/**
 * Reservation Ledger — per-event stakes and escrow aggregates.
 *
 * The ledger performs bookkeeping only. The settlement engine checks
 * preconditions first; the mutators here re-check just enough to refuse
 * a transition the state machine does not allow.
 *
 * Every mutator has an inverse so that an operation whose transfer fails
 * can be undone without disturbing anything that happened meanwhile.
 *
 * A new stake is pending until the custodian has collected it. A pending
 * stake holds its slot and counts in the balance, but it cannot be
 * refunded or forfeited.
 *
 * Invariants (at rest):
 * - escrowedBalance == Σ stake over staked reservations
 * - stakedCount == number of staked reservations
 */

import type {
  AccountId,
  Amount,
  EventId,
  ReservationStatus,
} from "@turnout/types";
import { EscrowError } from "./errors.js";
import type { EscrowAccount, Reservation, ReservationView } from "./types.js";

interface MutableAccount {
  eventId: EventId;
  escrowedBalance: Amount;
  stakedCount: number;
  totalSwept: Amount;
}

type MutableReservation = {
  -readonly [K in keyof Reservation]: Reservation[K];
};

/** Result of forfeiting every open stake of an event. */
export interface ForfeitResult {
  readonly amount: Amount;
  readonly participants: readonly AccountId[];
}

export class ReservationLedger {
  private readonly _accounts: Map<EventId, MutableAccount> = new Map();
  private readonly _reservations: Map<EventId, Map<AccountId, MutableReservation>> = new Map();
  private readonly _pending: Set<string> = new Set();

  // ───────────────────────────────────────────────────────────────────────
  // Accounts
  // ───────────────────────────────────────────────────────────────────────

  /** Open an empty escrow account for a newly registered event. */
  open(eventId: EventId): void {
    if (this._accounts.has(eventId)) {
      throw new EscrowError("INVARIANT_VIOLATION", `Escrow account for event ${eventId} already open`);
    }
    this._accounts.set(eventId, { eventId, escrowedBalance: 0n, stakedCount: 0, totalSwept: 0n });
    this._reservations.set(eventId, new Map());
  }

  account(eventId: EventId): EscrowAccount | undefined {
    const account = this._accounts.get(eventId);
    return account === undefined ? undefined : { ...account };
  }

  totalEscrowed(): Amount {
    let total = 0n;
    for (const account of this._accounts.values()) {
      total += account.escrowedBalance;
    }
    return total;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reservations
  // ───────────────────────────────────────────────────────────────────────

  statusOf(eventId: EventId, participant: AccountId): ReservationStatus {
    return this._reservations.get(eventId)?.get(participant)?.status ?? "none";
  }

  get(eventId: EventId, participant: AccountId): Reservation | undefined {
    const reservation = this._reservations.get(eventId)?.get(participant);
    return reservation === undefined ? undefined : { ...reservation };
  }

  view(eventId: EventId, participant: AccountId): ReservationView {
    const reservation = this._reservations.get(eventId)?.get(participant);
    if (reservation === undefined) {
      return { eventId, participant, status: "none", stake: 0n };
    }
    return {
      eventId,
      participant,
      status: reservation.status,
      stake: reservation.stake,
      outcome: reservation.outcome,
    };
  }

  list(eventId: EventId): readonly Reservation[] {
    return [...(this._reservations.get(eventId)?.values() ?? [])].map((r) => ({ ...r }));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Stake (none → staked)
  // ───────────────────────────────────────────────────────────────────────

  stake(eventId: EventId, participant: AccountId, amount: Amount, at: number): Reservation {
    const { account, book } = this._require(eventId);
    if (book.has(participant)) {
      throw new EscrowError("INVARIANT_VIOLATION", `${participant} already holds a reservation for event ${eventId}`);
    }

    const reservation: MutableReservation = {
      eventId,
      participant,
      status: "staked",
      stake: amount,
      stakedAt: at,
    };
    book.set(participant, reservation);
    account.escrowedBalance += amount;
    account.stakedCount += 1;
    this._pending.add(pendingKey(eventId, participant));
    return { ...reservation };
  }

  /** Mark a pending stake as collected. */
  confirmStake(eventId: EventId, participant: AccountId): void {
    const { book } = this._require(eventId);
    this._requireStatus(book, eventId, participant, "staked");
    this._requirePending(eventId, participant);
    this._pending.delete(pendingKey(eventId, participant));
  }

  /** Inverse of stake(). Only a stake still pending can be withdrawn. */
  unstake(eventId: EventId, participant: AccountId): void {
    const { account, book } = this._require(eventId);
    const reservation = this._requireStatus(book, eventId, participant, "staked");
    this._requirePending(eventId, participant);
    this._pending.delete(pendingKey(eventId, participant));
    book.delete(participant);
    account.escrowedBalance -= reservation.stake;
    account.stakedCount -= 1;
  }

  isPending(eventId: EventId, participant: AccountId): boolean {
    return this._pending.has(pendingKey(eventId, participant));
  }

  hasPending(): boolean {
    return this._pending.size > 0;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Refund (staked → settled/refunded)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Mark the reservation refunded and take its stake out of the balance.
   * The slot stays counted until releaseSlots() confirms the payout.
   */
  settle(eventId: EventId, participant: AccountId, at: number): Reservation {
    const { account, book } = this._require(eventId);
    const reservation = this._requireStatus(book, eventId, participant, "staked");
    if (this.isPending(eventId, participant)) {
      throw new EscrowError("INVARIANT_VIOLATION", `${participant}'s stake for event ${eventId} is not collected yet`);
    }
    reservation.status = "settled";
    reservation.outcome = "refunded";
    reservation.settledAt = at;
    account.escrowedBalance -= reservation.stake;
    return { ...reservation };
  }

  /** Inverse of settle(). */
  unsettle(eventId: EventId, participant: AccountId): void {
    const { account, book } = this._require(eventId);
    const reservation = this._requireStatus(book, eventId, participant, "settled");
    reservation.status = "staked";
    reservation.outcome = undefined;
    reservation.settledAt = undefined;
    account.escrowedBalance += reservation.stake;
  }

  releaseSlots(eventId: EventId, count: number): void {
    const { account } = this._require(eventId);
    if (count > account.stakedCount) {
      throw new EscrowError("INVARIANT_VIOLATION", `Cannot release ${count} slots of event ${eventId}`);
    }
    account.stakedCount -= count;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Forfeit (staked → settled/forfeited, for every open stake)
  // ───────────────────────────────────────────────────────────────────────

  /** Sum of the collected stakes a sweep would forfeit. */
  forfeitable(eventId: EventId): Amount {
    let amount = 0n;
    for (const reservation of this._reservations.get(eventId)?.values() ?? []) {
      if (reservation.status === "staked" && !this.isPending(eventId, reservation.participant)) {
        amount += reservation.stake;
      }
    }
    return amount;
  }

  /**
   * Close every collected stake as forfeited and take it out of the
   * balance. Slots are released separately, once the owner has been paid.
   */
  forfeitAll(eventId: EventId, at: number): ForfeitResult {
    const { account, book } = this._require(eventId);
    const participants: AccountId[] = [];
    let amount = 0n;

    for (const reservation of book.values()) {
      if (reservation.status === "staked" && !this.isPending(eventId, reservation.participant)) {
        reservation.status = "settled";
        reservation.outcome = "forfeited";
        reservation.settledAt = at;
        participants.push(reservation.participant);
        amount += reservation.stake;
      }
    }

    account.escrowedBalance -= amount;
    account.totalSwept += amount;
    return { amount, participants };
  }

  /** Inverse of forfeitAll(). */
  unforfeit(eventId: EventId, result: ForfeitResult): void {
    const { account, book } = this._require(eventId);
    for (const participant of result.participants) {
      const reservation = this._requireStatus(book, eventId, participant, "settled");
      reservation.status = "staked";
      reservation.outcome = undefined;
      reservation.settledAt = undefined;
    }
    account.escrowedBalance += result.amount;
    account.totalSwept -= result.amount;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Invariants & snapshot support
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Describe every broken invariant for one event. Empty when consistent.
   */
  audit(eventId: EventId, capacity: number): readonly string[] {
    const account = this._accounts.get(eventId);
    if (account === undefined) {
      return [`event ${eventId} has no escrow account`];
    }

    const problems: string[] = [];
    let staked = 0;
    let held = 0n;
    for (const reservation of this._reservations.get(eventId)?.values() ?? []) {
      if (reservation.status === "staked") {
        staked += 1;
        held += reservation.stake;
      }
    }

    if (held !== account.escrowedBalance) {
      problems.push(
        `event ${eventId}: escrowedBalance ${account.escrowedBalance.toString()} != staked total ${held.toString()}`,
      );
    }
    if (staked !== account.stakedCount) {
      problems.push(`event ${eventId}: stakedCount ${account.stakedCount} != ${staked} staked reservations`);
    }
    if (account.stakedCount > capacity) {
      problems.push(`event ${eventId}: stakedCount ${account.stakedCount} exceeds capacity ${capacity}`);
    }
    return problems;
  }

  restore(accounts: readonly EscrowAccount[], reservations: readonly Reservation[]): void {
    this._accounts.clear();
    this._reservations.clear();
    this._pending.clear();
    for (const account of accounts) {
      this._accounts.set(account.eventId, { ...account });
      this._reservations.set(account.eventId, new Map());
    }
    for (const reservation of reservations) {
      const book = this._reservations.get(reservation.eventId);
      if (book === undefined) {
        throw new EscrowError(
          "SNAPSHOT_INVALID",
          `Reservation of ${reservation.participant} references unknown event ${reservation.eventId}`,
        );
      }
      if (book.has(reservation.participant)) {
        throw new EscrowError(
          "SNAPSHOT_INVALID",
          `Duplicate reservation of ${reservation.participant} for event ${reservation.eventId}`,
        );
      }
      book.set(reservation.participant, { ...reservation });
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _require(eventId: EventId): {
    account: MutableAccount;
    book: Map<AccountId, MutableReservation>;
  } {
    const account = this._accounts.get(eventId);
    const book = this._reservations.get(eventId);
    if (account === undefined || book === undefined) {
      throw new EscrowError("INVARIANT_VIOLATION", `No escrow account for event ${eventId}`);
    }
    return { account, book };
  }

  private _requireStatus(
    book: Map<AccountId, MutableReservation>,
    eventId: EventId,
    participant: AccountId,
    status: "staked" | "settled",
  ): MutableReservation {
    const reservation = book.get(participant);
    if (reservation === undefined || reservation.status !== status) {
      throw new EscrowError(
        "INVARIANT_VIOLATION",
        `Expected ${participant} to be ${status} for event ${eventId}`,
      );
    }
    return reservation;
  }

  private _requirePending(eventId: EventId, participant: AccountId): void {
    if (!this.isPending(eventId, participant)) {
      throw new EscrowError(
        "INVARIANT_VIOLATION",
        `${participant}'s stake for event ${eventId} is not pending`,
      );
    }
  }
}

function pendingKey(eventId: EventId, participant: AccountId): string {
  return `${eventId}:${participant}`;
}
