/**
 * @turnout/escrow domain types.
 *
 * - EventRecord: immutable registration of a staked event
 * - EscrowAccount: per-event aggregate of held funds
 * - Reservation: one participant's stake in one event
 * - EscrowSnapshot: JSON-safe image of the whole engine
 */

import type {
  AccountId,
  Amount,
  AmountString,
  EventId,
  ReservationStatus,
  SettlementOutcome,
} from "@turnout/types";

// =============================================================================
// Registry
// =============================================================================

export interface EventRecord {
  readonly id: EventId;
  readonly owner: AccountId;
  readonly name: string;
  readonly capacity: number;
  readonly price: Amount;
  readonly startTime: number;
  readonly duration: number;
  /** Clock reading at registration */
  readonly createdAt: number;
}

/** First second after the attendance window. */
export function eventEnd(event: EventRecord): number {
  return event.startTime + event.duration;
}

// =============================================================================
// Reservation Ledger
// =============================================================================

export interface EscrowAccount {
  readonly eventId: EventId;
  /** Funds currently held for this event */
  readonly escrowedBalance: Amount;
  /** Reservations holding a slot */
  readonly stakedCount: number;
  /** Funds already paid out to the owner */
  readonly totalSwept: Amount;
}

export interface Reservation {
  readonly eventId: EventId;
  readonly participant: AccountId;
  readonly status: Exclude<ReservationStatus, "none">;
  /** Exact amount the participant sent */
  readonly stake: Amount;
  readonly outcome?: SettlementOutcome | undefined;
  readonly stakedAt: number;
  readonly settledAt?: number | undefined;
}

/**
 * Answer to a reservation lookup. Absent reservations read as
 * `{ status: "none", stake: 0n }`.
 */
export interface ReservationView {
  readonly eventId: EventId;
  readonly participant: AccountId;
  readonly status: ReservationStatus;
  readonly stake: Amount;
  readonly outcome?: SettlementOutcome | undefined;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface EventRecordSnapshot {
  readonly id: EventId;
  readonly owner: AccountId;
  readonly name: string;
  readonly capacity: number;
  readonly price: AmountString;
  readonly startTime: number;
  readonly duration: number;
  readonly createdAt: number;
}

export interface EscrowAccountSnapshot {
  readonly eventId: EventId;
  readonly escrowedBalance: AmountString;
  readonly stakedCount: number;
  readonly totalSwept: AmountString;
}

export interface ReservationSnapshot {
  readonly eventId: EventId;
  readonly participant: AccountId;
  readonly status: "staked" | "settled";
  readonly stake: AmountString;
  readonly outcome?: SettlementOutcome | undefined;
  readonly stakedAt: number;
  readonly settledAt?: number | undefined;
}

export interface EscrowSnapshot {
  readonly version: 1;
  readonly nextEventId: EventId;
  readonly events: readonly EventRecordSnapshot[];
  readonly accounts: readonly EscrowAccountSnapshot[];
  readonly reservations: readonly ReservationSnapshot[];
  readonly createdAt: number;
}
