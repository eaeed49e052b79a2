/**
 * Escrow Types
 *
 * Primitives shared by the registry, the reservation ledger and the
 * transport layer.
 *
 * Rules:
 * - One fungible unit of value per deployment; amounts are integers
 * - In memory amounts are bigint; on the wire they are decimal strings
 * - Times are integer seconds
 */

/** Identifier of a staked event. Positive, assigned from 1. */
export type EventId = number;

/** Opaque identifier of a caller (organizer or participant). */
export type AccountId = string;

/** Integer amount of the deployment's unit of value. */
export type Amount = bigint;

/** Integer amount rendered as a decimal string, e.g. "1500". */
export type AmountString = string;

/**
 * Reservation lifecycle for one (event, participant) pair.
 *
 * none → staked → settled. Never moves backwards; settled is terminal.
 */
export type ReservationStatus = "none" | "staked" | "settled";

/** How a settled reservation was resolved. */
export type SettlementOutcome = "refunded" | "forfeited";

/** Parameters an organizer supplies to register an event. */
export interface EventParams {
  readonly name: string;
  readonly capacity: number;
  readonly price: Amount;
  /** Start of the attendance window, in seconds */
  readonly startTime: number;
  /** Length of the attendance window, in seconds */
  readonly duration: number;
}

/** The sentinel-friendly public view of an event. */
export interface EventMetadataView {
  readonly name: string;
  /** Empty string when the event does not exist */
  readonly owner: AccountId;
}
