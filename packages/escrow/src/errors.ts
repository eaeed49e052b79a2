/**
 * Escrow errors.
 *
 * Every precondition failure is thrown as an EscrowError carrying a
 * stable code. Nothing is mutated before the throw.
 */

// =============================================================================
// Escrow Error
// =============================================================================

export type EscrowErrorCode =
  | "EVENT_NOT_FOUND"
  | "RESERVATION_NOT_FOUND"
  | "MISSING_CAPACITY"
  | "MISSING_PRICE"
  | "MISSING_START_TIME"
  | "MISSING_DURATION"
  | "INVALID_ARGUMENT"
  | "PRICE_NOT_MET"
  | "ALREADY_RESERVED"
  | "ALREADY_CHECKED_IN"
  | "OVERBOOKED"
  | "EVENT_NOT_IN_PROGRESS"
  | "EVENT_NOT_ENDED"
  | "NOT_CREATOR"
  | "NOTHING_TO_WITHDRAW"
  | "SNAPSHOT_INVALID"
  | "INVARIANT_VIOLATION";

export type EscrowErrorCategory =
  | "not-found"
  | "validation"
  | "state-conflict"
  | "time-window"
  | "authorization"
  | "accounting";

export const ERROR_CATEGORY: Readonly<Record<EscrowErrorCode, EscrowErrorCategory>> = {
  EVENT_NOT_FOUND: "not-found",
  RESERVATION_NOT_FOUND: "not-found",
  MISSING_CAPACITY: "validation",
  MISSING_PRICE: "validation",
  MISSING_START_TIME: "validation",
  MISSING_DURATION: "validation",
  INVALID_ARGUMENT: "validation",
  PRICE_NOT_MET: "validation",
  SNAPSHOT_INVALID: "validation",
  ALREADY_RESERVED: "state-conflict",
  ALREADY_CHECKED_IN: "state-conflict",
  OVERBOOKED: "state-conflict",
  EVENT_NOT_IN_PROGRESS: "time-window",
  EVENT_NOT_ENDED: "time-window",
  NOT_CREATOR: "authorization",
  NOTHING_TO_WITHDRAW: "accounting",
  INVARIANT_VIOLATION: "accounting",
};

export class EscrowError extends Error {
  public readonly code: EscrowErrorCode;
  public readonly category: EscrowErrorCategory;

  constructor(code: EscrowErrorCode, message: string) {
    super(message);
    this.name = "EscrowError";
    this.code = code;
    this.category = ERROR_CATEGORY[code];
  }
}

// =============================================================================
// Custody Error
// =============================================================================

export type CustodyErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_ESCROW"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT";

/**
 * Raised by a custodian that refuses a transfer. The engine rolls the
 * operation back and re-throws it unchanged.
 */
export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;

  constructor(code: CustodyErrorCode, message: string) {
    super(message);
    this.name = "CustodyError";
    this.code = code;
  }
}
