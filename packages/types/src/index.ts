/**
 * @turnout/types — Shared domain types for the Turnout stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Escrow primitives
export type {
  EventId,
  AccountId,
  Amount,
  AmountString,
  ReservationStatus,
  SettlementOutcome,
  EventParams,
  EventMetadataView,
} from "./escrow.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isReservationStatus,
  isSettlementOutcome,
  isAmountString,
  isEventId,
} from "./guards.js";
