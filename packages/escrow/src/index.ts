/**
 * @turnout/escrow — Stake-to-attend settlement.
 *
 * Provides:
 * - EventRegistry: validated event registration with monotonic ids
 * - ReservationLedger: per-participant stakes and per-event escrow totals
 * - SettlementEngine: reserve / check-in / sweep with rollback on custody failure
 * - LedgerCustodian: double-entry custody of wallets and the escrow pool
 * - Clocks for window gating, notifications for every committed operation
 *
 * @packageDocumentation
 */

export { SettlementEngine } from "./settlement.js";
export type { SettlementEngineOptions, SweepResult } from "./settlement.js";

export { EventRegistry, validateEventParams } from "./registry.js";
export { ReservationLedger } from "./reservations.js";
export type { ForfeitResult } from "./reservations.js";

export {
  LedgerCustodian,
  VAULT_ACCOUNT,
  ESCROW_ACCOUNT,
  walletAccount,
} from "./custody.js";
export type {
  Custodian,
  TransferKind,
  TransferReference,
  LedgerCustodianOptions,
} from "./custody.js";

export { SystemClock, ManualClock, toIsoTimestamp } from "./clock.js";
export type { Clock } from "./clock.js";

export { NOTIFICATION, NotificationPublisher, escrowStreamId } from "./notifications.js";
export type {
  NotificationType,
  EventCreatedPayload,
  ReservedPayload,
  CheckedInPayload,
  WithdrawnPayload,
} from "./notifications.js";

export { EscrowError, CustodyError, ERROR_CATEGORY } from "./errors.js";
export type {
  EscrowErrorCode,
  EscrowErrorCategory,
  CustodyErrorCode,
} from "./errors.js";

export { eventEnd } from "./types.js";
export type {
  EventRecord,
  EscrowAccount,
  Reservation,
  ReservationView,
  EventRecordSnapshot,
  EscrowAccountSnapshot,
  ReservationSnapshot,
  EscrowSnapshot,
} from "./types.js";
