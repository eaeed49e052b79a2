/**
 * Runtime Type Guards
 *
 * Narrowing functions for Turnout domain types, used where values come
 * back from outside the engine (restored snapshots).
 */

import type { ReservationStatus, SettlementOutcome } from "./escrow.js";

// =============================================================================
// Escrow guards
// =============================================================================

const RESERVATION_STATUSES = new Set<string>(["none", "staked", "settled"]);
const OUTCOMES = new Set<string>(["refunded", "forfeited"]);
const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

export function isReservationStatus(value: unknown): value is ReservationStatus {
  return typeof value === "string" && RESERVATION_STATUSES.has(value);
}

export function isSettlementOutcome(value: unknown): value is SettlementOutcome {
  return typeof value === "string" && OUTCOMES.has(value);
}

/** A canonical non-negative decimal integer string ("0", "42"; not "042"). */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isEventId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 1;
}
