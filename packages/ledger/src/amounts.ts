/**
 * @turnout/ledger — Integer amount parsing.
 *
 * Amounts cross process boundaries as canonical decimal integer strings
 * ("0", "2", "1500"). Inside the journal they are bigint.
 */

import { LedgerError } from "./types.js";

const INTEGER = /^(0|[1-9]\d*)$/;

/**
 * Parse a canonical non-negative integer string.
 *
 * "1500" → 1500n. Rejects signs, decimals, whitespace and leading zeros.
 */
export function parseAmount(amount: string): bigint {
  if (!INTEGER.test(amount)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }
  return BigInt(amount);
}

/**
 * Throws unless the amount is strictly positive.
 */
export function assertPositive(amount: bigint, label = "amount"): void {
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be positive, got ${amount.toString()}`,
    );
  }
}
