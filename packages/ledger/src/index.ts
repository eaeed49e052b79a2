/**
 * @turnout/ledger — Append-only double-entry journal.
 *
 * Books the custody of a single fungible unit of value:
 * - Every transaction balances (debits = credits)
 * - Entries are immutable once appended
 * - All arithmetic is bigint
 * - Zero runtime dependencies
 */

export { Ledger } from "./ledger.js";
export { AccountRegistry } from "./accounts.js";
export { applyEntry, toAccountBalance, computeTrialBalance } from "./balance-calculator.js";
export type { RunningTotals } from "./balance-calculator.js";
export { parseAmount, assertPositive } from "./amounts.js";

export type {
  AccountType,
  AccountRef,
  NormalBalance,
  LedgerAccount,
  EntryType,
  JournalEntry,
  LedgerTransaction,
  AccountBalance,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
  AppendResult,
  TransferParams,
  EntryFilter,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE } from "./types.js";
