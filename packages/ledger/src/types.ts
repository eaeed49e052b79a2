/**
 * @turnout/ledger — Types for the custody journal.
 *
 * The journal books one fungible unit of value. Amounts are bigint
 * integers; there is no currency dimension.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid entries throw, never silently succeed
 */

// ─── Account Types ───────────────────────────────────────────────────────

/** The five fundamental account types in double-entry accounting. */
export type AccountType = "asset" | "liability" | "income" | "expense" | "equity";

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account types to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

/** Reference to an account in the chart. */
export interface AccountRef {
  readonly id: string;
  readonly type: AccountType;
  readonly name: string;
}

export interface LedgerAccount {
  readonly ref: AccountRef;
  readonly createdAt: string;
}

// ─── Entries ─────────────────────────────────────────────────────────────

export type EntryType = "debit" | "credit";

/**
 * A single journal line. Always part of a balanced transaction.
 */
export interface JournalEntry {
  readonly id: string;
  readonly accountId: string;
  readonly type: EntryType;
  /** Strictly positive */
  readonly amount: bigint;
  /** ISO 8601 */
  readonly timestamp: string;
  readonly correlationId: string;
  /** Free-form reference, e.g. "reserve:3:alice" */
  readonly memo?: string | undefined;
}

/**
 * A balanced group of entries sharing a correlation ID.
 */
export interface LedgerTransaction {
  readonly correlationId: string;
  readonly entries: readonly JournalEntry[];
  readonly timestamp: string;
}

// ─── Balances ────────────────────────────────────────────────────────────

export interface AccountBalance {
  readonly accountId: string;
  readonly accountType: AccountType;
  /** Net balance in the account's normal direction. Negative = contra. */
  readonly balance: bigint;
  readonly totalDebits: bigint;
  readonly totalCredits: bigint;
}

export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly debitBalance: bigint;
  readonly creditBalance: bigint;
}

/**
 * Total debit balances MUST equal total credit balances.
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly totalDebits: bigint;
  readonly totalCredits: bigint;
  readonly balanced: boolean;
  readonly generatedAt: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_AMOUNT"
  | "DUPLICATE_ENTRY_ID"
  | "DUPLICATE_ACCOUNT_ID"
  | "EMPTY_TRANSACTION"
  | "MIXED_CORRELATION_ID";

/**
 * Structured error from the journal. Always thrown.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Append / Query ──────────────────────────────────────────────────────

export interface AppendResult {
  readonly correlationId: string;
  readonly entryCount: number;
  readonly timestamp: string;
}

/** Parameters for a two-line transfer between accounts. */
export interface TransferParams {
  /** Account whose debit side grows */
  readonly debit: string;
  /** Account whose credit side grows */
  readonly credit: string;
  readonly amount: bigint;
  readonly correlationId: string;
  readonly timestamp: string;
  readonly memo?: string | undefined;
}

export interface EntryFilter {
  readonly accountId?: string | undefined;
  readonly correlationId?: string | undefined;
}
