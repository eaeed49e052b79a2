/**
 * @turnout/ledger — Core Ledger class.
 *
 * Append-only double-entry journal. Once an entry is written it is
 * permanent; corrections are new reversing entries.
 *
 * API surface:
 * - registerAccount() — Add an account to the chart
 * - append() — Append a balanced set of entries
 * - transfer() — Append a two-line debit/credit pair
 * - getBalance() — Account balance in its normal direction
 * - getTrialBalance() — Debit/credit balances of every active account
 * - getEntries() — Query entries with optional filters
 */

import { AccountRegistry } from "./accounts.js";
import { assertPositive } from "./amounts.js";
import { applyEntry, computeTrialBalance, toAccountBalance } from "./balance-calculator.js";
import type { RunningTotals } from "./balance-calculator.js";
import type {
  AccountBalance,
  AccountRef,
  AppendResult,
  EntryFilter,
  JournalEntry,
  LedgerAccount,
  LedgerTransaction,
  TransferParams,
  TrialBalance,
} from "./types.js";
import { LedgerError } from "./types.js";

export class Ledger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _entries: JournalEntry[] = [];
  private readonly _entryIds: Set<string> = new Set();
  private readonly _transactions: LedgerTransaction[] = [];
  private readonly _totals: Map<string, RunningTotals> = new Map();

  // ─── Account Management ──────────────────────────────────────────────

  registerAccount(ref: AccountRef, timestamp?: string): LedgerAccount {
    return this._accounts.register(ref, timestamp ?? new Date().toISOString());
  }

  hasAccount(id: string): boolean {
    return this._accounts.has(id);
  }

  getAccounts(): readonly LedgerAccount[] {
    return this._accounts.getAll();
  }

  // ─── Core Append ─────────────────────────────────────────────────────

  /**
   * Append a balanced set of entries.
   *
   * Validation (fail-closed, nothing is written unless all pass):
   * 1. Entries array must not be empty
   * 2. All entries share one correlationId
   * 3. Entry IDs are unique, globally and within the batch
   * 4. Every referenced account exists
   * 5. Every amount is positive
   * 6. Total debits equal total credits
   */
  append(entries: readonly JournalEntry[]): AppendResult {
    const [first] = entries;
    if (first === undefined) {
      throw new LedgerError("EMPTY_TRANSACTION", "Cannot append an empty set of entries");
    }

    const { correlationId, timestamp } = first;
    const batchIds = new Set<string>();
    let debits = 0n;
    let credits = 0n;

    for (const entry of entries) {
      if (entry.correlationId !== correlationId) {
        throw new LedgerError(
          "MIXED_CORRELATION_ID",
          `All entries must share correlationId "${correlationId}", got "${entry.correlationId}"`,
        );
      }
      if (this._entryIds.has(entry.id) || batchIds.has(entry.id)) {
        throw new LedgerError("DUPLICATE_ENTRY_ID", `Duplicate entry ID: "${entry.id}"`);
      }
      batchIds.add(entry.id);

      this._accounts.assertExists(entry.accountId);
      assertPositive(entry.amount, `Entry "${entry.id}" amount`);

      if (entry.type === "debit") {
        debits += entry.amount;
      } else {
        credits += entry.amount;
      }
    }

    if (debits !== credits) {
      throw new LedgerError(
        "UNBALANCED_TRANSACTION",
        `Transaction "${correlationId}" is unbalanced: debits=${debits.toString()}, credits=${credits.toString()}`,
      );
    }

    for (const entry of entries) {
      this._entries.push(entry);
      this._entryIds.add(entry.id);
      applyEntry(this._totals, entry);
    }

    this._transactions.push({
      correlationId,
      entries: [...entries],
      timestamp,
    });

    return { correlationId, entryCount: entries.length, timestamp };
  }

  /**
   * Book `amount` as a debit on one account and a credit on another.
   */
  transfer(params: TransferParams): AppendResult {
    const base = {
      amount: params.amount,
      timestamp: params.timestamp,
      correlationId: params.correlationId,
      memo: params.memo,
    };
    return this.append([
      { ...base, id: `${params.correlationId}:dr`, accountId: params.debit, type: "debit" },
      { ...base, id: `${params.correlationId}:cr`, accountId: params.credit, type: "credit" },
    ]);
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getBalance(accountId: string): AccountBalance {
    const account = this._accounts.assertExists(accountId);
    return toAccountBalance(account, this._totals.get(accountId));
  }

  getTrialBalance(timestamp?: string): TrialBalance {
    return computeTrialBalance(
      this._totals,
      this._accounts,
      timestamp ?? new Date().toISOString(),
    );
  }

  getEntries(filter?: EntryFilter): readonly JournalEntry[] {
    if (filter === undefined) {
      return [...this._entries];
    }

    return this._entries.filter((entry) => {
      if (filter.accountId !== undefined && entry.accountId !== filter.accountId) {
        return false;
      }
      if (filter.correlationId !== undefined && entry.correlationId !== filter.correlationId) {
        return false;
      }
      return true;
    });
  }

  get transactionCount(): number {
    return this._transactions.length;
  }
}
