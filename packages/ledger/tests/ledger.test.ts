/**
 * Tests for the core Ledger class.
 *
 * Covers:
 * - Account management
 * - Double-entry validation
 * - Transfers and balances
 * - Trial balance
 * - Entry queries
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Ledger } from "../src/ledger.js";
import type { AccountRef, JournalEntry } from "../src/types.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2025-01-15T10:00:00.000Z";
const TS2 = "2025-01-15T11:00:00.000Z";

const VAULT: AccountRef = { id: "vault", type: "asset", name: "Vault" };
const ALICE: AccountRef = { id: "wallet:alice", type: "liability", name: "Alice" };
const POOL: AccountRef = { id: "escrow", type: "liability", name: "Escrow pool" };

function entry(
  id: string,
  accountId: string,
  type: "debit" | "credit",
  amount: bigint,
  correlationId: string,
  timestamp = TS,
): JournalEntry {
  return { id, accountId, type, amount, timestamp, correlationId };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("Ledger", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
    ledger.registerAccount(VAULT, TS);
    ledger.registerAccount(ALICE, TS);
    ledger.registerAccount(POOL, TS);
  });

  describe("account management", () => {
    it("registers and retrieves accounts", () => {
      expect(ledger.hasAccount("wallet:alice")).toBe(true);
      expect(ledger.hasAccount("wallet:bob")).toBe(false);
      expect(ledger.getAccounts()).toHaveLength(3);
    });

    it("stamps the current time when none is given", () => {
      const account = new Ledger().registerAccount({ id: "x", type: "asset", name: "X" });
      expect(account.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });
  });

  describe("append", () => {
    it("appends a balanced pair", () => {
      const result = ledger.append([
        entry("e1", "vault", "debit", 100n, "tx1"),
        entry("e2", "wallet:alice", "credit", 100n, "tx1"),
      ]);

      expect(result).toEqual({ correlationId: "tx1", entryCount: 2, timestamp: TS });
      expect(ledger.getEntries()).toHaveLength(2);
      expect(ledger.transactionCount).toBe(1);
    });

    it("rejects an empty batch", () => {
      expect(codeOf(() => ledger.append([]))).toBe("EMPTY_TRANSACTION");
    });

    it("rejects mixed correlation IDs", () => {
      expect(
        codeOf(() =>
          ledger.append([
            entry("e1", "vault", "debit", 5n, "tx1"),
            entry("e2", "wallet:alice", "credit", 5n, "tx2"),
          ]),
        ),
      ).toBe("MIXED_CORRELATION_ID");
    });

    it("rejects unbalanced batches and writes nothing", () => {
      expect(
        codeOf(() =>
          ledger.append([
            entry("e1", "vault", "debit", 5n, "tx1"),
            entry("e2", "wallet:alice", "credit", 4n, "tx1"),
          ]),
        ),
      ).toBe("UNBALANCED_TRANSACTION");
      expect(ledger.getEntries()).toHaveLength(0);
      expect(ledger.transactionCount).toBe(0);
    });

    it("rejects unknown accounts", () => {
      expect(
        codeOf(() =>
          ledger.append([
            entry("e1", "vault", "debit", 5n, "tx1"),
            entry("e2", "wallet:bob", "credit", 5n, "tx1"),
          ]),
        ),
      ).toBe("UNKNOWN_ACCOUNT");
    });

    it("rejects zero amounts", () => {
      expect(
        codeOf(() =>
          ledger.append([
            entry("e1", "vault", "debit", 0n, "tx1"),
            entry("e2", "wallet:alice", "credit", 0n, "tx1"),
          ]),
        ),
      ).toBe("INVALID_AMOUNT");
    });

    it("rejects entry IDs already in the ledger", () => {
      ledger.append([
        entry("e1", "vault", "debit", 5n, "tx1"),
        entry("e2", "wallet:alice", "credit", 5n, "tx1"),
      ]);
      expect(
        codeOf(() =>
          ledger.append([
            entry("e1", "vault", "debit", 5n, "tx2"),
            entry("e3", "wallet:alice", "credit", 5n, "tx2"),
          ]),
        ),
      ).toBe("DUPLICATE_ENTRY_ID");
    });
  });

  describe("transfer and balances", () => {
    beforeEach(() => {
      ledger.transfer({ debit: "vault", credit: "wallet:alice", amount: 10n, correlationId: "dep-1", timestamp: TS });
      ledger.transfer({
        debit: "wallet:alice",
        credit: "escrow",
        amount: 4n,
        correlationId: "xfer-1",
        timestamp: TS2,
        memo: "reserve:1:alice",
      });
    });

    it("builds entry IDs from the correlation ID", () => {
      expect(ledger.getEntries().map((e) => e.id)).toEqual(["dep-1:dr", "dep-1:cr", "xfer-1:dr", "xfer-1:cr"]);
    });

    it("reports balances in the normal direction", () => {
      expect(ledger.getBalance("vault").balance).toBe(10n);
      expect(ledger.getBalance("wallet:alice").balance).toBe(6n);
      expect(ledger.getBalance("escrow").balance).toBe(4n);
    });

    it("tracks gross debits and credits", () => {
      const alice = ledger.getBalance("wallet:alice");
      expect(alice.totalCredits).toBe(10n);
      expect(alice.totalDebits).toBe(4n);
    });

    it("throws for an unknown account balance", () => {
      expect(codeOf(() => ledger.getBalance("wallet:bob"))).toBe("UNKNOWN_ACCOUNT");
    });

    it("produces a balanced trial balance", () => {
      const trial = ledger.getTrialBalance(TS2);
      expect(trial.balanced).toBe(true);
      expect(trial.totalDebits).toBe(10n);
      expect(trial.totalCredits).toBe(10n);
      expect(trial.generatedAt).toBe(TS2);
      expect(trial.lines).toEqual([
        { accountId: "vault", accountType: "asset", debitBalance: 10n, creditBalance: 0n },
        { accountId: "wallet:alice", accountType: "liability", debitBalance: 0n, creditBalance: 6n },
        { accountId: "escrow", accountType: "liability", debitBalance: 0n, creditBalance: 4n },
      ]);
    });

    it("filters entries", () => {
      expect(ledger.getEntries({ accountId: "escrow" })).toHaveLength(1);
      expect(ledger.getEntries({ correlationId: "dep-1" })).toHaveLength(2);
      expect(ledger.getEntries()).toHaveLength(4);
    });

    it("keeps the memo on both lines", () => {
      const memos = ledger.getEntries({ correlationId: "xfer-1" }).map((e) => e.memo);
      expect(memos).toEqual(["reserve:1:alice", "reserve:1:alice"]);
    });
  });
});
