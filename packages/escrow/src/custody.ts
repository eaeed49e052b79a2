/**
 * Custody — where escrowed value actually lives.
 *
 * The settlement engine never holds value itself. It asks a Custodian to
 * pull a stake in or pay a refund / proceeds out, always as the last step
 * of an operation. A custodian refuses by throwing; the engine then
 * undoes the operation and re-throws.
 *
 * LedgerCustodian books every movement in a double-entry journal:
 *
 *   deposit   Dr custody:vault   Cr wallet:<account>
 *   collect   Dr wallet:<from>   Cr custody:escrow
 *   disburse  Dr custody:escrow  Cr wallet:<to>
 */

import { Ledger, LedgerError } from "@turnout/ledger";
import type { JournalEntry } from "@turnout/ledger";
import type { AccountId, Amount, EventId } from "@turnout/types";
import { CustodyError } from "./errors.js";

// =============================================================================
// Contract
// =============================================================================

export type TransferKind = "stake" | "refund" | "proceeds";

/** Why a transfer happens. Custodians may record it; they must not act on it. */
export interface TransferReference {
  readonly eventId: EventId;
  readonly kind: TransferKind;
  readonly account: AccountId;
}

export interface Custodian {
  /** Move `amount` from `from` into escrow. Throws to refuse. */
  collect(from: AccountId, amount: Amount, reference: TransferReference): void;

  /** Move `amount` out of escrow to `to`. Throws to refuse. */
  disburse(to: AccountId, amount: Amount, reference: TransferReference): void;

  /** Value currently held in escrow. */
  escrowed(): Amount;
}

// =============================================================================
// Ledger-backed custodian
// =============================================================================

export const VAULT_ACCOUNT = "custody:vault";
export const ESCROW_ACCOUNT = "custody:escrow";

export function walletAccount(account: AccountId): string {
  return `wallet:${account}`;
}

export interface LedgerCustodianOptions {
  /** Source of journal timestamps. Default: wall clock, ISO 8601 */
  readonly now?: () => string;
}

export class LedgerCustodian implements Custodian {
  private readonly ledger: Ledger = new Ledger();
  private readonly now: () => string;
  private sequence = 0;

  constructor(options?: LedgerCustodianOptions) {
    this.now = options?.now ?? (() => new Date().toISOString());
    const ts = this.now();
    this.ledger.registerAccount({ id: VAULT_ACCOUNT, type: "asset", name: "Custodied funds" }, ts);
    this.ledger.registerAccount({ id: ESCROW_ACCOUNT, type: "liability", name: "Escrow pool" }, ts);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Wallets
  // ───────────────────────────────────────────────────────────────────────

  /** Credit `account` with fresh value entering custody. */
  deposit(account: AccountId, amount: Amount): void {
    assertTransferable(amount);
    this.book(VAULT_ACCOUNT, this.wallet(account), amount, `deposit:${account}`);
  }

  balanceOf(account: AccountId): Amount {
    const id = walletAccount(account);
    return this.ledger.hasAccount(id) ? this.ledger.getBalance(id).balance : 0n;
  }

  /** Journal lines touching `account`'s wallet, oldest first. */
  statement(account: AccountId): readonly JournalEntry[] {
    return this.ledger.getEntries({ accountId: walletAccount(account) });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Custodian
  // ───────────────────────────────────────────────────────────────────────

  collect(from: AccountId, amount: Amount, reference: TransferReference): void {
    assertTransferable(amount);
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new CustodyError(
        "INSUFFICIENT_FUNDS",
        `${from} holds ${available.toString()}, needs ${amount.toString()}`,
      );
    }
    this.book(this.wallet(from), ESCROW_ACCOUNT, amount, memo(reference));
  }

  disburse(to: AccountId, amount: Amount, reference: TransferReference): void {
    assertTransferable(amount);
    const held = this.escrowed();
    if (held < amount) {
      throw new CustodyError(
        "INSUFFICIENT_ESCROW",
        `Escrow holds ${held.toString()}, cannot pay ${amount.toString()}`,
      );
    }
    this.book(ESCROW_ACCOUNT, this.wallet(to), amount, memo(reference));
  }

  escrowed(): Amount {
    return this.ledger.getBalance(ESCROW_ACCOUNT).balance;
  }

  /** Total value that ever entered custody and has not left it. */
  custodied(): Amount {
    return this.ledger.getBalance(VAULT_ACCOUNT).balance;
  }

  getLedger(): Ledger {
    return this.ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private wallet(account: AccountId): string {
    if (account.length === 0) {
      throw new CustodyError("INVALID_ACCOUNT", "Wallet owner must be a non-empty identifier");
    }
    const id = walletAccount(account);
    if (!this.ledger.hasAccount(id)) {
      this.ledger.registerAccount({ id, type: "liability", name: account }, this.now());
    }
    return id;
  }

  private book(debit: string, credit: string, amount: Amount, note: string): void {
    this.sequence += 1;
    try {
      this.ledger.transfer({
        debit,
        credit,
        amount,
        correlationId: `xfer-${this.sequence}`,
        timestamp: this.now(),
        memo: note,
      });
    } catch (err) {
      if (err instanceof LedgerError && err.code === "INVALID_AMOUNT") {
        throw new CustodyError("INVALID_AMOUNT", err.message);
      }
      throw err;
    }
  }
}

function assertTransferable(amount: Amount): void {
  if (amount <= 0n) {
    throw new CustodyError("INVALID_AMOUNT", `Transfer amount must be positive, got ${amount.toString()}`);
  }
}

function memo(reference: TransferReference): string {
  return `${reference.kind}:${reference.eventId}:${reference.account}`;
}
