/**
 * @turnout/ledger — Chart of accounts.
 *
 * Append-only: accounts can be added but never modified or removed.
 */

import type { AccountRef, LedgerAccount } from "./types.js";
import { LedgerError } from "./types.js";

export class AccountRegistry {
  private readonly _accounts: Map<string, LedgerAccount> = new Map();

  /**
   * Register a new account. Throws if the ID is taken.
   */
  register(ref: AccountRef, timestamp: string): LedgerAccount {
    if (this._accounts.has(ref.id)) {
      throw new LedgerError(
        "DUPLICATE_ACCOUNT_ID",
        `Account already exists: "${ref.id}"`,
      );
    }

    const account: LedgerAccount = { ref: { ...ref }, createdAt: timestamp };
    this._accounts.set(ref.id, account);
    return account;
  }

  has(id: string): boolean {
    return this._accounts.has(id);
  }

  assertExists(id: string): LedgerAccount {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return account;
  }

  getAll(): readonly LedgerAccount[] {
    return [...this._accounts.values()];
  }
}
