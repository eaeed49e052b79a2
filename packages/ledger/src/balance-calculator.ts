/**
 * @turnout/ledger — Balance arithmetic.
 *
 * Running debit/credit totals per account, folded into normal-direction
 * balances and the trial balance.
 */

import type { AccountRegistry } from "./accounts.js";
import type {
  AccountBalance,
  JournalEntry,
  LedgerAccount,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";

export interface RunningTotals {
  debits: bigint;
  credits: bigint;
}

/**
 * Fold one entry into the per-account totals map.
 */
export function applyEntry(
  totals: Map<string, RunningTotals>,
  entry: JournalEntry,
): void {
  let acc = totals.get(entry.accountId);
  if (acc === undefined) {
    acc = { debits: 0n, credits: 0n };
    totals.set(entry.accountId, acc);
  }
  if (entry.type === "debit") {
    acc.debits += entry.amount;
  } else {
    acc.credits += entry.amount;
  }
}

/**
 * Net balance of an account in its normal direction.
 */
export function toAccountBalance(
  account: LedgerAccount,
  totals: RunningTotals | undefined,
): AccountBalance {
  const debits = totals?.debits ?? 0n;
  const credits = totals?.credits ?? 0n;
  const normal = NORMAL_BALANCE[account.ref.type];

  return {
    accountId: account.ref.id,
    accountType: account.ref.type,
    balance: normal === "debit" ? debits - credits : credits - debits,
    totalDebits: debits,
    totalCredits: credits,
  };
}

/**
 * Trial balance over every registered account. Accounts without activity
 * are omitted.
 */
export function computeTrialBalance(
  totals: ReadonlyMap<string, RunningTotals>,
  accounts: AccountRegistry,
  generatedAt: string,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  let totalDebits = 0n;
  let totalCredits = 0n;

  for (const account of accounts.getAll()) {
    const acc = totals.get(account.ref.id);
    if (acc === undefined) continue;

    const net = acc.debits - acc.credits;
    const line: TrialBalanceLine = {
      accountId: account.ref.id,
      accountType: account.ref.type,
      debitBalance: net > 0n ? net : 0n,
      creditBalance: net < 0n ? -net : 0n,
    };
    totalDebits += line.debitBalance;
    totalCredits += line.creditBalance;
    lines.push(line);
  }

  return {
    lines,
    totalDebits,
    totalCredits,
    balanced: totalDebits === totalCredits,
    generatedAt,
  };
}
