/**
 * Scripted lifecycle of one staked event, driven on a manual clock.
 *
 * create → reserve → overbook rejection → check-in → clock past end →
 * sweep → second-sweep rejection → reconciliation
 *
 * Rendering is left to the reporter so the CLI can colour it and tests
 * can read the outcome.
 */

import {
  EscrowError,
  LedgerCustodian,
  ManualClock,
  SettlementEngine,
  toIsoTimestamp,
} from "@turnout/escrow";
import type { EscrowErrorCode } from "@turnout/escrow";
import type { Amount } from "@turnout/types";

// =============================================================================
// Reporter
// =============================================================================

export interface WalkthroughReporter {
  step(step: number, total: number, title: string): void;
  ok(message: string): void;
  info(label: string, value: string): void;
  rejected(code: string, message: string): void;
}

export interface WalkthroughOptions {
  /** Awaited between steps. Default: no pause */
  readonly pause?: () => Promise<void>;
}

export interface WalkthroughResult {
  readonly eventId: number;
  readonly overbooked: EscrowErrorCode | undefined;
  readonly secondSweep: EscrowErrorCode | undefined;
  readonly proceeds: Amount;
  readonly balances: Readonly<Record<string, Amount>>;
  readonly notifications: number;
  readonly reconciled: boolean;
  readonly chainValid: boolean;
  readonly journalBalanced: boolean;
  /** Balanced transactions booked by the custodian */
  readonly journalTransactions: number;
  readonly journalAccounts: number;
}

export const TOTAL_STEPS = 8;

const ORGANIZER = "organizer";
const PARTICIPANTS = ["alice", "bob", "carol"] as const;

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(
  reporter: WalkthroughReporter,
  options: WalkthroughOptions = {},
): Promise<WalkthroughResult> {
  const pause = options.pause ?? (async () => {});

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  reporter.step(1, TOTAL_STEPS, "Boot");

  const clock = new ManualClock(900);
  const custodian = new LedgerCustodian({ now: () => toIsoTimestamp(clock.now()) });
  const engine = new SettlementEngine({ custodian, clock });
  reporter.ok("Settlement engine on a manual clock (t=900)");

  for (const who of PARTICIPANTS) {
    custodian.deposit(who, 10n);
  }
  reporter.ok(`Wallets funded: ${PARTICIPANTS.join(", ")} (10 each)`);
  await pause();

  // ─── Step 2: Create Event ───────────────────────────────────────────

  reporter.step(2, TOTAL_STEPS, "Create Event");

  const eventId = engine.createEvent(ORGANIZER, {
    name: "Community meetup",
    capacity: 2,
    price: 2n,
    startTime: 1000,
    duration: 3600,
  });
  const meta = engine.getEventMetadata(eventId);
  reporter.info("id", String(eventId));
  reporter.info("name", meta.name);
  reporter.info("owner", meta.owner);
  reporter.info("window", "[1000, 4600)");
  reporter.ok("Event registered: capacity 2, price 2");
  await pause();

  // ─── Step 3: Reserve ────────────────────────────────────────────────

  reporter.step(3, TOTAL_STEPS, "Reserve");

  engine.reserve(eventId, "alice", 2n);
  reporter.ok("alice staked 2");
  engine.reserve(eventId, "bob", 3n);
  reporter.ok("bob staked 3 (overpayment is escrowed in full)");
  reporter.info("escrowed", engine.getEscrow(eventId)?.escrowedBalance.toString() ?? "0");
  await pause();

  // ─── Step 4: Overbook ───────────────────────────────────────────────

  reporter.step(4, TOTAL_STEPS, "Overbook");

  const overbooked = attempt(reporter, () => engine.reserve(eventId, "carol", 2n));
  reporter.info("carol wallet", custodian.balanceOf("carol").toString());
  await pause();

  // ─── Step 5: Check In ───────────────────────────────────────────────

  reporter.step(5, TOTAL_STEPS, "Check In");

  clock.set(1800);
  const settled = engine.checkIn(eventId, "alice");
  reporter.info("clock", String(clock.now()));
  reporter.ok(`alice checked in, refunded ${settled.stake.toString()}`);
  await pause();

  // ─── Step 6: Sweep ──────────────────────────────────────────────────

  reporter.step(6, TOTAL_STEPS, "Sweep No-Shows");

  clock.set(4600);
  const sweep = engine.sweep(eventId, ORGANIZER);
  reporter.info("clock", String(clock.now()));
  reporter.info("forfeited", sweep.forfeited.join(", "));
  reporter.ok(`organizer received ${sweep.amount.toString()}`);
  await pause();

  // ─── Step 7: Sweep Again ────────────────────────────────────────────

  reporter.step(7, TOTAL_STEPS, "Sweep Again");

  const secondSweep = attempt(reporter, () => engine.sweep(eventId, ORGANIZER));
  await pause();

  // ─── Step 8: Reconcile ──────────────────────────────────────────────

  reporter.step(8, TOTAL_STEPS, "Reconcile");

  const balances: Record<string, Amount> = {};
  for (const who of [...PARTICIPANTS, ORGANIZER]) {
    const balance = custodian.balanceOf(who);
    balances[who] = balance;
    reporter.info(who, balance.toString());
  }

  const reconciled = engine.isReconciled();
  const integrity = engine.eventStore.verifyIntegrity();
  const ledger = custodian.getLedger();
  const journal = ledger.getTrialBalance(toIsoTimestamp(clock.now()));
  const notifications = engine.notifications(eventId).length;

  reporter.info("books", engine.totalEscrowed().toString());
  reporter.info("custody", custodian.escrowed().toString());
  reporter.info("notifications", String(notifications));
  reporter.info("journal", `${ledger.transactionCount} transactions over ${ledger.getAccounts().length} accounts`);
  if (reconciled) reporter.ok("Books match custody");
  if (integrity.valid) reporter.ok("Notification hash chain intact");
  if (journal.balanced) reporter.ok("Custody journal balanced");

  return {
    eventId,
    overbooked,
    secondSweep,
    proceeds: sweep.amount,
    balances,
    notifications,
    reconciled,
    chainValid: integrity.valid,
    journalBalanced: journal.balanced,
    journalTransactions: ledger.transactionCount,
    journalAccounts: ledger.getAccounts().length,
  };
}

/** Run an operation expected to be refused and report the refusal. */
function attempt(reporter: WalkthroughReporter, fn: () => unknown): EscrowErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof EscrowError) {
      reporter.rejected(err.code, err.message);
      return err.code;
    }
    throw err;
  }
  return undefined;
}
