/**
 * EscrowService — Composition root for the escrow packages.
 *
 * Route handlers delegate to this service; they never touch the engine
 * or the custodian directly. Every mutating call is logged: `info` when
 * it commits, `warn` with the error code when the engine or the
 * custodian refuses it. Notifications are stamped from the service
 * clock; each one is logged at `debug` as it lands, and a failing
 * subscriber is logged at `error` without failing the operation.
 */

import type { Logger } from "pino";
import {
  CustodyError,
  EscrowError,
  LedgerCustodian,
  SettlementEngine,
  SystemClock,
  toIsoTimestamp,
} from "@turnout/escrow";
import type {
  Clock,
  EscrowAccount,
  EventRecord,
  Reservation,
  ReservationView,
  SweepResult,
} from "@turnout/escrow";
import { InMemoryEventStore } from "@turnout/event-store";
import type { EventStoreIntegrityResult, ReadAllOptions, StoredEvent } from "@turnout/event-store";
import type { JournalEntry } from "@turnout/ledger";
import type { AccountId, Amount, EventId, EventMetadataView, EventParams } from "@turnout/types";

// =============================================================================
// Configuration
// =============================================================================

export interface EscrowServiceConfig {
  /** Default: SystemClock */
  readonly clock?: Clock | undefined;
  /** Default: a fresh LedgerCustodian stamped by `clock` */
  readonly custodian?: LedgerCustodian | undefined;
  /** Receives settlement logs. Silent when omitted. */
  readonly logger?: Logger | undefined;
}

export interface ReadinessReport {
  readonly integrity: EventStoreIntegrityResult;
  readonly reconciled: boolean;
  readonly totalEscrowed: Amount;
  readonly custodyEscrowed: Amount;
}

type LogContext = Readonly<Record<string, string | number>>;

// =============================================================================
// Service
// =============================================================================

export class EscrowService {
  readonly engine: SettlementEngine;
  readonly custodian: LedgerCustodian;
  readonly eventStore: InMemoryEventStore;
  readonly clock: Clock;

  private readonly _logger: Logger | undefined;

  constructor(config: EscrowServiceConfig = {}) {
    this.clock = config.clock ?? new SystemClock();
    const clock = this.clock;
    this.custodian = config.custodian ?? new LedgerCustodian({ now: () => toIsoTimestamp(clock.now()) });
    this._logger = config.logger;
    this.eventStore = new InMemoryEventStore({
      now: () => toIsoTimestamp(clock.now()),
      onSubscriberError: (err, event) => {
        this._logger?.error(
          {
            streamId: event.streamId,
            version: event.version,
            type: event.event.type,
            error: err instanceof Error ? err.message : String(err),
          },
          "notification subscriber failed",
        );
      },
    });
    this.eventStore.subscribeAll((stored) => {
      this._logger?.debug(
        { streamId: stored.streamId, type: stored.event.type, globalPosition: stored.globalPosition },
        "notification appended",
      );
    });
    this.engine = new SettlementEngine({
      custodian: this.custodian,
      clock: this.clock,
      eventStore: this.eventStore,
    });
  }

  // ─── Registry ──────────────────────────────────────────────────────

  createEvent(caller: AccountId, params: EventParams): EventId {
    return this._run("createEvent", { caller, price: params.price.toString() }, () => {
      const eventId = this.engine.createEvent(caller, params);
      this._logger?.info({ op: "createEvent", eventId, owner: caller }, "event created");
      return eventId;
    });
  }

  getEvent(eventId: EventId): EventRecord | undefined {
    return this.engine.getEvent(eventId);
  }

  getEventMetadata(eventId: EventId): EventMetadataView {
    return this.engine.getEventMetadata(eventId);
  }

  listEvents(): readonly EventRecord[] {
    return this.engine.listEvents();
  }

  getEscrow(eventId: EventId): EscrowAccount | undefined {
    return this.engine.getEscrow(eventId);
  }

  // ─── Settlement ────────────────────────────────────────────────────

  reserve(eventId: EventId, participant: AccountId, amount: Amount): Reservation {
    const context = { eventId, participant, amount: amount.toString() };
    return this._run("reserve", context, () => {
      const reservation = this.engine.reserve(eventId, participant, amount);
      this._logger?.info({ op: "reserve", ...context }, "reservation staked");
      return reservation;
    });
  }

  checkIn(eventId: EventId, participant: AccountId): Reservation {
    return this._run("checkIn", { eventId, participant }, () => {
      const reservation = this.engine.checkIn(eventId, participant);
      this._logger?.info(
        { op: "checkIn", eventId, participant, refunded: reservation.stake.toString() },
        "participant checked in",
      );
      return reservation;
    });
  }

  withdraw(eventId: EventId, caller: AccountId): SweepResult {
    return this._run("withdraw", { eventId, caller }, () => {
      const result = this.engine.sweep(eventId, caller);
      this._logger?.info(
        {
          op: "withdraw",
          eventId,
          owner: caller,
          amount: result.amount.toString(),
          forfeited: result.forfeited.length,
        },
        "proceeds withdrawn",
      );
      return result;
    });
  }

  getReservation(eventId: EventId, participant: AccountId): ReservationView {
    return this.engine.getReservation(eventId, participant);
  }

  notifications(eventId: EventId): readonly StoredEvent[] {
    return this.engine.notifications(eventId);
  }

  /** Notifications of every event, in global order. */
  feed(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  // ─── Wallets ───────────────────────────────────────────────────────

  deposit(account: AccountId, amount: Amount): Amount {
    return this._run("deposit", { account, amount: amount.toString() }, () => {
      this.custodian.deposit(account, amount);
      const balance = this.custodian.balanceOf(account);
      this._logger?.info(
        { op: "deposit", account, amount: amount.toString(), balance: balance.toString() },
        "wallet funded",
      );
      return balance;
    });
  }

  balanceOf(account: AccountId): Amount {
    return this.custodian.balanceOf(account);
  }

  statement(account: AccountId): readonly JournalEntry[] {
    return this.custodian.statement(account);
  }

  // ─── Health & Integrity ──────────────────────────────────────────

  /**
   * Verify the notification hash chain and that the books agree with
   * custody. Called by /ready.
   */
  readiness(): ReadinessReport {
    return {
      integrity: this.eventStore.verifyIntegrity(),
      reconciled: this.engine.isReconciled(),
      totalEscrowed: this.engine.totalEscrowed(),
      custodyEscrowed: this.custodian.escrowed(),
    };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _run<T>(op: string, context: LogContext, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof EscrowError || err instanceof CustodyError) {
        this._logger?.warn({ op, code: err.code, ...context }, err.message);
      }
      throw err;
    }
  }
}
