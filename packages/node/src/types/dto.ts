/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Schemas check shape only; domain rules (zero capacity, price not met)
 * are left to the engine so they surface with their own error codes.
 *
 * Amounts travel as decimal integer strings and become bigint here.
 */

import { z } from "zod";
import type { EscrowAccount, EventRecord, ReservationView, SweepResult } from "@turnout/escrow";
import { eventEnd } from "@turnout/escrow";
import type { JournalEntry } from "@turnout/ledger";
import { LedgerError, parseAmount } from "@turnout/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z.string().transform((value, ctx) => {
  try {
    return parseAmount(value);
  } catch (err) {
    if (!(err instanceof LedgerError)) throw err;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Amount must be a non-negative decimal integer string",
    });
    return z.NEVER;
  }
});

const NonNegativeIntSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const EventIdParamSchema = z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const AccountParamSchema = z.string().min(1).max(128);

// =============================================================================
// Event DTOs
// =============================================================================

export const CreateEventSchema = z.object({
  name: z.string().max(256).default(""),
  capacity: NonNegativeIntSchema,
  price: AmountSchema,
  startTime: NonNegativeIntSchema,
  duration: NonNegativeIntSchema,
});

export type CreateEventDto = z.infer<typeof CreateEventSchema>;

// =============================================================================
// Reservation & Wallet DTOs
// =============================================================================

export const ReserveSchema = z.object({
  amount: AmountSchema,
});

export type ReserveDto = z.infer<typeof ReserveSchema>;

export const DepositSchema = z.object({
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const FeedQuerySchema = z.object({
  afterPosition: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type FeedQuery = z.infer<typeof FeedQuerySchema>;

// =============================================================================
// Response Views
// =============================================================================

export interface EscrowView {
  readonly escrowedBalance: string;
  readonly stakedCount: number;
  readonly totalSwept: string;
}

export interface EventView {
  readonly id: number;
  readonly owner: string;
  readonly name: string;
  readonly capacity: number;
  readonly price: string;
  readonly startTime: number;
  readonly duration: number;
  readonly endTime: number;
  readonly createdAt: number;
  readonly escrow: EscrowView | null;
}

export interface ReservationResponse {
  readonly eventId: number;
  readonly participant: string;
  readonly status: string;
  readonly stake: string;
  readonly outcome?: string | undefined;
}

export interface WithdrawResponse {
  readonly eventId: number;
  readonly amount: string;
  readonly forfeited: readonly string[];
}

export interface StatementLine {
  readonly type: string;
  readonly amount: string;
  readonly timestamp: string;
  readonly memo: string | null;
}

export function toStatementLine(entry: JournalEntry): StatementLine {
  return {
    type: entry.type,
    amount: entry.amount.toString(),
    timestamp: entry.timestamp,
    memo: entry.memo ?? null,
  };
}

export function toEventView(event: EventRecord, escrow: EscrowAccount | undefined): EventView {
  return {
    id: event.id,
    owner: event.owner,
    name: event.name,
    capacity: event.capacity,
    price: event.price.toString(),
    startTime: event.startTime,
    duration: event.duration,
    endTime: eventEnd(event),
    createdAt: event.createdAt,
    escrow:
      escrow === undefined
        ? null
        : {
            escrowedBalance: escrow.escrowedBalance.toString(),
            stakedCount: escrow.stakedCount,
            totalSwept: escrow.totalSwept.toString(),
          },
  };
}

export function toReservationResponse(view: ReservationView): ReservationResponse {
  const base = {
    eventId: view.eventId,
    participant: view.participant,
    status: view.status,
    stake: view.stake.toString(),
  };
  return view.outcome === undefined ? base : { ...base, outcome: view.outcome };
}

export function toWithdrawResponse(result: SweepResult): WithdrawResponse {
  return {
    eventId: result.eventId,
    amount: result.amount.toString(),
    forfeited: result.forfeited,
  };
}
