/**
 * Event Types
 *
 * Every externally visible state change in Turnout is published as a
 * DomainEvent (the "notification" of a settlement operation).
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, where from)
 * - Payloads are JSON-safe: amounts travel as decimal integer strings
 */

/** Which Turnout subsystem emitted an event. */
export type EventSource = "registry" | "settlement";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Caller that triggered the event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups every notification of one staked event */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "event.created", "reservation.staked") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
