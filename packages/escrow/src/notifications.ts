/**
 * Notifications — the observable record of every committed operation.
 *
 * Each staked event owns one stream in the event store
 * (`escrow-event-<id>`). Payload amounts are decimal strings so the
 * stream can be hashed and serialized as JSON.
 */

import { randomUUID } from "node:crypto";
import type { EventStore, StoredEvent } from "@turnout/event-store";
import type { AccountId, AmountString, DomainEvent, EventId, EventSource } from "@turnout/types";
import type { Clock } from "./clock.js";
import { toIsoTimestamp } from "./clock.js";

// =============================================================================
// Catalog
// =============================================================================

export const NOTIFICATION = {
  EVENT_CREATED: "event.created",
  RESERVED: "reservation.staked",
  CHECKED_IN: "reservation.checked_in",
  WITHDRAWN: "proceeds.withdrawn",
} as const;

export type NotificationType = (typeof NOTIFICATION)[keyof typeof NOTIFICATION];

export type EventCreatedPayload = {
  readonly eventId: EventId;
  readonly owner: AccountId;
  readonly name: string;
  readonly capacity: number;
  readonly price: AmountString;
  readonly startTime: number;
  readonly duration: number;
};

export type ReservedPayload = {
  readonly eventId: EventId;
  readonly participant: AccountId;
  readonly amount: AmountString;
};

export type CheckedInPayload = {
  readonly eventId: EventId;
  readonly participant: AccountId;
  /** Amount refunded */
  readonly amount: AmountString;
};

export type WithdrawnPayload = {
  readonly eventId: EventId;
  readonly owner: AccountId;
  readonly amount: AmountString;
};

interface PayloadByType {
  "event.created": EventCreatedPayload;
  "reservation.staked": ReservedPayload;
  "reservation.checked_in": CheckedInPayload;
  "proceeds.withdrawn": WithdrawnPayload;
}

const SOURCE_BY_TYPE: Readonly<Record<NotificationType, EventSource>> = {
  "event.created": "registry",
  "reservation.staked": "settlement",
  "reservation.checked_in": "settlement",
  "proceeds.withdrawn": "settlement",
};

export function escrowStreamId(eventId: EventId): string {
  return `escrow-event-${eventId}`;
}

// =============================================================================
// Publisher
// =============================================================================

export class NotificationPublisher {
  private readonly store: EventStore;
  private readonly clock: Clock;
  private readonly newId: () => string;

  constructor(store: EventStore, clock: Clock, newId: () => string = randomUUID) {
    this.store = store;
    this.clock = clock;
    this.newId = newId;
  }

  publish<T extends NotificationType>(
    type: T,
    actor: AccountId,
    payload: PayloadByType[T],
  ): DomainEvent {
    const streamId = escrowStreamId(payload.eventId);
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: this.newId(),
        timestamp: toIsoTimestamp(this.clock.now()),
        actor,
        correlationId: streamId,
        source: SOURCE_BY_TYPE[type],
      },
      payload,
    };
    this.store.append(streamId, [event]);
    return event;
  }

  history(eventId: EventId): readonly StoredEvent[] {
    return this.store.read(escrowStreamId(eventId));
  }
}
