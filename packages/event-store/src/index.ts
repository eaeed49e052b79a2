/**
 * @turnout/event-store — Append-only notification persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for the engine and tests
 * - SHA-256 hash chain over the global log
 *
 * @packageDocumentation
 */

export type {
  UnhashedStoredEvent,
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions, SubscriberErrorHandler } from "./in-memory-store.js";
