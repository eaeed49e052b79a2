/**
 * @turnout/event-store — In-memory EventStore implementation.
 *
 * Durability is the embedding process's concern; this store keeps
 * everything in arrays and dispatches subscriptions synchronously.
 * A subscriber that throws never fails the append: its error goes to
 * `onSubscriberError` and the remaining subscribers still run.
 */

import type { DomainEvent } from "@turnout/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Default: wall clock, ISO 8601 */
  readonly now?: () => string;
  /** Receives subscriber failures. Default: a process warning */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

export type SubscriberErrorHandler = (error: unknown, event: StoredEvent) => void;

function warnSubscriberError(error: unknown, event: StoredEvent): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.emitWarning(
    `Subscriber failed on ${event.streamId}@${event.version}: ${reason}`,
    "SubscriberWarning",
  );
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _now: () => string;
  private readonly _onSubscriberError: SubscriberErrorHandler;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date().toISOString());
    this._onSubscriberError = options?.onSubscriberError ?? warnSubscriberError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const currentVersion = stream.length;
    this._streams.set(streamId, stream);

    const appendedAt = this._now();
    const stored: StoredEvent[] = events.map((event, i) => {
      const base = {
        event,
        streamId,
        version: currentVersion + i + 1,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(base, previousHash);
      this._lastHash = hash;
      return { ...base, hash, previousHash };
    });

    stream.push(...stored);
    this._globalLog.push(...stored);
    this._dispatch(stored);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + stored.length,
      count: stored.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (!Number.isInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be an integer >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(stream.filter((e) => e.version >= fromVersion), options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return limit(
      this._globalLog.filter((e) => e.globalPosition >= fromPosition),
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const handler of [...this._subscribers]) {
      for (const event of events) {
        try {
          handler(event);
        } catch (err) {
          this._onSubscriberError(err, event);
        }
      }
    }
  }
}

function limit<T>(items: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? items.slice(0, maxCount) : items;
}
