/**
 * @swapvault/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for tests, the demo and any
 * process that does not need the log to outlive it.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Synchronous subscription dispatch
 * - No durability guarantees
 */

import type { DomainEvent } from "@swapvault/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashableEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt`. Default: wall clock */
  readonly clock?: () => string;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _clock: () => string;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._clock = options.clock ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    const expected = options?.expectedVersion ?? "any";
    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && expected !== currentVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expected)}`,
        streamId,
      );
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._clock();
    const stored: StoredEvent[] = [];

    events.forEach((event, i) => {
      const base: HashableEvent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = { ...base, hash: computeEventHash(base, previousHash), previousHash };
      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    });

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
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

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

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

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    const failures: unknown[] = [];
    const deliver = (handler: EventHandler, event: StoredEvent): void => {
      try {
        handler(event);
      } catch (err) {
        failures.push(err);
      }
    };
    for (const event of events) {
      streamSubs?.forEach((handler) => deliver(handler, event));
      this._globalSubscribers.forEach((handler) => deliver(handler, event));
    }
    if (failures.length > 0) {
      throw new AggregateError(
        failures,
        `${String(failures.length)} subscriber(s) failed after append to "${streamId}"`,
      );
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
