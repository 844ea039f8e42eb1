/**
 * @swapvault/event-store — Core types.
 *
 * Interfaces for the append-only notification log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a contiguous version within its stream
 * - Every event is linked to its predecessor by a SHA-256 hash
 */

import type { DomainEvent } from "@swapvault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 of this record chained to `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH for the first */
  readonly previousHash: string;
}

/**
 * The part of a stored event covered by its hash.
 */
export type HashableEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read
// =============================================================================

/**
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export interface ReadOptions {
  /** Inclusive, 1-based. Default: 1 */
  readonly fromVersion?: number;

  /** Default: unlimited */
  readonly maxCount?: number;
}

export interface ReadAllOptions {
  /** Inclusive, 1-based. Default: 1 */
  readonly fromPosition?: number;

  readonly maxCount?: number;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * Every subscriber sees the batch even if another throws. Subscriber
   * failures are rethrown together as an AggregateError once the events
   * are stored.
   *
   * @throws EventStoreError on an empty batch or a version conflict
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  /** Version of the last event, or 0. */
  streamVersion(streamId: string): number;

  /** Global position of the last event, or 0. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "INVALID_EVENT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
