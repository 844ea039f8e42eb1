/**
 * Event Types
 *
 * Notifications emitted for external observers and indexers.
 * Every committed state change of the vault is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are only published once the operation that produced them commits
 * - Amounts in payloads are decimal strings (bigint is not JSON)
 */

/** Which subsystem emitted an event. Only the vault publishes. */
export type EventSource = "vault";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address of the caller whose operation caused this event */
  readonly actor: string;

  /** ID shared by every event of one committed operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.backend.swapped") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
