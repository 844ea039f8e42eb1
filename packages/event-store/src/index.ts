/**
 * @swapvault/event-store — Append-only notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog for payload validation
 * - Vault event definitions
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  HashableEvent,
  ExpectedVersion,
  AppendOptions,
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
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

export { VAULT_EVENTS, VAULT_EVENT_SCHEMAS, createVaultCatalog } from "./vault-events.js";
export type {
  VaultEventType,
  VaultInitializedPayload,
  BackendSetPayload,
  FundsTransferredPayload,
  BackendSwappedPayload,
  AssetManagerChangedPayload,
  Erc20SweptPayload,
  OwnershipTransferredPayload,
  TokensSuppliedPayload,
  TokensRedeemedPayload,
} from "./vault-events.js";
