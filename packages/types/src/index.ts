/**
 * @swapvault/types — Shared domain types for the vault stack.
 *
 * - Addresses and token references
 * - Event architecture (DomainEvent, EventMetadata)
 * - Runtime guards for boundary checks
 *
 * No runtime dependencies, no mutable state.
 */

export {
  ZERO_ADDRESS,
  ADDRESS_PATTERN,
  normalizeAddress,
  sameAddress,
  isZeroAddress,
} from "./address.js";
export type { Address, TokenRef } from "./address.js";

export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

export {
  isRecord,
  isAddress,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
