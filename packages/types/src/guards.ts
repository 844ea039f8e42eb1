/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used where values cross a boundary the compiler cannot see through:
 * a backend's probe response, a deserialized event, a payload check.
 */

import { ADDRESS_PATTERN } from "./address.js";
import type { Address } from "./address.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Address guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault"] satisfies EventSource[]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
