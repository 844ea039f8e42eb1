/**
 * @swapvault/event-store — Event catalog.
 *
 * Registry of known event types and their payload shapes. The store
 * itself is payload-agnostic; producers and consumers use the catalog
 * to check that what they write or read has the expected shape.
 */

import type { DomainEvent, EventSource } from "@swapvault/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "vault.backend.swapped") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** True if `payload` has the shape this schema describes */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same type and version
   * is a no-op; a different version replaces the schema.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${String(schema.version)}`,
      );
    }
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${String(existing.version)} to ${String(schema.version)}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  /**
   * Validate an event's payload against its registered schema.
   * Unregistered types and events from another source are invalid.
   */
  validate(event: DomainEvent): boolean {
    const schema = this._schemas.get(event.type);
    if (schema === undefined || schema.source !== event.metadata.source) {
      return false;
    }
    return schema.validate(event.payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
