import type { DomainEvent } from "@swapvault/types";

let counter = 0;

export function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${String(counter)}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "0x0000000000000000000000000000000000000001",
      correlationId: "corr-1",
      source: "vault",
    },
    payload,
  };
}

export const FIXED_CLOCK = (): string => "2025-01-01T00:00:00.000Z";
