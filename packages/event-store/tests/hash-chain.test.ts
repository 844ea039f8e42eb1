/**
 * Tests for the event store hash chain.
 */

import { describe, it, expect } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { HashableEvent, StoredEvent } from "../src/types.js";
import { FIXED_CLOCK, makeEvent } from "./helpers.js";

function hashable(payload: Record<string, unknown> = {}): HashableEvent {
  return {
    event: makeEvent("vault.test", payload),
    streamId: "s",
    version: 1,
    globalPosition: 1,
    appendedAt: "2025-01-01T00:00:00.000Z",
  };
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(hashable(), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    const event = hashable({ amount: "1" });
    expect(computeEventHash(event, GENESIS_HASH)).toBe(computeEventHash(event, GENESIS_HASH));
  });

  it("ignores key order in the payload", () => {
    const a = hashable({ x: "1", y: "2" });
    const b: HashableEvent = { ...a, event: { ...a.event, payload: { y: "2", x: "1" } } };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when the payload changes", () => {
    const base = hashable({ amount: "1" });
    const modified: HashableEvent = { ...base, event: { ...base.event, payload: { amount: "2" } } };
    expect(computeEventHash(base, GENESIS_HASH)).not.toBe(computeEventHash(modified, GENESIS_HASH));
  });

  it("changes when previousHash changes", () => {
    const event = hashable();
    expect(computeEventHash(event, GENESIS_HASH)).not.toBe(computeEventHash(event, "other"));
  });
});

// =============================================================================
// Store integration
// =============================================================================

describe("InMemoryEventStore chain", () => {
  it("links each event to its predecessor across streams", () => {
    const store = new InMemoryEventStore({ clock: FIXED_CLOCK });
    store.append("a", [makeEvent("e1")]);
    store.append("b", [makeEvent("e2")]);

    const [first, second] = store.readAll();
    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(second?.previousHash).toBe(first?.hash);
    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 2, errors: [] });
  });

  it("an empty store is valid", () => {
    expect(new InMemoryEventStore().verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  function chain(count: number): StoredEvent[] {
    const store = new InMemoryEventStore({ clock: FIXED_CLOCK });
    for (let i = 0; i < count; i++) {
      store.append("s", [makeEvent(`e${String(i + 1)}`, { index: String(i) })]);
    }
    return [...store.readAll()];
  }

  it("detects a tampered payload", () => {
    const events = chain(3);
    const victim = events[1];
    if (victim === undefined) throw new Error("missing event");
    events[1] = { ...victim, event: { ...victim.event, payload: { index: "99" } } };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
  });

  it("detects a removed event", () => {
    const events = chain(3);
    events.splice(1, 1);

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(3);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });
});
