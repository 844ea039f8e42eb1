/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, versions, global positions
 * - Concurrency: expected version, no_stream, any
 * - Read / ReadAll: from version, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Errors: empty append, invalid stream ID, bad fromVersion
 */

import { describe, it, expect, vi } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import { FIXED_CLOCK, makeEvent } from "./helpers.js";

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();
    const result = store.append("vault:a", [makeEvent("vault.initialized")]);

    expect(result).toEqual({ streamId: "vault:a", fromVersion: 1, toVersion: 1, count: 1 });
    expect(store.streamVersion("vault:a")).toBe(1);
    expect(store.globalPosition()).toBe(1);
  });

  it("assigns contiguous versions per stream and positions globally", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("x"), makeEvent("y")]);
    const result = store.append("b", [makeEvent("z")]);
    store.append("a", [makeEvent("w")]);

    expect(result.fromVersion).toBe(1);
    expect(store.read("a").map((e) => [e.version, e.globalPosition])).toEqual([
      [1, 1],
      [2, 2],
      [3, 4],
    ]);
    expect(store.read("b").map((e) => e.globalPosition)).toEqual([3]);
  });

  it("uses the injected clock for appendedAt", () => {
    const store = new InMemoryEventStore({ clock: FIXED_CLOCK });
    store.append("a", [makeEvent("x")]);
    expect(store.read("a")[0]?.appendedAt).toBe("2025-01-01T00:00:00.000Z");
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("a", [])).toThrow(EventStoreError);
  });

  it("rejects an empty stream ID", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("", [makeEvent("x")])).toThrow(/non-empty/);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expected version", () => {
  it("accepts a matching version", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("x")]);
    const result = store.append("a", [makeEvent("y")], { expectedVersion: 1 });
    expect(result.toVersion).toBe(2);
  });

  it("rejects a stale version", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("x"), makeEvent("y")]);
    try {
      store.append("a", [makeEvent("z")], { expectedVersion: 1 });
      expect.unreachable("should have thrown");
    } catch (e) {
      expect(e).toMatchObject({ code: "CONCURRENCY_CONFLICT", streamId: "a" });
    }
  });

  it("no_stream only succeeds on a fresh stream", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("x")], { expectedVersion: "no_stream" });
    expect(() =>
      store.append("a", [makeEvent("y")], { expectedVersion: "no_stream" }),
    ).toThrow(/already exists/);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty list for an unknown stream", () => {
    const store = new InMemoryEventStore();
    expect(store.read("missing")).toEqual([]);
  });

  it("honours fromVersion and maxCount", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("e1"), makeEvent("e2"), makeEvent("e3"), makeEvent("e4")]);
    expect(store.read("a", { fromVersion: 2, maxCount: 2 }).map((e) => e.event.type)).toEqual([
      "e2",
      "e3",
    ]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();
    expect(() => store.read("a", { fromVersion: 0 })).toThrow(/fromVersion must be >= 1/);
  });

  it("readAll returns every stream in global order", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("e1")]);
    store.append("b", [makeEvent("e2")]);
    store.append("a", [makeEvent("e3")]);
    expect(store.readAll({ fromPosition: 2 }).map((e) => e.event.type)).toEqual(["e2", "e3"]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events to stream subscribers only", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribe("a", handler);

    store.append("a", [makeEvent("e1"), makeEvent("e2")]);
    store.append("b", [makeEvent("e3")]);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map((c) => c[0].event.type)).toEqual(["e1", "e2"]);
  });

  it("delivers every event to global subscribers", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribeAll(handler);

    store.append("a", [makeEvent("e1")]);
    store.append("b", [makeEvent("e2")]);

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("stops delivering after unsubscribe", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const sub = store.subscribe("a", handler);
    const all = store.subscribeAll(handler);

    store.append("a", [makeEvent("e1")]);
    sub.unsubscribe();
    all.unsubscribe();
    store.append("a", [makeEvent("e2")]);

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("keeps delivering and storing when a subscriber throws", () => {
    const store = new InMemoryEventStore();
    const failing = vi.fn(() => {
      throw new Error("indexer down");
    });
    const healthy = vi.fn();
    store.subscribe("a", failing);
    store.subscribeAll(healthy);

    let thrown: unknown;
    try {
      store.append("a", [makeEvent("e1"), makeEvent("e2")]);
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(AggregateError);
    expect(thrown).toMatchObject({ errors: [new Error("indexer down"), new Error("indexer down")] });
    expect(failing).toHaveBeenCalledTimes(2);
    expect(healthy).toHaveBeenCalledTimes(2);
    expect(store.read("a").map((e) => e.event.type)).toEqual(["e1", "e2"]);
    expect(store.streamVersion("a")).toBe(2);
  });
});
