/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - Subscriptions: stream-specific, global, unsubscribe, errors
 * - Persist hook: a failing persist commits nothing
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@keepsake/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import type { StoredEvent } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let seq = 0;

function makeEvent(type: string): DomainEvent {
  seq += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${String(seq)}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "alice",
      correlationId: `corr-${String(seq)}`,
      source: "ledger",
    },
    payload: { seq },
  };
}

function makeEvents(count: number, prefix = "vault.test"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${String(i + 1)}`));
}

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof EventStoreError) return err.code;
    throw err;
  }
  throw new Error("expected EventStoreError");
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("vault-1", [makeEvent("vault.created")]);

    expect(result).toEqual({ streamId: "vault-1", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("assigns contiguous versions within a stream", () => {
    const store = new InMemoryEventStore();

    store.append("vault-1", makeEvents(2));
    const result = store.append("vault-1", makeEvents(3));

    expect(result.fromVersion).toBe(3);
    expect(result.toVersion).toBe(5);
    expect(store.read("vault-1").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();

    store.append("vault-1", makeEvents(2));
    store.append("vault-2", makeEvents(1));

    expect(store.readAll().map((e) => [e.streamId, e.globalPosition])).toEqual([
      ["vault-1", 1],
      ["vault-1", 2],
      ["vault-2", 3],
    ]);
    expect(store.globalPosition()).toBe(3);
  });

  it("stamps appendedAt from the injected clock", () => {
    const store = new InMemoryEventStore({ now: () => new Date("2026-03-01T12:00:00.000Z") });

    store.append("vault-1", makeEvents(1));

    expect(store.read("vault-1")[0]?.appendedAt).toBe("2026-03-01T12:00:00.000Z");
  });

  it("links every event to its predecessor's hash", () => {
    const store = new InMemoryEventStore();

    store.append("vault-1", makeEvents(2));
    store.append("vault-2", makeEvents(1));

    const [a, b, c] = store.readAll();
    expect(a?.previousHash).toBe("genesis");
    expect(b?.previousHash).toBe(a?.hash);
    expect(c?.previousHash).toBe(b?.hash);
    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();
    expect(codeOf(() => store.append("vault-1", []))).toBe("EMPTY_APPEND");
  });

  it("rejects an empty stream id", () => {
    const store = new InMemoryEventStore();
    expect(codeOf(() => store.append("", makeEvents(1)))).toBe("INVALID_STREAM_ID");
  });
});

// =============================================================================
// Expected version
// =============================================================================

describe("expected version", () => {
  it("accepts the matching version", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(2));

    const result = store.append("vault-1", makeEvents(1), { expectedVersion: 2 });
    expect(result.toVersion).toBe(3);
  });

  it("rejects a stale version without appending", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(2));

    expect(codeOf(() => store.append("vault-1", makeEvents(1), { expectedVersion: 1 }))).toBe(
      "CONCURRENCY_CONFLICT",
    );
    expect(store.streamVersion("vault-1")).toBe(2);
  });

  it("enforces no_stream on first write only", () => {
    const store = new InMemoryEventStore();

    store.append("vault-1", makeEvents(1), { expectedVersion: "no_stream" });

    expect(
      codeOf(() => store.append("vault-1", makeEvents(1), { expectedVersion: "no_stream" })),
    ).toBe("CONCURRENCY_CONFLICT");
  });

  it("skips the check for any", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(4));

    expect(store.append("vault-1", makeEvents(1), { expectedVersion: "any" }).toVersion).toBe(5);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty list for an unknown stream", () => {
    const store = new InMemoryEventStore();
    expect(store.read("vault-9")).toEqual([]);
    expect(store.streamExists("vault-9")).toBe(false);
    expect(store.streamVersion("vault-9")).toBe(0);
  });

  it("reads forward from a version with a max count", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(5));

    const events = store.read("vault-1", { fromVersion: 2, maxCount: 2 });
    expect(events.map((e) => e.version)).toEqual([2, 3]);
  });

  it("reads backward from the head by default", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(3));

    const events = store.read("vault-1", { direction: "backward" });
    expect(events.map((e) => e.version)).toEqual([3, 2, 1]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(1));
    expect(codeOf(() => store.read("vault-1", { fromVersion: 0 }))).toBe("INVALID_VERSION");
  });

  it("reads all streams from a global position", () => {
    const store = new InMemoryEventStore();
    store.append("vault-1", makeEvents(2));
    store.append("vault-2", makeEvents(2));

    expect(store.readAll({ fromPosition: 3 }).map((e) => e.globalPosition)).toEqual([3, 4]);
    expect(
      store.readAll({ direction: "backward", maxCount: 2 }).map((e) => e.globalPosition),
    ).toEqual([4, 3]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events to stream subscribers only", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribe("vault-1", handler);

    store.append("vault-1", makeEvents(2));
    store.append("vault-2", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("delivers every event to global subscribers in commit order", () => {
    const store = new InMemoryEventStore();
    const positions: number[] = [];
    store.subscribeAll((e) => positions.push(e.globalPosition));

    store.append("vault-1", makeEvents(2));
    store.append("vault-2", makeEvents(1));

    expect(positions).toEqual([1, 2, 3]);
  });

  it("stops delivery after unsubscribe", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const sub = store.subscribe("vault-1", handler);

    store.append("vault-1", makeEvents(1));
    sub.unsubscribe();
    store.append("vault-1", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("commits before rethrowing a subscriber error", () => {
    const store = new InMemoryEventStore();
    const later = vi.fn();
    store.subscribeAll(() => {
      throw new Error("boom");
    });
    store.subscribeAll(later);

    expect(() => store.append("vault-1", makeEvents(1))).toThrow("boom");
    expect(store.streamVersion("vault-1")).toBe(1);
    expect(later).toHaveBeenCalledTimes(1);
  });

  it("routes subscriber errors to onSubscriberError when given", () => {
    const onSubscriberError = vi.fn();
    const store = new InMemoryEventStore({ onSubscriberError });
    store.subscribeAll(() => {
      throw new Error("boom");
    });

    const result = store.append("vault-1", makeEvents(1));

    expect(result.count).toBe(1);
    expect(onSubscriberError).toHaveBeenCalledTimes(1);
  });
});

// =============================================================================
// Persist hook
// =============================================================================

class FailingStore extends InMemoryEventStore {
  fail = false;
  readonly persisted: StoredEvent[] = [];

  protected override persist(batch: readonly StoredEvent[]): void {
    if (this.fail) throw new Error("disk full");
    this.persisted.push(...batch);
  }
}

describe("persist hook", () => {
  it("passes each hashed batch to persist", () => {
    const store = new FailingStore();
    store.append("vault-1", makeEvents(2));

    expect(store.persisted.map((e) => e.version)).toEqual([1, 2]);
    expect(store.persisted[1]?.previousHash).toBe(store.persisted[0]?.hash);
  });

  it("commits nothing when persist throws", () => {
    const store = new FailingStore();
    const handler = vi.fn();
    store.subscribeAll(handler);
    store.append("vault-1", makeEvents(1));

    store.fail = true;
    expect(() => store.append("vault-1", makeEvents(1))).toThrow("disk full");

    expect(store.streamVersion("vault-1")).toBe(1);
    expect(store.globalPosition()).toBe(1);
    expect(handler).toHaveBeenCalledTimes(1);

    store.fail = false;
    store.append("vault-1", makeEvents(1));
    expect(store.verifyIntegrity().valid).toBe(true);
  });
});
