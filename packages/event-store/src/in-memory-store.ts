/**
 * @keepsake/event-store — In-memory EventStore implementation.
 *
 * Keeps the fact log in process memory. Stream versions and global
 * positions are contiguous from 1, so reads are array slices rather
 * than scans. `JsonlEventStore` extends this class and adds a file.
 */

import type { DomainEvent } from "@keepsake/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: `() => new Date()` */
  readonly now?: () => Date;
  /**
   * Receives errors thrown by subscribers. Without it, the first
   * subscriber error is rethrown from `append` after every handler ran.
   */
  readonly onSubscriberError?: (error: unknown, event: StoredEvent) => void;
}

/** Subscriber key for handlers that see every stream. */
const ALL_STREAMS = Symbol("all-streams");

type SubscriberKey = string | typeof ALL_STREAMS;

/**
 * Window of `items` for a 1-based `start`, walking in `direction`,
 * truncated to `maxCount` when given.
 */
function window<T>(
  items: readonly T[],
  start: number,
  direction: ReadDirection,
  maxCount: number | undefined,
): T[] {
  const picked =
    direction === "forward"
      ? items.slice(Math.max(start, 1) - 1)
      : items.slice(0, Math.max(Math.min(start, items.length), 0)).reverse();
  return maxCount !== undefined && maxCount >= 0 ? picked.slice(0, maxCount) : picked;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: StoredEvent[] = [];
  private readonly _byStream = new Map<string, StoredEvent[]>();
  private readonly _subscribers = new Map<SubscriberKey, Set<EventHandler>>();

  private readonly _now: () => Date;
  private readonly _onSubscriberError: InMemoryEventStoreOptions["onSubscriberError"];

  /** Hash of the newest event, or GENESIS_HASH while empty */
  private _head: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
    this._onSubscriberError = options?.onSubscriberError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const head = this.streamVersion(streamId);
    assertExpectedVersion(streamId, head, options);

    const appendedAt = this._now().toISOString();
    const batch = this._seal(streamId, head, events, appendedAt);

    this.persist(batch);
    this.restore(batch);
    this._notify(streamId, batch);

    return {
      streamId,
      fromVersion: head + 1,
      toVersion: head + batch.length,
      count: batch.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    assertStreamId(streamId);
    const stream = this._byStream.get(streamId) ?? [];
    const direction = options?.direction ?? "forward";
    const fromVersion =
      options?.fromVersion ?? (direction === "forward" ? 1 : stream.length);

    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }
    return window(stream, fromVersion, direction, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition =
      options?.fromPosition ?? (direction === "forward" ? 1 : this._log.length);
    return window(this._log, fromPosition, direction, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    assertStreamId(streamId);
    return this._addSubscriber(streamId, handler);
  }

  subscribeAll(handler: EventHandler): Subscription {
    return this._addSubscriber(ALL_STREAMS, handler);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this._byStream.has(streamId);
  }

  streamVersion(streamId: string): number {
    return this._byStream.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Extension points ───────────────────────────────────────────────

  /** Durably record a sealed batch. Throwing aborts the append. */
  protected persist(_batch: readonly StoredEvent[]): void {
    // memory only
  }

  /** Index sealed events without notifying subscribers. */
  protected restore(batch: readonly StoredEvent[]): void {
    for (const stored of batch) {
      const stream = this._byStream.get(stored.streamId);
      if (stream === undefined) {
        this._byStream.set(stored.streamId, [stored]);
      } else {
        stream.push(stored);
      }
      this._log.push(stored);
      this._head = stored.hash;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _seal(
    streamId: string,
    head: number,
    events: readonly DomainEvent[],
    appendedAt: string,
  ): StoredEvent[] {
    const sealed: StoredEvent[] = [];
    let previousHash = this._head;

    for (const [offset, event] of events.entries()) {
      const unhashed: UnhashedStoredEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: head + offset + 1,
        globalPosition: this._log.length + offset + 1,
        appendedAt,
      };
      const hash = computeEventHash(unhashed, previousHash);
      sealed.push({ ...unhashed, hash, previousHash });
      previousHash = hash;
    }
    return sealed;
  }

  private _addSubscriber(key: SubscriberKey, handler: EventHandler): Subscription {
    const handlers = this._subscribers.get(key) ?? new Set<EventHandler>();
    handlers.add(handler);
    this._subscribers.set(key, handlers);

    return {
      unsubscribe: () => {
        handlers.delete(handler);
        if (handlers.size === 0 && this._subscribers.get(key) === handlers) {
          this._subscribers.delete(key);
        }
      },
    };
  }

  private _notify(streamId: string, batch: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._subscribers.get(streamId) ?? []),
      ...(this._subscribers.get(ALL_STREAMS) ?? []),
    ];
    const failures: unknown[] = [];

    for (const stored of batch) {
      for (const handler of handlers) {
        try {
          handler(stored);
        } catch (error) {
          if (this._onSubscriberError === undefined) {
            failures.push(error);
          } else {
            this._onSubscriberError(error, stored);
          }
        }
      }
    }

    if (failures.length > 0) {
      throw failures[0];
    }
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function assertExpectedVersion(
  streamId: string,
  head: number,
  options: AppendOptions | undefined,
): void {
  const expected = options?.expectedVersion ?? "any";
  if (expected === "any") {
    return;
  }
  const ok = expected === "no_stream" ? head === 0 : head === expected;
  if (!ok) {
    const wanted = expected === "no_stream" ? "no_stream" : String(expected);
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${String(head)}, expected ${wanted}`,
      streamId,
    );
  }
}
