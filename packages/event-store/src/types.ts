/**
 * @keepsake/event-store — Core types.
 *
 * A fact log is a set of append-only streams (one per vault, `vault-<id>`)
 * threaded together by a global position and a SHA-256 hash chain.
 * Nothing is ever rewritten; writers coordinate through expected versions.
 */

import type { DomainEvent } from "@keepsake/types";

// =============================================================================
// Stored Event
// =============================================================================

export interface StoredEvent {
  readonly event: DomainEvent;
  readonly streamId: string;
  /** 1-based, gap-free within the stream */
  readonly version: number;
  /** 1-based, gap-free across the whole log */
  readonly globalPosition: number;
  /** Store clock at append time (ISO 8601) */
  readonly appendedAt: string;
  readonly hash: string;
  /** Hash of the previous event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

/** A StoredEvent before it has been sealed into the chain. */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * Optimistic concurrency guard for `append`. A number pins the current
 * stream head, `"no_stream"` requires an empty stream, `"any"` skips it.
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive. Defaults to the first event (forward) or the head (backward). */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Inclusive. Defaults to the first event (forward) or the head (backward). */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

/** Runs synchronously inside `append`, once per committed event. */
export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Append a batch to one stream. The batch commits whole or not at all,
   * and subscribers are notified in commit order.
   *
   * @throws EventStoreError on an empty batch, a blank stream id, or a
   *   failed expected-version check
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; an unknown stream reads as empty. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Current head of the stream; 0 when it has no events. */
  streamVersion(streamId: string): number;

  /** Position of the newest event; 0 when the log is empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
