/**
 * Event Types
 *
 * Append-only fact architecture.
 * Every committed vault mutation is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - No UPDATE, no DELETE — only new events
 */

/** Which Keepsake subsystem emitted an event */
export type EventSource = "ledger" | "release" | "heartbeat";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity that caused this event */
  readonly actor: string;

  /** ID for grouping events emitted by one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.created", "vault.claimed") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
