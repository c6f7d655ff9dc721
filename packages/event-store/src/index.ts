/**
 * @keepsake/event-store — Append-only fact persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - SHA-256 hash chain over every stored event
 * - Vault fact definitions (11 fact types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
export { JsonlEventStore, isStoredEvent } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Vault facts
export { VAULT_EVENTS, isVaultEventType, vaultStreamId } from "./vault-events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  VaultFact,
  VaultCreatedPayload,
  MultiBeneficiaryVaultCreatedPayload,
  TokenMintedPayload,
  VaultClaimedPayload,
  EmergencyWithdrawPayload,
  VaultExtendedPayload,
  BeneficiaryUpdatedPayload,
  HeartbeatEnabledPayload,
  HeartbeatRecordedPayload,
  VaultFundedPayload,
  MessageUpdatedPayload,
} from "./vault-events.js";
