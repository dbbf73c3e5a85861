/**
 * @capvault/event-store: Append-only notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain over every event
 * - Vault domain event definitions and the notification mapping
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
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
export { EventStoreError, isHashedEvent } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Vault domain events
export {
  VAULT_EVENTS,
  isVaultEventType,
  isValidVaultPayload,
  toDomainEvent,
} from "./vault-events.js";
export type {
  VaultEventType,
  VaultEventContext,
  DepositedPayload,
  WithdrawnPayload,
  RescuedPayload,
} from "./vault-events.js";
