/**
 * @strongbox/event-store - Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and development
 * - SHA-256 hash chain over RFC 8785 canonical JSON
 * - EventCatalog with the vault's domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
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
export type { HashableEvent } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema, CatalogErrorCode } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Vault domain events
export { VAULT_EVENTS, createVaultCatalog } from "./vault-events.js";
export type {
  VaultEventType,
  TransactionSubmittedPayload,
  ConfirmationPayload,
  TransactionExecutedPayload,
  TransactionExecutionFailedPayload,
  SubscriptionAddedPayload,
  SubscriptionCancelledPayload,
  SubscriptionPauseTogglePayload,
  SubscriptionExecutedPayload,
  SubscriptionExecutionFailedPayload,
  NotificationFailedPayload,
  OwnerChangedPayload,
  RequirementChangedPayload,
  DepositReceivedPayload,
} from "./vault-events.js";
