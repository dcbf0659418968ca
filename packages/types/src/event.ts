/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state transition in a Strongbox vault is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which entity)
 * - No UPDATE, no DELETE - only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 rendering of the vault's logical clock */
  readonly timestamp: string;

  /** Account whose invocation caused this event */
  readonly actor: string;

  /** Groups every event of one entity, e.g. "transaction:4" */
  readonly correlationId: string;

  /** Which vault component emitted this event */
  readonly source: EventSource;
}

export type EventSource = "owners" | "transactions" | "subscriptions" | "treasury";

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.transaction.confirmed") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
