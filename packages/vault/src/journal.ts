/**
 * Vault journal.
 *
 * Turns ledger transitions into domain events and appends them to the
 * event store, one stream per entity. Payloads are checked against the
 * vault catalog before they are written.
 */

import { randomUUID } from "node:crypto";
import type { AccountId, EventSource } from "@strongbox/types";
import { VAULT_EVENTS, createVaultCatalog } from "@strongbox/event-store";
import type {
  EventCatalog,
  EventStore,
  StoredEvent,
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
} from "@strongbox/event-store";
import { toIsoTimestamp } from "./clock.js";
import type { Clock } from "./clock.js";

export interface VaultEventPayloads {
  [VAULT_EVENTS.TRANSACTION_SUBMITTED]: TransactionSubmittedPayload;
  [VAULT_EVENTS.TRANSACTION_CONFIRMED]: ConfirmationPayload;
  [VAULT_EVENTS.TRANSACTION_REVOKED]: ConfirmationPayload;
  [VAULT_EVENTS.TRANSACTION_EXECUTED]: TransactionExecutedPayload;
  [VAULT_EVENTS.TRANSACTION_EXECUTION_FAILED]: TransactionExecutionFailedPayload;
  [VAULT_EVENTS.SUBSCRIPTION_ADDED]: SubscriptionAddedPayload;
  [VAULT_EVENTS.SUBSCRIPTION_CANCELLED]: SubscriptionCancelledPayload;
  [VAULT_EVENTS.SUBSCRIPTION_PAUSED]: SubscriptionPauseTogglePayload;
  [VAULT_EVENTS.SUBSCRIPTION_RESUMED]: SubscriptionPauseTogglePayload;
  [VAULT_EVENTS.SUBSCRIPTION_EXECUTED]: SubscriptionExecutedPayload;
  [VAULT_EVENTS.SUBSCRIPTION_EXECUTION_FAILED]: SubscriptionExecutionFailedPayload;
  [VAULT_EVENTS.NOTIFICATION_FAILED]: NotificationFailedPayload;
  [VAULT_EVENTS.OWNER_ADDED]: OwnerChangedPayload;
  [VAULT_EVENTS.OWNER_REMOVED]: OwnerChangedPayload;
  [VAULT_EVENTS.REQUIREMENT_CHANGED]: RequirementChangedPayload;
  [VAULT_EVENTS.DEPOSIT_RECEIVED]: DepositReceivedPayload;
}

/** The entity an event belongs to. Decides the stream it lands in. */
export type JournalEntity =
  | { readonly kind: "transaction"; readonly id: number }
  | { readonly kind: "subscription"; readonly id: number }
  | { readonly kind: "owners" }
  | { readonly kind: "deposits" };

const SOURCES: Record<JournalEntity["kind"], EventSource> = {
  transaction: "transactions",
  subscription: "subscriptions",
  owners: "owners",
  deposits: "treasury",
};

export function streamIdFor(vaultId: AccountId, entity: JournalEntity): string {
  switch (entity.kind) {
    case "transaction":
    case "subscription":
      return `${vaultId}/${entity.kind}/${entity.id}`;
    case "owners":
    case "deposits":
      return `${vaultId}/${entity.kind}`;
  }
}

function correlationIdFor(entity: JournalEntity): string {
  return "id" in entity ? `${entity.kind}:${entity.id}` : entity.kind;
}

export class VaultJournal {
  constructor(
    private readonly vaultId: AccountId,
    private readonly store: EventStore,
    private readonly clock: Clock,
    private readonly catalog: EventCatalog = createVaultCatalog(),
  ) {}

  record<T extends VaultEventType>(
    entity: JournalEntity,
    type: T,
    actor: AccountId,
    payload: VaultEventPayloads[T],
  ): StoredEvent {
    this.catalog.assertValid(type, payload);

    const streamId = streamIdFor(this.vaultId, entity);
    this.store.append(streamId, [
      {
        type,
        metadata: {
          eventId: randomUUID(),
          timestamp: toIsoTimestamp(this.clock.now()),
          actor,
          correlationId: correlationIdFor(entity),
          source: SOURCES[entity.kind],
        },
        payload: { ...payload },
      },
    ]);

    const [stored] = this.store.read(streamId, {
      fromVersion: this.store.streamVersion(streamId),
    });
    if (stored === undefined) {
      throw new Error(`Event vanished from stream ${streamId}`);
    }
    return stored;
  }
}
