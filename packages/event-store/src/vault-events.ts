/**
 * @strongbox/event-store - Vault Domain Event Definitions.
 *
 * Naming convention: `vault.<entity>.<action>`
 *
 * Amounts travel as decimal strings and timestamps as integer seconds,
 * so every payload is plain JSON and canonicalizes deterministically.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Transaction Events
// =============================================================================

export interface TransactionSubmittedPayload {
  readonly transactionId: number;
  readonly destination: string;
  readonly value: string;
  readonly payload: string;
  readonly submittedBy: string;
}

export interface ConfirmationPayload {
  readonly transactionId: number;
  readonly owner: string;
}

export interface TransactionExecutedPayload {
  readonly transactionId: number;
  readonly confirmations: number;
}

export interface TransactionExecutionFailedPayload {
  readonly transactionId: number;
  readonly reason: string;
}

// =============================================================================
// Subscription Events
// =============================================================================

export interface SubscriptionAddedPayload {
  readonly subscriptionId: number;
  readonly destination: string;
  readonly recipient: string;
  readonly value: string;
  readonly period: number;
  readonly variant: string;
  readonly externalId: string;
  readonly expires: number;
  readonly withdrawNext: number;
}

export interface SubscriptionCancelledPayload {
  readonly subscriptionId: number;
  readonly expires: number;
}

export interface SubscriptionPauseTogglePayload {
  readonly subscriptionId: number;
}

export interface SubscriptionExecutedPayload {
  readonly subscriptionId: number;
  readonly cycle: number;
  readonly value: string;
  readonly withdrawPrev: number;
  readonly withdrawNext: number;
}

export interface SubscriptionExecutionFailedPayload {
  readonly subscriptionId: number;
  readonly cycle: number;
  readonly reason: string;
}

export interface NotificationFailedPayload {
  readonly subscriptionId: number;
  readonly notification: "new_subscription" | "payment";
  readonly reason: string;
}

// =============================================================================
// Owner & Treasury Events
// =============================================================================

export interface OwnerChangedPayload {
  readonly owner: string;
}

export interface RequirementChangedPayload {
  readonly previous: number;
  readonly required: number;
}

export interface DepositReceivedPayload {
  readonly from: string;
  readonly value: string;
  readonly balance: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const VAULT_EVENTS = {
  TRANSACTION_SUBMITTED: "vault.transaction.submitted",
  TRANSACTION_CONFIRMED: "vault.transaction.confirmed",
  TRANSACTION_REVOKED: "vault.transaction.revoked",
  TRANSACTION_EXECUTED: "vault.transaction.executed",
  TRANSACTION_EXECUTION_FAILED: "vault.transaction.execution_failed",

  SUBSCRIPTION_ADDED: "vault.subscription.added",
  SUBSCRIPTION_CANCELLED: "vault.subscription.cancelled",
  SUBSCRIPTION_PAUSED: "vault.subscription.paused",
  SUBSCRIPTION_RESUMED: "vault.subscription.resumed",
  SUBSCRIPTION_EXECUTED: "vault.subscription.executed",
  SUBSCRIPTION_EXECUTION_FAILED: "vault.subscription.execution_failed",
  NOTIFICATION_FAILED: "vault.notification.failed",

  OWNER_ADDED: "vault.owner.added",
  OWNER_REMOVED: "vault.owner.removed",
  REQUIREMENT_CHANGED: "vault.requirement.changed",
  DEPOSIT_RECEIVED: "vault.deposit.received",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasInteger(obj: Record<string, unknown>, key: string): boolean {
  return Number.isInteger(obj[key]);
}

function hasAmount(obj: Record<string, unknown>, key: string): boolean {
  const v = obj[key];
  return typeof v === "string" && /^\d+$/.test(v);
}

const TRANSACTION_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.TRANSACTION_SUBMITTED,
    version: 1,
    description: "An owner proposed a transaction",
    source: "transactions",
    validate: (p): p is TransactionSubmittedPayload =>
      isObject(p) &&
      hasInteger(p, "transactionId") &&
      hasString(p, "destination") &&
      hasAmount(p, "value") &&
      hasString(p, "payload") &&
      hasString(p, "submittedBy"),
  },
  {
    type: VAULT_EVENTS.TRANSACTION_CONFIRMED,
    version: 1,
    description: "An owner confirmed a transaction",
    source: "transactions",
    validate: (p): p is ConfirmationPayload =>
      isObject(p) && hasInteger(p, "transactionId") && hasString(p, "owner"),
  },
  {
    type: VAULT_EVENTS.TRANSACTION_REVOKED,
    version: 1,
    description: "An owner revoked a confirmation",
    source: "transactions",
    validate: (p): p is ConfirmationPayload =>
      isObject(p) && hasInteger(p, "transactionId") && hasString(p, "owner"),
  },
  {
    type: VAULT_EVENTS.TRANSACTION_EXECUTED,
    version: 1,
    description: "A confirmed transaction was executed",
    source: "transactions",
    validate: (p): p is TransactionExecutedPayload =>
      isObject(p) && hasInteger(p, "transactionId") && hasInteger(p, "confirmations"),
  },
  {
    type: VAULT_EVENTS.TRANSACTION_EXECUTION_FAILED,
    version: 1,
    description: "A transaction's external call failed and was rolled back",
    source: "transactions",
    validate: (p): p is TransactionExecutionFailedPayload =>
      isObject(p) && hasInteger(p, "transactionId") && hasString(p, "reason"),
  },
];

const SUBSCRIPTION_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.SUBSCRIPTION_ADDED,
    version: 1,
    description: "A recurring withdrawal was registered",
    source: "subscriptions",
    validate: (p): p is SubscriptionAddedPayload =>
      isObject(p) &&
      hasInteger(p, "subscriptionId") &&
      hasString(p, "destination") &&
      hasString(p, "recipient") &&
      hasAmount(p, "value") &&
      hasInteger(p, "period") &&
      hasString(p, "variant") &&
      hasString(p, "externalId") &&
      hasInteger(p, "expires") &&
      hasInteger(p, "withdrawNext"),
  },
  {
    type: VAULT_EVENTS.SUBSCRIPTION_CANCELLED,
    version: 1,
    description: "A subscription was cancelled by moving its expiry to now",
    source: "subscriptions",
    validate: (p): p is SubscriptionCancelledPayload =>
      isObject(p) && hasInteger(p, "subscriptionId") && hasInteger(p, "expires"),
  },
  {
    type: VAULT_EVENTS.SUBSCRIPTION_PAUSED,
    version: 1,
    description: "A subscription was paused",
    source: "subscriptions",
    validate: (p): p is SubscriptionPauseTogglePayload =>
      isObject(p) && hasInteger(p, "subscriptionId"),
  },
  {
    type: VAULT_EVENTS.SUBSCRIPTION_RESUMED,
    version: 1,
    description: "A paused subscription was resumed",
    source: "subscriptions",
    validate: (p): p is SubscriptionPauseTogglePayload =>
      isObject(p) && hasInteger(p, "subscriptionId"),
  },
  {
    type: VAULT_EVENTS.SUBSCRIPTION_EXECUTED,
    version: 1,
    description: "A subscription cycle was withdrawn",
    source: "subscriptions",
    validate: (p): p is SubscriptionExecutedPayload =>
      isObject(p) &&
      hasInteger(p, "subscriptionId") &&
      hasInteger(p, "cycle") &&
      hasAmount(p, "value") &&
      hasInteger(p, "withdrawPrev") &&
      hasInteger(p, "withdrawNext"),
  },
  {
    type: VAULT_EVENTS.SUBSCRIPTION_EXECUTION_FAILED,
    version: 1,
    description: "A subscription withdrawal failed; the subscription is unchanged",
    source: "subscriptions",
    validate: (p): p is SubscriptionExecutionFailedPayload =>
      isObject(p) &&
      hasInteger(p, "subscriptionId") &&
      hasInteger(p, "cycle") &&
      hasString(p, "reason"),
  },
  {
    type: VAULT_EVENTS.NOTIFICATION_FAILED,
    version: 1,
    description: "A best-effort registry notification failed",
    source: "subscriptions",
    validate: (p): p is NotificationFailedPayload =>
      isObject(p) &&
      hasInteger(p, "subscriptionId") &&
      (p.notification === "new_subscription" || p.notification === "payment") &&
      hasString(p, "reason"),
  },
];

const OWNER_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.OWNER_ADDED,
    version: 1,
    description: "An owner joined the quorum",
    source: "owners",
    validate: (p): p is OwnerChangedPayload => isObject(p) && hasString(p, "owner"),
  },
  {
    type: VAULT_EVENTS.OWNER_REMOVED,
    version: 1,
    description: "An owner left the quorum",
    source: "owners",
    validate: (p): p is OwnerChangedPayload => isObject(p) && hasString(p, "owner"),
  },
  {
    type: VAULT_EVENTS.REQUIREMENT_CHANGED,
    version: 1,
    description: "The confirmation threshold changed",
    source: "owners",
    validate: (p): p is RequirementChangedPayload =>
      isObject(p) && hasInteger(p, "previous") && hasInteger(p, "required"),
  },
  {
    type: VAULT_EVENTS.DEPOSIT_RECEIVED,
    version: 1,
    description: "Value was deposited into the vault",
    source: "treasury",
    validate: (p): p is DepositReceivedPayload =>
      isObject(p) && hasString(p, "from") && hasAmount(p, "value") && hasAmount(p, "balance"),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every vault event type registered at v1.
 */
export function createVaultCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [
    ...TRANSACTION_SCHEMAS,
    ...SUBSCRIPTION_SCHEMAS,
    ...OWNER_SCHEMAS,
  ]) {
    catalog.register(schema);
  }
  return catalog;
}
