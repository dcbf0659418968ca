/**
 * Vault domain types.
 */

import type { AccountId, Payload } from "@strongbox/types";
import type { EventStore } from "@strongbox/event-store";
import type { Logger } from "pino";
import type { Clock } from "./clock.js";
import type { ExternalCallFailure } from "./errors.js";
import type { BalanceSheet, PrincipalDirectory } from "./external-call.js";
import type { SubscriptionRegistry, TokenService } from "./collaborators.js";

// =============================================================================
// Invocation
// =============================================================================

/** Who is calling, and how much value they attach. */
export interface CallContext {
  readonly caller: AccountId;
  readonly value?: bigint;
}

// =============================================================================
// Transactions
// =============================================================================

export interface Transaction {
  readonly id: number;
  readonly destination: AccountId;
  readonly value: bigint;
  readonly payload: Payload;
  readonly executed: boolean;
  readonly submittedBy: AccountId;
  readonly submittedAt: number;
}

export type ExecutionOutcome =
  | { readonly status: "executed" }
  | { readonly status: "failed"; readonly failure: ExternalCallFailure }
  | {
      readonly status: "pending";
      readonly confirmations: number;
      readonly required: number;
    };

// =============================================================================
// Subscriptions
// =============================================================================

export type SettlementVariant =
  | "direct-escrow"
  | "escrow-token"
  | "delegated-allowance";

export const SETTLEMENT_VARIANTS: readonly SettlementVariant[] = [
  "direct-escrow",
  "escrow-token",
  "delegated-allowance",
];

/** Where a cycle's funds come from. */
export type Settlement =
  | { readonly variant: "direct-escrow" }
  | { readonly variant: "escrow-token" }
  | { readonly variant: "delegated-allowance"; readonly wallet: AccountId };

export interface Subscription {
  readonly id: number;
  readonly destination: AccountId;
  readonly recipient: AccountId;
  readonly value: bigint;
  readonly period: number;
  readonly settlement: Settlement;
  readonly externalId: string;
  readonly payload: Payload;
  readonly metadata: readonly string[];
  readonly created: number;
  readonly expires: number;
  readonly cycle: number;
  readonly withdrawPrev: number;
  readonly withdrawNext: number;
  readonly paused: boolean;
}

export interface SubscriptionRequest {
  readonly destination: AccountId;
  readonly recipient: AccountId;
  readonly value: bigint;
  readonly period: number;
  readonly variant: SettlementVariant;
  readonly payload: Payload;
  readonly metadata: readonly string[];
}

export type SubscriptionOutcome =
  | { readonly status: "executed"; readonly cycle: number }
  | { readonly status: "failed"; readonly failure: ExternalCallFailure };

export interface SubmittedSubscription {
  readonly subscriptionId: number;
  /** Null when the first cycle was not attempted at submission. */
  readonly firstExecution: SubscriptionOutcome | null;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  readonly vaultId: AccountId;
  readonly owners: readonly AccountId[];
  readonly required: number;
  readonly clock?: Clock;
  readonly eventStore?: EventStore;
  readonly principals?: PrincipalDirectory;
  readonly balances?: BalanceSheet;
  readonly registry?: SubscriptionRegistry;
  readonly token?: TokenService;
  /** Fee units granted to each outbound transaction or settlement call. */
  readonly callFeeBudget?: number;
  /** Fee units granted to each registry notification. */
  readonly notificationFeeBudget?: number;
  readonly logger?: Logger;
}

export const DEFAULT_CALL_FEE_BUDGET = 1_000_000;
export const DEFAULT_NOTIFICATION_FEE_BUDGET = 50_000;
