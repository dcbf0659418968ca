/**
 * VaultService - composition root for the node.
 *
 * Route handlers delegate to this service; they never touch the vault's
 * collaborators directly. The service owns one vault together with the
 * in-process token ledger and operator registry it settles through, and
 * renders domain records as JSON-safe views (amounts as decimal strings).
 */

import type { AccountId } from "@strongbox/types";
import {
  Vault,
  InMemoryTokenLedger,
  StaticSubscriptionRegistry,
} from "@strongbox/vault";
import type {
  AdminCall,
  Clock,
  ExecutionOutcome,
  Settlement,
  SubmittedSubscription,
  SubscriptionOutcome,
  SubscriptionRequest,
} from "@strongbox/vault";
import type {
  EventStoreIntegrityResult,
  StoredEvent,
} from "@strongbox/event-store";
import type { Logger } from "pino";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly vaultId: AccountId;
  readonly owners: readonly AccountId[];
  readonly required: number;
  /** Accounts the in-process registry accepts as operators. */
  readonly operators?: readonly AccountId[];
  readonly callFeeBudget?: number;
  readonly notificationFeeBudget?: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

// =============================================================================
// Views
// =============================================================================

export interface OwnersView {
  readonly owners: readonly AccountId[];
  readonly required: number;
}

export interface TransactionView {
  readonly id: number;
  readonly destination: AccountId;
  readonly value: string;
  readonly payload: string;
  readonly executed: boolean;
  readonly submittedBy: AccountId;
  readonly submittedAt: number;
  readonly confirmations: readonly AccountId[];
}

export interface SubscriptionView {
  readonly id: number;
  readonly destination: AccountId;
  readonly recipient: AccountId;
  readonly value: string;
  readonly period: number;
  readonly settlement: Settlement;
  readonly externalId: string;
  readonly payload: string;
  readonly created: number;
  readonly expires: number;
  readonly cycle: number;
  readonly withdrawPrev: number;
  readonly withdrawNext: number;
  readonly paused: boolean;
  readonly expired: boolean;
}

export interface TokenAccountView {
  readonly account: AccountId;
  readonly balance: string;
  /** What the vault may still pull from this account. */
  readonly allowance: string;
}

export interface TransactionResult {
  readonly outcome: ExecutionOutcome;
  readonly transaction: TransactionView;
}

export interface SubscriptionResult {
  readonly outcome: SubscriptionOutcome;
  readonly subscription: SubscriptionView;
}

export interface SubmittedSubscriptionResult {
  readonly firstExecution: SubmittedSubscription["firstExecution"];
  readonly subscription: SubscriptionView;
}

export interface IdRange {
  readonly from: number;
  readonly to?: number | undefined;
}

export interface ListResult<T> {
  readonly data: readonly T[];
  readonly total: number;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: Vault;
  readonly token: InMemoryTokenLedger;
  readonly registry: StaticSubscriptionRegistry;

  constructor(config: VaultServiceConfig) {
    this.token = new InMemoryTokenLedger(config.vaultId);
    this.registry = new StaticSubscriptionRegistry(config.operators ?? []);
    this.vault = new Vault({
      vaultId: config.vaultId,
      owners: config.owners,
      required: config.required,
      registry: this.registry,
      token: this.token,
      ...(config.clock !== undefined ? { clock: config.clock } : {}),
      ...(config.logger !== undefined ? { logger: config.logger } : {}),
      ...(config.callFeeBudget !== undefined ? { callFeeBudget: config.callFeeBudget } : {}),
      ...(config.notificationFeeBudget !== undefined
        ? { notificationFeeBudget: config.notificationFeeBudget }
        : {}),
    });
  }

  get vaultId(): AccountId {
    return this.vault.id;
  }

  // ─── Owners ────────────────────────────────────────────────────────

  getOwners(): OwnersView {
    return { owners: this.vault.getOwners(), required: this.vault.required };
  }

  proposeAdminCall(caller: AccountId, call: AdminCall): TransactionView {
    const id = this.vault.proposeAdminCall({ caller }, call);
    return this.getTransaction(id);
  }

  // ─── Treasury ──────────────────────────────────────────────────────

  balance(): string {
    return this.vault.balance().toString();
  }

  deposit(caller: AccountId, amount: bigint): string {
    return this.vault.deposit({ caller, value: amount }).toString();
  }

  // ─── Tokens ────────────────────────────────────────────────────────

  getTokenAccount(account: AccountId): TokenAccountView {
    return {
      account,
      balance: this.token.balanceOf(account).toString(),
      allowance: this.token.allowance(account, this.vaultId).toString(),
    };
  }

  mintTokens(account: AccountId, amount: bigint): TokenAccountView {
    this.token.mint(account, amount);
    return this.getTokenAccount(account);
  }

  approveTokens(owner: AccountId, amount: bigint): TokenAccountView {
    this.token.approve(owner, this.vaultId, amount);
    return this.getTokenAccount(owner);
  }

  // ─── Transactions ──────────────────────────────────────────────────

  submitTransaction(
    caller: AccountId,
    destination: AccountId,
    value: bigint,
    payload: string,
  ): TransactionView {
    const id = this.vault.submitTransaction({ caller }, destination, value, payload);
    return this.getTransaction(id);
  }

  confirmTransaction(caller: AccountId, id: number): TransactionResult {
    const outcome = this.vault.confirmTransaction({ caller }, id);
    return { outcome, transaction: this.getTransaction(id) };
  }

  revokeConfirmation(caller: AccountId, id: number): TransactionView {
    this.vault.revokeConfirmation({ caller }, id);
    return this.getTransaction(id);
  }

  executeTransaction(caller: AccountId, id: number): TransactionResult {
    const outcome = this.vault.executeTransaction({ caller }, id);
    return { outcome, transaction: this.getTransaction(id) };
  }

  getTransaction(id: number): TransactionView {
    const tx = this.vault.getTransaction(id);
    return {
      id: tx.id,
      destination: tx.destination,
      value: tx.value.toString(),
      payload: tx.payload,
      executed: tx.executed,
      submittedBy: tx.submittedBy,
      submittedAt: tx.submittedAt,
      confirmations: this.vault.getConfirmations(id),
    };
  }

  listTransactions(
    range: IdRange,
    pending: boolean,
    executed: boolean,
  ): ListResult<TransactionView> {
    const total = this.vault.getTransactionCount(pending, executed);
    const ids = this.vault.getTransactionIds(range.from, range.to ?? total, pending, executed);
    return { data: ids.map((id) => this.getTransaction(id)), total };
  }

  // ─── Subscriptions ─────────────────────────────────────────────────

  submitSubscription(
    caller: AccountId,
    request: SubscriptionRequest,
    attachedValue: bigint,
  ): SubmittedSubscriptionResult {
    const submitted = this.vault.submitSubscription({ caller, value: attachedValue }, request);
    return {
      firstExecution: submitted.firstExecution,
      subscription: this.getSubscription(submitted.subscriptionId),
    };
  }

  executeSubscription(caller: AccountId, id: number): SubscriptionResult {
    const outcome = this.vault.executeSubscription({ caller }, id);
    return { outcome, subscription: this.getSubscription(id) };
  }

  cancelSubscription(caller: AccountId, id: number): SubscriptionView {
    this.vault.cancelSubscription({ caller }, id);
    return this.getSubscription(id);
  }

  pauseSubscription(caller: AccountId, id: number): SubscriptionView {
    this.vault.pauseSubscription({ caller }, id);
    return this.getSubscription(id);
  }

  resumeSubscription(caller: AccountId, id: number): SubscriptionView {
    this.vault.resumeSubscription({ caller }, id);
    return this.getSubscription(id);
  }

  getSubscription(id: number): SubscriptionView {
    const sub = this.vault.getSubscription(id);
    return {
      id: sub.id,
      destination: sub.destination,
      recipient: sub.recipient,
      value: sub.value.toString(),
      period: sub.period,
      settlement: sub.settlement,
      externalId: sub.externalId,
      payload: sub.payload,
      created: sub.created,
      expires: sub.expires,
      cycle: sub.cycle,
      withdrawPrev: sub.withdrawPrev,
      withdrawNext: sub.withdrawNext,
      paused: sub.paused,
      expired: this.vault.isSubscriptionExpired(id),
    };
  }

  listSubscriptions(
    range: IdRange,
    withdrawable: boolean,
    expired: boolean,
  ): ListResult<SubscriptionView> {
    const total = this.vault.getSubscriptionCount(withdrawable, expired);
    const ids = this.vault.getSubscriptionIds(range.from, range.to ?? total, withdrawable, expired);
    return { data: ids.map((id) => this.getSubscription(id)), total };
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(afterPosition?: number, type?: string): readonly StoredEvent[] {
    return this.vault.events.readAll({
      ...(afterPosition !== undefined ? { fromPosition: afterPosition + 1 } : {}),
      ...(type !== undefined ? { types: [type] } : {}),
    });
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.vault.events.verifyIntegrity();
  }
}
