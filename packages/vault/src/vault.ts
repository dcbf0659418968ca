/**
 * Vault - top-level coordinator.
 *
 * Composes:
 * - OwnerSet (who may vote, and the threshold)
 * - TransactionLedger (propose → confirm → execute)
 * - SubscriptionLedger (recurring withdrawals by operators)
 * - VaultTreasury (native balance and deposits)
 *
 * The vault registers itself as a principal. Owner management runs only
 * when an executed transaction calls back into the vault with an admin
 * call payload; there is no other way in.
 */

import { isAccountId, isEmptyPayload } from "@strongbox/types";
import type { AccountId, Payload } from "@strongbox/types";
import { InMemoryEventStore, VAULT_EVENTS } from "@strongbox/event-store";
import type { EventStore } from "@strongbox/event-store";
import pino from "pino";
import type { Logger } from "pino";
import { decodeAdminCall, encodeAdminCall } from "./admin-call.js";
import type { AdminCall } from "./admin-call.js";
import { systemClock } from "./clock.js";
import { AuthorizationError, ValidationError } from "./errors.js";
import {
  BalanceSheet,
  ExternalCallGateway,
  PrincipalDirectory,
} from "./external-call.js";
import type { InboundCall } from "./external-call.js";
import { VaultJournal } from "./journal.js";
import { NotificationRelay } from "./notification-relay.js";
import { OwnerSet } from "./owner-set.js";
import type { OwnerChange } from "./owner-set.js";
import { SubscriptionLedger } from "./subscription-ledger.js";
import { TransactionLedger } from "./transaction-ledger.js";
import { VaultTreasury } from "./treasury.js";
import {
  DEFAULT_CALL_FEE_BUDGET,
  DEFAULT_NOTIFICATION_FEE_BUDGET,
} from "./types.js";
import type {
  CallContext,
  ExecutionOutcome,
  SubmittedSubscription,
  Subscription,
  SubscriptionOutcome,
  SubscriptionRequest,
  Transaction,
  VaultConfig,
} from "./types.js";

/** Fee units charged to apply one admin call. */
export const ADMIN_CALL_COST = 10_000;

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly id: AccountId;
  readonly events: EventStore;
  readonly principals: PrincipalDirectory;
  readonly balances: BalanceSheet;
  private readonly owners: OwnerSet;
  private readonly journal: VaultJournal;
  private readonly treasury: VaultTreasury;
  private readonly transactions: TransactionLedger;
  private readonly subscriptions: SubscriptionLedger;
  private readonly logger: Logger;

  constructor(config: VaultConfig) {
    if (!isAccountId(config.vaultId)) {
      throw new ValidationError("INVALID_OWNER_CONFIGURATION", "Vault id must be non-empty");
    }
    this.id = config.vaultId;
    this.logger = (config.logger ?? pino({ level: "silent" })).child({ vaultId: this.id });
    this.owners = new OwnerSet(this.id, config.owners, config.required);

    const clock = config.clock ?? systemClock;
    const callFeeBudget = config.callFeeBudget ?? DEFAULT_CALL_FEE_BUDGET;
    const notificationFeeBudget =
      config.notificationFeeBudget ?? DEFAULT_NOTIFICATION_FEE_BUDGET;

    this.events = config.eventStore ?? new InMemoryEventStore();
    this.principals = config.principals ?? new PrincipalDirectory();
    this.balances = config.balances ?? new BalanceSheet();
    this.journal = new VaultJournal(this.id, this.events, clock);
    this.treasury = new VaultTreasury(this.id, this.balances, this.journal);

    const gateway = new ExternalCallGateway(
      this.id,
      this.principals,
      this.balances,
      this.logger.child({ component: "gateway" }),
    );

    this.transactions = new TransactionLedger({
      owners: this.owners,
      gateway,
      journal: this.journal,
      clock,
      callFeeBudget,
      logger: this.logger.child({ component: "transactions" }),
    });

    const subscriptionLogger = this.logger.child({ component: "subscriptions" });
    const relay = new NotificationRelay(
      this.id,
      config.registry,
      gateway,
      this.journal,
      notificationFeeBudget,
      subscriptionLogger,
    );
    this.subscriptions = new SubscriptionLedger({
      vaultId: this.id,
      owners: this.owners,
      gateway,
      journal: this.journal,
      relay,
      treasury: this.treasury,
      clock,
      ...(config.registry !== undefined ? { registry: config.registry } : {}),
      ...(config.token !== undefined ? { token: config.token } : {}),
      callFeeBudget,
      notificationFeeBudget,
      logger: subscriptionLogger,
    });

    this.principals.register(this.id, (call) => this.handleInbound(call));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owners
  // ───────────────────────────────────────────────────────────────────────

  getOwners(): readonly AccountId[] {
    return this.owners.getOwners();
  }

  isOwner(account: AccountId): boolean {
    return this.owners.isOwner(account);
  }

  get required(): number {
    return this.owners.required;
  }

  /**
   * Propose an owner-management change. It takes effect when the
   * resulting transaction reaches quorum and executes.
   */
  proposeAdminCall(ctx: CallContext, call: AdminCall): number {
    return this.transactions.submitTransaction(ctx, this.id, 0n, encodeAdminCall(call));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Treasury
  // ───────────────────────────────────────────────────────────────────────

  balance(): bigint {
    return this.treasury.balance();
  }

  deposit(ctx: CallContext): bigint {
    return this.treasury.deposit(ctx.caller, ctx.value ?? 0n);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  submitTransaction(
    ctx: CallContext,
    destination: AccountId,
    value: bigint,
    payload: Payload,
  ): number {
    return this.transactions.submitTransaction(ctx, destination, value, payload);
  }

  confirmTransaction(ctx: CallContext, id: number): ExecutionOutcome {
    return this.transactions.confirmTransaction(ctx, id);
  }

  revokeConfirmation(ctx: CallContext, id: number): void {
    this.transactions.revokeConfirmation(ctx, id);
  }

  executeTransaction(ctx: CallContext, id: number): ExecutionOutcome {
    return this.transactions.executeTransaction(ctx, id);
  }

  isConfirmed(id: number): boolean {
    return this.transactions.isConfirmed(id);
  }

  getTransaction(id: number): Transaction {
    return this.transactions.getTransaction(id);
  }

  getConfirmations(id: number): readonly AccountId[] {
    return this.transactions.getConfirmations(id);
  }

  getConfirmationCount(id: number): number {
    return this.transactions.getConfirmationCount(id);
  }

  getTransactionCount(pending: boolean, executed: boolean): number {
    return this.transactions.getTransactionCount(pending, executed);
  }

  getTransactionIds(
    from: number,
    to: number,
    pending: boolean,
    executed: boolean,
  ): readonly number[] {
    return this.transactions.getTransactionIds(from, to, pending, executed);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Subscriptions
  // ───────────────────────────────────────────────────────────────────────

  submitSubscription(
    ctx: CallContext,
    request: SubscriptionRequest,
  ): SubmittedSubscription {
    return this.subscriptions.submitSubscription(ctx, request);
  }

  cancelSubscription(ctx: CallContext, id: number): void {
    this.subscriptions.cancelSubscription(ctx, id);
  }

  pauseSubscription(ctx: CallContext, id: number): void {
    this.subscriptions.pauseSubscription(ctx, id);
  }

  resumeSubscription(ctx: CallContext, id: number): void {
    this.subscriptions.resumeSubscription(ctx, id);
  }

  executeSubscription(ctx: CallContext, id: number): SubscriptionOutcome {
    return this.subscriptions.executeSubscription(ctx, id);
  }

  getSubscription(id: number): Subscription {
    return this.subscriptions.getSubscription(id);
  }

  isSubscriptionExpired(id: number): boolean {
    return this.subscriptions.isExpired(id);
  }

  getSubscriptionCount(withdrawable: boolean, expired: boolean): number {
    return this.subscriptions.getSubscriptionCount(withdrawable, expired);
  }

  getSubscriptionIds(
    from: number,
    to: number,
    withdrawable: boolean,
    expired: boolean,
  ): readonly number[] {
    return this.subscriptions.getSubscriptionIds(from, to, withdrawable, expired);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Self-calls
  // ───────────────────────────────────────────────────────────────────────

  /** Code at the vault's own account. Empty payloads are plain transfers. */
  private handleInbound(call: InboundCall): void {
    if (isEmptyPayload(call.payload)) return;
    if (call.from !== this.id) {
      throw new AuthorizationError("NOT_SELF", `${call.from} cannot call vault admin methods`);
    }

    call.meter.consume(ADMIN_CALL_COST);
    const admin = decodeAdminCall(call.payload);
    const changes = this.applyAdminCall(admin);
    for (const change of changes) {
      this.recordOwnerChange(change);
    }
    this.logger.info({ method: admin.method, changes: changes.length }, "Admin call applied");
  }

  private applyAdminCall(call: AdminCall): OwnerChange[] {
    switch (call.method) {
      case "addOwner":
        return this.owners.addOwner(this.id, call.owner);
      case "removeOwner":
        return this.owners.removeOwner(this.id, call.owner);
      case "replaceOwner":
        return this.owners.replaceOwner(this.id, call.owner, call.newOwner);
      case "changeRequirement":
        return this.owners.changeRequirement(this.id, call.required);
    }
  }

  private recordOwnerChange(change: OwnerChange): void {
    const entity = { kind: "owners" } as const;
    switch (change.type) {
      case "owner_added":
        this.journal.record(entity, VAULT_EVENTS.OWNER_ADDED, this.id, { owner: change.owner });
        break;
      case "owner_removed":
        this.journal.record(entity, VAULT_EVENTS.OWNER_REMOVED, this.id, { owner: change.owner });
        break;
      case "requirement_changed":
        this.journal.record(entity, VAULT_EVENTS.REQUIREMENT_CHANGED, this.id, {
          previous: change.previous,
          required: change.required,
        });
        break;
    }
  }
}
