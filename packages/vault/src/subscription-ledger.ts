/**
 * Subscription Ledger
 *
 * Recurring withdrawals set up once by an owner and triggered each
 * period by an operator, without a fresh quorum vote per cycle.
 *
 * Rules:
 * - Subscriptions are append-only, keyed by an increasing id from 0
 * - Eligible only while now < expires and now >= withdrawNext
 * - cycle, withdrawPrev and withdrawNext advance only after a
 *   successful withdrawal; the schedule is anchored at `created`
 * - Cancelling moves `expires` to now; nothing else marks termination
 */

import { isAccountId, isEmptyPayload, isPayload } from "@strongbox/types";
import type { AccountId } from "@strongbox/types";
import { VAULT_EVENTS } from "@strongbox/event-store";
import type { Logger } from "pino";
import type { Clock } from "./clock.js";
import type { SubscriptionRegistry, TokenService } from "./collaborators.js";
import {
  AuthorizationError,
  NotFoundError,
  StateConflictError,
  ValidationError,
} from "./errors.js";
import type { CallOutcome, ExternalCallGateway } from "./external-call.js";
import type { VaultJournal } from "./journal.js";
import { decodeSubscriptionMetadata } from "./metadata.js";
import type { NotificationRelay } from "./notification-relay.js";
import type { OwnerSet } from "./owner-set.js";
import type { VaultTreasury } from "./treasury.js";
import { SETTLEMENT_VARIANTS } from "./types.js";
import type {
  CallContext,
  SubmittedSubscription,
  Subscription,
  SubscriptionOutcome,
  SubscriptionRequest,
} from "./types.js";

export interface SubscriptionLedgerDeps {
  readonly vaultId: AccountId;
  readonly owners: OwnerSet;
  readonly gateway: ExternalCallGateway;
  readonly journal: VaultJournal;
  readonly relay: NotificationRelay;
  readonly treasury: VaultTreasury;
  readonly clock: Clock;
  readonly registry?: SubscriptionRegistry;
  readonly token?: TokenService;
  readonly callFeeBudget: number;
  readonly notificationFeeBudget: number;
  readonly logger: Logger;
}

export class SubscriptionLedger {
  private readonly subscriptions: Map<number, Subscription> = new Map();
  private readonly inFlight: Set<number> = new Set();
  private nextId = 0;

  constructor(private readonly deps: SubscriptionLedgerDeps) {}

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a subscription. Attached value is deposited first. When the
   * first withdrawal is already due and can plausibly be paid, the first
   * cycle runs immediately; its failure does not undo the registration.
   */
  submitSubscription(
    ctx: CallContext,
    request: SubscriptionRequest,
  ): SubmittedSubscription {
    const { owners, clock, journal } = this.deps;
    owners.requireOwner(ctx.caller);
    const attached = ctx.value ?? 0n;
    this.validateRequest(request, attached);

    const now = clock.now();
    const terms = decodeSubscriptionMetadata(request.variant, request.metadata, now);

    if (attached > 0n) {
      this.deps.treasury.deposit(ctx.caller, attached);
    }

    const id = this.nextId++;
    const subscription: Subscription = {
      id,
      destination: request.destination,
      recipient: request.recipient,
      value: request.value,
      period: request.period,
      settlement: terms.settlement,
      externalId: terms.externalId,
      payload: request.payload,
      metadata: [...request.metadata],
      created: now,
      expires: terms.expires,
      cycle: 0,
      withdrawPrev: 0,
      withdrawNext: Math.max(now, terms.firstWithdrawal),
      paused: false,
    };
    this.subscriptions.set(id, subscription);

    journal.record({ kind: "subscription", id }, VAULT_EVENTS.SUBSCRIPTION_ADDED, ctx.caller, {
      subscriptionId: id,
      destination: subscription.destination,
      recipient: subscription.recipient,
      value: subscription.value.toString(),
      period: subscription.period,
      variant: subscription.settlement.variant,
      externalId: subscription.externalId,
      expires: subscription.expires,
      withdrawNext: subscription.withdrawNext,
    });
    this.deps.relay.subscriptionCreated(subscription, ctx.caller);

    // The registry may have executed, paused or cancelled it meanwhile.
    const current = this.requireSubscription(id);
    const eligible = this.ineligibility(current, clock.now()) === null;
    const payable =
      attached >= current.value ||
      this.deps.treasury.balance() >= current.value ||
      !isEmptyPayload(current.payload);

    return {
      subscriptionId: id,
      firstExecution: eligible && payable ? this.runCycle(ctx.caller, id) : null,
    };
  }

  /** Cancel by moving the expiry to now. */
  cancelSubscription(ctx: CallContext, id: number): void {
    this.deps.owners.requireOwner(ctx.caller);
    const subscription = this.requireSubscription(id);
    const now = this.deps.clock.now();
    this.assertNotExpired(subscription, now);

    this.subscriptions.set(id, { ...subscription, expires: now });
    this.deps.journal.record(
      { kind: "subscription", id },
      VAULT_EVENTS.SUBSCRIPTION_CANCELLED,
      ctx.caller,
      { subscriptionId: id, expires: now },
    );
  }

  pauseSubscription(ctx: CallContext, id: number): void {
    this.setPaused(ctx, id, true);
  }

  resumeSubscription(ctx: CallContext, id: number): void {
    this.setPaused(ctx, id, false);
  }

  /**
   * Withdraw the current cycle. Callable by owners and by accounts the
   * registry recognizes as operators.
   */
  executeSubscription(ctx: CallContext, id: number): SubscriptionOutcome {
    this.requireOperator(ctx.caller);
    const subscription = this.requireSubscription(id);
    const now = this.deps.clock.now();

    const blocked = this.ineligibility(subscription, now);
    if (blocked !== null) throw blocked;

    return this.runCycle(ctx.caller, id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getSubscription(id: number): Subscription {
    return this.requireSubscription(id);
  }

  isExpired(id: number): boolean {
    return this.deps.clock.now() >= this.requireSubscription(id).expires;
  }

  getSubscriptionCount(withdrawable: boolean, expired: boolean): number {
    return this.filter(withdrawable, expired).length;
  }

  /** Matching ids in positions [from, to) of the filtered list. */
  getSubscriptionIds(
    from: number,
    to: number,
    withdrawable: boolean,
    expired: boolean,
  ): readonly number[] {
    return this.filter(withdrawable, expired).slice(from, to);
  }

  get count(): number {
    return this.subscriptions.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private runCycle(actor: AccountId, id: number): SubscriptionOutcome {
    const subscription = this.requireSubscription(id);

    let result: CallOutcome;
    this.inFlight.add(id);
    try {
      result = this.settle(subscription);
    } finally {
      this.inFlight.delete(id);
    }

    if (!result.ok) {
      this.deps.journal.record(
        { kind: "subscription", id },
        VAULT_EVENTS.SUBSCRIPTION_EXECUTION_FAILED,
        actor,
        { subscriptionId: id, cycle: subscription.cycle, reason: result.failure.code },
      );
      this.deps.logger.info(
        { subscriptionId: id, reason: result.failure.code },
        "Subscription execution failed",
      );
      return { status: "failed", failure: result.failure };
    }

    // Re-read: a re-entrant cancel or pause during the call must survive.
    const current = this.requireSubscription(id);
    const isFirstCycle = current.cycle === 0;
    const cycle = current.cycle + 1;
    const advanced: Subscription = {
      ...current,
      cycle,
      withdrawPrev: this.deps.clock.now(),
      withdrawNext: current.created + current.period * cycle,
    };
    this.subscriptions.set(id, advanced);

    this.deps.journal.record(
      { kind: "subscription", id },
      VAULT_EVENTS.SUBSCRIPTION_EXECUTED,
      actor,
      {
        subscriptionId: id,
        cycle,
        value: advanced.value.toString(),
        withdrawPrev: advanced.withdrawPrev,
        withdrawNext: advanced.withdrawNext,
      },
    );
    this.deps.logger.info(
      { subscriptionId: id, cycle, withdrawNext: advanced.withdrawNext },
      "Subscription executed",
    );
    this.deps.relay.paymentExecuted(advanced, isFirstCycle, actor);
    return { status: "executed", cycle };
  }

  private settle(subscription: Subscription): CallOutcome {
    const { gateway, treasury, vaultId, callFeeBudget } = this.deps;
    const { settlement, destination, value } = subscription;

    switch (settlement.variant) {
      case "direct-escrow": {
        const balance = treasury.balance();
        if (balance < value) {
          return {
            ok: false,
            failure: {
              code: "INSUFFICIENT_BALANCE",
              message: `Vault balance ${balance} cannot cover ${value}`,
            },
          };
        }
        return gateway.call(destination, value, subscription.payload, callFeeBudget);
      }
      case "escrow-token":
        return this.transferTokens(vaultId, destination, value);
      case "delegated-allowance":
        return this.transferTokens(settlement.wallet, destination, value);
    }
  }

  private transferTokens(from: AccountId, to: AccountId, value: bigint): CallOutcome {
    const token = this.deps.token;
    if (token === undefined) {
      return {
        ok: false,
        failure: { code: "CALL_FAILED", message: "No token service configured" },
      };
    }
    return this.deps.gateway.invoke("token.transferOnBehalf", this.deps.callFeeBudget, (meter) =>
      token.transferOnBehalf(from, to, value, meter),
    );
  }

  private setPaused(ctx: CallContext, id: number, paused: boolean): void {
    this.deps.owners.requireOwner(ctx.caller);
    const subscription = this.requireSubscription(id);
    this.assertNotExpired(subscription, this.deps.clock.now());
    if (subscription.paused === paused) {
      throw paused
        ? new StateConflictError("SUBSCRIPTION_PAUSED", `Subscription ${id} is already paused`)
        : new StateConflictError("SUBSCRIPTION_NOT_PAUSED", `Subscription ${id} is not paused`);
    }

    this.subscriptions.set(id, { ...subscription, paused });
    this.deps.journal.record(
      { kind: "subscription", id },
      paused ? VAULT_EVENTS.SUBSCRIPTION_PAUSED : VAULT_EVENTS.SUBSCRIPTION_RESUMED,
      ctx.caller,
      { subscriptionId: id },
    );
  }

  private requireOperator(caller: AccountId): void {
    if (this.deps.owners.isOwner(caller)) return;

    const registry = this.deps.registry;
    if (registry !== undefined) {
      const isOperator = this.deps.gateway.check(
        "registry.isOperator",
        this.deps.notificationFeeBudget,
        (meter) => registry.isOperator(caller, meter),
      );
      if (isOperator) return;
    }
    throw new AuthorizationError("NOT_OPERATOR", `${caller} is neither an owner nor an operator`);
  }

  private validateRequest(request: SubscriptionRequest, attached: bigint): void {
    if (!isAccountId(request.destination) || !isAccountId(request.recipient)) {
      throw new ValidationError(
        "INVALID_DESTINATION",
        "Destination and recipient must be non-empty account ids",
      );
    }
    if (request.value <= 0n) {
      throw new ValidationError("INVALID_AMOUNT", `Value must be positive, got ${request.value}`);
    }
    if (attached < 0n) {
      throw new ValidationError("INVALID_AMOUNT", `Attached value must not be negative, got ${attached}`);
    }
    if (!Number.isSafeInteger(request.period) || request.period <= 0) {
      throw new ValidationError(
        "INVALID_METADATA",
        `Period must be a positive whole number of seconds, got ${request.period}`,
      );
    }
    if (!SETTLEMENT_VARIANTS.includes(request.variant)) {
      throw new ValidationError(
        "UNSUPPORTED_VARIANT",
        `Unknown settlement variant "${String(request.variant)}"`,
      );
    }
    if (request.variant !== "direct-escrow" && this.deps.token === undefined) {
      throw new ValidationError(
        "UNSUPPORTED_VARIANT",
        `${request.variant} subscriptions need a token service`,
      );
    }
    if (!isPayload(request.payload)) {
      throw new ValidationError("INVALID_PAYLOAD", "Payload must be 0x-prefixed hex of whole bytes");
    }
  }

  /**
   * Why the subscription cannot be withdrawn right now, checked in order:
   * expired, paused, already executing, not yet due. Null when it can.
   */
  private ineligibility(subscription: Subscription, now: number): StateConflictError | null {
    const { id } = subscription;
    if (now >= subscription.expires) {
      return new StateConflictError(
        "SUBSCRIPTION_EXPIRED",
        `Subscription ${id} expired at ${subscription.expires}`,
      );
    }
    if (subscription.paused) {
      return new StateConflictError("SUBSCRIPTION_PAUSED", `Subscription ${id} is paused`);
    }
    if (this.inFlight.has(id)) {
      return new StateConflictError(
        "EXECUTION_IN_FLIGHT",
        `Subscription ${id} is already executing`,
      );
    }
    if (now < subscription.withdrawNext) {
      return new StateConflictError(
        "NOT_YET_DUE",
        `Subscription ${id} is not due until ${subscription.withdrawNext}`,
      );
    }
    return null;
  }

  private assertNotExpired(subscription: Subscription, now: number): void {
    if (now >= subscription.expires) {
      throw new StateConflictError(
        "SUBSCRIPTION_EXPIRED",
        `Subscription ${subscription.id} expired at ${subscription.expires}`,
      );
    }
  }

  private filter(withdrawable: boolean, expired: boolean): number[] {
    const now = this.deps.clock.now();
    const ids: number[] = [];
    for (const sub of this.subscriptions.values()) {
      const isExpired = now >= sub.expires;
      if ((withdrawable && !isExpired) || (expired && isExpired)) {
        ids.push(sub.id);
      }
    }
    return ids;
  }

  private requireSubscription(id: number): Subscription {
    const subscription = this.subscriptions.get(id);
    if (subscription === undefined) {
      throw new NotFoundError("SUBSCRIPTION_NOT_FOUND", `Subscription ${id} not found`);
    }
    return subscription;
  }
}
