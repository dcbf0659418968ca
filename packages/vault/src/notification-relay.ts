/**
 * Best-effort callbacks to the subscription registry.
 *
 * A failed notification is logged and journaled; it never undoes the
 * mutation that triggered it.
 */

import type { AccountId } from "@strongbox/types";
import { VAULT_EVENTS } from "@strongbox/event-store";
import type { NotificationFailedPayload } from "@strongbox/event-store";
import type { Logger } from "pino";
import type { SubscriptionRegistry } from "./collaborators.js";
import type { CallOutcome, ExternalCallGateway, FeeMeter } from "./external-call.js";
import type { VaultJournal } from "./journal.js";
import type { Subscription } from "./types.js";

type NotificationKind = NotificationFailedPayload["notification"];

export class NotificationRelay {
  constructor(
    private readonly vaultId: AccountId,
    private readonly registry: SubscriptionRegistry | undefined,
    private readonly gateway: ExternalCallGateway,
    private readonly journal: VaultJournal,
    private readonly feeBudget: number,
    private readonly logger: Logger,
  ) {}

  /** Returns whether the registry accepted the notice. */
  subscriptionCreated(subscription: Subscription, actor: AccountId): boolean {
    return this.dispatch("new_subscription", subscription, actor, (registry, meter) =>
      registry.handleNewSubscription(
        {
          destination: subscription.destination,
          vaultId: this.vaultId,
          subscriptionId: subscription.id,
          externalId: subscription.externalId,
        },
        meter,
      ),
    );
  }

  paymentExecuted(
    subscription: Subscription,
    isFirstCycle: boolean,
    actor: AccountId,
  ): boolean {
    return this.dispatch("payment", subscription, actor, (registry, meter) =>
      registry.handlePaymentNotification(
        {
          destination: subscription.destination,
          subscriptionId: subscription.id,
          externalId: subscription.externalId,
          isFirstCycle,
        },
        meter,
      ),
    );
  }

  private dispatch(
    notification: NotificationKind,
    subscription: Subscription,
    actor: AccountId,
    send: (registry: SubscriptionRegistry, meter: FeeMeter) => void,
  ): boolean {
    const registry = this.registry;
    if (registry === undefined) return false;

    const outcome: CallOutcome = this.gateway.invoke(
      `registry.${notification}`,
      this.feeBudget,
      (meter) => send(registry, meter),
    );
    if (outcome.ok) return true;

    this.logger.warn(
      {
        subscriptionId: subscription.id,
        notification,
        code: outcome.failure.code,
        reason: outcome.failure.message,
      },
      "Registry notification failed",
    );
    this.journal.record(
      { kind: "subscription", id: subscription.id },
      VAULT_EVENTS.NOTIFICATION_FAILED,
      actor,
      {
        subscriptionId: subscription.id,
        notification,
        reason: outcome.failure.code,
      },
    );
    return false;
  }
}
