/**
 * Collaborator interfaces the vault consumes but does not implement.
 */

import type { AccountId } from "@strongbox/types";
import type { FeeMeter } from "./external-call.js";

export interface NewSubscriptionNotice {
  readonly destination: AccountId;
  readonly vaultId: AccountId;
  readonly subscriptionId: number;
  readonly externalId: string;
}

export interface PaymentNotice {
  readonly destination: AccountId;
  readonly subscriptionId: number;
  readonly externalId: string;
  readonly isFirstCycle: boolean;
}

/**
 * Operator registry and payment tracker.
 *
 * Every method is charged against the meter it receives and may throw;
 * the vault contains either outcome. A throwing `isOperator` means "no".
 */
export interface SubscriptionRegistry {
  isOperator(account: AccountId, meter: FeeMeter): boolean;
  handleNewSubscription(notice: NewSubscriptionNotice, meter: FeeMeter): void;
  handlePaymentNotification(notice: PaymentNotice, meter: FeeMeter): void;
}

/** Token transfer service acting on behalf of the vault. */
export interface TokenService {
  transferOnBehalf(
    from: AccountId,
    to: AccountId,
    value: bigint,
    meter: FeeMeter,
  ): boolean;
}
