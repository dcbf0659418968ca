/**
 * In-process collaborators for tests and the development server.
 */

import type { AccountId } from "@strongbox/types";
import type {
  NewSubscriptionNotice,
  PaymentNotice,
  SubscriptionRegistry,
  TokenService,
} from "./collaborators.js";
import type { FeeMeter } from "./external-call.js";

const TOKEN_TRANSFER_COST = 5_000;
const NOTICE_COST = 2_000;
const OPERATOR_LOOKUP_COST = 500;

// =============================================================================
// Token ledger
// =============================================================================

/**
 * Fungible token balances with allowances. `spender` is the account
 * whose `transferOnBehalf` calls this ledger serves, normally a vault.
 */
export class InMemoryTokenLedger implements TokenService {
  private readonly balances: Map<AccountId, bigint> = new Map();
  private readonly allowances: Map<AccountId, Map<AccountId, bigint>> = new Map();

  constructor(private readonly spender: AccountId) {}

  mint(account: AccountId, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): void {
    let granted = this.allowances.get(owner);
    if (granted === undefined) {
      granted = new Map();
      this.allowances.set(owner, granted);
    }
    granted.set(spender, amount);
  }

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  /**
   * Move `value` from `from` to `to`. The spender moves its own tokens
   * freely; anyone else's need an allowance, which is drawn down.
   */
  transferOnBehalf(
    from: AccountId,
    to: AccountId,
    value: bigint,
    meter: FeeMeter,
  ): boolean {
    meter.consume(TOKEN_TRANSFER_COST);
    if (this.balanceOf(from) < value) return false;

    if (from !== this.spender) {
      const allowed = this.allowance(from, this.spender);
      if (allowed < value) return false;
      this.approve(from, this.spender, allowed - value);
    }

    this.balances.set(from, this.balanceOf(from) - value);
    this.balances.set(to, this.balanceOf(to) + value);
    return true;
  }
}

// =============================================================================
// Registry
// =============================================================================

/** A fixed operator list that records every notice it receives. */
export class StaticSubscriptionRegistry implements SubscriptionRegistry {
  private readonly operators: Set<AccountId>;
  private readonly _newSubscriptions: NewSubscriptionNotice[] = [];
  private readonly _payments: PaymentNotice[] = [];

  constructor(operators: Iterable<AccountId> = []) {
    this.operators = new Set(operators);
  }

  get newSubscriptions(): readonly NewSubscriptionNotice[] {
    return this._newSubscriptions;
  }

  get payments(): readonly PaymentNotice[] {
    return this._payments;
  }

  addOperator(account: AccountId): void {
    this.operators.add(account);
  }

  removeOperator(account: AccountId): void {
    this.operators.delete(account);
  }

  isOperator(account: AccountId, meter: FeeMeter): boolean {
    meter.consume(OPERATOR_LOOKUP_COST);
    return this.operators.has(account);
  }

  handleNewSubscription(notice: NewSubscriptionNotice, meter: FeeMeter): void {
    meter.consume(NOTICE_COST);
    this._newSubscriptions.push(notice);
  }

  handlePaymentNotification(notice: PaymentNotice, meter: FeeMeter): void {
    meter.consume(NOTICE_COST);
    this._payments.push(notice);
  }
}
