/**
 * Vault treasury: the vault's native balance on the shared balance sheet.
 */

import type { AccountId } from "@strongbox/types";
import { VAULT_EVENTS } from "@strongbox/event-store";
import { ValidationError } from "./errors.js";
import type { BalanceSheet } from "./external-call.js";
import type { VaultJournal } from "./journal.js";

export class VaultTreasury {
  constructor(
    private readonly vaultId: AccountId,
    private readonly balances: BalanceSheet,
    private readonly journal: VaultJournal,
  ) {}

  balance(): bigint {
    return this.balances.balanceOf(this.vaultId);
  }

  /**
   * Credit `value` sent by `from` and record the deposit. The credit is
   * settled at once, so a failing call around it cannot take it back.
   */
  deposit(from: AccountId, value: bigint): bigint {
    if (value <= 0n) {
      throw new ValidationError("INVALID_AMOUNT", `Deposit must be positive, got ${value}`);
    }
    const balance = this.balances.settled(() => this.balances.credit(this.vaultId, value));
    this.journal.record({ kind: "deposits" }, VAULT_EVENTS.DEPOSIT_RECEIVED, from, {
      from,
      value: value.toString(),
      balance: balance.toString(),
    });
    return balance;
  }
}
