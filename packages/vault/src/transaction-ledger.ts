/**
 * Transaction Ledger
 *
 * Propose → confirm → execute for one-off transfers authorized by
 * owner quorum.
 *
 * Rules:
 * - Transactions are append-only, keyed by an increasing id from 0
 * - A transaction executes at most once, and only at quorum
 * - `executed` is set before the external call and rolled back only
 *   when that call fails
 * - Confirmations of removed owners are kept but never counted
 */

import { isAccountId, isPayload } from "@strongbox/types";
import type { AccountId, Payload } from "@strongbox/types";
import { VAULT_EVENTS } from "@strongbox/event-store";
import type { Logger } from "pino";
import type { Clock } from "./clock.js";
import {
  NotFoundError,
  StateConflictError,
  ValidationError,
} from "./errors.js";
import type { CallOutcome, ExternalCallGateway } from "./external-call.js";
import type { VaultJournal } from "./journal.js";
import type { OwnerSet } from "./owner-set.js";
import type { CallContext, ExecutionOutcome, Transaction } from "./types.js";

export interface TransactionLedgerDeps {
  readonly owners: OwnerSet;
  readonly gateway: ExternalCallGateway;
  readonly journal: VaultJournal;
  readonly clock: Clock;
  readonly callFeeBudget: number;
  readonly logger: Logger;
}

export class TransactionLedger {
  private readonly transactions: Map<number, Transaction> = new Map();
  private readonly confirmations: Map<number, Set<AccountId>> = new Map();
  private readonly inFlight: Set<number> = new Set();
  private nextId = 0;

  constructor(private readonly deps: TransactionLedgerDeps) {}

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose a transaction. The proposer's confirmation is recorded and
   * execution is attempted straight away.
   */
  submitTransaction(
    ctx: CallContext,
    destination: AccountId,
    value: bigint,
    payload: Payload,
  ): number {
    this.deps.owners.requireOwner(ctx.caller);
    if (!isAccountId(destination)) {
      throw new ValidationError("INVALID_DESTINATION", "Destination must be a non-empty account id");
    }
    if (value < 0n) {
      throw new ValidationError("INVALID_AMOUNT", `Value must not be negative, got ${value}`);
    }
    if (!isPayload(payload)) {
      throw new ValidationError("INVALID_PAYLOAD", "Payload must be 0x-prefixed hex of whole bytes");
    }

    const id = this.nextId++;
    const transaction: Transaction = {
      id,
      destination,
      value,
      payload,
      executed: false,
      submittedBy: ctx.caller,
      submittedAt: this.deps.clock.now(),
    };
    this.transactions.set(id, transaction);
    this.confirmations.set(id, new Set());

    this.deps.journal.record(
      { kind: "transaction", id },
      VAULT_EVENTS.TRANSACTION_SUBMITTED,
      ctx.caller,
      {
        transactionId: id,
        destination,
        value: value.toString(),
        payload,
        submittedBy: ctx.caller,
      },
    );

    this.confirm(ctx.caller, id);
    return id;
  }

  confirmTransaction(ctx: CallContext, id: number): ExecutionOutcome {
    this.deps.owners.requireOwner(ctx.caller);
    const transaction = this.requireTransaction(id);
    if (transaction.executed) {
      throw new StateConflictError("ALREADY_EXECUTED", `Transaction ${id} has already executed`);
    }
    if (this.confirmationSet(id).has(ctx.caller)) {
      throw new StateConflictError(
        "ALREADY_CONFIRMED",
        `${ctx.caller} has already confirmed transaction ${id}`,
      );
    }
    return this.confirm(ctx.caller, id);
  }

  revokeConfirmation(ctx: CallContext, id: number): void {
    this.deps.owners.requireOwner(ctx.caller);
    const transaction = this.requireTransaction(id);
    const confirmations = this.confirmationSet(id);
    if (!confirmations.has(ctx.caller)) {
      throw new StateConflictError(
        "NOT_CONFIRMED",
        `${ctx.caller} has not confirmed transaction ${id}`,
      );
    }
    if (transaction.executed) {
      throw new StateConflictError("ALREADY_EXECUTED", `Transaction ${id} has already executed`);
    }

    confirmations.delete(ctx.caller);
    this.deps.journal.record(
      { kind: "transaction", id },
      VAULT_EVENTS.TRANSACTION_REVOKED,
      ctx.caller,
      { transactionId: id, owner: ctx.caller },
    );
  }

  /**
   * Execute a transaction that has reached quorum. The caller must be an
   * owner who confirmed it.
   */
  executeTransaction(ctx: CallContext, id: number): ExecutionOutcome {
    this.deps.owners.requireOwner(ctx.caller);
    const transaction = this.requireTransaction(id);
    if (!this.confirmationSet(id).has(ctx.caller)) {
      throw new StateConflictError(
        "NOT_CONFIRMED",
        `${ctx.caller} has not confirmed transaction ${id}`,
      );
    }
    if (this.inFlight.has(id)) {
      throw new StateConflictError(
        "EXECUTION_IN_FLIGHT",
        `Transaction ${id} is already executing`,
      );
    }
    if (transaction.executed) {
      throw new StateConflictError("ALREADY_EXECUTED", `Transaction ${id} has already executed`);
    }
    if (!this.isConfirmed(id)) {
      throw new StateConflictError(
        "THRESHOLD_NOT_MET",
        `Transaction ${id} has ${this.getConfirmationCount(id)} of ${this.deps.owners.required} confirmations`,
      );
    }
    return this.execute(ctx.caller, id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** True once confirmations from current owners reach the threshold. */
  isConfirmed(id: number): boolean {
    const confirmations = this.confirmationSet(id);
    const required = this.deps.owners.required;
    let count = 0;
    for (const owner of this.deps.owners.getOwners()) {
      if (confirmations.has(owner)) count++;
      if (count === required) return true;
    }
    return false;
  }

  getTransaction(id: number): Transaction {
    return this.requireTransaction(id);
  }

  /** Current owners who have confirmed, in owner order. */
  getConfirmations(id: number): readonly AccountId[] {
    this.requireTransaction(id);
    const confirmations = this.confirmationSet(id);
    return this.deps.owners.getOwners().filter((owner) => confirmations.has(owner));
  }

  getConfirmationCount(id: number): number {
    return this.getConfirmations(id).length;
  }

  getTransactionCount(pending: boolean, executed: boolean): number {
    return this.filter(pending, executed).length;
  }

  /** Matching ids in positions [from, to) of the filtered list. */
  getTransactionIds(
    from: number,
    to: number,
    pending: boolean,
    executed: boolean,
  ): readonly number[] {
    return this.filter(pending, executed).slice(from, to);
  }

  get count(): number {
    return this.transactions.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private confirm(owner: AccountId, id: number): ExecutionOutcome {
    this.confirmationSet(id).add(owner);
    this.deps.journal.record(
      { kind: "transaction", id },
      VAULT_EVENTS.TRANSACTION_CONFIRMED,
      owner,
      { transactionId: id, owner },
    );

    if (this.requireTransaction(id).executed || !this.isConfirmed(id)) {
      return this.pending(id);
    }
    return this.execute(owner, id);
  }

  private execute(actor: AccountId, id: number): ExecutionOutcome {
    const transaction = this.requireTransaction(id);
    this.transactions.set(id, { ...transaction, executed: true });
    this.inFlight.add(id);

    let result: CallOutcome;
    try {
      result = this.deps.gateway.call(
        transaction.destination,
        transaction.value,
        transaction.payload,
        this.deps.callFeeBudget,
      );
    } finally {
      this.inFlight.delete(id);
    }

    const entity = { kind: "transaction", id } as const;
    if (result.ok) {
      const confirmations = this.getConfirmationCount(id);
      this.deps.journal.record(entity, VAULT_EVENTS.TRANSACTION_EXECUTED, actor, {
        transactionId: id,
        confirmations,
      });
      this.deps.logger.info({ transactionId: id, confirmations }, "Transaction executed");
      return { status: "executed" };
    }

    this.transactions.set(id, { ...this.requireTransaction(id), executed: false });
    this.deps.journal.record(entity, VAULT_EVENTS.TRANSACTION_EXECUTION_FAILED, actor, {
      transactionId: id,
      reason: result.failure.code,
    });
    this.deps.logger.info(
      { transactionId: id, reason: result.failure.code },
      "Transaction execution failed",
    );
    return { status: "failed", failure: result.failure };
  }

  private pending(id: number): ExecutionOutcome {
    return {
      status: "pending",
      confirmations: this.getConfirmationCount(id),
      required: this.deps.owners.required,
    };
  }

  private filter(pending: boolean, executed: boolean): number[] {
    const ids: number[] = [];
    for (const tx of this.transactions.values()) {
      if ((pending && !tx.executed) || (executed && tx.executed)) {
        ids.push(tx.id);
      }
    }
    return ids;
  }

  private requireTransaction(id: number): Transaction {
    const transaction = this.transactions.get(id);
    if (transaction === undefined) {
      throw new NotFoundError("TRANSACTION_NOT_FOUND", `Transaction ${id} not found`);
    }
    return transaction;
  }

  private confirmationSet(id: number): Set<AccountId> {
    let set = this.confirmations.get(id);
    if (set === undefined) {
      set = new Set();
      this.confirmations.set(id, set);
    }
    return set;
  }
}
