/**
 * External call gateway.
 *
 * Every outbound interaction leaves the vault through here. A call moves
 * value on the balance sheet, then hands control to the destination's
 * handler (if it has one) under a bounded fee meter. Whatever the handler
 * does, the caller only ever sees success or failure.
 *
 * A handler may call back into the vault before it returns. When a call
 * fails, only its own transfer and the moves its handler made directly
 * are undone. Nested calls that succeeded, and deposits, are settled the
 * moment they complete and survive the enclosing failure, together with
 * the ledger rows they advanced.
 */

import type { AccountId, Payload } from "@strongbox/types";
import type { Logger } from "pino";
import type { ExternalCallFailure, ExternalCallFailureCode } from "./errors.js";

/** Nested calls beyond this depth fail. */
export const MAX_CALL_DEPTH = 64;

// =============================================================================
// Fee metering
// =============================================================================

export class FeeBudgetExceededError extends Error {
  constructor(
    public readonly budget: number,
    public readonly requested: number,
  ) {
    super(`Fee budget of ${budget} exceeded (requested ${requested})`);
    this.name = "FeeBudgetExceededError";
  }
}

export class FeeMeter {
  private _used = 0;

  constructor(public readonly budget: number) {}

  get used(): number {
    return this._used;
  }

  get remaining(): number {
    return this.budget - this._used;
  }

  /** Charge units; throws once the budget would be exceeded. */
  consume(units: number): void {
    if (this._used + units > this.budget) {
      throw new FeeBudgetExceededError(this.budget, this._used + units);
    }
    this._used += units;
  }
}

// =============================================================================
// Balances
// =============================================================================

interface BalanceMove {
  readonly account: AccountId;
  readonly delta: bigint;
}

/**
 * Account balances with nested checkpoints. Every move is logged against
 * the innermost open checkpoint; `commit` settles that log for good and
 * `rollback` reverses it.
 */
export class BalanceSheet {
  private readonly balances: Map<AccountId, bigint> = new Map();
  private readonly frames: BalanceMove[][] = [];

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? 0n;
  }

  credit(account: AccountId, value: bigint): bigint {
    return this.adjust(account, value);
  }

  /** Returns false and moves nothing when `from` cannot cover `value`. */
  transfer(from: AccountId, to: AccountId, value: bigint): boolean {
    if (this.balanceOf(from) < value) return false;
    if (from === to || value === 0n) return true;
    this.adjust(from, -value);
    this.adjust(to, value);
    return true;
  }

  checkpoint(): void {
    this.frames.push([]);
  }

  /**
   * Close the innermost checkpoint and keep its moves. They are not
   * handed to the enclosing checkpoint, so its rollback cannot undo them.
   */
  commit(): void {
    this.closeFrame();
  }

  /** Close the innermost checkpoint and reverse its moves, newest first. */
  rollback(): void {
    const moves = this.closeFrame();
    for (let i = moves.length - 1; i >= 0; i--) {
      const move = moves[i];
      if (move === undefined) continue;
      this.balances.set(move.account, this.balanceOf(move.account) - move.delta);
    }
  }

  /** Run `fn` under its own checkpoint, settled when it returns. */
  settled<T>(fn: () => T): T {
    this.checkpoint();
    try {
      const result = fn();
      this.commit();
      return result;
    } catch (err) {
      this.rollback();
      throw err;
    }
  }

  private adjust(account: AccountId, delta: bigint): bigint {
    const next = this.balanceOf(account) + delta;
    this.balances.set(account, next);
    this.frames[this.frames.length - 1]?.push({ account, delta });
    return next;
  }

  private closeFrame(): BalanceMove[] {
    const moves = this.frames.pop();
    if (moves === undefined) {
      throw new Error("No open balance checkpoint");
    }
    return moves;
  }
}

// =============================================================================
// Principals
// =============================================================================

export interface InboundCall {
  readonly from: AccountId;
  readonly value: bigint;
  readonly payload: Payload;
  readonly meter: FeeMeter;
}

/** Code living at an account. Throwing signals failure; return values are ignored. */
export type PrincipalHandler = (call: InboundCall) => void;

export class PrincipalDirectory {
  private readonly handlers: Map<AccountId, PrincipalHandler> = new Map();

  register(account: AccountId, handler: PrincipalHandler): void {
    this.handlers.set(account, handler);
  }

  unregister(account: AccountId): boolean {
    return this.handlers.delete(account);
  }

  handlerFor(account: AccountId): PrincipalHandler | undefined {
    return this.handlers.get(account);
  }

  hasCode(account: AccountId): boolean {
    return this.handlers.has(account);
  }
}

// =============================================================================
// Gateway
// =============================================================================

export type CallOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly failure: ExternalCallFailure };

const OK: CallOutcome = { ok: true };

function failed(code: ExternalCallFailureCode, message: string): CallOutcome {
  return { ok: false, failure: { code, message } };
}

function describeThrown(err: unknown): CallOutcome {
  if (err instanceof FeeBudgetExceededError) {
    return failed("FEE_BUDGET_EXCEEDED", err.message);
  }
  return failed("CALL_FAILED", err instanceof Error ? err.message : String(err));
}

export class ExternalCallGateway {
  private depth = 0;

  constructor(
    private readonly origin: AccountId,
    private readonly principals: PrincipalDirectory,
    private readonly balances: BalanceSheet,
    private readonly logger: Logger,
  ) {}

  /**
   * Send `value` and `payload` to `destination`. Never throws.
   */
  call(
    destination: AccountId,
    value: bigint,
    payload: Payload,
    feeBudget: number,
  ): CallOutcome {
    if (this.depth >= MAX_CALL_DEPTH) {
      return this.report(
        destination,
        failed("CALL_DEPTH_EXCEEDED", `Call depth limit of ${MAX_CALL_DEPTH} reached`),
      );
    }

    this.balances.checkpoint();
    if (!this.balances.transfer(this.origin, destination, value)) {
      this.balances.rollback();
      return this.report(
        destination,
        failed(
          "INSUFFICIENT_BALANCE",
          `Balance ${this.balances.balanceOf(this.origin)} cannot cover ${value}`,
        ),
      );
    }

    const handler = this.principals.handlerFor(destination);
    if (handler === undefined) {
      this.balances.commit();
      return OK;
    }

    const meter = new FeeMeter(feeBudget);
    this.depth++;
    try {
      handler({ from: this.origin, value, payload, meter });
      this.balances.commit();
      return OK;
    } catch (err) {
      this.balances.rollback();
      return this.report(destination, describeThrown(err));
    } finally {
      this.depth--;
    }
  }

  /**
   * Run a collaborator call with the same containment as `call`.
   * A `false` return counts as failure.
   */
  invoke(
    label: string,
    feeBudget: number,
    fn: (meter: FeeMeter) => boolean | void,
  ): CallOutcome {
    if (this.depth >= MAX_CALL_DEPTH) {
      return this.report(
        label,
        failed("CALL_DEPTH_EXCEEDED", `Call depth limit of ${MAX_CALL_DEPTH} reached`),
      );
    }

    const meter = new FeeMeter(feeBudget);
    this.depth++;
    try {
      if (fn(meter) === false) {
        return this.report(label, failed("TRANSFER_REJECTED", `${label} returned false`));
      }
      return OK;
    } catch (err) {
      return this.report(label, describeThrown(err));
    } finally {
      this.depth--;
    }
  }

  /**
   * Ask a collaborator a yes/no question with the same containment.
   * A thrown error or an exhausted budget counts as "no"; a plain "no"
   * is an answer, not a failure, and is not reported.
   */
  check(label: string, feeBudget: number, fn: (meter: FeeMeter) => boolean): boolean {
    if (this.depth >= MAX_CALL_DEPTH) {
      this.report(
        label,
        failed("CALL_DEPTH_EXCEEDED", `Call depth limit of ${MAX_CALL_DEPTH} reached`),
      );
      return false;
    }

    const meter = new FeeMeter(feeBudget);
    this.depth++;
    try {
      return fn(meter);
    } catch (err) {
      this.report(label, describeThrown(err));
      return false;
    } finally {
      this.depth--;
    }
  }

  private report(target: string, outcome: CallOutcome): CallOutcome {
    if (!outcome.ok) {
      this.logger.debug(
        { target, code: outcome.failure.code, reason: outcome.failure.message },
        "External call failed",
      );
    }
    return outcome;
  }
}
