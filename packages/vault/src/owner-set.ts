/**
 * Owner Set
 *
 * The accounts allowed to propose and confirm transactions, plus the
 * confirmation threshold. Mutations are self-authorized: they only
 * succeed when the caller is the vault itself, which happens when an
 * admin-call transaction addressed to the vault is executed.
 *
 * Invariant: 1 <= required <= owners <= MAX_OWNER_COUNT.
 */

import { isAccountId } from "@strongbox/types";
import type { AccountId } from "@strongbox/types";
import { AuthorizationError, ValidationError } from "./errors.js";

export const MAX_OWNER_COUNT = 50;

export type OwnerChange =
  | { readonly type: "owner_added"; readonly owner: AccountId }
  | { readonly type: "owner_removed"; readonly owner: AccountId }
  | {
      readonly type: "requirement_changed";
      readonly previous: number;
      readonly required: number;
    };

export class OwnerSet {
  private readonly owners: AccountId[] = [];
  private _required: number;

  constructor(
    private readonly vaultId: AccountId,
    owners: readonly AccountId[],
    required: number,
  ) {
    for (const owner of owners) {
      this.assertAdmissible(owner);
      this.owners.push(owner);
    }
    assertValidRequirement(this.owners.length, required);
    this._required = required;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  get required(): number {
    return this._required;
  }

  get count(): number {
    return this.owners.length;
  }

  getOwners(): readonly AccountId[] {
    return [...this.owners];
  }

  isOwner(account: AccountId): boolean {
    return this.owners.includes(account);
  }

  requireOwner(account: AccountId): void {
    if (!this.isOwner(account)) {
      throw new AuthorizationError("NOT_OWNER", `${account} is not an owner`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Self-authorized mutations
  // ───────────────────────────────────────────────────────────────────────

  addOwner(caller: AccountId, owner: AccountId): OwnerChange[] {
    this.requireSelf(caller);
    this.assertAdmissible(owner);
    assertValidRequirement(this.owners.length + 1, this._required);

    this.owners.push(owner);
    return [{ type: "owner_added", owner }];
  }

  /**
   * Remove an owner. When the threshold would exceed the remaining owner
   * count it is lowered to that count in the same call.
   */
  removeOwner(caller: AccountId, owner: AccountId): OwnerChange[] {
    this.requireSelf(caller);
    const index = this.indexOf(owner);
    if (this.owners.length === 1) {
      throw new ValidationError(
        "INVALID_OWNER_CONFIGURATION",
        "Cannot remove the last owner",
      );
    }

    this.owners.splice(index, 1);
    const changes: OwnerChange[] = [{ type: "owner_removed", owner }];

    if (this._required > this.owners.length) {
      changes.push(this.applyRequirement(this.owners.length));
    }
    return changes;
  }

  /** Swap an owner in place, keeping its position. */
  replaceOwner(
    caller: AccountId,
    owner: AccountId,
    newOwner: AccountId,
  ): OwnerChange[] {
    this.requireSelf(caller);
    const index = this.indexOf(owner);
    this.assertAdmissible(newOwner);

    this.owners[index] = newOwner;
    return [
      { type: "owner_removed", owner },
      { type: "owner_added", owner: newOwner },
    ];
  }

  changeRequirement(caller: AccountId, required: number): OwnerChange[] {
    this.requireSelf(caller);
    assertValidRequirement(this.owners.length, required);
    return [this.applyRequirement(required)];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private applyRequirement(required: number): OwnerChange {
    const previous = this._required;
    this._required = required;
    return { type: "requirement_changed", previous, required };
  }

  private requireSelf(caller: AccountId): void {
    if (caller !== this.vaultId) {
      throw new AuthorizationError(
        "NOT_SELF",
        "Owner management is only reachable through an executed vault transaction",
      );
    }
  }

  private indexOf(owner: AccountId): number {
    const index = this.owners.indexOf(owner);
    if (index === -1) {
      throw new ValidationError("OWNER_NOT_FOUND", `${owner} is not an owner`);
    }
    return index;
  }

  private assertAdmissible(owner: AccountId): void {
    if (!isAccountId(owner)) {
      throw new ValidationError(
        "INVALID_OWNER_CONFIGURATION",
        "Owner must be a non-empty account id",
      );
    }
    if (owner === this.vaultId) {
      throw new ValidationError(
        "INVALID_OWNER_CONFIGURATION",
        "The vault cannot own itself",
      );
    }
    if (this.owners.includes(owner)) {
      throw new ValidationError("OWNER_EXISTS", `${owner} is already an owner`);
    }
  }
}

export function assertValidRequirement(ownerCount: number, required: number): void {
  if (
    ownerCount > MAX_OWNER_COUNT ||
    !Number.isInteger(required) ||
    required < 1 ||
    required > ownerCount
  ) {
    throw new ValidationError(
      "INVALID_OWNER_CONFIGURATION",
      `Threshold ${required} is invalid for ${ownerCount} owner(s) (max ${MAX_OWNER_COUNT})`,
    );
  }
}
