/**
 * Tests for OwnerSet - owners and confirmation threshold.
 */

import { describe, it, expect } from "vitest";
import {
  OwnerSet,
  MAX_OWNER_COUNT,
  AuthorizationError,
  ValidationError,
} from "../src/index.js";
import { OWNER1, OWNER2, OWNER3, VAULT } from "./setup.js";

function ownerSet(required = 2): OwnerSet {
  return new OwnerSet(VAULT, [OWNER1, OWNER2, OWNER3], required);
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof AuthorizationError || err instanceof ValidationError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}

describe("OwnerSet", () => {
  // ─── Construction ───────────────────────────────────────────────────

  describe("constructor", () => {
    it("keeps owners in order", () => {
      const owners = ownerSet();
      expect(owners.getOwners()).toEqual([OWNER1, OWNER2, OWNER3]);
      expect(owners.required).toBe(2);
      expect(owners.count).toBe(3);
    });

    it("rejects duplicate owners", () => {
      expect(codeOf(() => new OwnerSet(VAULT, [OWNER1, OWNER1], 1))).toBe("OWNER_EXISTS");
    });

    it("rejects the vault as its own owner", () => {
      expect(codeOf(() => new OwnerSet(VAULT, [OWNER1, VAULT], 1))).toBe(
        "INVALID_OWNER_CONFIGURATION",
      );
    });

    it("rejects empty owner ids", () => {
      expect(codeOf(() => new OwnerSet(VAULT, [OWNER1, ""], 1))).toBe(
        "INVALID_OWNER_CONFIGURATION",
      );
    });

    it("rejects a threshold of zero or above the owner count", () => {
      expect(codeOf(() => ownerSet(0))).toBe("INVALID_OWNER_CONFIGURATION");
      expect(codeOf(() => ownerSet(4))).toBe("INVALID_OWNER_CONFIGURATION");
    });

    it("rejects more than the maximum owner count", () => {
      const owners = Array.from({ length: MAX_OWNER_COUNT + 1 }, (_, i) => `0xo${i}`);
      expect(codeOf(() => new OwnerSet(VAULT, owners, 1))).toBe("INVALID_OWNER_CONFIGURATION");
    });
  });

  // ─── Self-authorization ─────────────────────────────────────────────

  describe("self-authorization", () => {
    it("refuses changes from anyone but the vault", () => {
      const owners = ownerSet();
      expect(codeOf(() => owners.addOwner(OWNER1, "0xowner4"))).toBe("NOT_SELF");
      expect(codeOf(() => owners.removeOwner(OWNER1, OWNER2))).toBe("NOT_SELF");
      expect(codeOf(() => owners.replaceOwner(OWNER1, OWNER2, "0xowner4"))).toBe("NOT_SELF");
      expect(codeOf(() => owners.changeRequirement(OWNER1, 1))).toBe("NOT_SELF");
      expect(owners.getOwners()).toEqual([OWNER1, OWNER2, OWNER3]);
    });
  });

  // ─── Mutations ──────────────────────────────────────────────────────

  describe("addOwner", () => {
    it("appends the owner", () => {
      const owners = ownerSet();
      expect(owners.addOwner(VAULT, "0xowner4")).toEqual([
        { type: "owner_added", owner: "0xowner4" },
      ]);
      expect(owners.isOwner("0xowner4")).toBe(true);
    });

    it("rejects an existing owner", () => {
      expect(codeOf(() => ownerSet().addOwner(VAULT, OWNER2))).toBe("OWNER_EXISTS");
    });

    it("rejects growth beyond the maximum", () => {
      const full = Array.from({ length: MAX_OWNER_COUNT }, (_, i) => `0xo${i}`);
      const owners = new OwnerSet(VAULT, full, 1);
      expect(codeOf(() => owners.addOwner(VAULT, "0xextra"))).toBe(
        "INVALID_OWNER_CONFIGURATION",
      );
      expect(owners.count).toBe(MAX_OWNER_COUNT);
    });
  });

  describe("removeOwner", () => {
    it("removes without touching a threshold that still fits", () => {
      const owners = ownerSet(2);
      expect(owners.removeOwner(VAULT, OWNER2)).toEqual([
        { type: "owner_removed", owner: OWNER2 },
      ]);
      expect(owners.getOwners()).toEqual([OWNER1, OWNER3]);
      expect(owners.required).toBe(2);
    });

    it("clamps the threshold to the remaining owner count", () => {
      const owners = ownerSet(3);
      expect(owners.removeOwner(VAULT, OWNER3)).toEqual([
        { type: "owner_removed", owner: OWNER3 },
        { type: "requirement_changed", previous: 3, required: 2 },
      ]);
      expect(owners.required).toBe(2);
    });

    it("rejects an unknown owner", () => {
      expect(codeOf(() => ownerSet().removeOwner(VAULT, "0xnobody"))).toBe("OWNER_NOT_FOUND");
    });

    it("refuses to remove the last owner", () => {
      const owners = new OwnerSet(VAULT, [OWNER1], 1);
      expect(codeOf(() => owners.removeOwner(VAULT, OWNER1))).toBe(
        "INVALID_OWNER_CONFIGURATION",
      );
    });
  });

  describe("replaceOwner", () => {
    it("keeps the replaced owner's position", () => {
      const owners = ownerSet();
      owners.replaceOwner(VAULT, OWNER2, "0xowner4");
      expect(owners.getOwners()).toEqual([OWNER1, "0xowner4", OWNER3]);
    });

    it("rejects a replacement that is already an owner", () => {
      expect(codeOf(() => ownerSet().replaceOwner(VAULT, OWNER1, OWNER2))).toBe("OWNER_EXISTS");
    });
  });

  describe("changeRequirement", () => {
    it("records the previous and new threshold", () => {
      expect(ownerSet(2).changeRequirement(VAULT, 3)).toEqual([
        { type: "requirement_changed", previous: 2, required: 3 },
      ]);
    });

    it("rejects a threshold above the owner count", () => {
      const owners = ownerSet(2);
      expect(codeOf(() => owners.changeRequirement(VAULT, 4))).toBe(
        "INVALID_OWNER_CONFIGURATION",
      );
      expect(owners.required).toBe(2);
    });
  });
});
