/**
 * Runtime type guard tests for @strongbox/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAccountId,
  isPayload,
  isEmptyPayload,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Primitive guards
// =============================================================================

describe("isAccountId", () => {
  it("accepts a non-empty string", () => {
    expect(isAccountId("0xowner1")).toBe(true);
  });

  it("rejects empty and whitespace-only strings", () => {
    expect(isAccountId("")).toBe(false);
    expect(isAccountId("   ")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAccountId(42)).toBe(false);
    expect(isAccountId(null)).toBe(false);
  });
});

describe("isPayload", () => {
  it("accepts the empty payload", () => {
    expect(isPayload("0x")).toBe(true);
  });

  it("accepts whole bytes in either case", () => {
    expect(isPayload("0xdeadBEEF")).toBe(true);
  });

  it("rejects odd-length hex", () => {
    expect(isPayload("0xabc")).toBe(false);
  });

  it("rejects a missing prefix", () => {
    expect(isPayload("abcd")).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isPayload("0xzz")).toBe(false);
  });
});

describe("isEmptyPayload", () => {
  it("is true only for 0x", () => {
    expect(isEmptyPayload("0x")).toBe(true);
    expect(isEmptyPayload("0x00")).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const validMetadata = {
  eventId: "evt-1",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "0xowner1",
  correlationId: "transaction:0",
  source: "transactions",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    expect(isEventSource("owners")).toBe(true);
    expect(isEventSource("subscriptions")).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("observer")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(validMetadata)).toBe(true);
  });

  it("rejects metadata with an unknown source", () => {
    expect(isEventMetadata({ ...validMetadata, source: "elsewhere" })).toBe(false);
  });

  it("rejects metadata without an actor", () => {
    const { actor: _actor, ...rest } = validMetadata;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "vault.transaction.submitted",
        metadata: validMetadata,
        payload: { transactionId: 0 },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({
        type: "vault.transaction.submitted",
        metadata: validMetadata,
        payload: null,
      }),
    ).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isDomainEvent("vault.transaction.submitted")).toBe(false);
  });
});
