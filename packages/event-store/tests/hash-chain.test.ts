/**
 * Tests for the event hash chain.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@strongbox/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "../src/hash-chain.js";
import type { StoredEvent } from "../src/types.js";

function makeEvent(n: number): DomainEvent {
  return {
    type: "vault.deposit.received",
    metadata: {
      eventId: `evt-${n}`,
      timestamp: "2024-01-01T00:00:00.000Z",
      actor: "0xpayer",
      correlationId: "deposit",
      source: "treasury",
    },
    payload: { from: "0xpayer", value: String(n), balance: String(n) },
  };
}

function buildChain(count: number): readonly StoredEvent[] {
  const store = new InMemoryEventStore();
  for (let i = 1; i <= count; i++) {
    store.append("vault/deposits", [makeEvent(i)]);
  }
  return store.readAll();
}

describe("computeEventHash", () => {
  it("is a 64-char hex digest", () => {
    const [event] = buildChain(1);
    expect(event!.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("depends on the previous hash", () => {
    const [event] = buildChain(1);
    expect(computeEventHash(event!, GENESIS_HASH)).not.toBe(
      computeEventHash(event!, "other"),
    );
  });

  it("ignores payload key order", () => {
    const [event] = buildChain(1);
    const reordered: StoredEvent = {
      ...event!,
      event: {
        ...event!.event,
        payload: { balance: "1", value: "1", from: "0xpayer" },
      },
    };
    expect(computeEventHash(reordered, GENESIS_HASH)).toBe(event!.hash);
  });
});

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("detects a modified payload", () => {
    const events = [...buildChain(3)];
    const tampered = events[1]!;
    events[1] = {
      ...tampered,
      event: { ...tampered.event, payload: { from: "0xpayer", value: "999", balance: "2" } },
    };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors[0]!.position).toBe(2);
    expect(result.lastVerifiedPosition).toBe(1);
  });

  it("detects a removed event", () => {
    const events = buildChain(3);
    const result = verifyHashChain([events[0]!, events[2]!]);

    expect(result.valid).toBe(false);
    expect(result.errors[0]!.reason).toMatch(/previousHash mismatch at position 3/);
  });

  it("holds for any number of appended events", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 25 }), (count) => {
        expect(verifyHashChain(buildChain(count)).valid).toBe(true);
      }),
    );
  });
});
