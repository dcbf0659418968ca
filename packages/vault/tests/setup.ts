/**
 * Shared fixtures for vault tests.
 */

import {
  Vault,
  ManualClock,
  InMemoryTokenLedger,
  StaticSubscriptionRegistry,
} from "../src/index.js";
import type { SubscriptionRequest, VaultConfig } from "../src/index.js";

export const VAULT = "0xvault";
export const OWNER1 = "0xowner1";
export const OWNER2 = "0xowner2";
export const OWNER3 = "0xowner3";
export const OPERATOR = "0xoperator";
export const MERCHANT = "0xmerchant";
export const START = 1_700_000_000;

export interface TestVault {
  readonly vault: Vault;
  readonly clock: ManualClock;
  readonly registry: StaticSubscriptionRegistry;
  readonly token: InMemoryTokenLedger;
}

export function createTestVault(overrides: Partial<VaultConfig> = {}): TestVault {
  const clock = new ManualClock(START);
  const registry = new StaticSubscriptionRegistry([OPERATOR]);
  const token = new InMemoryTokenLedger(VAULT);
  const vault = new Vault({
    vaultId: VAULT,
    owners: [OWNER1, OWNER2, OWNER3],
    required: 2,
    clock,
    registry,
    token,
    ...overrides,
  });
  return { vault, clock, registry, token };
}

export function eventTypes(vault: Vault): string[] {
  return vault.events.readAll().map((e) => e.event.type);
}

/** A direct-escrow request for 100 every 30s, due now, expiring in an hour. */
export function subscriptionRequest(
  overrides: Partial<SubscriptionRequest> = {},
): SubscriptionRequest {
  return {
    destination: MERCHANT,
    recipient: MERCHANT,
    value: 100n,
    period: 30,
    variant: "direct-escrow",
    payload: "0x",
    metadata: ["ext-1", String(START + 3600), String(START)],
    ...overrides,
  };
}
