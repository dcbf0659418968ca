/**
 * Tests for config.ts - parseAccountList, parseApiKeys, loadConfig.
 */

import { describe, it, expect } from "vitest";
import {
  parseAccountList,
  parseApiKeys,
  loadConfig,
  toServiceConfig,
} from "../src/config.js";

// =============================================================================
// parseAccountList
// =============================================================================

describe("parseAccountList", () => {
  it("returns empty array for blank input", () => {
    expect(parseAccountList("", "VAULT_OWNERS")).toEqual([]);
    expect(parseAccountList("  ", "VAULT_OWNERS")).toEqual([]);
  });

  it("splits and trims entries", () => {
    expect(parseAccountList(" 0xa, 0xb ,0xc", "VAULT_OWNERS")).toEqual(["0xa", "0xb", "0xc"]);
  });

  it("throws on an empty entry", () => {
    expect(() => parseAccountList("0xa,,0xb", "VAULT_OWNERS")).toThrow(
      'Empty entry in VAULT_OWNERS: "0xa,,0xb"',
    );
  });

  it("throws on a duplicate", () => {
    expect(() => parseAccountList("0xa,0xa", "VAULT_OPERATORS")).toThrow(
      'Duplicate account "0xa" in VAULT_OPERATORS',
    );
  });
});

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses multiple comma-separated entries", () => {
    expect(parseApiKeys("k1:0xowner1, k2:0xoperator")).toEqual([
      { key: "k1", accountId: "0xowner1" },
      { key: "k2", accountId: "0xoperator" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or account", () => {
    expect(() => parseApiKeys(":0xowner1")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow("Account ID cannot be empty in API_KEYS");
  });

  it("throws on a repeated key", () => {
    expect(() => parseApiKeys("k1:0xa,k1:0xb")).toThrow('Duplicate API key in API_KEYS: "k1"');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.VAULT_ID).toBe("vault");
    expect(config.VAULT_REQUIRED).toBe(1);
    expect(config.CALL_FEE_BUDGET).toBe(1_000_000);
    expect(config.NOTIFICATION_FEE_BUDGET).toBe(50_000);
  });

  it("coerces numeric values", () => {
    const config = loadConfig({ PORT: "8080", VAULT_REQUIRED: "2", CALL_FEE_BUDGET: "5000" });

    expect(config.PORT).toBe(8080);
    expect(config.VAULT_REQUIRED).toBe(2);
    expect(config.CALL_FEE_BUDGET).toBe(5000);
  });

  it("rejects an invalid log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
  });

  it("rejects a zero threshold", () => {
    expect(() => loadConfig({ VAULT_REQUIRED: "0" })).toThrow();
  });
});

describe("toServiceConfig", () => {
  it("parses owner and operator lists", () => {
    const config = loadConfig({
      VAULT_ID: "0xvault",
      VAULT_OWNERS: "0xowner1,0xowner2",
      VAULT_REQUIRED: "2",
      VAULT_OPERATORS: "0xoperator",
    });

    expect(toServiceConfig(config)).toEqual({
      vaultId: "0xvault",
      owners: ["0xowner1", "0xowner2"],
      required: 2,
      operators: ["0xoperator"],
      callFeeBudget: 1_000_000,
      notificationFeeBudget: 50_000,
    });
  });
});
