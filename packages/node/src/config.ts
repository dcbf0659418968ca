/**
 * @strongbox/node - Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { AccountId } from "@strongbox/types";
import {
  DEFAULT_CALL_FEE_BUDGET,
  DEFAULT_NOTIFICATION_FEE_BUDGET,
} from "@strongbox/vault";
import type { VaultServiceConfig } from "./services/vault-service.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Vault
  VAULT_ID: z.string().trim().min(1).default("vault"),
  VAULT_OWNERS: z.string().default(""),
  VAULT_REQUIRED: z.coerce.number().int().min(1).default(1),
  VAULT_OPERATORS: z.string().default(""),

  // Auth
  API_KEYS: z.string().default(""),

  // Fee budgets
  CALL_FEE_BUDGET: z.coerce.number().int().min(1).default(DEFAULT_CALL_FEE_BUDGET),
  NOTIFICATION_FEE_BUDGET: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_NOTIFICATION_FEE_BUDGET),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Account Lists
// =============================================================================

/**
 * Parse a comma-separated account list.
 *
 * Format: "0xa,0xb,0xc". Blank input yields an empty list.
 */
export function parseAccountList(raw: string, name: string): readonly AccountId[] {
  if (raw.trim() === "") {
    return [];
  }

  const accounts: AccountId[] = [];
  for (const entry of raw.split(",")) {
    const account = entry.trim();
    if (account === "") {
      throw new Error(`Empty entry in ${name}: "${raw}"`);
    }
    if (accounts.includes(account)) {
      throw new Error(`Duplicate account "${account}" in ${name}`);
    }
    accounts.push(account);
  }
  return accounts;
}

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly accountId: AccountId;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:account1,key2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, accountId] = parts;
    if (parts.length !== 2 || key === undefined || accountId === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:accountId`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (accountId === "") {
      throw new Error("Account ID cannot be empty in API_KEYS");
    }
    if (keys.some((k) => k.key === key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }

    keys.push({ key, accountId });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Derive the vault service configuration. Owner-set validity
 * (threshold against owner count) is left to the vault itself.
 */
export function toServiceConfig(config: AppConfig): VaultServiceConfig {
  return {
    vaultId: config.VAULT_ID,
    owners: parseAccountList(config.VAULT_OWNERS, "VAULT_OWNERS"),
    required: config.VAULT_REQUIRED,
    operators: parseAccountList(config.VAULT_OPERATORS, "VAULT_OPERATORS"),
    callFeeBudget: config.CALL_FEE_BUDGET,
    notificationFeeBudget: config.NOTIFICATION_FEE_BUDGET,
  };
}
