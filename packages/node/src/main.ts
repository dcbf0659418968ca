/**
 * @strongbox/node - Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { pathToFileURL } from "node:url";
import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys, toServiceConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { VaultService } from "./services/vault-service.js";
export type {
  VaultServiceConfig,
  OwnersView,
  TransactionView,
  SubscriptionView,
  TransactionResult,
  SubscriptionResult,
  SubmittedSubscriptionResult,
  TokenAccountView,
  IdRange,
  ListResult,
} from "./services/vault-service.js";
export {
  loadConfig,
  parseApiKeys,
  parseAccountList,
  toServiceConfig,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const parsedKeys = parseApiKeys(config.API_KEYS);
  let apiKeys: Map<string, string> | undefined;
  if (parsedKeys.length > 0) {
    apiKeys = new Map(parsedKeys.map((k) => [k.key, k.accountId]));
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured - trusting X-Caller-Id (unsecured mode)");
  }

  const { app, service } = createApp({
    serviceConfig: { ...toServiceConfig(config), logger },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
    ...(apiKeys !== undefined ? { apiKeys } : {}),
    tokenFaucet: config.NODE_ENV !== "production",
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      vaultId: service.vaultId,
      owners: service.getOwners().owners.length,
      required: service.getOwners().required,
    },
    "Strongbox node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
        process.exit(1);
      }
      logger.info({ events: service.verifyIntegrity().lastVerifiedPosition }, "Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Only run when executed directly (not when imported)
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
}
