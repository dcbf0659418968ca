/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability - tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AccountId } from "@strongbox/types";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { VaultService } from "./services/vault-service.js";
import type { VaultServiceConfig } from "./services/vault-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { UnexpectedErrorSink } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { callerMiddleware } from "./middleware/caller.js";
import { createHealthRoutes } from "./routes/health.js";
import { createOwnerRoutes } from "./routes/owners.js";
import { createTreasuryRoutes } from "./routes/deposits.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createSubscriptionRoutes } from "./routes/subscriptions.js";
import { createEventRoutes } from "./routes/events.js";
import { createTokenRoutes } from "./routes/tokens.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VaultServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives non-domain errors before they become 500 responses. */
  readonly onUnexpectedError?: UnexpectedErrorSink;
  /** API key → account. When provided, callers must authenticate with X-Api-Key. */
  readonly apiKeys?: ReadonlyMap<string, AccountId>;
  /** Expose POST /api/v1/tokens/mint. Off by default. */
  readonly tokenFaucet?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VaultService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no caller required) ─────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", callerMiddleware({ apiKeys: options.apiKeys }));
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/owners", createOwnerRoutes());
  app.route("/api/v1", createTreasuryRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/subscriptions", createSubscriptionRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/tokens", createTokenRoutes({ faucet: options.tokenFaucet ?? false }));

  return { app, service };
}
