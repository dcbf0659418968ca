/**
 * Token routes for the in-process token ledger.
 *
 * GET  /api/v1/tokens/:account  - Token balance and allowance to the vault
 * POST /api/v1/tokens/approve   - Let the vault pull the caller's tokens
 * POST /api/v1/tokens/mint      - Mint tokens (faucet mode only)
 *
 * These let escrow-token and delegated-allowance subscriptions be funded
 * without a real token contract behind the vault.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveTokensSchema, MintTokensSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export interface TokenRouteOptions {
  /** Mount the mint endpoint. Never enable in production. */
  readonly faucet: boolean;
}

export function createTokenRoutes(options: TokenRouteOptions): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  if (options.faucet) {
    routes.post("/mint", validateBody(MintTokensSchema), (c) => {
      const { account, amount } = c.get("validatedBody");
      return c.json({ data: c.get("service").mintTokens(account, amount) }, 201);
    });
  }

  routes.post("/approve", validateBody(ApproveTokensSchema), (c) => {
    const service = c.get("service");
    return c.json({ data: service.approveTokens(c.get("caller"), c.get("validatedBody").amount) });
  });

  routes.get("/:account", (c) => {
    return c.json({ data: c.get("service").getTokenAccount(c.req.param("account")) });
  });

  return routes;
}
