/**
 * Treasury routes.
 *
 * POST /api/v1/deposits  - Credit native value to the vault
 * GET  /api/v1/balance   - Current vault balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTreasuryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposits", validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const balance = service.deposit(c.get("caller"), c.get("validatedBody").amount);
    return c.json({ data: { balance } }, 201);
  });

  routes.get("/balance", (c) => {
    const service = c.get("service");
    return c.json({ data: { vaultId: service.vaultId, balance: service.balance() } });
  });

  return routes;
}
