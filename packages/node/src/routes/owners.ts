/**
 * Owner routes.
 *
 * GET  /api/v1/owners            - Current owners and threshold
 * POST /api/v1/owners/proposals  - Propose an owner-management change
 *
 * A proposal is a vault transaction addressed to the vault itself. It
 * takes effect when owners confirm it up to the threshold.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ProposeAdminCallSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createOwnerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").getOwners() });
  });

  routes.post("/proposals", validateBody(ProposeAdminCallSchema), (c) => {
    const service = c.get("service");
    const transaction = service.proposeAdminCall(c.get("caller"), c.get("validatedBody"));
    return c.json({ data: transaction }, 201);
  });

  return routes;
}
