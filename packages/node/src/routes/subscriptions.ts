/**
 * Subscription routes.
 *
 * POST /api/v1/subscriptions              - Create a subscription
 * GET  /api/v1/subscriptions              - List by status over an index range
 * GET  /api/v1/subscriptions/:id          - Get one
 * POST /api/v1/subscriptions/:id/execute  - Run the due cycle (operators)
 * POST /api/v1/subscriptions/:id/cancel   - Cancel (owners)
 * POST /api/v1/subscriptions/:id/pause    - Pause (owners)
 * POST /api/v1/subscriptions/:id/resume   - Resume (owners)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListSubscriptionsQuerySchema, SubmitSubscriptionSchema } from "../types/dto.js";
import { rangePage } from "../types/pagination.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { invalidId, invalidQuery, parseId } from "./params.js";

export function createSubscriptionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SubmitSubscriptionSchema), (c) => {
    const service = c.get("service");
    const { attachedValue, ...request } = c.get("validatedBody");
    const result = service.submitSubscription(c.get("caller"), request, attachedValue);
    return c.json({ data: result }, 201);
  });

  routes.get("/", (c) => {
    const queryResult = ListSubscriptionsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return invalidQuery(c, { issues: formatZodErrors(queryResult.error) });
    }
    const query = queryResult.data;
    const { data, total } = c
      .get("service")
      .listSubscriptions({ from: query.from, to: query.to }, query.withdrawable, query.expired);
    return c.json(rangePage(data, query.from, total));
  });

  routes.get("/:id", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").getSubscription(id) });
  });

  routes.post("/:id/execute", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").executeSubscription(c.get("caller"), id) });
  });

  routes.post("/:id/cancel", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").cancelSubscription(c.get("caller"), id) });
  });

  routes.post("/:id/pause", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").pauseSubscription(c.get("caller"), id) });
  });

  routes.post("/:id/resume", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").resumeSubscription(c.get("caller"), id) });
  });

  return routes;
}
