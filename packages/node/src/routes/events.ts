/**
 * Event query routes.
 *
 * GET /api/v1/events            - List journal events (cursor pagination)
 * GET /api/v1/events/integrity  - Verify the hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { formatZodErrors } from "../middleware/validate.js";
import { invalidQuery } from "./params.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return invalidQuery(c, { issues: formatZodErrors(queryResult.error) });
    }

    const query = queryResult.data;
    const events = c.get("service").readEvents(query.afterPosition, query.type);

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json(result);
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyIntegrity() });
  });

  return routes;
}
