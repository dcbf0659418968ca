/**
 * Transaction routes.
 *
 * POST /api/v1/transactions              - Submit (and confirm) a transaction
 * GET  /api/v1/transactions              - List by status over an index range
 * GET  /api/v1/transactions/:id          - Get one
 * POST /api/v1/transactions/:id/confirm  - Confirm; executes at threshold
 * POST /api/v1/transactions/:id/revoke   - Withdraw a confirmation
 * POST /api/v1/transactions/:id/execute  - Retry execution
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListTransactionsQuerySchema, SubmitTransactionSchema } from "../types/dto.js";
import { rangePage } from "../types/pagination.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { invalidId, invalidQuery, parseId } from "./params.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SubmitTransactionSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const transaction = service.submitTransaction(
      c.get("caller"),
      body.destination,
      body.value,
      body.payload,
    );
    return c.json({ data: transaction }, 201);
  });

  routes.get("/", (c) => {
    const queryResult = ListTransactionsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return invalidQuery(c, { issues: formatZodErrors(queryResult.error) });
    }
    const query = queryResult.data;
    const { data, total } = c
      .get("service")
      .listTransactions({ from: query.from, to: query.to }, query.pending, query.executed);
    return c.json(rangePage(data, query.from, total));
  });

  routes.get("/:id", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").getTransaction(id) });
  });

  routes.post("/:id/confirm", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").confirmTransaction(c.get("caller"), id) });
  });

  routes.post("/:id/revoke", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").revokeConfirmation(c.get("caller"), id) });
  });

  routes.post("/:id/execute", (c) => {
    const raw = c.req.param("id");
    const id = parseId(raw);
    if (id === undefined) return invalidId(c, raw);
    return c.json({ data: c.get("service").executeTransaction(c.get("caller"), id) });
  });

  return routes;
}
