/**
 * Path parameter helpers shared by the ledger routes.
 */

import type { Context } from "hono";
import { createErrorEnvelope } from "../types/error.js";

const ID_PATTERN = /^\d+$/;

/** Parse `:id` as a non-negative safe integer, or undefined. */
export function parseId(raw: string): number | undefined {
  if (!ID_PATTERN.test(raw)) return undefined;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : undefined;
}

export function invalidId(c: Context, raw: string): Response {
  return c.json(createErrorEnvelope("VALIDATION_ERROR", `Invalid id '${raw}'`), 400);
}

export function invalidQuery(c: Context, details?: Record<string, unknown>): Response {
  return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", details), 400);
}
