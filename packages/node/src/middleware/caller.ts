/**
 * Caller identity middleware.
 *
 * Every vault operation runs on behalf of an account. Two strategies:
 * 1. Secured: X-Api-Key is looked up in the configured key registry
 * 2. Unsecured (development, tests): X-Caller-Id names the account directly
 *
 * On success, sets `c.set("caller", accountId)`. On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import { isAccountId } from "@strongbox/types";
import type { AccountId } from "@strongbox/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_ID_HEADER = "X-Caller-Id";

export interface CallerConfig {
  /** Map of API key → account. When absent, X-Caller-Id is trusted. */
  readonly apiKeys?: ReadonlyMap<string, AccountId> | undefined;
}

export function callerMiddleware(config: CallerConfig): MiddlewareHandler<AppEnv> {
  const apiKeys = config.apiKeys;

  return async (c, next) => {
    if (apiKeys !== undefined) {
      const key = c.req.header(API_KEY_HEADER);
      if (key === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
      }
      const account = apiKeys.get(key);
      if (account === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      c.set("caller", account);
      return next();
    }

    const callerId = c.req.header(CALLER_ID_HEADER);
    if (callerId === undefined || !isAccountId(callerId)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${CALLER_ID_HEADER} header is required`),
        401,
      );
    }
    c.set("caller", callerId.trim());
    return next();
  };
}
