/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Vault errors keep their
 * own code; the HTTP status follows the error's kind.
 */

import type { Context } from "hono";
import { isVaultError } from "@strongbox/vault";
import type { VaultErrorKind } from "@strongbox/vault";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP = {
  authorization: 403,
  not_found: 404,
  state_conflict: 409,
  validation: 400,
} as const satisfies Record<VaultErrorKind, number>;

export function statusForKind(kind: VaultErrorKind): 400 | 403 | 404 | 409 {
  return STATUS_MAP[kind];
}

// =============================================================================
// Handler
// =============================================================================

/** Receives errors that are not vault errors, before the 500 goes out. */
export type UnexpectedErrorSink = (err: Error, requestId: string) => void;

/**
 * Build the handler registered with Hono's `onError`.
 */
export function createErrorHandler(
  onUnexpected?: UnexpectedErrorSink,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    if (isVaultError(err)) {
      return c.json(createErrorEnvelope(err.code, err.message), statusForKind(err.kind));
    }

    onUnexpected?.(err, c.get("requestId"));
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
