/**
 * Subscription metadata decoding.
 *
 * Metadata arrives as ordered string fields:
 *   [0] external correlation id
 *   [1] expiry timestamp (seconds)
 *   [2] first withdrawal timestamp (seconds)
 *   [3] settlement wallet (delegated-allowance only)
 */

import { z } from "zod";
import type { AccountId } from "@strongbox/types";
import { ValidationError } from "./errors.js";
import type { Settlement, SettlementVariant } from "./types.js";

const timestamp = z
  .string()
  .regex(/^\d+$/, "must be an integer number of seconds")
  .transform(Number)
  .refine(Number.isSafeInteger, "is out of range");

const nonEmpty = z.string().trim().min(1, "must not be empty");

const MetadataSchema = z.object({
  externalId: nonEmpty,
  expires: timestamp,
  firstWithdrawal: timestamp,
});

export interface SubscriptionTerms {
  readonly externalId: string;
  readonly expires: number;
  readonly firstWithdrawal: number;
  readonly settlement: Settlement;
}

export function requiredMetadataFields(variant: SettlementVariant): number {
  return variant === "delegated-allowance" ? 4 : 3;
}

/**
 * Decode and check metadata for a subscription submitted at `now`.
 */
export function decodeSubscriptionMetadata(
  variant: SettlementVariant,
  fields: readonly string[],
  now: number,
): SubscriptionTerms {
  const needed = requiredMetadataFields(variant);
  if (fields.length < needed) {
    throw new ValidationError(
      "INVALID_METADATA",
      `${variant} subscriptions need ${needed} metadata fields, got ${fields.length}`,
    );
  }

  const parsed = MetadataSchema.safeParse({
    externalId: fields[0],
    expires: fields[1],
    firstWithdrawal: fields[2],
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue !== undefined ? `${issue.path.join(".")} ${issue.message}` : "is malformed";
    throw new ValidationError("INVALID_METADATA", `Metadata ${detail}`);
  }

  const { externalId, expires, firstWithdrawal } = parsed.data;
  if (expires <= now) {
    throw new ValidationError(
      "INVALID_METADATA",
      `Expiry ${expires} must be after the current time ${now}`,
    );
  }

  return {
    externalId,
    expires,
    firstWithdrawal,
    settlement: decodeSettlement(variant, fields[3]),
  };
}

function decodeSettlement(
  variant: SettlementVariant,
  walletField: string | undefined,
): Settlement {
  switch (variant) {
    case "direct-escrow":
    case "escrow-token":
      return { variant };
    case "delegated-allowance": {
      const wallet = nonEmpty.safeParse(walletField);
      if (!wallet.success) {
        throw new ValidationError(
          "INVALID_METADATA",
          "Settlement wallet must not be empty",
        );
      }
      const account: AccountId = wallet.data;
      return { variant, wallet: account };
    }
  }
}
