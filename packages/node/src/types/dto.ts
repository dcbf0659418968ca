/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation. Amounts travel
 * as decimal strings and are parsed to bigint here.
 */

import { z } from "zod";
import { isPayload } from "@strongbox/types";
import { AdminCallSchema, SETTLEMENT_VARIANTS } from "@strongbox/vault";
import type { SettlementVariant } from "@strongbox/vault";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AccountSchema = z.string().trim().min(1).max(256);

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer string")
  .transform((v) => BigInt(v));

export const PayloadSchema = z
  .string()
  .refine(isPayload, "must be 0x-prefixed hex with whole bytes");

const VariantSchema = z.custom<SettlementVariant>(
  (v) => typeof v === "string" && SETTLEMENT_VARIANTS.some((variant) => variant === v),
  { message: `must be one of: ${SETTLEMENT_VARIANTS.join(", ")}` },
);

const BooleanQuerySchema = z
  .enum(["true", "false"])
  .default("true")
  .transform((v) => v === "true");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const RangeQuerySchema = z.object({
  from: z.coerce.number().int().min(0).default(0),
  to: z.coerce.number().int().min(0).optional(),
});

// =============================================================================
// Owner DTOs
// =============================================================================

export const ProposeAdminCallSchema = AdminCallSchema;

export type ProposeAdminCallDto = z.infer<typeof ProposeAdminCallSchema>;

// =============================================================================
// Deposit DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

// =============================================================================
// Token DTOs
// =============================================================================

export const MintTokensSchema = z.object({
  account: AccountSchema,
  amount: AmountSchema,
});

export type MintTokensDto = z.infer<typeof MintTokensSchema>;

/** Allowance the caller grants the vault over its own tokens. */
export const ApproveTokensSchema = z.object({
  amount: AmountSchema,
});

export type ApproveTokensDto = z.infer<typeof ApproveTokensSchema>;

// =============================================================================
// Transaction DTOs
// =============================================================================

export const SubmitTransactionSchema = z.object({
  destination: AccountSchema,
  value: AmountSchema.default("0"),
  payload: PayloadSchema.default("0x"),
});

export type SubmitTransactionDto = z.infer<typeof SubmitTransactionSchema>;

export const ListTransactionsQuerySchema = RangeQuerySchema.extend({
  pending: BooleanQuerySchema,
  executed: BooleanQuerySchema,
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

// =============================================================================
// Subscription DTOs
// =============================================================================

export const SubmitSubscriptionSchema = z.object({
  destination: AccountSchema,
  recipient: AccountSchema,
  value: AmountSchema,
  period: z.number().int(),
  variant: VariantSchema,
  payload: PayloadSchema.default("0x"),
  metadata: z.array(z.string()).max(16),
  /** Native value attached to the submission, credited to the vault. */
  attachedValue: AmountSchema.default("0"),
});

export type SubmitSubscriptionDto = z.infer<typeof SubmitSubscriptionSchema>;

export const ListSubscriptionsQuerySchema = RangeQuerySchema.extend({
  withdrawable: BooleanQuerySchema,
  expired: BooleanQuerySchema,
});

export type ListSubscriptionsQuery = z.infer<typeof ListSubscriptionsQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
