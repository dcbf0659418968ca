/**
 * Type barrel - re-exports all public types from @strongbox/node.
 */

// DTOs
export {
  AccountSchema,
  AmountSchema,
  PayloadSchema,
  PaginationQuerySchema,
  RangeQuerySchema,
  ProposeAdminCallSchema,
  DepositSchema,
  MintTokensSchema,
  ApproveTokensSchema,
  SubmitTransactionSchema,
  ListTransactionsQuerySchema,
  SubmitSubscriptionSchema,
  ListSubscriptionsQuerySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  ProposeAdminCallDto,
  DepositDto,
  MintTokensDto,
  ApproveTokensDto,
  SubmitTransactionDto,
  ListTransactionsQuery,
  SubmitSubscriptionDto,
  ListSubscriptionsQuery,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate, rangePage } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
  RangePaginationMeta,
  RangePaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
