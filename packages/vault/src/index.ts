/**
 * @strongbox/vault - Multi-party authorization vault.
 *
 * Two ledgers share one owner set and one treasury:
 * - Transactions: one-off transfers executed at owner quorum
 * - Subscriptions: recurring withdrawals triggered by operators
 *
 * Design rules:
 * - Authorization and validation happen before any state changes
 * - External calls report success or failure, never throw
 * - Every transition is journaled to a hash-chained event store
 * - Owner management only runs through executed vault transactions
 */

// Top-level vault
export { Vault, ADMIN_CALL_COST } from "./vault.js";

// Components
export { OwnerSet, MAX_OWNER_COUNT, assertValidRequirement } from "./owner-set.js";
export type { OwnerChange } from "./owner-set.js";
export { TransactionLedger } from "./transaction-ledger.js";
export type { TransactionLedgerDeps } from "./transaction-ledger.js";
export { SubscriptionLedger } from "./subscription-ledger.js";
export type { SubscriptionLedgerDeps } from "./subscription-ledger.js";
export { NotificationRelay } from "./notification-relay.js";
export { VaultTreasury } from "./treasury.js";
export { VaultJournal, streamIdFor } from "./journal.js";
export type { JournalEntity, VaultEventPayloads } from "./journal.js";

// External calls
export {
  ExternalCallGateway,
  PrincipalDirectory,
  BalanceSheet,
  FeeMeter,
  FeeBudgetExceededError,
  MAX_CALL_DEPTH,
} from "./external-call.js";
export type { CallOutcome, InboundCall, PrincipalHandler } from "./external-call.js";

// Collaborators
export type {
  SubscriptionRegistry,
  TokenService,
  NewSubscriptionNotice,
  PaymentNotice,
} from "./collaborators.js";
export {
  InMemoryTokenLedger,
  StaticSubscriptionRegistry,
} from "./in-memory-collaborators.js";

// Codecs
export { encodeAdminCall, decodeAdminCall, AdminCallSchema } from "./admin-call.js";
export type { AdminCall } from "./admin-call.js";
export { decodeSubscriptionMetadata, requiredMetadataFields } from "./metadata.js";
export type { SubscriptionTerms } from "./metadata.js";

// Clock
export { systemClock, ManualClock, toIsoTimestamp } from "./clock.js";
export type { Clock } from "./clock.js";

// Errors
export {
  VaultError,
  AuthorizationError,
  NotFoundError,
  StateConflictError,
  ValidationError,
  isVaultError,
} from "./errors.js";
export type {
  VaultErrorKind,
  VaultErrorCode,
  AuthorizationErrorCode,
  NotFoundErrorCode,
  StateConflictErrorCode,
  ValidationErrorCode,
  ExternalCallFailure,
  ExternalCallFailureCode,
} from "./errors.js";

// Types
export type {
  CallContext,
  Transaction,
  ExecutionOutcome,
  SettlementVariant,
  Settlement,
  Subscription,
  SubscriptionRequest,
  SubscriptionOutcome,
  SubmittedSubscription,
  VaultConfig,
} from "./types.js";
export {
  SETTLEMENT_VARIANTS,
  DEFAULT_CALL_FEE_BUDGET,
  DEFAULT_NOTIFICATION_FEE_BUDGET,
} from "./types.js";
