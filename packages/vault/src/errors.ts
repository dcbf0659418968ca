/**
 * Vault error taxonomy.
 *
 * Thrown errors abort the whole invocation before any state changes.
 * External call failures are never thrown: they are returned as values
 * inside failed outcomes and recorded as failure events.
 */

export type VaultErrorKind =
  | "authorization"
  | "not_found"
  | "state_conflict"
  | "validation";

export type AuthorizationErrorCode = "NOT_OWNER" | "NOT_OPERATOR" | "NOT_SELF";

export type NotFoundErrorCode =
  | "TRANSACTION_NOT_FOUND"
  | "SUBSCRIPTION_NOT_FOUND";

export type StateConflictErrorCode =
  | "ALREADY_CONFIRMED"
  | "NOT_CONFIRMED"
  | "ALREADY_EXECUTED"
  | "THRESHOLD_NOT_MET"
  | "SUBSCRIPTION_EXPIRED"
  | "SUBSCRIPTION_PAUSED"
  | "SUBSCRIPTION_NOT_PAUSED"
  | "NOT_YET_DUE"
  | "EXECUTION_IN_FLIGHT";

export type ValidationErrorCode =
  | "INVALID_OWNER_CONFIGURATION"
  | "OWNER_EXISTS"
  | "OWNER_NOT_FOUND"
  | "INVALID_METADATA"
  | "UNSUPPORTED_VARIANT"
  | "INVALID_PAYLOAD"
  | "INVALID_AMOUNT"
  | "INVALID_DESTINATION";

export type VaultErrorCode =
  | AuthorizationErrorCode
  | NotFoundErrorCode
  | StateConflictErrorCode
  | ValidationErrorCode;

// =============================================================================
// Thrown errors
// =============================================================================

export class VaultError<C extends VaultErrorCode = VaultErrorCode> extends Error {
  public readonly kind: VaultErrorKind;
  public readonly code: C;
  constructor(kind: VaultErrorKind, code: C, message: string) {
    super(message);
    this.name = "VaultError";
    this.kind = kind;
    this.code = code;
  }
}

/** Caller lacks owner, operator or self-authorization standing. */
export class AuthorizationError extends VaultError<AuthorizationErrorCode> {
  constructor(code: AuthorizationErrorCode, message: string) {
    super("authorization", code, message);
    this.name = "AuthorizationError";
  }
}

/** Referenced id was never created. */
export class NotFoundError extends VaultError<NotFoundErrorCode> {
  constructor(code: NotFoundErrorCode, message: string) {
    super("not_found", code, message);
    this.name = "NotFoundError";
  }
}

/** Entity is in the wrong state for the requested transition. */
export class StateConflictError extends VaultError<StateConflictErrorCode> {
  constructor(code: StateConflictErrorCode, message: string) {
    super("state_conflict", code, message);
    this.name = "StateConflictError";
  }
}

/** Malformed input or a configuration that would break an invariant. */
export class ValidationError extends VaultError<ValidationErrorCode> {
  constructor(code: ValidationErrorCode, message: string) {
    super("validation", code, message);
    this.name = "ValidationError";
  }
}

export function isVaultError(err: unknown): err is VaultError {
  return err instanceof VaultError;
}

// =============================================================================
// Non-fatal external call failure
// =============================================================================

export type ExternalCallFailureCode =
  | "CALL_FAILED"
  | "INSUFFICIENT_BALANCE"
  | "FEE_BUDGET_EXCEEDED"
  | "CALL_DEPTH_EXCEEDED"
  | "TRANSFER_REJECTED";

/** An outbound call returned failure. Carried as a value, never thrown. */
export interface ExternalCallFailure {
  readonly code: ExternalCallFailureCode;
  readonly message: string;
}
