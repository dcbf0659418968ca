/**
 * @strongbox/types - Shared domain primitives for the Strongbox stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types - meaning lives in consuming code
 */

// Account primitives
export type { AccountId, Payload } from "./account.js";
export { EMPTY_PAYLOAD } from "./account.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAccountId,
  isPayload,
  isEmptyPayload,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
