/**
 * Runtime Type Guards
 *
 * Narrowing functions for Strongbox primitives.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, external integrations).
 */

import type { AccountId, Payload } from "./account.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Primitive guards
// =============================================================================

const HEX_PAYLOAD = /^0x(?:[0-9a-fA-F]{2})*$/;

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isPayload(value: unknown): value is Payload {
  return typeof value === "string" && HEX_PAYLOAD.test(value);
}

export function isEmptyPayload(payload: Payload): boolean {
  return payload === "0x";
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "owners",
  "transactions",
  "subscriptions",
  "treasury",
]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
