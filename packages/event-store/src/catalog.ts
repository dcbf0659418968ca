/**
 * @strongbox/event-store - Event Catalog.
 *
 * A registry of known event types: what events exist, which component
 * emits them, and a runtime check of their payload shape. Writers
 * validate against the catalog before appending so that a malformed
 * payload never reaches the append-only log.
 */

import type { EventSource } from "@strongbox/types";

export interface EventSchema {
  /** Event type string (e.g., "vault.transaction.submitted") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  validate(payload: unknown): boolean;
}

export type CatalogErrorCode =
  | "DUPLICATE_TYPE"
  | "UNKNOWN_TYPE"
  | "INVALID_PAYLOAD";

export class CatalogError extends Error {
  constructor(
    public readonly code: CatalogErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  register(schema: EventSchema): void {
    if (this._schemas.has(schema.type)) {
      throw new CatalogError(
        "DUPLICATE_TYPE",
        `Event type "${schema.type}" is already registered`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  has(type: string): boolean {
    return this._schemas.has(type);
  }

  get(type: string): EventSchema | undefined {
    return this._schemas.get(type);
  }

  /**
   * Assert that a payload matches the registered schema for its type.
   *
   * @throws CatalogError for unknown types or invalid payloads
   */
  assertValid(type: string, payload: unknown): void {
    const schema = this._schemas.get(type);
    if (schema === undefined) {
      throw new CatalogError("UNKNOWN_TYPE", `Unknown event type "${type}"`);
    }
    if (!schema.validate(payload)) {
      throw new CatalogError(
        "INVALID_PAYLOAD",
        `Payload does not match schema for "${type}" v${schema.version}`,
      );
    }
  }

  types(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  get size(): number {
    return this._schemas.size;
  }
}
