/**
 * Account and payload primitives.
 *
 * Accounts are opaque identifiers (addresses, handles); the vault never
 * interprets them beyond equality. Payloads are 0x-prefixed hex strings
 * carried verbatim to the invoked principal.
 */

/** Identifier of an owner, operator, destination or the vault itself. */
export type AccountId = string;

/** Opaque call data, `0x`-prefixed hex. `"0x"` is the empty payload. */
export type Payload = string;

export const EMPTY_PAYLOAD: Payload = "0x";
