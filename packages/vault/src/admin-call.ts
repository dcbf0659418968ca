/**
 * Admin-call codec.
 *
 * Owner management runs as a transaction addressed to the vault itself.
 * Its payload is one of these calls, rendered as hex of UTF-8 JSON.
 */

import { z } from "zod";
import { isPayload } from "@strongbox/types";
import type { Payload } from "@strongbox/types";
import { ValidationError } from "./errors.js";

const account = z.string().trim().min(1);

export const AdminCallSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("addOwner"), owner: account }),
  z.object({ method: z.literal("removeOwner"), owner: account }),
  z.object({
    method: z.literal("replaceOwner"),
    owner: account,
    newOwner: account,
  }),
  z.object({
    method: z.literal("changeRequirement"),
    required: z.number().int().positive(),
  }),
]);

export type AdminCall = z.infer<typeof AdminCallSchema>;

export function encodeAdminCall(call: AdminCall): Payload {
  const json = JSON.stringify(AdminCallSchema.parse(call));
  return `0x${Buffer.from(json, "utf8").toString("hex")}`;
}

export function decodeAdminCall(payload: Payload): AdminCall {
  if (!isPayload(payload) || payload === "0x") {
    throw new ValidationError("INVALID_PAYLOAD", "Admin call payload is empty or not hex");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(payload.slice(2), "hex").toString("utf8"));
  } catch (err) {
    throw new ValidationError(
      "INVALID_PAYLOAD",
      `Admin call payload is not JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = AdminCallSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      "INVALID_PAYLOAD",
      `Unrecognized admin call: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    );
  }
  return parsed.data;
}
