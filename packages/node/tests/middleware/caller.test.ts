/**
 * Tests for caller identity middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, OWNER1, OWNER2 } from "../setup.js";
import type { ErrorBody } from "../setup.js";
import type { OwnersView, TransactionView } from "../../src/services/vault-service.js";

describe("callerMiddleware (API keys)", () => {
  const apiKeys = new Map([
    ["key-one", OWNER1],
    ["key-two", OWNER2],
  ]);

  it("acts as the account bound to the key", async () => {
    const { app } = createTestApp({ apiKeys });

    const res = await app.request(
      jsonRequest("/api/v1/transactions", "POST", { destination: "0xdest" }, undefined, {
        "X-Api-Key": "key-two",
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: TransactionView };
    expect(body.data.submittedBy).toBe(OWNER2);
  });

  it("ignores X-Caller-Id when keys are configured", async () => {
    const { app } = createTestApp({ apiKeys });

    const res = await app.request(jsonRequest("/api/v1/owners", "GET", undefined, OWNER1));

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("rejects an unknown key", async () => {
    const { app } = createTestApp({ apiKeys });

    const res = await app.request(
      jsonRequest("/api/v1/owners", "GET", undefined, undefined, { "X-Api-Key": "nope" }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Invalid API key" });
  });
});

describe("callerMiddleware (unsecured)", () => {
  it("trusts X-Caller-Id", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/owners", "GET", undefined, "0xanyone"));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: OwnersView };
    expect(body.data.required).toBe(2);
  });

  it("rejects a blank caller id", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/owners", "GET", undefined, "   "));

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "UNAUTHORIZED",
      message: "X-Caller-Id header is required",
    });
  });
});
