/**
 * Tests for deposit and balance routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, MERCHANT, OWNER1 } from "../setup.js";
import type { ErrorBody } from "../setup.js";

describe("POST /api/v1/deposits", () => {
  it("credits the vault and returns the new balance", async () => {
    const { app } = createTestApp();

    const first = await app.request(jsonRequest("/api/v1/deposits", "POST", { amount: "250" }, MERCHANT));
    expect(first.status).toBe(201);
    expect(await first.json()).toEqual({ data: { balance: "250" } });

    const second = await app.request(jsonRequest("/api/v1/deposits", "POST", { amount: "50" }, OWNER1));
    expect(await second.json()).toEqual({ data: { balance: "300" } });
  });

  it("keeps amounts beyond the safe integer range exact", async () => {
    const { app } = createTestApp();
    const amount = "123456789012345678901234567890";

    const res = await app.request(jsonRequest("/api/v1/deposits", "POST", { amount }, OWNER1));

    expect(await res.json()).toEqual({ data: { balance: amount } });
  });

  it("returns 400 for a zero deposit", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/deposits", "POST", { amount: "0" }, OWNER1));

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "INVALID_AMOUNT", message: "Deposit must be positive, got 0" });
  });

  it("returns 400 for a numeric amount", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/deposits", "POST", { amount: 10 }, OWNER1));

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/balance", () => {
  it("starts at zero", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/balance", "GET", undefined, OWNER1));

    expect(await res.json()).toEqual({ data: { vaultId: "0xvault", balance: "0" } });
  });
});
