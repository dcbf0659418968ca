/**
 * Tests for subscription routes.
 *
 * Covers: create (with and without a first cycle), execute by operators,
 * cancel, pause/resume, listing and token settlement.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestApp,
  jsonRequest,
  MERCHANT,
  OPERATOR,
  OWNER1,
  OWNER2,
  START,
  VAULT,
} from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";
import type {
  SubmittedSubscriptionResult,
  SubscriptionResult,
  SubscriptionView,
} from "../../src/services/vault-service.js";

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

function subscriptionBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    destination: MERCHANT,
    recipient: MERCHANT,
    value: "100",
    period: 30,
    variant: "direct-escrow",
    metadata: ["ext-1", String(START + 3600), String(START)],
    ...overrides,
  };
}

async function create(
  overrides: Record<string, unknown> = {},
): Promise<SubmittedSubscriptionResult> {
  const res = await instance.app.request(
    jsonRequest("/api/v1/subscriptions", "POST", subscriptionBody(overrides), OWNER1),
  );
  const body = (await res.json()) as { data: SubmittedSubscriptionResult };
  return body.data;
}

function post(path: string, caller: string): Promise<Response> {
  return Promise.resolve(instance.app.request(jsonRequest(path, "POST", undefined, caller)));
}

// =============================================================================
// POST /api/v1/subscriptions - Create
// =============================================================================

describe("POST /api/v1/subscriptions", () => {
  it("runs the first cycle when funded at creation", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/subscriptions", "POST", subscriptionBody({ attachedValue: "100" }), OWNER1),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: SubmittedSubscriptionResult };
    expect(body.data.firstExecution).toEqual({ status: "executed", cycle: 1 });
    expect(body.data.subscription).toEqual({
      id: 0,
      destination: MERCHANT,
      recipient: MERCHANT,
      value: "100",
      period: 30,
      settlement: { variant: "direct-escrow" },
      externalId: "ext-1",
      payload: "0x",
      created: START,
      expires: START + 3600,
      cycle: 1,
      withdrawPrev: START,
      withdrawNext: START + 30,
      paused: false,
      expired: false,
    });
    expect(instance.service.registry.newSubscriptions).toHaveLength(1);
    expect(instance.service.registry.payments).toHaveLength(1);
  });

  it("skips the first cycle when nothing can pay for it", async () => {
    const result = await create();

    expect(result.firstExecution).toBeNull();
    expect(result.subscription.cycle).toBe(0);
    expect(result.subscription.withdrawNext).toBe(START);
  });

  it("keeps the delegated wallet in the settlement", async () => {
    const result = await create({
      variant: "delegated-allowance",
      metadata: ["ext-2", String(START + 3600), String(START + 60), "0xpayer"],
    });

    expect(result.firstExecution).toBeNull();
    expect(result.subscription.settlement).toEqual({
      variant: "delegated-allowance",
      wallet: "0xpayer",
    });
    expect(result.subscription.withdrawNext).toBe(START + 60);
  });

  it("returns 400 for an unknown variant", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/subscriptions", "POST", subscriptionBody({ variant: "wire" }), OWNER1),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("returns 400 INVALID_METADATA for missing fields", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/subscriptions", "POST", subscriptionBody({ metadata: ["ext-1"] }), OWNER1),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "INVALID_METADATA",
      message: "direct-escrow subscriptions need 3 metadata fields, got 1",
    });
  });
});

// =============================================================================
// POST /api/v1/subscriptions/:id/execute
// =============================================================================

describe("POST /api/v1/subscriptions/:id/execute", () => {
  beforeEach(async () => {
    await create({ attachedValue: "100" });
  });

  it("returns 409 before the next withdrawal is due", async () => {
    const res = await post("/api/v1/subscriptions/0/execute", OPERATOR);

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "NOT_YET_DUE",
      message: `Subscription 0 is not due until ${START + 30}`,
    });
  });

  it("reports an unfunded cycle as failed and leaves the schedule alone", async () => {
    instance.clock.advance(30);

    const res = await post("/api/v1/subscriptions/0/execute", OPERATOR);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: SubscriptionResult };
    expect(body.data.outcome).toEqual({
      status: "failed",
      failure: { code: "INSUFFICIENT_BALANCE", message: "Vault balance 0 cannot cover 100" },
    });
    expect(body.data.subscription.cycle).toBe(1);
    expect(body.data.subscription.withdrawNext).toBe(START + 30);
  });

  it("advances the schedule on a funded cycle", async () => {
    instance.clock.advance(30);
    await instance.app.request(jsonRequest("/api/v1/deposits", "POST", { amount: "100" }, OWNER1));

    const res = await post("/api/v1/subscriptions/0/execute", OPERATOR);

    const body = (await res.json()) as { data: SubscriptionResult };
    expect(body.data.outcome).toEqual({ status: "executed", cycle: 2 });
    expect(body.data.subscription.withdrawPrev).toBe(START + 30);
    expect(body.data.subscription.withdrawNext).toBe(START + 60);
  });

  it("returns 403 for accounts that are neither owner nor operator", async () => {
    instance.clock.advance(30);

    const res = await post("/api/v1/subscriptions/0/execute", "0xstranger");

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_OPERATOR");
  });
});

// =============================================================================
// Cancel / Pause / Resume
// =============================================================================

describe("subscription controls", () => {
  beforeEach(async () => {
    await create();
  });

  it("cancels by expiring now", async () => {
    const res = await post("/api/v1/subscriptions/0/cancel", OWNER2);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: SubscriptionView };
    expect(body.data.expires).toBe(START);
    expect(body.data.expired).toBe(true);

    const execute = await post("/api/v1/subscriptions/0/execute", OPERATOR);
    expect(execute.status).toBe(409);
    const error = (await execute.json()) as ErrorBody;
    expect(error.error.code).toBe("SUBSCRIPTION_EXPIRED");
  });

  it("only lets owners cancel", async () => {
    const res = await post("/api/v1/subscriptions/0/cancel", OPERATOR);

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NOT_OWNER");
  });

  it("blocks execution while paused", async () => {
    const paused = await post("/api/v1/subscriptions/0/pause", OWNER1);
    const body = (await paused.json()) as { data: SubscriptionView };
    expect(body.data.paused).toBe(true);

    const execute = await post("/api/v1/subscriptions/0/execute", OPERATOR);
    expect(execute.status).toBe(409);
    const error = (await execute.json()) as ErrorBody;
    expect(error.error.code).toBe("SUBSCRIPTION_PAUSED");
  });

  it("resumes a paused subscription once", async () => {
    await post("/api/v1/subscriptions/0/pause", OWNER1);

    const resumed = await post("/api/v1/subscriptions/0/resume", OWNER2);
    const body = (await resumed.json()) as { data: SubscriptionView };
    expect(body.data.paused).toBe(false);

    const again = await post("/api/v1/subscriptions/0/resume", OWNER2);
    expect(again.status).toBe(409);
    const error = (await again.json()) as ErrorBody;
    expect(error.error.code).toBe("SUBSCRIPTION_NOT_PAUSED");
  });

  it("returns 404 for an unknown subscription", async () => {
    const res = await post("/api/v1/subscriptions/9/pause", OWNER1);

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "SUBSCRIPTION_NOT_FOUND",
      message: "Subscription 9 not found",
    });
  });
});

// =============================================================================
// GET /api/v1/subscriptions - List
// =============================================================================

describe("GET /api/v1/subscriptions", () => {
  beforeEach(async () => {
    await create();
    await create({ metadata: ["ext-2", String(START + 3600), String(START)] });
    await post("/api/v1/subscriptions/1/cancel", OWNER1);
  });

  async function listIds(query: string): Promise<{ ids: number[]; total: number }> {
    const res = await instance.app.request(
      jsonRequest(`/api/v1/subscriptions${query}`, "GET", undefined, OPERATOR),
    );
    const body = (await res.json()) as { data: SubscriptionView[]; pagination: { total: number } };
    return { ids: body.data.map((s) => s.id), total: body.pagination.total };
  }

  it("lists every subscription by default", async () => {
    expect(await listIds("")).toEqual({ ids: [0, 1], total: 2 });
  });

  it("filters withdrawable subscriptions", async () => {
    expect(await listIds("?expired=false")).toEqual({ ids: [0], total: 1 });
  });

  it("filters expired subscriptions", async () => {
    expect(await listIds("?withdrawable=false")).toEqual({ ids: [1], total: 1 });
  });
});

// =============================================================================
// Token settlement
// =============================================================================

describe("escrow-token subscriptions", () => {
  it("pays from the vault's token balance", async () => {
    const created = await create({ variant: "escrow-token" });
    expect(created.firstExecution).toBeNull();

    instance.service.token.mint(VAULT, 500n);
    const res = await post("/api/v1/subscriptions/0/execute", OPERATOR);

    const body = (await res.json()) as { data: SubscriptionResult };
    expect(body.data.outcome).toEqual({ status: "executed", cycle: 1 });
    expect(instance.service.token.balanceOf(MERCHANT)).toBe(100n);
    expect(instance.service.token.balanceOf(VAULT)).toBe(400n);
  });
});
