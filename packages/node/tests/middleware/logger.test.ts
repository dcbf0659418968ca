/**
 * Tests for logger and request-id middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, OWNER1 } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("logs one entry per request with the caller", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest("/api/v1/deposits", "POST", { amount: "5" }, OWNER1, { "X-Request-Id": "req-42" }),
    );

    expect(entries).toHaveLength(1);
    const entry = entries[0];
    expect(entry?.method).toBe("POST");
    expect(entry?.path).toBe("/api/v1/deposits");
    expect(entry?.status).toBe(201);
    expect(entry?.requestId).toBe("req-42");
    expect(entry?.caller).toBe(OWNER1);
    expect(entry?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("omits the caller on public routes", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health");

    expect(entries[0]?.caller).toBeUndefined();
  });
});

describe("requestIdMiddleware", () => {
  it("echoes a well-formed request id", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { "X-Request-Id": "trace-7" } });

    expect(res.headers.get("X-Request-Id")).toBe("trace-7");
  });

  it("replaces a malformed request id", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { "X-Request-Id": "bad id with spaces" } });

    const id = res.headers.get("X-Request-Id");
    expect(id).not.toBe("bad id with spaces");
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });
});
