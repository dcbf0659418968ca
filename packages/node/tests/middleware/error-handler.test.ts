/**
 * Tests for the error handler.
 *
 * Verifies vault errors map to HTTP status by kind and that
 * unexpected errors are reported but not leaked.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";
import { statusForKind } from "../../src/middleware/error-handler.js";

describe("statusForKind", () => {
  it("maps each kind", () => {
    expect(statusForKind("authorization")).toBe(403);
    expect(statusForKind("not_found")).toBe(404);
    expect(statusForKind("state_conflict")).toBe(409);
    expect(statusForKind("validation")).toBe(400);
  });
});

describe("error handler", () => {
  it("hides unexpected errors behind a 500 and reports them", async () => {
    const reported: { message: string; requestId: string }[] = [];
    const { app } = createTestApp({
      onUnexpectedError: (err, requestId) => reported.push({ message: err.message, requestId }),
    });
    app.get("/boom", () => {
      throw new Error("database on fire");
    });

    const res = await app.request(
      jsonRequest("/boom", "GET", undefined, undefined, { "X-Request-Id": "req-1" }),
    );

    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
    expect(reported).toEqual([{ message: "database on fire", requestId: "req-1" }]);
  });

  it("rejects malformed JSON bodies", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      new Request("http://localhost/api/v1/deposits", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Caller-Id": "0xowner1" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
    });
  });
});
