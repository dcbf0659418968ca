/**
 * Tests for pagination utilities - encodeCursor, decodeCursor, paginate, rangePage.
 */

import { describe, it, expect } from "vitest";
import { encodeCursor, decodeCursor, paginate, rangePage } from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads what encodeCursor writes", () => {
    expect(decodeCursor(encodeCursor("globalPosition", 12))).toEqual({
      field: "globalPosition",
      value: 12,
    });
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined for a string position", () => {
    const stringValue = Buffer.from(JSON.stringify({ f: "globalPosition", v: "3" })).toString(
      "base64url",
    );
    expect(decodeCursor(stringValue)).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    const num = Buffer.from(JSON.stringify(42)).toString("base64url");
    expect(decodeCursor(num)).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

const items = Array.from({ length: 12 }, (_, i) => ({ position: i + 1 }));
const position = (item: { position: number }): number => item.position;

describe("paginate", () => {
  it("returns the first page with a cursor", () => {
    const result = paginate(items, { limit: 5 }, position, "position");

    expect(result.data.map(position)).toEqual([1, 2, 3, 4, 5]);
    expect(result.pagination).toEqual({ cursor: encodeCursor("position", 5), hasMore: true });
  });

  it("orders numerically past single digits", () => {
    const result = paginate(
      items,
      { limit: 5, cursor: encodeCursor("position", 9) },
      position,
      "position",
    );

    expect(result.data.map(position)).toEqual([10, 11, 12]);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores a cursor minted for another field", () => {
    const result = paginate(
      items,
      { limit: 2, cursor: encodeCursor("version", 9) },
      position,
      "position",
    );

    expect(result.data.map(position)).toEqual([1, 2]);
  });

  it("handles an empty list", () => {
    expect(paginate([], { limit: 5 }, position, "position")).toEqual({
      data: [],
      pagination: { cursor: null, hasMore: false },
    });
  });
});

// =============================================================================
// rangePage
// =============================================================================

describe("rangePage", () => {
  it("reports more items past the slice", () => {
    expect(rangePage(["b", "c"], 1, 5)).toEqual({
      data: ["b", "c"],
      pagination: { from: 1, to: 3, total: 5, hasMore: true },
    });
  });

  it("reports the end of the list", () => {
    expect(rangePage(["d"], 3, 4).pagination).toEqual({ from: 3, to: 4, total: 4, hasMore: false });
  });

  it("handles a start past the end", () => {
    expect(rangePage([], 9, 2).pagination).toEqual({ from: 9, to: 9, total: 2, hasMore: false });
  });
});
