/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { field, value }.
 * Cursor-paged endpoints return { data, pagination: { cursor, hasMore } };
 * index-range endpoints return { data, pagination: { from, to, total, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

export interface RangePaginationMeta {
  readonly from: number;
  /** One past the last returned index. */
  readonly to: number;
  readonly total: number;
  readonly hasMore: boolean;
}

export interface RangePaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: RangePaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: number; // last seen position
}

/**
 * Encode a cursor from field name and last seen position.
 */
export function encodeCursor(field: string, value: number): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen position.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: number } | undefined {
  try {
    const json = Buffer.from(cursor, "base64url").toString("utf-8");
    const data: unknown = JSON.parse(json);
    if (
      typeof data === "object" &&
      data !== null &&
      "f" in data &&
      "v" in data &&
      typeof data.f === "string" &&
      typeof data.v === "number"
    ) {
      return { field: data.f, value: data.v };
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Apply cursor-based pagination to a sorted array.
 *
 * Items must be sorted by the cursor field in ascending order. A cursor
 * minted for a different field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getField: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const cursorValue = decoded.value;
      filtered = filtered.filter((item) => getField(item) > cursorValue);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data.at(-1);
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getField(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}

/**
 * Wrap one slice of a filtered list that starts at index `from`.
 */
export function rangePage<T>(
  data: readonly T[],
  from: number,
  total: number,
): RangePaginatedResponse<T> {
  const to = from + data.length;
  return { data, pagination: { from, to, total, hasMore: to < total } };
}
