/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: position }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
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

// =============================================================================
// Cursor Encoding
// =============================================================================

export interface Cursor {
  readonly field: string;
  readonly position: number;
}

/**
 * Encode a cursor from field name and last seen position.
 */
export function encodeCursor(field: string, position: number): string {
  return Buffer.from(JSON.stringify({ f: field, v: position })).toString("base64url");
}

/**
 * Decode a cursor. Returns undefined if the cursor is malformed.
 */
export function decodeCursor(cursor: string): Cursor | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (data === null || typeof data !== "object") {
    return undefined;
  }
  const record = data as Record<string, unknown>;
  const { f, v } = record;
  if (typeof f !== "string" || typeof v !== "number" || !Number.isInteger(v) || v < 0) {
    return undefined;
  }
  return { field: f, position: v };
}

/**
 * Apply cursor-based pagination to items in ascending position order.
 *
 * A cursor for a different field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  positionOf: (item: T) => number,
  field: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === field) {
      filtered = filtered.filter((item) => positionOf(item) > decoded.position);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data.at(-1);

  const cursor = hasMore && last !== undefined ? encodeCursor(field, positionOf(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
