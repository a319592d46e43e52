/**
 * Cursor-based pagination over integer positions.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, p: position }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import { z } from "zod";

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

const CursorSchema = z.object({
  f: z.string(),
  p: z.number().int().nonnegative(),
});

export function encodeCursor(field: string, position: number): string {
  return Buffer.from(JSON.stringify({ f: field, p: position })).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen position.
 *
 * @returns Decoded cursor, or undefined if the cursor is malformed.
 */
export function decodeCursor(
  cursor: string,
): { field: string; position: number } | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = CursorSchema.safeParse(raw);
  return parsed.success ? { field: parsed.data.f, position: parsed.data.p } : undefined;
}

/**
 * Page through items sorted ascending by `position`.
 *
 * A cursor for a different field is ignored (first page); an unreadable
 * cursor is the caller's to reject before calling.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  position: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.position;
      filtered = filtered.filter((item) => position(item) > after);
    }
  }

  // One extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(fieldName, position(last)) : null,
      hasMore,
    },
  };
}
