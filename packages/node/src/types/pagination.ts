/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: position }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

import { z } from "zod";
import { ApiError } from "./error.js";

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
  v: z.number().int().safe(),
});

export function encodeCursor(field: string, value: number): string {
  const payload: z.infer<typeof CursorSchema> = { f: field, v: value };
  return Buffer.from(JSON.stringify(payload)).toString("base64url");
}

/** Field and last seen position, or undefined for a malformed cursor. */
export function decodeCursor(
  cursor: string,
): { field: string; value: number } | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  const parsed = CursorSchema.safeParse(raw);
  return parsed.success ? { field: parsed.data.f, value: parsed.data.v } : undefined;
}

/**
 * Apply cursor-based pagination to items sorted ascending by a numeric
 * position.
 *
 * @throws ApiError (VALIDATION_ERROR) if the cursor is malformed or was
 *   issued for a different field
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getPosition: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  const after = query.cursor === undefined ? undefined : decodeCursor(query.cursor);
  if (query.cursor !== undefined && (after === undefined || after.field !== fieldName)) {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid pagination cursor");
  }

  const remaining =
    after === undefined ? items : items.filter((item) => getPosition(item) > after.value);
  const data = remaining.slice(0, query.limit);
  const hasMore = remaining.length > query.limit;
  const last = data.at(-1);

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(fieldName, getPosition(last)) : null,
      hasMore,
    },
  };
}
