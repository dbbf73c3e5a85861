/**
 * Position-based pagination.
 *
 * List endpoints return { data, pagination: { nextAfterPosition, hasMore } }.
 * A client passes nextAfterPosition back as `afterPosition` to read on.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationMeta {
  /** Position of the last item returned, or null when there are no more */
  readonly nextAfterPosition: number | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Paging
// =============================================================================

/**
 * Cut a page of `limit` items from `items`, which must be sorted by
 * position and may hold one extra item to detect hasMore.
 */
export function paginate<T>(
  items: readonly T[],
  limit: number,
  getPosition: (item: T) => number,
): PaginatedResponse<T> {
  const hasMore = items.length > limit;
  const data = hasMore ? items.slice(0, limit) : items;
  const last = data.at(-1);

  const nextAfterPosition = hasMore && last !== undefined ? getPosition(last) : null;

  return { data, pagination: { nextAfterPosition, hasMore } };
}
