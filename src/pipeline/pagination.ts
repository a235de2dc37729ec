export interface Page<T> {
  page: T[];
  /** Offset of the following page, or null when this page reaches the end. */
  nextOffset: number | null;
}

/**
 * Offset/limit slice of an already filtered and sorted list. Never throws:
 * an offset outside the list yields an empty page with no cursor. Bounding
 * `limit` is the caller's job.
 */
export function paginate<T>(items: readonly T[], offset: number, limit: number): Page<T> {
  if (offset < 0 || offset >= items.length) {
    return { page: [], nextOffset: null };
  }

  const end = offset + limit;
  return {
    page: items.slice(offset, end),
    nextOffset: end < items.length ? end : null,
  };
}
