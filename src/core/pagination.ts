import { PaginationContext } from "../types";
import { NoRecordsFoundError, OffsetOutOfRangeError } from "../errors";

export const DEFAULT_LIMIT = 10000;
export const MAX_LIMIT = 100000;

/**
 * Checks a requested page against the number of matching records. Nothing
 * reaches the formatters unless the offset points at an existing record.
 */
export function resolvePage(
  totalCount: number,
  offset: number,
  limit: number,
  describeMissing: () => string,
): PaginationContext {
  if (totalCount === 0) {
    throw new NoRecordsFoundError(describeMissing());
  }

  if (offset >= totalCount) {
    throw new OffsetOutOfRangeError(offset, totalCount);
  }

  return { totalCount, offset, limit };
}

export function formatPaginationNote(
  pagination: PaginationContext,
  count: number,
): string | undefined {
  const { totalCount, offset, limit } = pagination;
  if (totalCount <= count) return undefined;

  return `# Showing ${offset + 1}-${offset + count} of ${totalCount} records (limit=${limit}, offset=${offset})`;
}
