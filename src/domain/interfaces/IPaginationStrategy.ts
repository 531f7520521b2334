import type { RawItem, RequestDescriptor } from '@shared/types';

export type PaginationMode = 'next-url' | 'has-more';

export interface PageResult {
  items: RawItem[];
  /** Descriptor for the following page, or null when the collection is exhausted. */
  next: RequestDescriptor | null;
}

/**
 * Pagination Strategy Interface
 * Layer: Domain
 * Pattern: Strategy Pattern
 *
 * The two APIs signal "there is another page" differently:
 *
 *   - next-url: Affinity returns `pagination.nextUrl`, a ready-to-use URL.
 *   - has-more: Notion returns `has_more` plus an opaque `next_cursor` that
 *     goes back into the original request as `start_cursor`.
 *
 * The collector only loops; a strategy reads one page body and decides what
 * comes next. `initial` is always the first request of the collection so a
 * strategy can rebuild from it rather than from whatever came before.
 */
export interface IPaginationStrategy {
  readonly mode: PaginationMode;
  parsePage(initial: RequestDescriptor, body: unknown): PageResult;
}
