/**
 * Has-More Pagination Strategy (flag mode)
 * Layer: Application
 * Pattern: Strategy Pattern (implements IPaginationStrategy)
 *
 * Notion list endpoints answer:
 *
 *   { object: 'list', results: [...], has_more: true, next_cursor: 'abc' }
 *
 * The next page is the ORIGINAL request with `start_cursor` set. Search and
 * database queries are POSTs that take the cursor in the JSON body; plain
 * GET listings take it in the query string, hence `cursorLocation`.
 */
import type { IPaginationStrategy, PageResult } from '@domain/interfaces/IPaginationStrategy';
import { MalformedResponseError } from '@shared/errors/AppError';
import { getProperty, isString } from '@shared/typeGuards';
import type { RequestDescriptor } from '@shared/types';

import { readItems } from './NextUrlPaginationStrategy';

export type CursorLocation = 'query' | 'body';

export class HasMorePaginationStrategy implements IPaginationStrategy {
  readonly mode = 'has-more' as const;

  constructor(
    private readonly cursorLocation: CursorLocation = 'body',
    private readonly itemsKey = 'results',
  ) {}

  parsePage(initial: RequestDescriptor, body: unknown): PageResult {
    const items = readItems(body, this.itemsKey);

    if (getProperty(body, 'has_more') !== true) {
      return { items, next: null };
    }

    const cursor = getProperty(body, 'next_cursor');
    if (!isString(cursor) || cursor === '') {
      throw new MalformedResponseError('has_more is true but next_cursor is missing');
    }

    const next: RequestDescriptor =
      this.cursorLocation === 'body'
        ? { ...initial, body: { ...initial.body, start_cursor: cursor } }
        : { ...initial, query: { ...initial.query, start_cursor: cursor } };

    return { items, next };
  }
}
