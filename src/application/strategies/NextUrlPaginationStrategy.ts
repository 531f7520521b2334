/**
 * Next-URL Pagination Strategy (cursor mode)
 * Layer: Application
 * Pattern: Strategy Pattern (implements IPaginationStrategy)
 *
 * Affinity v2 list endpoints answer:
 *
 *   { data: [...], pagination: { prevUrl: '...', nextUrl: 'https://api.affinity.co/v2/...?cursor=...' } }
 *
 * `nextUrl` already carries the cursor and every original query parameter,
 * so the next request is that URL verbatim with the initial method and
 * headers; the initial `query` is dropped to avoid appending it twice.
 */
import type { IPaginationStrategy, PageResult } from '@domain/interfaces/IPaginationStrategy';
import { MalformedResponseError } from '@shared/errors/AppError';
import { getProperty, isObject, isString } from '@shared/typeGuards';
import type { RawItem, RequestDescriptor } from '@shared/types';

export class NextUrlPaginationStrategy implements IPaginationStrategy {
  readonly mode = 'next-url' as const;

  constructor(private readonly itemsKey = 'data') {}

  parsePage(initial: RequestDescriptor, body: unknown): PageResult {
    const items = readItems(body, this.itemsKey);
    const nextUrl = getProperty(getProperty(body, 'pagination'), 'nextUrl');

    if (!isString(nextUrl) || nextUrl === '') {
      return { items, next: null };
    }

    return {
      items,
      next: {
        method: initial.method,
        url: nextUrl,
        headers: initial.headers,
        body: initial.body,
      },
    };
  }
}

/**
 * Pull the item array out of a page body; shared by both strategies. Items
 * are returned as given, so a non-object element fails the page rather than
 * being left out.
 */
export function readItems(body: unknown, itemsKey: string): RawItem[] {
  if (!isObject(body)) {
    throw new MalformedResponseError('page body is not a JSON object');
  }
  const items = body[itemsKey];
  if (!Array.isArray(items)) {
    throw new MalformedResponseError(`page body has no "${itemsKey}" array`);
  }
  return items.map((item, index) => {
    if (!isObject(item)) {
      throw new MalformedResponseError(`"${itemsKey}" item at position ${index} is not an object`);
    }
    return item;
  });
}
