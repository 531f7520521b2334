/**
 * Paginated Collector
 * Layer: Application
 *
 * Drains a remote collection into one array: issue the request, let the
 * strategy pull out the items and the next descriptor, repeat until the
 * strategy says the collection is exhausted. Items keep the order the server
 * returned them in, across pages.
 *
 * Pages are fetched one at a time. The first failed page aborts the whole
 * collection; nothing gathered so far is returned.
 *
 * `maxPages` guards against a server that never stops signalling another
 * page. The client is a parameter rather than a constructor dependency so a
 * single collector serves both remote systems.
 */
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IHttpClient } from '@domain/interfaces/IHttpClient';
import type { IPaginationStrategy } from '@domain/interfaces/IPaginationStrategy';
import { PaginationLimitError } from '@shared/errors/AppError';
import type { CollectOptions, RawItem, RequestDescriptor } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class PaginatedCollector {
  constructor(
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.Config) private config: AppConfig,
  ) {}

  async collect(
    client: IHttpClient,
    initial: RequestDescriptor,
    strategy: IPaginationStrategy,
    options: CollectOptions = {},
  ): Promise<RawItem[]> {
    const maxPages = options.maxPages ?? this.config.pagination.maxPages;
    const items: RawItem[] = [];
    let next: RequestDescriptor | null = initial;
    let pages = 0;

    while (next) {
      if (pages >= maxPages) {
        this.log.warn({ url: initial.url, maxPages }, 'Pagination limit reached');
        throw new PaginationLimitError(maxPages);
      }

      const body = await client.request(next);
      const page = strategy.parsePage(initial, body);
      pages += 1;
      items.push(...page.items);

      this.log.debug(
        { url: initial.url, mode: strategy.mode, page: pages, received: page.items.length },
        'Collected page',
      );

      if (options.limit !== undefined && items.length >= options.limit) {
        return items.slice(0, options.limit);
      }
      next = page.next;
    }

    return items;
  }
}
