/**
 * Pagination Strategy Factory
 * Layer: Application
 * Pattern: Factory Pattern
 *
 * Maps a pagination mode to its strategy. Affinity collections use
 * 'next-url'; Notion collections use 'has-more' with the cursor in the body
 * for POST endpoints and in the query string otherwise.
 */
import {
  HasMorePaginationStrategy,
  type CursorLocation,
} from '@application/strategies/HasMorePaginationStrategy';
import { NextUrlPaginationStrategy } from '@application/strategies/NextUrlPaginationStrategy';
import type { IPaginationStrategy, PaginationMode } from '@domain/interfaces/IPaginationStrategy';
import { AppError } from '@shared/errors/AppError';
import { injectable } from 'tsyringe';

export interface StrategyOptions {
  itemsKey?: string;
  cursorLocation?: CursorLocation;
}

@injectable()
export class PaginationStrategyFactory {
  create(mode: PaginationMode, options: StrategyOptions = {}): IPaginationStrategy {
    switch (mode) {
      case 'next-url':
        return new NextUrlPaginationStrategy(options.itemsKey ?? 'data');
      case 'has-more':
        return new HasMorePaginationStrategy(
          options.cursorLocation ?? 'body',
          options.itemsKey ?? 'results',
        );
      default:
        throw new AppError(`Unknown pagination mode: ${String(mode)}`, 400);
    }
  }
}
