/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where dependencies are wired. `reflect-metadata` must load
 * first so tsyringe can read constructor parameter metadata.
 *
 * Each remote system gets its own FetchHttpClient handle registered under its
 * own token; nothing else in the app constructs a client. Services receive
 * the handle and pass it explicitly to the collector.
 *
 * Tokens are already validated by the time this runs (config.ts exits on a
 * missing AFFINITY_API_KEY or NOTION_TOKEN), so no request can be issued
 * without credentials.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { TOKENS } from './types';
import { config } from './config';
import { logger } from './logger';

import { AffinityService } from '@application/services/AffinityService';
import { NotionService } from '@application/services/NotionService';
import { FetchHttpClient } from '@infrastructure/http/FetchHttpClient';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Config, { useValue: config });
container.register(TOKENS.SummaryFieldIds, { useValue: config.affinity.summaryFieldIds });

container.register(TOKENS.AffinityHttpClient, {
  useValue: new FetchHttpClient(
    {
      baseUrl: config.affinity.baseUrl,
      token: config.affinity.apiKey,
      timeoutMs: config.http.timeoutMs,
    },
    logger.child({ remote: 'affinity' }),
  ),
});
container.register(TOKENS.NotionHttpClient, {
  useValue: new FetchHttpClient(
    {
      baseUrl: config.notion.baseUrl,
      token: config.notion.token,
      timeoutMs: config.http.timeoutMs,
      headers: { 'Notion-Version': config.notion.version },
    },
    logger.child({ remote: 'notion' }),
  ),
});

container.register(TOKENS.AffinityService, { useClass: AffinityService });
container.register(TOKENS.NotionService, { useClass: NotionService });

export { container };
