/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting (port, API tokens, timeouts, pagination guard, summary field
 * ids) is read here and nowhere else. dotenv loads .env into process.env and
 * a Zod schema validates and coerces it ("20000" → 20000).
 *
 * `parseConfig()` throws a ConfigurationError naming the offending variables,
 * which the tests exercise directly. At module load the process exits when
 * the environment is unusable, so a missing AFFINITY_API_KEY or NOTION_TOKEN
 * is reported before a single request leaves the process.
 */
import 'dotenv/config';

import type { SummaryFieldIds } from '@domain/entities/CompanySummary';
import {
  AFFINITY_BASE_URL,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SUMMARY_FIELD_IDS,
  NOTION_API_VERSION,
  NOTION_BASE_URL,
} from '@shared/constants';
import { ConfigurationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

const summaryFieldIdsSchema = z
  .object({
    dealroomUrl: z.string().min(1),
    linkedinUrl: z.string().min(1),
    description: z.string().min(1),
    industries: z.string().min(1),
    technologies: z.string().min(1),
    businessModels: z.string().min(1),
    clientFocus: z.string().min(1),
    ownershipTypes: z.string().min(1),
    employeesRange: z.string().min(1),
    yearFounded: z.string().min(1),
    lastFundingAmount: z.string().min(1),
    totalFundingAmount: z.string().min(1),
    location: z.string().min(1),
  })
  .partial();

/** JSON text → partial field-id overrides; invalid JSON is reported as a schema issue. */
const summaryOverridesSchema = z
  .string()
  .transform((text, ctx) => {
    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch {
      ctx.addIssue({ code: 'custom', message: 'must be a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(summaryFieldIdsSchema);

export const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Affinity v2 API key, sent as a bearer token. */
  AFFINITY_API_KEY: z.string({ error: 'AFFINITY_API_KEY is required' }).min(1, 'AFFINITY_API_KEY is required'),
  AFFINITY_BASE_URL: z.url().default(AFFINITY_BASE_URL),
  /** `limit` sent on Affinity list endpoints; the API caps it at 100. */
  AFFINITY_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(DEFAULT_PAGE_SIZE),
  /** Optional JSON object overriding entries of DEFAULT_SUMMARY_FIELD_IDS. */
  AFFINITY_SUMMARY_FIELD_IDS: summaryOverridesSchema.optional(),

  /** Notion internal integration token. */
  NOTION_TOKEN: z.string({ error: 'NOTION_TOKEN is required' }).min(1, 'NOTION_TOKEN is required'),
  NOTION_BASE_URL: z.url().default(NOTION_BASE_URL),
  NOTION_VERSION: z.string().default(NOTION_API_VERSION),

  /** Per-request timeout applied to every outbound call. */
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_HTTP_TIMEOUT_MS),
  /** Guard against a server that never ends a pagination chain. */
  PAGINATION_MAX_PAGES: z.coerce.number().int().min(1).default(DEFAULT_MAX_PAGES),
});

export function parseConfig(source: NodeJS.ProcessEnv) {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const details = parsed.error.issues
      .map((issue) => `${String(issue.path[0])}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`, variables);
  }

  const env = parsed.data;
  const summaryFieldIds: SummaryFieldIds = {
    ...DEFAULT_SUMMARY_FIELD_IDS,
    ...env.AFFINITY_SUMMARY_FIELD_IDS,
  };

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',

    cluster: {
      workers: env.WEB_CONCURRENCY,
    },

    log: {
      level: env.LOG_LEVEL,
    },

    http: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
    },

    pagination: {
      maxPages: env.PAGINATION_MAX_PAGES,
    },

    affinity: {
      apiKey: env.AFFINITY_API_KEY,
      baseUrl: env.AFFINITY_BASE_URL,
      pageSize: env.AFFINITY_PAGE_SIZE,
      summaryFieldIds,
    },

    notion: {
      token: env.NOTION_TOKEN,
      baseUrl: env.NOTION_BASE_URL,
      version: env.NOTION_VERSION,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof parseConfig>;

function loadConfig(): AppConfig {
  try {
    return parseConfig(process.env);
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

export const config = loadConfig();
