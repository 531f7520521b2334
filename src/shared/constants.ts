import type { SummaryFieldIds } from '@domain/entities/CompanySummary';

export const AFFINITY_BASE_URL = 'https://api.affinity.co';
export const NOTION_BASE_URL = 'https://api.notion.com';

/** Notion-Version header the property envelopes below are written against. */
export const NOTION_API_VERSION = '2022-06-28';

/** Notion caps `page_size` at 100 per query. */
export const NOTION_MAX_PAGE_SIZE = 100;

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_PAGES = 1000;
export const DEFAULT_HTTP_TIMEOUT_MS = 20_000;

/**
 * Affinity field ids backing the company summary. Most are Dealroom
 * enrichment fields; the LinkedIn URL comes from Affinity's own data.
 */
export const DEFAULT_SUMMARY_FIELD_IDS: SummaryFieldIds = {
  dealroomUrl: 'dealroom-url',
  linkedinUrl: 'affinity-data-linkedin-url',
  description: 'dealroom-description',
  industries: 'dealroom-industry',
  technologies: 'dealroom-technologies',
  businessModels: 'dealroom-business-models',
  clientFocus: 'dealroom-client-focus',
  ownershipTypes: 'dealroom-ownership-types',
  employeesRange: 'dealroom-number-of-employees',
  yearFounded: 'dealroom-year-founded',
  lastFundingAmount: 'dealroom-last-funding-amount',
  totalFundingAmount: 'dealroom-total-funding-amount',
  location: 'dealroom-location',
};

/** Notion property types computed by Notion; they cannot be written. */
export const NOTION_READ_ONLY_TYPES = [
  'formula',
  'rollup',
  'created_time',
  'created_by',
  'last_edited_time',
  'last_edited_by',
] as const;
