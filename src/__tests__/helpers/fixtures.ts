/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Field records are shaped like Affinity's list-entry field payloads; pages
 * like Notion's database query results. Company names, ids and URLs are
 * made up.
 */
import type { FieldRecord } from '@domain/entities/FieldRecord';
import type { NotionRow } from '@domain/entities/NotionDatabase';

export const descriptionField: FieldRecord = {
  id: 'dealroom-description',
  name: 'Description',
  enrichmentSource: 'dealroom',
  value: { type: 'text', data: 'Satellite connectivity for industrial sensors' },
};

export const industryField: FieldRecord = {
  id: 'dealroom-industry',
  name: 'Industries',
  enrichmentSource: 'dealroom',
  value: { type: 'text-multi', data: ['space', 'telecom'] },
};

export const yearFoundedField: FieldRecord = {
  id: 'dealroom-year-founded',
  name: 'Year Founded',
  enrichmentSource: 'dealroom',
  value: { type: 'number', data: '2018' },
};

export const totalFundingField: FieldRecord = {
  id: 'dealroom-total-funding-amount',
  name: 'Total Funding',
  enrichmentSource: 'dealroom',
  value: { type: 'number', data: '12500000.5' },
};

export const locationField: FieldRecord = {
  id: 'dealroom-location',
  name: 'Location',
  enrichmentSource: 'dealroom',
  value: {
    type: 'location',
    data: { streetAddress: null, city: 'Paris', state: null, country: 'France' },
  },
};

export const emptyField: FieldRecord = {
  id: 'dealroom-client-focus',
  name: 'Client Focus',
  enrichmentSource: 'dealroom',
  value: { type: 'text-multi', data: null },
};

export const linkedinField: FieldRecord = {
  id: 'affinity-data-linkedin-url',
  name: 'LinkedIn URL',
  enrichmentSource: null,
  value: { type: 'text', data: 'https://www.linkedin.com/company/orbitel-example' },
};

export const sampleFieldRecords: FieldRecord[] = [
  descriptionField,
  industryField,
  yearFoundedField,
  totalFundingField,
  locationField,
  emptyField,
  linkedinField,
];

/** A Notion page as returned inside `results` of a database query. */
export const sampleNotionPage = {
  object: 'page',
  id: '1429989f-e8ac-4eff-bc8f-57f56486db54',
  created_time: '2024-03-20T09:15:00.000Z',
  last_edited_time: '2024-04-02T17:40:00.000Z',
  url: 'https://www.notion.so/Orbitel-1429989fe8ac4effbc8f57f56486db54',
  properties: {
    Name: { id: 'title', type: 'title', title: [{ plain_text: 'Orbitel' }] },
    Stage: { id: 'a1', type: 'select', select: { name: 'Seed' } },
    Tags: { id: 'a2', type: 'multi_select', multi_select: [{ name: 'space' }, { name: 'iot' }] },
    Employees: { id: 'a3', type: 'number', number: 42 },
    Active: { id: 'a4', type: 'checkbox', checkbox: true },
  },
};

export const sampleNotionRow: NotionRow = {
  notionId: '1429989f-e8ac-4eff-bc8f-57f56486db54',
  createdTime: '2024-03-20T09:15:00.000Z',
  lastEditedTime: '2024-04-02T17:40:00.000Z',
  notionUrl: 'https://www.notion.so/Orbitel-1429989fe8ac4effbc8f57f56486db54',
  properties: {
    Name: 'Orbitel',
    Stage: 'Seed',
    Tags: ['space', 'iot'],
    Employees: 42,
    Active: true,
  },
};

/** Database object as returned by GET /v1/databases/{id}. */
export const sampleDatabase = {
  object: 'database',
  id: 'db-companies',
  title: [{ plain_text: 'Companies' }],
  properties: {
    Name: { id: 'title', type: 'title', title: {} },
    Stage: {
      id: 'a1',
      type: 'select',
      select: { options: [{ name: 'Seed' }, { name: 'Series A' }] },
    },
    Tags: {
      id: 'a2',
      type: 'multi_select',
      multi_select: { options: [{ name: 'space' }, { name: 'iot' }] },
    },
    Employees: { id: 'a3', type: 'number', number: { format: 'number' } },
    Active: { id: 'a4', type: 'checkbox', checkbox: {} },
    Score: { id: 'a5', type: 'formula', formula: { expression: '1' } },
  },
};
