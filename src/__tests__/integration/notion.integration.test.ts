/**
 * Integration Tests — Notion Endpoints
 *
 *   GET   /api/v1/notion/databases
 *   GET   /api/v1/notion/databases/export
 *   POST  /api/v1/notion/databases/resolve
 *   GET   /api/v1/notion/databases/:databaseId/schema
 *   POST  /api/v1/notion/databases/:databaseId/query
 *   POST  /api/v1/notion/databases/:databaseId/pages
 *   PATCH /api/v1/notion/databases/:databaseId/pages/:pageId
 *
 * NotionService is swapped for a mock through the DI container (same
 * ordering rules as the Affinity suite). The id resolution and export
 * analysis run for real since they are pure.
 */
import type { NotionService } from '@application/services/NotionService';
import { TOKENS } from '@core/types';
import { ValidationError } from '@shared/errors/AppError';
import type { Express } from 'express';
import request from 'supertest';
import { container } from 'tsyringe';

import { sampleNotionRow } from '../helpers/fixtures';
import { createMockNotionService, type MockNotionService } from '../helpers/mockServices';

let app: Express;
let mockService: MockNotionService;

beforeAll(async () => {
  await import('@core/container');

  mockService = createMockNotionService();
  container.register<NotionService>(TOKENS.NotionService, {
    useValue: mockService as unknown as NotionService,
  });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterEach(() => {
  jest.clearAllMocks();
});

describe('GET /api/v1/notion/databases', () => {
  it('should return the title → id mapping with a count', async () => {
    mockService.discoverDatabases.mockResolvedValue({ Companies: 'db-1', Deals: 'db-2' });

    const res = await request(app).get('/api/v1/notion/databases');

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ Companies: 'db-1', Deals: 'db-2' });
    expect(res.body.meta.count).toBe(2);
  });
});

describe('GET /api/v1/notion/databases/export', () => {
  it('should return every row and the per-database analysis', async () => {
    mockService.discoverDatabases.mockResolvedValue({ Companies: 'db-1' });
    mockService.extractAllDatabaseData.mockResolvedValue({ Companies: [sampleNotionRow] });

    const res = await request(app).get('/api/v1/notion/databases/export');

    expect(res.status).toBe(200);
    expect(mockService.extractAllDatabaseData).toHaveBeenCalledWith({ Companies: 'db-1' });
    expect(res.body.data.Companies).toEqual([sampleNotionRow]);
    expect(res.body.analysis).toEqual([
      {
        name: 'Companies',
        entries: 1,
        properties: ['Name', 'Stage', 'Tags', 'Employees', 'Active'],
        dateRange: { from: '2024-03-20', to: '2024-03-20' },
      },
    ]);
  });
});

describe('POST /api/v1/notion/databases/resolve', () => {
  it('should turn a view URL into a database id', async () => {
    const res = await request(app)
      .post('/api/v1/notion/databases/resolve')
      .send({ url: 'https://www.notion.so/acme/x?v=1429989fe8ac4effbc8f57f56486db54' });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ id: '1429989f-e8ac-4eff-bc8f-57f56486db54' });
  });

  it('should answer 400 for a URL without a view id', async () => {
    const res = await request(app)
      .post('/api/v1/notion/databases/resolve')
      .send({ url: 'https://www.notion.so/acme/x' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message: "URL does not contain 'v='" });
  });
});

describe('GET /api/v1/notion/databases/:databaseId/schema', () => {
  it('should return property types and options', async () => {
    mockService.getDatabasePropertyOptions.mockResolvedValue({
      Stage: { type: 'select', options: ['Seed'] },
    });

    const res = await request(app).get('/api/v1/notion/databases/db-1/schema');

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ Stage: { type: 'select', options: ['Seed'] } });
    expect(mockService.getDatabasePropertyOptions).toHaveBeenCalledWith('db-1');
  });
});

describe('POST /api/v1/notion/databases/:databaseId/query', () => {
  it('should pass filter, sorts and limit to the service', async () => {
    mockService.queryDatabase.mockResolvedValue([sampleNotionRow]);
    const body = {
      filter: { property: 'Active', checkbox: { equals: true } },
      sorts: [{ property: 'Name', direction: 'ascending' }],
      limit: 5,
    };

    const res = await request(app).post('/api/v1/notion/databases/db-1/query').send(body);

    expect(res.status).toBe(200);
    expect(res.body.meta.count).toBe(1);
    expect(mockService.queryDatabase).toHaveBeenCalledWith('db-1', body);
  });

  it('should accept an empty body', async () => {
    mockService.queryDatabase.mockResolvedValue([]);

    const res = await request(app).post('/api/v1/notion/databases/db-1/query').send({});

    expect(res.status).toBe(200);
    expect(mockService.queryDatabase).toHaveBeenCalledWith('db-1', {});
  });

  it('should reject a non-positive limit', async () => {
    const res = await request(app).post('/api/v1/notion/databases/db-1/query').send({ limit: 0 });

    expect(res.status).toBe(400);
    expect(res.body.message).toMatch(/^limit: /);
    expect(mockService.queryDatabase).not.toHaveBeenCalled();
  });
});

describe('page writes', () => {
  const prepared = { Name: { type: 'title', value: 'Orbitel' } };

  it('should create a page from user-entered values and answer 201', async () => {
    mockService.prepareProperties.mockResolvedValue(prepared);
    mockService.createPage.mockResolvedValue({ object: 'page', id: 'page-new' });

    const res = await request(app)
      .post('/api/v1/notion/databases/db-1/pages')
      .send({ values: { Name: 'Orbitel' } });

    expect(res.status).toBe(201);
    expect(res.body.data).toEqual({ object: 'page', id: 'page-new' });
    expect(mockService.prepareProperties).toHaveBeenCalledWith('db-1', { Name: 'Orbitel' });
    expect(mockService.createPage).toHaveBeenCalledWith('db-1', prepared);
  });

  it('should update a page', async () => {
    mockService.prepareProperties.mockResolvedValue(prepared);
    mockService.updatePage.mockResolvedValue({ object: 'page', id: 'page-1' });

    const res = await request(app)
      .patch('/api/v1/notion/databases/db-1/pages/page-1')
      .send({ values: { Name: 'Orbitel' } });

    expect(res.status).toBe(200);
    expect(mockService.updatePage).toHaveBeenCalledWith('page-1', prepared);
  });

  it('should answer 400 with the conversion errors', async () => {
    mockService.prepareProperties.mockRejectedValue(
      new ValidationError('Employees: Must be a number'),
    );

    const res = await request(app)
      .post('/api/v1/notion/databases/db-1/pages')
      .send({ values: { Employees: 'many' } });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message: 'Employees: Must be a number' });
    expect(mockService.createPage).not.toHaveBeenCalled();
  });

  it('should require values to be strings', async () => {
    const res = await request(app)
      .post('/api/v1/notion/databases/db-1/pages')
      .send({ values: { Employees: 42 } });

    expect(res.status).toBe(400);
    expect(mockService.prepareProperties).not.toHaveBeenCalled();
  });
});
