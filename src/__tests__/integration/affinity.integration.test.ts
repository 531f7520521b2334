/**
 * Integration Tests — Affinity Endpoints
 *
 *   GET /api/v1/affinity/me
 *   GET /api/v1/affinity/companies, /companies/:companyId
 *   GET /api/v1/affinity/lists, /lists/:listId/entries
 *   GET /api/v1/affinity/lists/:listId/entries/:entryId/fields[/:fieldId]
 *   PUT /api/v1/affinity/lists/:listId/entries/:entryId/fields/:fieldId
 *
 * The real middleware chain, routes and controllers run; AffinityService is
 * replaced by a mock through the DI container, so no request reaches
 * Affinity. The checks are on the HTTP contract: status codes, envelope
 * shape, parameter validation and error formatting.
 *
 * The app is created inside `beforeAll`, after the override: tsyringe
 * resolves the LAST registration, and affinityRoutes.ts resolves the service
 * when it is first imported.
 */
import type { AffinityService } from '@application/services/AffinityService';
import { TOKENS } from '@core/types';
import { RemoteRequestError } from '@shared/errors/AppError';
import type { Express } from 'express';
import request from 'supertest';
import { container } from 'tsyringe';

import { createMockAffinityService, type MockAffinityService } from '../helpers/mockServices';

let app: Express;
let mockService: MockAffinityService;

beforeAll(async () => {
  await import('@core/container');

  mockService = createMockAffinityService();
  container.register<AffinityService>(TOKENS.AffinityService, {
    useValue: mockService as unknown as AffinityService,
  });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterEach(() => {
  jest.clearAllMocks();
});

describe('GET /api/v1/affinity/me', () => {
  it('should return the authenticated user', async () => {
    mockService.whoAmI.mockResolvedValue({ id: 7, firstName: 'Ada' });

    const res = await request(app).get('/api/v1/affinity/me');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('success');
    expect(res.body.data).toEqual({ id: 7, firstName: 'Ada' });
    expect(typeof res.body.meta.totalTimeMs).toBe('number');
  });

  it('should answer 502 with the upstream status when Affinity refuses the key', async () => {
    mockService.whoAmI.mockRejectedValue(
      new RemoteRequestError(401, 'unauthorized', 'https://api.affinity.co/v2/auth/whoami'),
    );

    const res = await request(app).get('/api/v1/affinity/me');

    expect(res.status).toBe(502);
    expect(res.body).toEqual({
      status: 'error',
      message: 'Remote request failed (401): https://api.affinity.co/v2/auth/whoami',
      remoteStatus: 401,
    });
  });
});

describe('GET /api/v1/affinity/companies', () => {
  it('should return the collected companies with a count', async () => {
    mockService.listCompanies.mockResolvedValue([{ id: 1 }, { id: 2 }]);

    const res = await request(app).get('/api/v1/affinity/companies');

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual([{ id: 1 }, { id: 2 }]);
    expect(res.body.meta.count).toBe(2);
    expect(mockService.listCompanies).toHaveBeenCalledWith({ limit: undefined });
  });

  it('should pass a positive ?limit= through and ignore a bad one', async () => {
    mockService.listCompanies.mockResolvedValue([]);

    await request(app).get('/api/v1/affinity/companies?limit=5');
    await request(app).get('/api/v1/affinity/companies?limit=zero');

    expect(mockService.listCompanies).toHaveBeenNthCalledWith(1, { limit: 5 });
    expect(mockService.listCompanies).toHaveBeenNthCalledWith(2, { limit: undefined });
  });

  it('should fetch one company by numeric id', async () => {
    mockService.getCompany.mockResolvedValue({ id: 55, name: 'Orbitel' });

    const res = await request(app).get('/api/v1/affinity/companies/55');

    expect(res.status).toBe(200);
    expect(res.body.data.name).toBe('Orbitel');
    expect(mockService.getCompany).toHaveBeenCalledWith('55');
  });

  it('should reject a non-numeric company id with 400', async () => {
    const res = await request(app).get('/api/v1/affinity/companies/abc');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ status: 'error', message: 'companyId: ids must be numeric' });
    expect(mockService.getCompany).not.toHaveBeenCalled();
  });
});

describe('GET /api/v1/affinity/lists', () => {
  it('should list lists', async () => {
    mockService.listLists.mockResolvedValue([{ id: 12, name: 'Pipeline' }]);

    const res = await request(app).get('/api/v1/affinity/lists');

    expect(res.status).toBe(200);
    expect(res.body.meta.count).toBe(1);
  });

  it('should list entries of one list', async () => {
    mockService.listListEntries.mockResolvedValue([{ id: 34 }]);

    const res = await request(app).get('/api/v1/affinity/lists/12/entries?limit=10');

    expect(res.status).toBe(200);
    expect(mockService.listListEntries).toHaveBeenCalledWith('12', { limit: 10 });
  });
});

describe('GET /api/v1/affinity/lists/:listId/entries/:entryId/fields', () => {
  it('should return normalized fields and the summary, counting fields', async () => {
    mockService.getListEntryFields.mockResolvedValue({
      normalizedFields: {
        'dealroom-description': {
          id: 'dealroom-description',
          name: 'Description',
          source: 'dealroom',
          type: 'text',
          data: 'Satellite connectivity',
        },
      },
      summary: { description: 'Satellite connectivity' },
    });

    const res = await request(app).get('/api/v1/affinity/lists/12/entries/34/fields');

    expect(res.status).toBe(200);
    expect(res.body.data.summary.description).toBe('Satellite connectivity');
    expect(res.body.meta.count).toBe(1);
    expect(mockService.getListEntryFields).toHaveBeenCalledWith('12', '34');
  });

  it('should return one field', async () => {
    mockService.getListEntryField.mockResolvedValue({
      id: 'dealroom-year-founded',
      name: 'Year Founded',
      source: 'dealroom',
      type: 'number',
      data: 2018,
    });

    const res = await request(app).get(
      '/api/v1/affinity/lists/12/entries/34/fields/dealroom-year-founded',
    );

    expect(res.status).toBe(200);
    expect(res.body.data.data).toBe(2018);
    expect(mockService.getListEntryField).toHaveBeenCalledWith('12', '34', 'dealroom-year-founded');
  });

  it('should answer 404 when the field cannot be read', async () => {
    mockService.getListEntryField.mockResolvedValue(null);

    const res = await request(app).get('/api/v1/affinity/lists/12/entries/34/fields/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Field not found: missing' });
  });
});

describe('PUT /api/v1/affinity/lists/:listId/entries/:entryId/fields/:fieldId', () => {
  const url = '/api/v1/affinity/lists/12/entries/34/fields/stage';

  it('should answer 204 when Affinity accepts the write', async () => {
    mockService.updateListEntryField.mockResolvedValue({ success: true });

    const res = await request(app).put(url).send({ type: 'text', value: 'Series A' });

    expect(res.status).toBe(204);
    expect(mockService.updateListEntryField).toHaveBeenCalledWith('12', '34', 'stage', {
      type: 'text',
      value: 'Series A',
    });
  });

  it('should answer 502 with the remote status when Affinity rejects the write', async () => {
    mockService.updateListEntryField.mockResolvedValue({
      success: false,
      status: 422,
      body: '{"message":"bad value"}',
    });

    const res = await request(app).put(url).send({ type: 'text', value: 'x' });

    expect(res.status).toBe(502);
    expect(res.body).toEqual({
      status: 'error',
      message: 'Affinity rejected the update of stage',
      remoteStatus: 422,
      detail: '{"message":"bad value"}',
    });
  });

  it('should require a type tag', async () => {
    const res = await request(app).put(url).send({ value: 'x' });

    expect(res.status).toBe(400);
    expect(res.body.message).toMatch(/^type: /);
    expect(mockService.updateListEntryField).not.toHaveBeenCalled();
  });
});
