/**
 * Affinity Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/affinity`:
 *
 *   GET /me
 *   GET /companies[?limit=]                    GET /companies/:companyId
 *   GET /lists[?limit=]                        GET /lists/:listId/entries[?limit=]
 *   GET /lists/:listId/entries/:entryId/fields
 *   GET /lists/:listId/entries/:entryId/fields/:fieldId
 *   PUT /lists/:listId/entries/:entryId/fields/:fieldId   { type, value }
 */
import { AffinityController } from '@interfaces/http/controllers/AffinityController';
import { validate } from '@interfaces/http/middleware/validation';
import { Router } from 'express';
import { z } from 'zod/v4';

const numericId = z.string().regex(/^\d+$/, 'ids must be numeric');

const entryParams = z.object({ listId: numericId, entryId: numericId });
const fieldParams = entryParams.extend({ fieldId: z.string().min(1) });

const fieldUpdateBody = z.object({
  type: z.string().min(1, 'type is required'),
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
});

const router = Router();
const controller = new AffinityController();

router.get('/me', controller.me);
router.get('/companies', controller.listCompanies);
router.get('/companies/:companyId', validate(z.object({ companyId: numericId }), 'params'), controller.getCompany);
router.get('/lists', controller.listLists);
router.get('/lists/:listId/entries', validate(z.object({ listId: numericId }), 'params'), controller.listListEntries);
router.get('/lists/:listId/entries/:entryId/fields', validate(entryParams, 'params'), controller.getListEntryFields);
router.get(
  '/lists/:listId/entries/:entryId/fields/:fieldId',
  validate(fieldParams, 'params'),
  controller.getListEntryField,
);
router.put(
  '/lists/:listId/entries/:entryId/fields/:fieldId',
  validate(fieldParams, 'params'),
  validate(fieldUpdateBody, 'body'),
  controller.updateListEntryField,
);

export { router as affinityRoutes };
