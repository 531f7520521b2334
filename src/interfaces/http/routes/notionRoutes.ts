/**
 * Notion Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/notion`:
 *
 *   GET   /databases                          title → id of every shared database
 *   GET   /databases/export                   every row of every database, plus analysis
 *   POST  /databases/resolve                  { url } → database id
 *   GET   /databases/:databaseId/schema       property types and select options
 *   POST  /databases/:databaseId/query        { filter?, sorts?, limit? }
 *   POST  /databases/:databaseId/pages        { values }
 *   PATCH /databases/:databaseId/pages/:pageId { values }
 */
import { NotionController } from '@interfaces/http/controllers/NotionController';
import { validate } from '@interfaces/http/middleware/validation';
import { Router } from 'express';
import { z } from 'zod/v4';

const queryBody = z.object({
  filter: z.record(z.string(), z.unknown()).optional(),
  sorts: z.array(z.record(z.string(), z.unknown())).optional(),
  limit: z.number().int().min(1).optional(),
});

const pageValuesBody = z.object({
  values: z.record(z.string(), z.string()),
});

const resolveBody = z.object({ url: z.string().min(1, 'url is required') });

const router = Router();
const controller = new NotionController();

router.get('/databases', controller.listDatabases);
router.get('/databases/export', controller.exportDatabases);
router.post('/databases/resolve', validate(resolveBody, 'body'), controller.resolveDatabaseId);
router.get('/databases/:databaseId/schema', controller.getSchema);
router.post('/databases/:databaseId/query', validate(queryBody, 'body'), controller.queryDatabase);
router.post('/databases/:databaseId/pages', validate(pageValuesBody, 'body'), controller.createPage);
router.patch(
  '/databases/:databaseId/pages/:pageId',
  validate(pageValuesBody, 'body'),
  controller.updatePage,
);

export { router as notionRoutes };
