/**
 * Notion Controller — HTTP Boundary for the Workspace
 * Layer: Interfaces (HTTP)
 *
 * Page writes take `{ values: { <property>: <text> } }`; the service converts
 * each text against the database schema before formatting it for Notion.
 */
import { extractIdFromUrl } from '@application/normalizers/notionIds';
import { analyzeDatabaseData, type NotionService } from '@application/services/NotionService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { DatabaseQuery } from '@domain/entities/NotionDatabase';
import type { Request, Response } from 'express';

import { responseMeta } from './responseMeta';

interface PageValuesBody {
  values: Record<string, string>;
}

export class NotionController {
  private service: NotionService;

  constructor() {
    this.service = container.resolve<NotionService>(TOKENS.NotionService);
  }

  listDatabases = async (req: Request, res: Response): Promise<void> => {
    const databases = await this.service.discoverDatabases();
    res.status(200).json({
      status: 'success',
      data: databases,
      meta: responseMeta(req, Object.keys(databases).length),
    });
  };

  resolveDatabaseId = async (req: Request, res: Response): Promise<void> => {
    const { url }: { url: string } = req.body;
    res.status(200).json({ status: 'success', data: { id: extractIdFromUrl(url) } });
  };

  exportDatabases = async (req: Request, res: Response): Promise<void> => {
    const databases = await this.service.discoverDatabases();
    const data = await this.service.extractAllDatabaseData(databases);
    res.status(200).json({
      status: 'success',
      data,
      analysis: analyzeDatabaseData(data),
      meta: responseMeta(req),
    });
  };

  getSchema = async (req: Request, res: Response): Promise<void> => {
    const properties = await this.service.getDatabasePropertyOptions(req.params.databaseId);
    res.status(200).json({ status: 'success', data: properties, meta: responseMeta(req) });
  };

  queryDatabase = async (req: Request, res: Response): Promise<void> => {
    const query: DatabaseQuery = req.body;
    const rows = await this.service.queryDatabase(req.params.databaseId, query);
    res.status(200).json({ status: 'success', data: rows, meta: responseMeta(req, rows.length) });
  };

  createPage = async (req: Request, res: Response): Promise<void> => {
    const { databaseId } = req.params;
    const { values }: PageValuesBody = req.body;
    const properties = await this.service.prepareProperties(databaseId, values);
    const page = await this.service.createPage(databaseId, properties);
    res.status(201).json({ status: 'success', data: page });
  };

  updatePage = async (req: Request, res: Response): Promise<void> => {
    const { databaseId, pageId } = req.params;
    const { values }: PageValuesBody = req.body;
    const properties = await this.service.prepareProperties(databaseId, values);
    const page = await this.service.updatePage(pageId, properties);
    res.status(200).json({ status: 'success', data: page });
  };
}
