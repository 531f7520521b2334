/**
 * Affinity Controller — HTTP Boundary for the CRM
 * Layer: Interfaces (HTTP)
 *
 * Thin: read params, call AffinityService, send JSON. Collections accept an
 * optional `?limit=` that stops collection once that many items are in.
 * Arrow-function members keep `this` bound when Express calls them.
 */
import type { AffinityService, FieldUpdate } from '@application/services/AffinityService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { NotFoundError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';

import { parseLimit, responseMeta } from './responseMeta';

export class AffinityController {
  private service: AffinityService;

  constructor() {
    this.service = container.resolve<AffinityService>(TOKENS.AffinityService);
  }

  me = async (req: Request, res: Response): Promise<void> => {
    const user = await this.service.whoAmI();
    res.status(200).json({ status: 'success', data: user, meta: responseMeta(req) });
  };

  listCompanies = async (req: Request, res: Response): Promise<void> => {
    const companies = await this.service.listCompanies({ limit: parseLimit(req.query.limit) });
    res.status(200).json({
      status: 'success',
      data: companies,
      meta: responseMeta(req, companies.length),
    });
  };

  getCompany = async (req: Request, res: Response): Promise<void> => {
    const company = await this.service.getCompany(req.params.companyId);
    res.status(200).json({ status: 'success', data: company, meta: responseMeta(req) });
  };

  listLists = async (req: Request, res: Response): Promise<void> => {
    const lists = await this.service.listLists({ limit: parseLimit(req.query.limit) });
    res.status(200).json({ status: 'success', data: lists, meta: responseMeta(req, lists.length) });
  };

  listListEntries = async (req: Request, res: Response): Promise<void> => {
    const entries = await this.service.listListEntries(req.params.listId, {
      limit: parseLimit(req.query.limit),
    });
    res.status(200).json({
      status: 'success',
      data: entries,
      meta: responseMeta(req, entries.length),
    });
  };

  getListEntryFields = async (req: Request, res: Response): Promise<void> => {
    const { listId, entryId } = req.params;
    const result = await this.service.getListEntryFields(listId, entryId);
    res.status(200).json({
      status: 'success',
      data: result,
      meta: responseMeta(req, Object.keys(result.normalizedFields).length),
    });
  };

  getListEntryField = async (req: Request, res: Response): Promise<void> => {
    const { listId, entryId, fieldId } = req.params;
    const field = await this.service.getListEntryField(listId, entryId, fieldId);
    if (!field) {
      throw new NotFoundError('Field', fieldId);
    }
    res.status(200).json({ status: 'success', data: field, meta: responseMeta(req) });
  };

  updateListEntryField = async (req: Request, res: Response): Promise<void> => {
    const { listId, entryId, fieldId } = req.params;
    const update: FieldUpdate = req.body;
    const result = await this.service.updateListEntryField(listId, entryId, fieldId, update);

    if (result.success) {
      res.status(204).end();
      return;
    }
    res.status(502).json({
      status: 'error',
      message: `Affinity rejected the update of ${fieldId}`,
      remoteStatus: result.status,
      detail: result.body,
    });
  };
}
