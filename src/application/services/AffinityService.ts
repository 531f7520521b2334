/**
 * Affinity Service — CRM Read/Write Facade
 * Layer: Application
 * Pattern: Facade
 *
 * Wraps the Affinity v2 REST API. Collection endpoints run through the
 * PaginatedCollector with the next-url strategy; the list-entry field
 * endpoint additionally runs the FieldNormalizer to produce the normalized
 * field set and company summary.
 *
 * Error discipline per operation:
 *   - collections and single-entity reads propagate the first failure;
 *   - getListEntryField() answers null for any non-200, unreadable field or
 *     failed round trip (timeout included);
 *   - updateListEntryField() answers a FieldUpdateResult instead of throwing,
 *     whatever went wrong.
 */
import { PaginationStrategyFactory } from '@application/factories/PaginationStrategyFactory';
import { FieldNormalizer, parseFieldRecord } from '@application/services/FieldNormalizer';
import { PaginatedCollector } from '@application/services/PaginatedCollector';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { CompanySummary } from '@domain/entities/CompanySummary';
import type {
  FieldRecord,
  FieldUpdateResult,
  NormalizedField,
  NormalizedFieldSet,
} from '@domain/entities/FieldRecord';
import type { IHttpClient } from '@domain/interfaces/IHttpClient';
import { MalformedResponseError } from '@shared/errors/AppError';
import { isObject } from '@shared/typeGuards';
import type { CollectOptions, HttpResponse, RawItem, RequestDescriptor } from '@shared/types';
import { inject, injectable } from 'tsyringe';

export interface ListEntryFields {
  normalizedFields: NormalizedFieldSet;
  summary: CompanySummary;
}

export interface FieldUpdate {
  /** Value type tag sent as `value.type`. */
  type: string;
  value: unknown;
}

@injectable()
export class AffinityService {
  constructor(
    @inject(TOKENS.AffinityHttpClient) private client: IHttpClient,
    @inject(TOKENS.Config) private config: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
    private collector: PaginatedCollector,
    private normalizer: FieldNormalizer,
    private strategies: PaginationStrategyFactory,
  ) {}

  async whoAmI(): Promise<RawItem> {
    const body = await this.client.request({ method: 'GET', url: '/v2/auth/whoami' });
    const user = isObject(body) ? body.user : undefined;
    if (!isObject(user)) {
      throw new MalformedResponseError('whoami response has no "user" object');
    }
    return user;
  }

  listCompanies(options: CollectOptions = {}): Promise<RawItem[]> {
    return this.collectPath('/v2/companies', options);
  }

  getCompany(companyId: string): Promise<RawItem> {
    return this.getEntity(`/v2/companies/${encodeURIComponent(companyId)}`);
  }

  listCompanyFields(options: CollectOptions = {}): Promise<RawItem[]> {
    return this.collectPath('/v2/companies/fields', options);
  }

  listCompanyLists(companyId: string, options: CollectOptions = {}): Promise<RawItem[]> {
    return this.collectPath(`/v2/companies/${encodeURIComponent(companyId)}/lists`, options);
  }

  listCompanyListEntries(companyId: string, options: CollectOptions = {}): Promise<RawItem[]> {
    return this.collectPath(`/v2/companies/${encodeURIComponent(companyId)}/list-entries`, options);
  }

  listLists(options: CollectOptions = {}): Promise<RawItem[]> {
    return this.collectPath('/v2/lists', options);
  }

  getList(listId: string): Promise<RawItem> {
    return this.getEntity(`/v2/lists/${encodeURIComponent(listId)}`);
  }

  listListEntries(listId: string, options: CollectOptions = {}): Promise<RawItem[]> {
    return this.collectPath(`/v2/lists/${encodeURIComponent(listId)}/list-entries`, options);
  }

  getListEntry(listId: string, entryId: string): Promise<RawItem> {
    return this.getEntity(entryPath(listId, entryId));
  }

  /** Every field of a list entry, normalized and summarized. */
  async getListEntryFields(listId: string, entryId: string): Promise<ListEntryFields> {
    const items = await this.collectPath(`${entryPath(listId, entryId)}/fields`);

    const records: FieldRecord[] = [];
    items.forEach((item, index) => {
      const record = parseFieldRecord(item);
      if (record) {
        records.push(record);
      } else {
        this.log.warn({ listId, entryId, position: index }, 'Skipping unreadable field record');
      }
    });

    const normalizedFields = this.normalizer.normalize(records);
    return { normalizedFields, summary: this.normalizer.summarize(normalizedFields) };
  }

  /** One field of a list entry; null when the API does not answer 200 or the field is empty. */
  async getListEntryField(
    listId: string,
    entryId: string,
    fieldId: string,
  ): Promise<NormalizedField | null> {
    let response: HttpResponse;
    try {
      response = await this.client.send({
        method: 'GET',
        url: fieldPath(listId, entryId, fieldId),
      });
    } catch (err) {
      this.log.warn({ listId, entryId, fieldId, err }, 'Field read failed');
      return null;
    }

    if (response.status !== 200) {
      this.log.info({ listId, entryId, fieldId, status: response.status }, 'Field not readable');
      return null;
    }

    const record = parseFieldRecord(response.body);
    return record ? this.normalizer.normalizeField(record) : null;
  }

  /**
   * Write one field. Affinity answers 204 with an empty body on success;
   * anything else is returned with the response text for diagnostics.
   */
  async updateListEntryField(
    listId: string,
    entryId: string,
    fieldId: string,
    update: FieldUpdate,
  ): Promise<FieldUpdateResult> {
    let response: HttpResponse;
    try {
      response = await this.client.send({
        method: 'PUT',
        url: fieldPath(listId, entryId, fieldId),
        body: {
          value: {
            type: update.type,
            data: { str: update.value },
          },
        },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn({ listId, entryId, fieldId, err }, 'Field update failed');
      return { success: false, status: null, body: message };
    }

    if (response.status === 204) {
      this.log.info({ listId, entryId, fieldId }, 'Field updated');
      return { success: true };
    }

    this.log.warn(
      { listId, entryId, fieldId, status: response.status, body: response.text },
      'Field update rejected',
    );
    return { success: false, status: response.status, body: response.text };
  }

  private collectPath(path: string, options: CollectOptions = {}): Promise<RawItem[]> {
    const request: RequestDescriptor = {
      method: 'GET',
      url: path,
      query: { limit: this.config.affinity.pageSize },
    };
    return this.collector.collect(
      this.client,
      request,
      this.strategies.create('next-url'),
      options,
    );
  }

  private async getEntity(path: string): Promise<RawItem> {
    const body = await this.client.request({ method: 'GET', url: path });
    if (!isObject(body)) {
      throw new MalformedResponseError(`${path} did not return an object`);
    }
    return body;
  }
}

function entryPath(listId: string, entryId: string): string {
  return `/v2/lists/${encodeURIComponent(listId)}/list-entries/${encodeURIComponent(entryId)}`;
}

function fieldPath(listId: string, entryId: string, fieldId: string): string {
  return `${entryPath(listId, entryId)}/fields/${encodeURIComponent(fieldId)}`;
}
