/**
 * Notion Service — Workspace Database Facade
 * Layer: Application
 * Pattern: Facade
 *
 * Discovers the databases shared with the integration, reads their schemas,
 * drains their rows through the PaginatedCollector (has-more strategy, cursor
 * in the POST body) and writes pages through the property codec.
 *
 * Rows come back flattened: page metadata plus every property reduced to a
 * plain value. Writes take user-entered text per property, convert it against
 * the live schema, and send only the properties that produced a value.
 */
import { PaginationStrategyFactory } from '@application/factories/PaginationStrategyFactory';
import { convertPropertyInput, isReadOnlyType } from '@application/normalizers/notionInput';
import {
  extractPropertyValue,
  formatPropertyValue,
  type PropertyPayload,
} from '@application/normalizers/notionPropertyCodec';
import { PaginatedCollector } from '@application/services/PaginatedCollector';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  DatabaseAnalysis,
  DatabaseMapping,
  DatabaseQuery,
  DatabaseSchema,
  NotionRow,
  PropertyInput,
  PropertyOptions,
} from '@domain/entities/NotionDatabase';
import type { IHttpClient } from '@domain/interfaces/IHttpClient';
import { NOTION_MAX_PAGE_SIZE } from '@shared/constants';
import { MalformedResponseError, ValidationError } from '@shared/errors/AppError';
import { arrayOf, getProperty, isObject, isString, stringOrNull } from '@shared/typeGuards';
import type { RawItem } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class NotionService {
  constructor(
    @inject(TOKENS.NotionHttpClient) private client: IHttpClient,
    @inject(TOKENS.Logger) private log: Logger,
    private collector: PaginatedCollector,
    private strategies: PaginationStrategyFactory,
  ) {}

  /** Every database shared with the integration, as title → id. Later titles win on duplicates. */
  async discoverDatabases(): Promise<DatabaseMapping> {
    const results = await this.collector.collect(
      this.client,
      {
        method: 'POST',
        url: '/v1/search',
        body: {
          filter: { property: 'object', value: 'database' },
          page_size: NOTION_MAX_PAGE_SIZE,
        },
      },
      this.strategies.create('has-more', { cursorLocation: 'body' }),
    );

    const mapping: DatabaseMapping = {};
    for (const item of results) {
      if (item.object !== 'database' || !isString(item.id)) continue;
      mapping[databaseTitle(item)] = item.id;
    }

    this.log.info({ count: Object.keys(mapping).length }, 'Discovered Notion databases');
    return mapping;
  }

  async getDatabaseSchema(databaseId: string): Promise<DatabaseSchema> {
    const properties = await this.retrieveProperties(databaseId);
    const schema: DatabaseSchema = {};
    for (const [name, info] of Object.entries(properties)) {
      const type = getProperty(info, 'type');
      if (isString(type)) schema[name] = type;
    }
    return schema;
  }

  async getDatabaseSchemas(databases: DatabaseMapping): Promise<Record<string, DatabaseSchema>> {
    const schemas: Record<string, DatabaseSchema> = {};
    for (const [name, databaseId] of Object.entries(databases)) {
      schemas[name] = await this.getDatabaseSchema(databaseId);
    }
    return schemas;
  }

  /** Type of every property, with the allowed option names of select / multi_select ones. */
  async getDatabasePropertyOptions(databaseId: string): Promise<Record<string, PropertyOptions>> {
    const properties = await this.retrieveProperties(databaseId);
    const result: Record<string, PropertyOptions> = {};

    for (const [name, info] of Object.entries(properties)) {
      const type = getProperty(info, 'type');
      if (!isString(type)) continue;

      const config = getProperty(info, type);
      const hasOptions = (type === 'select' || type === 'multi_select') && isObject(config);
      result[name] = {
        type,
        options: hasOptions
          ? arrayOf(getProperty(config, 'options'))
              .map((option) => getProperty(option, 'name'))
              .filter(isString)
          : null,
      };
    }
    return result;
  }

  async queryDatabase(databaseId: string, query: DatabaseQuery = {}): Promise<NotionRow[]> {
    const pageSize = Math.min(query.limit ?? NOTION_MAX_PAGE_SIZE, NOTION_MAX_PAGE_SIZE);
    const pages = await this.collector.collect(
      this.client,
      {
        method: 'POST',
        url: `/v1/databases/${encodeURIComponent(databaseId)}/query`,
        body: {
          ...(query.filter && { filter: query.filter }),
          ...(query.sorts && { sorts: query.sorts }),
          page_size: pageSize,
        },
      },
      this.strategies.create('has-more', { cursorLocation: 'body' }),
      { limit: query.limit },
    );
    return pages.map(toNotionRow);
  }

  /** Rows of every database, keyed by database title. */
  async extractAllDatabaseData(databases: DatabaseMapping): Promise<Record<string, NotionRow[]>> {
    const data: Record<string, NotionRow[]> = {};
    for (const [name, databaseId] of Object.entries(databases)) {
      data[name] = await this.queryDatabase(databaseId);
      this.log.info({ database: name, entries: data[name].length }, 'Extracted database rows');
    }
    return data;
  }

  /**
   * Convert user-entered text against the database schema. Read-only and
   * empty entries are skipped; any invalid entry fails the whole set.
   */
  async prepareProperties(
    databaseId: string,
    values: Record<string, string>,
  ): Promise<Record<string, PropertyInput>> {
    const options = await this.getDatabasePropertyOptions(databaseId);
    const prepared: Record<string, PropertyInput> = {};
    const errors: string[] = [];

    for (const [name, raw] of Object.entries(values)) {
      if (!Object.hasOwn(options, name)) {
        errors.push(`${name}: unknown property`);
        continue;
      }
      const property = options[name];
      if (isReadOnlyType(property.type)) continue;

      const result = convertPropertyInput(raw, property.type, property.options);
      if (!result.ok) {
        errors.push(`${name}: ${result.error}`);
      } else if (result.value !== null) {
        prepared[name] = { type: property.type, value: result.value };
      }
    }

    if (errors.length > 0) {
      throw new ValidationError(errors.join('; '));
    }
    return prepared;
  }

  async createPage(databaseId: string, properties: Record<string, PropertyInput>): Promise<RawItem> {
    const page = await this.client.request({
      method: 'POST',
      url: '/v1/pages',
      body: {
        parent: { database_id: databaseId },
        properties: formatProperties(properties),
      },
    });
    return requireObject(page, 'created page');
  }

  async updatePage(pageId: string, properties: Record<string, PropertyInput>): Promise<RawItem> {
    const page = await this.client.request({
      method: 'PATCH',
      url: `/v1/pages/${encodeURIComponent(pageId)}`,
      body: { properties: formatProperties(properties) },
    });
    return requireObject(page, 'updated page');
  }

  private async retrieveProperties(databaseId: string): Promise<Record<string, unknown>> {
    const database = await this.client.request({
      method: 'GET',
      url: `/v1/databases/${encodeURIComponent(databaseId)}`,
    });
    const properties = getProperty(database, 'properties');
    if (!isObject(properties)) {
      throw new MalformedResponseError(`database ${databaseId} has no "properties" object`);
    }
    return properties;
  }
}

/** Entry count, property names and created-date range per database. */
export function analyzeDatabaseData(data: Record<string, NotionRow[]>): DatabaseAnalysis[] {
  return Object.entries(data).map(([name, rows]) => {
    const dates = rows
      .map((row) => row.createdTime)
      .filter(isString)
      .sort();

    return {
      name,
      entries: rows.length,
      properties: rows.length > 0 ? Object.keys(rows[0].properties) : [],
      dateRange:
        dates.length > 0
          ? { from: dates[0].slice(0, 10), to: dates[dates.length - 1].slice(0, 10) }
          : null,
    };
  });
}

export function toNotionRow(page: RawItem): NotionRow {
  const properties: Record<string, unknown> = {};
  const raw = page.properties;
  if (isObject(raw)) {
    for (const [name, value] of Object.entries(raw)) {
      properties[name] = extractPropertyValue(value);
    }
  }

  return {
    notionId: isString(page.id) ? page.id : '',
    createdTime: stringOrNull(page.created_time),
    lastEditedTime: stringOrNull(page.last_edited_time),
    notionUrl: stringOrNull(page.url),
    properties,
  };
}

function databaseTitle(database: RawItem): string {
  const [first] = arrayOf(database.title);
  const text = stringOrNull(getProperty(first, 'plain_text'));
  return text ? text : 'Untitled';
}

function formatProperties(properties: Record<string, PropertyInput>): Record<string, PropertyPayload> {
  const formatted: Record<string, PropertyPayload> = {};
  for (const [name, { type, value }] of Object.entries(properties)) {
    const payload = formatPropertyValue(type, value);
    if (payload) formatted[name] = payload;
  }
  if (Object.keys(formatted).length === 0) {
    throw new ValidationError('No property values to write');
  }
  return formatted;
}

function requireObject(body: unknown, what: string): RawItem {
  if (!isObject(body)) {
    throw new MalformedResponseError(`${what} is not an object`);
  }
  return body;
}
