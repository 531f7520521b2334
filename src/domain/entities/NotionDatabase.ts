/**
 * Notion Database Entities
 * Layer: Domain
 *
 * A NotionRow is one page of a database query with every property reduced to
 * a plain value by the property codec. The four metadata fields come from
 * the page object itself, not from its properties.
 */
export interface NotionRow {
  notionId: string;
  createdTime: string | null;
  lastEditedTime: string | null;
  notionUrl: string | null;
  properties: Record<string, unknown>;
}

/** Database title → database id. */
export type DatabaseMapping = Record<string, string>;

/** Property name → property type tag. */
export type DatabaseSchema = Record<string, string>;

export interface PropertyOptions {
  type: string;
  /** Allowed option names for select / multi_select, null otherwise. */
  options: string[] | null;
}

/** A value to write, tagged with the property type it is written as. */
export interface PropertyInput {
  type: string;
  value: unknown;
}

export interface DatabaseQuery {
  filter?: Record<string, unknown>;
  sorts?: Record<string, unknown>[];
  limit?: number;
}

export interface DatabaseAnalysis {
  name: string;
  entries: number;
  properties: string[];
  dateRange: { from: string; to: string } | null;
}
