/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * RequestDescriptor is what a caller hands to the collector: everything
 * needed to issue one HTTP call. The pagination strategies derive the next
 * descriptor from the initial one, so it stays a plain value object.
 * RawItem is one element of a remote collection, passed through untouched.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean;

export interface RequestDescriptor {
  method: HttpMethod;
  /** Path relative to the client's base URL, or an absolute URL (next-page links). */
  url: string;
  query?: Record<string, QueryValue | undefined>;
  body?: Record<string, unknown>;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON body; null for an empty body or one that is not JSON. */
  body: unknown;
  /** Raw body text, kept for diagnostics. */
  text: string;
}

export type RawItem = Record<string, unknown>;

export interface CollectOptions {
  /** Upper bound on requests before giving up with PaginationLimitError. */
  maxPages?: number;
  /** Stop once this many items have been gathered and return that prefix. */
  limit?: number;
}

/** Timing metadata returned alongside collection responses. */
export interface ResponseMeta {
  totalTimeMs?: number;
  count?: number;
}
