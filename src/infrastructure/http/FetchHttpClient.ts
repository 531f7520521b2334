/**
 * Fetch HTTP Client
 * Layer: Infrastructure
 * Pattern: Adapter (implements IHttpClient over Node's global fetch)
 *
 * One instance per remote system. The container builds one for Affinity and
 * one for Notion, each with its own base URL, bearer token and extra headers
 * (Notion also needs `Notion-Version`).
 *
 * Calls never leave the base URL's origin. Every call is bounded by
 * `timeoutMs` through an AbortController; an abort surfaces as
 * RequestTimeoutError. Bodies are read as text first so a failed
 * call can report exactly what the server said, then parsed as JSON.
 */
import type { Logger } from '@core/logger';
import type { IHttpClient } from '@domain/interfaces/IHttpClient';
import {
  MalformedResponseError,
  RemoteRequestError,
  RequestTimeoutError,
} from '@shared/errors/AppError';
import type { HttpResponse, RequestDescriptor } from '@shared/types';

export interface HttpClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export class FetchHttpClient implements IHttpClient {
  constructor(
    private readonly options: HttpClientOptions,
    private readonly log: Logger,
  ) {}

  async send(request: RequestDescriptor): Promise<HttpResponse> {
    const url = this.buildUrl(request);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.token}`,
      Accept: 'application/json',
      ...this.options.headers,
      ...request.headers,
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const startedAt = Date.now();
    try {
      const response = await fetch(url, {
        method: request.method,
        headers,
        body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
        signal: controller.signal,
      });
      const text = await response.text();

      this.log.debug(
        { method: request.method, url, status: response.status, durationMs: Date.now() - startedAt },
        'Remote request completed',
      );

      return {
        status: response.status,
        ok: response.ok,
        body: parseJson(text),
        text,
      };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new RequestTimeoutError(url, this.options.timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }

  async request(request: RequestDescriptor): Promise<unknown> {
    const response = await this.send(request);

    if (!response.ok) {
      throw new RemoteRequestError(response.status, response.text, this.buildUrl(request));
    }
    if (response.text !== '' && response.body === null) {
      throw new MalformedResponseError(`body of ${request.method} ${request.url} is not JSON`);
    }
    return response.body;
  }

  /**
   * Relative paths resolve against the base URL; absolute next-page URLs pass
   * through as long as they stay on the base URL's origin, since every call
   * carries the bearer token.
   */
  buildUrl(request: RequestDescriptor): string {
    const base = new URL(this.options.baseUrl);
    const url = new URL(request.url, base);
    if (url.origin !== base.origin) {
      throw new MalformedResponseError(`refusing to call ${url.origin}, outside ${base.origin}`);
    }
    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }
}

function parseJson(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
