import type { HttpResponse, RequestDescriptor } from '@shared/types';

/**
 * HTTP Client Interface
 * Layer: Domain
 *
 * Each remote system gets its own client handle, configured with a base URL,
 * bearer token and timeout. Collectors and services receive the handle
 * explicitly instead of reaching for a module-level instance, so tests can
 * pass an in-process stub and two handles never share state.
 *
 *   - send():    one round trip, whatever the status. Used where a non-2xx
 *                answer is an expected outcome (single-field read/write).
 *   - request(): one round trip that must succeed. Non-2xx raises
 *                RemoteRequestError; the parsed body is returned.
 */
export interface IHttpClient {
  send(request: RequestDescriptor): Promise<HttpResponse>;
  request(request: RequestDescriptor): Promise<unknown>;
}
