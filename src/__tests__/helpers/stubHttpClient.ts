/**
 * In-process HTTP stand-in
 * Layer: Test Helpers
 *
 * Implements IHttpClient without touching the network. A handler decides the
 * response for each request; every request is recorded in `calls` so tests
 * can assert exactly what would have been sent.
 *
 *   const client = stubSequence([jsonResponse(page1), jsonResponse(page2)]);
 *   await collector.collect(client, request, strategy);
 *   expect(client.calls[1].body).toEqual({ start_cursor: 'c1' });
 */
import type { IHttpClient } from '@domain/interfaces/IHttpClient';
import { RemoteRequestError } from '@shared/errors/AppError';
import type { HttpResponse, RequestDescriptor } from '@shared/types';

type Handler = (request: RequestDescriptor, index: number) => HttpResponse;

export class StubHttpClient implements IHttpClient {
  readonly calls: RequestDescriptor[] = [];

  constructor(private readonly handler: Handler) {}

  async send(request: RequestDescriptor): Promise<HttpResponse> {
    this.calls.push(request);
    return this.handler(request, this.calls.length - 1);
  }

  async request(request: RequestDescriptor): Promise<unknown> {
    const response = await this.send(request);
    if (!response.ok) {
      throw new RemoteRequestError(response.status, response.text, request.url);
    }
    return response.body;
  }
}

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    body,
    text: body === null ? '' : JSON.stringify(body),
  };
}

export function textResponse(text: string, status: number): HttpResponse {
  return { status, ok: status >= 200 && status < 300, body: null, text };
}

/** Answers the n-th request with the n-th response; fails the test past the end. */
export function stubSequence(responses: HttpResponse[]): StubHttpClient {
  return new StubHttpClient((request, index) => {
    if (index >= responses.length) {
      throw new Error(`Unexpected request #${index + 1}: ${request.method} ${request.url}`);
    }
    return responses[index];
  });
}

/** Answers by exact request URL. */
export function stubRoutes(routes: Record<string, HttpResponse>): StubHttpClient {
  return new StubHttpClient((request) => {
    if (!Object.hasOwn(routes, request.url)) {
      throw new Error(`No stubbed route for ${request.method} ${request.url}`);
    }
    return routes[request.url];
  });
}
