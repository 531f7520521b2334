/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure reach the error handler:
 *
 *   1. Operational errors: expected problems such as "the CRM answered 404",
 *      "the workspace API returned a page without `results`" or "field id is
 *      missing". They carry an HTTP status the API can answer with.
 *
 *   2. Programmer / deployment errors: bugs, or a process started without its
 *      credentials. These are flagged non-operational and surface as a
 *      generic 500.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for every subclass when the code is compiled down to CommonJS.
 *
 * The remote-call errors (RemoteRequestError, MalformedResponseError,
 * PaginationLimitError, RequestTimeoutError) all map to gateway statuses:
 * the upstream API misbehaved, not the client of this service.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Missing or invalid environment. Raised before any network call is made. */
export class ConfigurationError extends AppError {
  public readonly variables: string[];

  constructor(message: string, variables: string[] = []) {
    super(message, 500, false);
    this.variables = variables;
  }
}

/** A remote API answered with a non-success status. */
export class RemoteRequestError extends AppError {
  public readonly remoteStatus: number;
  public readonly responseBody: string;
  public readonly url: string;

  constructor(remoteStatus: number, responseBody: string, url: string) {
    super(`Remote request failed (${remoteStatus}): ${url}`, 502);
    this.remoteStatus = remoteStatus;
    this.responseBody = responseBody;
    this.url = url;
  }
}

/** A remote API answered 2xx but the body lacks an expected structural field. */
export class MalformedResponseError extends AppError {
  constructor(message: string) {
    super(`Malformed response: ${message}`, 502);
  }
}

/** The server kept signalling another page after `maxPages` pages. */
export class PaginationLimitError extends AppError {
  public readonly maxPages: number;

  constructor(maxPages: number) {
    super(`Pagination did not terminate within ${maxPages} pages`, 502);
    this.maxPages = maxPages;
  }
}

export class RequestTimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Remote request timed out after ${timeoutMs}ms: ${url}`, 504);
    this.timeoutMs = timeoutMs;
  }
}
