/**
 * Error bodies and the central error-to-response mapping. Domain errors get the
 * uniform `{ status, error, message, timestamp }` body; request-shape problems
 * (bad JSON, wrong media type, unknown method) get a short `{ error, message }`.
 */

import type { CaseflowErrorCode } from '@caseflow/core';
import { isCaseflowError, createLogger } from '@caseflow/core';
import type { ApiRequest, ApiResponse } from './types.js';

const log = createLogger('HttpErrors');

export interface ErrorBody {
  status: number;
  error: string;
  message: string;
  timestamp: string;
}

export interface ValidationErrorBody extends ErrorBody {
  validationErrors: Record<string, string>;
}

export interface ProblemBody {
  error: string;
  message: string;
}

/** Thrown by request parsing; carries the exact response to send */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: ProblemBody | ValidationErrorBody,
    public readonly headers?: Record<string, string>,
  ) {
    super(body.message);
    this.name = 'HttpError';
  }

  toResponse(): ApiResponse {
    return this.headers
      ? { status: this.status, body: this.body, headers: this.headers }
      : { status: this.status, body: this.body };
  }
}

const DOMAIN_ERRORS: Record<CaseflowErrorCode, { status: number; error: string }> = {
  NOT_FOUND: { status: 404, error: 'Task Not Found' },
  INVALID_ARGUMENT: { status: 400, error: 'Invalid Request' },
  DUPLICATE_CASE_NUMBER: { status: 409, error: 'Duplicate Case Number' },
};

export function errorBody(status: number, error: string, message: string): ErrorBody {
  return { status, error, message, timestamp: new Date().toISOString() };
}

export function badRequest(message: string): HttpError {
  return new HttpError(400, { error: 'Bad Request', message });
}

export function typeMismatch(name: string): HttpError {
  return new HttpError(400, { error: `Invalid path parameter: ${name}`, message: 'Expected type: int' });
}

export function unsupportedMediaType(): HttpError {
  return new HttpError(415, {
    error: 'Unsupported Media Type',
    message: 'Content-Type header is missing or not supported. Expected: application/json',
  });
}

export function methodNotAllowed(method: string, allowed: readonly string[]): HttpError {
  return new HttpError(
    405,
    { error: 'Method Not Allowed', message: `HTTP method '${method}' is not supported for this endpoint` },
    { Allow: allowed.join(', ') },
  );
}

export function routeNotFound(method: string, path: string): HttpError {
  return new HttpError(404, { error: 'Not Found', message: `No route for ${method} ${path}` });
}

export function validationFailed(fields: Record<string, string>): HttpError {
  return new HttpError(400, {
    ...errorBody(400, 'Validation Failed', 'Request validation failed'),
    validationErrors: fields,
  });
}

/** Map anything thrown while handling `request` to a response */
export function toErrorResponse(err: unknown, request: ApiRequest): ApiResponse {
  if (err instanceof HttpError) {
    log.warn(`${request.method} ${request.url} rejected: ${err.message}`, { status: err.status });
    return err.toResponse();
  }

  if (isCaseflowError(err)) {
    const mapped = DOMAIN_ERRORS[err.code];
    log.warn(`${request.method} ${request.url} failed: ${err.message}`, { code: err.code });
    return { status: mapped.status, body: errorBody(mapped.status, mapped.error, err.message) };
  }

  log.error(`Unhandled error on ${request.method} ${request.url}`, {
    error: err instanceof Error ? err.stack ?? err.message : String(err),
  });
  return { status: 500, body: errorBody(500, 'Internal Server Error', 'An unexpected error occurred') };
}
