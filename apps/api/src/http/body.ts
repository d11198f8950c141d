import type { ZodError, ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { badRequest, unsupportedMediaType, validationFailed } from './errors.js';
import { FORMAT_ISSUE } from '../schemas/task-requests.js';
import type { ApiRequest } from './types.js';

export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  return contentType.split(';')[0]?.trim().toLowerCase() === 'application/json';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A value of the wrong type or shape, as opposed to a failed constraint */
function isFormatIssue(issue: ZodIssue): boolean {
  if (issue.code === 'invalid_type') return issue.received !== 'undefined';
  return issue.code === 'custom' && issue.params?.['kind'] === FORMAT_ISSUE;
}

/** Field name to message; the first issue reported for a field wins */
export function formatZodErrors(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.errors) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    fields[field] ??= issue.message;
  }
  return fields;
}

/**
 * Parse and validate a JSON request body. Checks run in order: media type,
 * presence, JSON syntax, value formats, field constraints.
 */
export function readJsonBody<T>(request: ApiRequest, schema: ZodType<T, ZodTypeDef, unknown>): T {
  if (!isJsonContentType(request.contentType)) throw unsupportedMediaType();
  if (request.body.trim().length === 0) throw badRequest('Request body is missing');

  let parsed: unknown;
  try {
    parsed = JSON.parse(request.body);
  } catch {
    throw badRequest('Malformed JSON request');
  }
  if (!isPlainObject(parsed)) throw badRequest('Malformed JSON request');

  const result = schema.safeParse(parsed);
  if (result.success) return result.data;

  const formatIssue = result.error.errors.find(isFormatIssue);
  if (formatIssue) throw badRequest(`Invalid value for field: ${formatIssue.path.join('.')}`);
  throw validationFailed(formatZodErrors(result.error));
}
