/**
 * Zod schemas for task request bodies. Unknown fields are stripped; an explicit
 * `null` is treated the same as an absent field.
 */

import { z } from 'zod';
import { MAX_DESCRIPTION_LENGTH, MAX_TITLE_LENGTH } from '@caseflow/core';

/** Marks an issue as a malformed value rather than a failed constraint */
export const FORMAT_ISSUE = 'format';

// 2030-01-15T10:00, 2030-01-15T10:00:00, 2030-01-15T10:00:00.000Z, ...+02:00
const DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(?:Z|([+-])(\d{2}):(\d{2}))?$/;

/**
 * Parse an ISO-8601 date-time. A value without an offset is read as UTC, and
 * fractions finer than a millisecond are truncated. Returns null for anything
 * else, including calendar dates that do not exist.
 */
export function parseDateTime(value: string): Date | null {
  const match = DATE_TIME.exec(value);
  if (!match) return null;
  const [, year = '', month = '', day = '', hour = '', minute = '', second = '0', fraction = '', sign, offsetHour = '0',
    offsetMinute = '0'] = match;
  const y = Number(year);
  const mo = Number(month) - 1;
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  if (h > 23 || mi > 59 || s > 59 || Number(offsetHour) > 23 || Number(offsetMinute) > 59) return null;

  const local = new Date(0);
  local.setUTCFullYear(y, mo, d);
  local.setUTCHours(h, mi, s, Number(fraction.slice(0, 3).padEnd(3, '0')));
  if (local.getUTCFullYear() !== y || local.getUTCMonth() !== mo || local.getUTCDate() !== d) return null;

  const offsetMs = (Number(offsetHour) * 60 + Number(offsetMinute)) * 60_000;
  const date = new Date(local.getTime() + (sign === '-' ? offsetMs : -offsetMs));
  return Number.isNaN(date.getTime()) ? null : date;
}

function nullToUndefined(value: unknown): unknown {
  return value === null ? undefined : value;
}

function hasText(value: string): boolean {
  return value.trim().length > 0;
}

const dateTime = z.string().transform((value, ctx) => {
  const date = parseDateTime(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date-time', params: { kind: FORMAT_ISSUE } });
    return z.NEVER;
  }
  return date;
});

const title = z.string().max(MAX_TITLE_LENGTH, `Title must not exceed ${MAX_TITLE_LENGTH} characters`);
const description = z.string().max(
  MAX_DESCRIPTION_LENGTH,
  `Description must not exceed ${MAX_DESCRIPTION_LENGTH} characters`,
);

export const createTaskSchema = z.object({
  title: z.preprocess(
    nullToUndefined,
    z.string({ required_error: 'Title is required' })
      .refine(hasText, 'Title is required')
      .pipe(title),
  ),
  description: z.preprocess(nullToUndefined, description.optional()),
  status: z.preprocess(nullToUndefined, z.string().optional()),
  dueDate: z.preprocess(nullToUndefined, z.string({ required_error: 'Due date is required' }).pipe(dateTime)),
});

export const updateStatusSchema = z.object({
  status: z.preprocess(
    nullToUndefined,
    z.string({ required_error: 'Status is required' }).refine(hasText, 'Status is required'),
  ),
});

export const updateTaskSchema = z.object({
  title: z.preprocess(nullToUndefined, title.optional()),
  description: z.preprocess(nullToUndefined, description.optional()),
  status: z.preprocess(nullToUndefined, z.string().optional()),
  dueDate: z.preprocess(nullToUndefined, dateTime.optional()),
});

export type CreateTaskRequest = z.infer<typeof createTaskSchema>;
export type UpdateStatusRequest = z.infer<typeof updateStatusSchema>;
export type UpdateTaskRequest = z.infer<typeof updateTaskSchema>;
