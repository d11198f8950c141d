/**
 * Input rules for creating and changing tasks. Every function here is pure and
 * returns a ValidationResult, so the rules can be checked without a store.
 */

import type { NewTask } from '../types/task.js';
import type { ValidationResult } from '../types/results.js';
import { ok, fail } from '../types/results.js';
import { TaskStatus, VALID_STATUSES, toTaskStatus } from '../types/task-status.js';

export const MAX_TITLE_LENGTH = 255;
export const MAX_DESCRIPTION_LENGTH = 1000;
export const DEFAULT_DUE_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreateTaskInput {
  title: string | null | undefined;
  description?: string | null;
  status?: string | null;
  dueDate?: Date | null;
}

export interface TaskChangesInput {
  title?: string | null;
  description?: string | null;
  status?: string | null;
  dueDate?: Date | null;
}

/** Fields a partial update will overwrite; absent keys stay as they are */
export interface TaskChanges {
  title?: string;
  description?: string;
  status?: TaskStatus;
  dueDate?: string;
}

export type CreateTaskValues = Omit<NewTask, 'caseNumber'>;

function hasText(value: string | null | undefined): value is string {
  return value != null && value.trim().length > 0;
}

export function invalidStatusMessage(status: string): string {
  return `Invalid status: ${status}. Valid statuses are: ${VALID_STATUSES.join(', ')}`;
}

export function validateTitle(title: string): ValidationResult<string> {
  const trimmed = title.trim();
  if (trimmed.length === 0) return fail('Title is required');
  if (trimmed.length > MAX_TITLE_LENGTH) return fail(`Title must not exceed ${MAX_TITLE_LENGTH} characters`);
  return ok(trimmed);
}

export function validateDescription(description: string): ValidationResult<string> {
  const trimmed = description.trim();
  if (trimmed.length > MAX_DESCRIPTION_LENGTH) {
    return fail(`Description must not exceed ${MAX_DESCRIPTION_LENGTH} characters`);
  }
  return ok(trimmed);
}

/** Case-insensitive match against the canonical set; yields the upper-case form */
export function validateStatus(status: string | null | undefined): ValidationResult<TaskStatus> {
  if (!hasText(status)) return fail('Status cannot be empty');
  const canonical = toTaskStatus(status);
  return canonical ? ok(canonical) : fail(invalidStatusMessage(status));
}

/** Checks run in order: title, status, due date, description */
export function validateCreateTask(input: CreateTaskInput, now: Date): ValidationResult<CreateTaskValues> {
  if (!hasText(input.title)) return fail('Title is required');
  const title = validateTitle(input.title);
  if (title.type === 'error') return title;

  let status: TaskStatus = TaskStatus.Pending;
  if (input.status != null) {
    const result = validateStatus(input.status);
    if (result.type === 'error') return result;
    status = result.data;
  }

  if (input.dueDate != null && input.dueDate.getTime() < now.getTime()) {
    return fail('Due date cannot be in the past');
  }
  const dueDate = input.dueDate ?? new Date(now.getTime() + DEFAULT_DUE_DAYS * DAY_MS);

  let description: string | null = null;
  if (input.description != null) {
    const result = validateDescription(input.description);
    if (result.type === 'error') return result;
    description = result.data;
  }

  return ok({ title: title.data, description, status, dueDate: dueDate.toISOString() });
}

/**
 * Normalize a partial update. A blank title or status is ignored, a non-null
 * description is trimmed and applied even when empty, and the due date is taken
 * as given: past dates are only rejected at creation.
 */
export function validateTaskChanges(input: TaskChangesInput): ValidationResult<TaskChanges> {
  const changes: TaskChanges = {};

  if (hasText(input.title)) {
    const result = validateTitle(input.title);
    if (result.type === 'error') return result;
    changes.title = result.data;
  }

  if (input.description != null) {
    const result = validateDescription(input.description);
    if (result.type === 'error') return result;
    changes.description = result.data;
  }

  if (hasText(input.status)) {
    const result = validateStatus(input.status);
    if (result.type === 'error') return result;
    changes.status = result.data;
  }

  if (input.dueDate != null) {
    changes.dueDate = input.dueDate.toISOString();
  }

  return ok(changes);
}
