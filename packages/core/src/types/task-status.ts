export const TaskStatus = {
  Pending: 'PENDING',
  InProgress: 'IN_PROGRESS',
  Completed: 'COMPLETED',
  Cancelled: 'CANCELLED',
  OnHold: 'ON_HOLD',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Canonical statuses in declaration order */
export const VALID_STATUSES: readonly TaskStatus[] = Object.values(TaskStatus);

export function isTaskStatus(value: string): value is TaskStatus {
  return VALID_STATUSES.some(s => s === value);
}

/** Case-insensitive check against the canonical set */
export function isValidStatus(value: string | null | undefined): boolean {
  return value != null && isTaskStatus(value.toUpperCase());
}

/** Upper-cased canonical form, or null when the value is not a known status */
export function toTaskStatus(value: string): TaskStatus | null {
  const upper = value.toUpperCase();
  return isTaskStatus(upper) ? upper : null;
}
