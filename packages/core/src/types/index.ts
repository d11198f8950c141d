export { TaskStatus, VALID_STATUSES, isTaskStatus, isValidStatus, toTaskStatus } from './task-status.js';
export type { TaskId, CaseNumber, Task, NewTask, TaskStatistics } from './task.js';
export type { ValidationResult } from './results.js';
export { ok, fail, isSuccess } from './results.js';
