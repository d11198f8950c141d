// Types
export { TaskStatus, VALID_STATUSES, isTaskStatus, isValidStatus, toTaskStatus } from './types/index.js';
export type { TaskId, CaseNumber, Task, NewTask, TaskStatistics, ValidationResult } from './types/index.js';
export { ok, fail, isSuccess } from './types/index.js';

// Errors
export {
  CaseflowError, TaskNotFoundError, InvalidArgumentError, DuplicateCaseNumberError, isCaseflowError,
} from './errors.js';
export type { CaseflowErrorCode } from './errors.js';

// Logging
export {
  createLogger, setLogLevel, getLogLevel, addLogTransport, consoleTransport, formatEntry,
  isLogThreshold, LOG_THRESHOLDS,
} from './logger.js';
export type { Logger, LogLevel, LogThreshold, LogEntry, LogTransport } from './logger.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, closeDb, isUniqueViolation, CREATE_SCHEMA_SQL } from './db.js';
export type { CaseflowDb } from './db.js';

// Repository
export { SqliteTaskRepository, UNBOUNDED_LIMIT } from './queries/task-repository.js';
export type { TaskRepository } from './queries/task-repository.js';

// Services
export { CaseNumberSequence, CASE_NUMBER_PATTERN, CASE_NUMBER_PREFIX } from './services/case-number-sequence.js';
export {
  validateCreateTask, validateTaskChanges, validateStatus, validateTitle, validateDescription,
  invalidStatusMessage, MAX_TITLE_LENGTH, MAX_DESCRIPTION_LENGTH, DEFAULT_DUE_DAYS,
} from './services/task-validation.js';
export type { CreateTaskInput, TaskChangesInput, TaskChanges, CreateTaskValues } from './services/task-validation.js';
export { TaskService } from './services/task-service.js';
export type { TaskServiceOptions } from './services/task-service.js';
