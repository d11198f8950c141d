import type { CaseNumber, TaskId } from './types/task.js';

export type CaseflowErrorCode = 'NOT_FOUND' | 'INVALID_ARGUMENT' | 'DUPLICATE_CASE_NUMBER';

/** Base class for every error the service layer raises on purpose */
export class CaseflowError extends Error {
  constructor(
    public readonly code: CaseflowErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CaseflowError';
  }
}

export class TaskNotFoundError extends CaseflowError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'TaskNotFoundError';
  }

  static byId(id: TaskId): TaskNotFoundError {
    return new TaskNotFoundError(`Task with ID ${id} not found`);
  }

  static byCaseNumber(caseNumber: CaseNumber): TaskNotFoundError {
    return new TaskNotFoundError(`Task with case number ${caseNumber} not found`);
  }
}

export class InvalidArgumentError extends CaseflowError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class DuplicateCaseNumberError extends CaseflowError {
  constructor(
    public readonly caseNumber: CaseNumber,
    options?: { cause?: unknown },
  ) {
    super('DUPLICATE_CASE_NUMBER', `Case number ${caseNumber} already exists`);
    this.name = 'DuplicateCaseNumberError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function isCaseflowError(err: unknown): err is CaseflowError {
  return err instanceof CaseflowError;
}
