/**
 * Business operations on tasks: validation, case-number generation and the
 * orchestration of repository calls.
 */

import type { Task, TaskId, TaskStatistics } from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import { VALID_STATUSES } from '../types/task-status.js';
import type { TaskRepository } from '../queries/task-repository.js';
import { UNBOUNDED_LIMIT } from '../queries/task-repository.js';
import { DuplicateCaseNumberError, InvalidArgumentError, TaskNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';
import { CaseNumberSequence } from './case-number-sequence.js';
import { validateCreateTask, validateStatus, validateTaskChanges } from './task-validation.js';

const log = createLogger('TaskService');

export interface TaskServiceOptions {
  sequence?: CaseNumberSequence;
  clock?: () => Date;
  /** Inserts to try when the store rejects a case number as taken */
  maxCreateAttempts?: number;
}

/** Trimmed value, or null when absent or whitespace only */
function normalize(value: string | null | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export class TaskService {
  private readonly sequence: CaseNumberSequence;
  private readonly clock: () => Date;
  private readonly maxCreateAttempts: number;

  constructor(
    private readonly repository: TaskRepository,
    options: TaskServiceOptions = {},
  ) {
    this.sequence = options.sequence ?? new CaseNumberSequence();
    this.clock = options.clock ?? (() => new Date());
    this.maxCreateAttempts = Math.max(1, options.maxCreateAttempts ?? 5);
  }

  // -------------------------------------------------------------------------
  // Create
  // -------------------------------------------------------------------------

  createTask(
    title: string | null | undefined,
    description?: string | null,
    status?: string | null,
    dueDate?: Date | null,
  ): Task {
    const validation = validateCreateTask({ title, description, status, dueDate }, this.clock());
    if (validation.type === 'error') throw new InvalidArgumentError(validation.message);

    for (let attempt = 1; ; attempt++) {
      const caseNumber = this.generateUniqueCaseNumber();
      try {
        const task = this.repository.save({ caseNumber, ...validation.data });
        log.info(`Created task ${task.caseNumber}`, { id: task.id, status: task.status });
        return task;
      } catch (err: unknown) {
        if (err instanceof DuplicateCaseNumberError && attempt < this.maxCreateAttempts) {
          log.warn(`Case number ${caseNumber} was taken concurrently, retrying`, { attempt });
          continue;
        }
        throw err;
      }
    }
  }

  /** Next free case number; skips values already present in storage */
  private generateUniqueCaseNumber(): string {
    let caseNumber: string;
    do {
      caseNumber = CaseNumberSequence.format(this.sequence.next());
    } while (this.repository.existsByCaseNumber(caseNumber));
    return caseNumber;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Every task, latest due first */
  getAllTasks(): Task[] {
    return this.repository.findAllOrderedByDueDateDesc();
  }

  /** Unbounded substring search; a blank term returns every task */
  searchTasks(search: string | null | undefined): Task[];
  /** One page of tasks matching the optional term and status */
  searchTasks(search: string | null | undefined, status: string | null | undefined, offset: number, pageSize: number): Task[];
  searchTasks(
    search: string | null | undefined,
    status?: string | null,
    offset?: number,
    pageSize?: number,
  ): Task[] {
    if (offset === undefined || pageSize === undefined) {
      if (search == null || search.trim().length === 0) return this.getAllTasks();
      return this.repository.searchPaginated(search, null, 0, UNBOUNDED_LIMIT);
    }
    return this.repository.searchPaginated(normalize(search), normalize(status), offset, pageSize);
  }

  countAllTasks(): number {
    return this.repository.count();
  }

  countFilteredTasks(search: string | null | undefined, status: string | null | undefined): number {
    const term = normalize(search);
    const statusFilter = normalize(status);
    if (term === null && statusFilter === null) return this.repository.count();
    return this.repository.countFiltered(term, statusFilter);
  }

  getTaskById(id: TaskId): Task {
    const task = this.repository.findById(id);
    if (!task) throw TaskNotFoundError.byId(id);
    return task;
  }

  findTaskById(id: TaskId): Task | null {
    return this.repository.findById(id);
  }

  getTaskByCaseNumber(caseNumber: string): Task {
    const task = this.repository.findByCaseNumber(caseNumber);
    if (!task) throw TaskNotFoundError.byCaseNumber(caseNumber);
    return task;
  }

  getTasksByStatus(status: string): Task[] {
    return this.repository.findByStatus(status);
  }

  getTasksDueBefore(date: Date): Task[] {
    return this.repository.findDueBefore(date);
  }

  getOverdueTasks(): Task[] {
    return this.repository.findOverdue(this.clock());
  }

  getTasksCreatedBetween(start: Date, end: Date): Task[] {
    return this.repository.findCreatedBetween(start, end);
  }

  /**
   * `total`, then one lower-cased key per status that has tasks, then
   * `overdue` as of now.
   */
  getTaskStatistics(): TaskStatistics {
    const stats: TaskStatistics = { total: this.repository.count() };
    for (const [status, count] of Object.entries(this.repository.countByStatus())) {
      stats[status.toLowerCase()] = count;
    }
    stats.overdue = this.repository.findOverdue(this.clock()).length;
    return stats;
  }

  getValidStatuses(): TaskStatus[] {
    return [...VALID_STATUSES];
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  updateTaskStatus(id: TaskId, status: string | null | undefined): Task {
    const validation = validateStatus(status);
    if (validation.type === 'error') throw new InvalidArgumentError(validation.message);

    return this.repository.transaction(() => {
      const task = this.getTaskById(id);
      const updated = this.repository.save({ ...task, status: validation.data });
      log.info(`Task ${updated.caseNumber} status set to ${updated.status}`, { id });
      return updated;
    });
  }

  /**
   * Partial update. Only non-null arguments are applied; see
   * validateTaskChanges for how blank values are treated.
   */
  updateTask(
    id: TaskId,
    title?: string | null,
    description?: string | null,
    status?: string | null,
    dueDate?: Date | null,
  ): Task {
    return this.repository.transaction(() => {
      const task = this.getTaskById(id);
      const validation = validateTaskChanges({ title, description, status, dueDate });
      if (validation.type === 'error') throw new InvalidArgumentError(validation.message);

      const updated = this.repository.save({ ...task, ...validation.data });
      log.info(`Updated task ${updated.caseNumber}`, { id, fields: Object.keys(validation.data) });
      return updated;
    });
  }

  deleteTask(id: TaskId): void {
    this.repository.transaction(() => {
      if (!this.repository.existsById(id)) throw TaskNotFoundError.byId(id);
      this.repository.deleteById(id);
    });
    log.info(`Deleted task ${id}`);
  }
}
