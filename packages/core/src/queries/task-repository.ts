/**
 * Task persistence: the repository contract the service depends on, and its
 * SQLite implementation on Drizzle ORM.
 */

import { eq, and, asc, desc, count, gte, lt, lte, ne, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { CaseflowDb } from '../db.js';
import { getRawDb, isUniqueViolation } from '../db.js';
import { DuplicateCaseNumberError, TaskNotFoundError } from '../errors.js';
import type { Task, TaskId, NewTask } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { tasks } from '../schema/tasks.js';

/** Page size used when a caller wants every match in one page */
export const UNBOUNDED_LIMIT = 2_147_483_647;

export interface TaskRepository {
  /** Insert when the task has no id yet, update otherwise */
  save(task: NewTask | Task): Task;
  findById(id: TaskId): Task | null;
  existsById(id: TaskId): boolean;
  deleteById(id: TaskId): void;
  count(): number;
  findByCaseNumber(caseNumber: string | null | undefined): Task | null;
  existsByCaseNumber(caseNumber: string | null | undefined): boolean;
  /** Case-insensitive; newest first */
  findByStatus(status: string): Task[];
  /** Earliest due first */
  findDueBefore(before: Date): Task[];
  /** Due before `asOf` and not COMPLETED */
  findOverdue(asOf: Date): Task[];
  /**
   * Substring match on title, description or case number. An empty term
   * matches everything, a null term matches nothing.
   */
  search(term: string | null): Task[];
  /** Latest due first; each filter applies only when present */
  searchPaginated(term: string | null, status: string | null, offset: number, limit: number): Task[];
  countFiltered(term: string | null, status: string | null): number;
  countByStatus(): Record<string, number>;
  findAllOrderedByDueDateDesc(): Task[];
  findAllPaginated(offset: number, limit: number): Task[];
  /** Inclusive range, newest first */
  findCreatedBetween(start: Date, end: Date): Task[];
  /** Run `fn` as one atomic unit against storage */
  transaction<T>(fn: () => T): T;
}

// ---------------------------------------------------------------------------
// Filter helpers
// ---------------------------------------------------------------------------

function escapeLike(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/** Case-insensitive substring match on case number, title or description */
function matchesTerm(term: string): SQL {
  const pattern = `%${escapeLike(term.toLowerCase())}%`;
  return sql`(lower(${tasks.caseNumber}) LIKE ${pattern} ESCAPE '\\'
    OR lower(${tasks.title}) LIKE ${pattern} ESCAPE '\\'
    OR lower(${tasks.description}) LIKE ${pattern} ESCAPE '\\')`;
}

function matchesStatus(status: string): SQL {
  return sql`lower(${tasks.status}) = ${status.toLowerCase()}`;
}

function filterConditions(term: string | null, status: string | null): SQL | undefined {
  const conditions: SQL[] = [];
  if (term != null) conditions.push(matchesTerm(term));
  if (status != null) conditions.push(matchesStatus(status));
  return conditions.length > 0 ? and(...conditions) : undefined;
}

function clampPaging(offset: number, limit: number): { offset: number; limit: number } {
  return {
    offset: Math.max(0, Math.floor(offset)),
    limit: Math.max(0, Math.floor(limit)),
  };
}

// ---------------------------------------------------------------------------
// SQLite implementation
// ---------------------------------------------------------------------------

export class SqliteTaskRepository implements TaskRepository {
  constructor(
    private readonly db: CaseflowDb,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  save(task: NewTask | Task): Task {
    return 'id' in task ? this.update(task) : this.insert(task);
  }

  private insert(task: NewTask): Task {
    const now = this.clock().toISOString();
    let row: Task | undefined;
    try {
      row = this.db.insert(tasks).values({
        caseNumber: task.caseNumber,
        title: task.title,
        description: task.description,
        status: task.status,
        dueDate: task.dueDate,
        createdDate: now,
        updatedDate: now,
      }).returning().get();
    } catch (err: unknown) {
      if (isUniqueViolation(err)) throw new DuplicateCaseNumberError(task.caseNumber, { cause: err });
      throw err;
    }
    if (!row) throw new Error(`Insert of ${task.caseNumber} returned no row`);
    return row;
  }

  /** Case number and created date are never rewritten */
  private update(task: Task): Task {
    const row = this.db.update(tasks).set({
      title: task.title,
      description: task.description,
      status: task.status,
      dueDate: task.dueDate,
      updatedDate: this.clock().toISOString(),
    }).where(eq(tasks.id, task.id)).returning().get();
    if (!row) throw TaskNotFoundError.byId(task.id);
    return row;
  }

  findById(id: TaskId): Task | null {
    return this.db.select().from(tasks).where(eq(tasks.id, id)).get() ?? null;
  }

  existsById(id: TaskId): boolean {
    return this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, id)).get() !== undefined;
  }

  deleteById(id: TaskId): void {
    this.db.delete(tasks).where(eq(tasks.id, id)).run();
  }

  count(): number {
    return this.db.select({ value: count() }).from(tasks).get()?.value ?? 0;
  }

  findByCaseNumber(caseNumber: string | null | undefined): Task | null {
    if (caseNumber == null) return null;
    return this.db.select().from(tasks).where(eq(tasks.caseNumber, caseNumber)).get() ?? null;
  }

  existsByCaseNumber(caseNumber: string | null | undefined): boolean {
    if (caseNumber == null) return false;
    const row = this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.caseNumber, caseNumber)).get();
    return row !== undefined;
  }

  findByStatus(status: string): Task[] {
    return this.db.select().from(tasks)
      .where(matchesStatus(status))
      .orderBy(desc(tasks.createdDate), desc(tasks.id))
      .all();
  }

  findDueBefore(before: Date): Task[] {
    return this.db.select().from(tasks)
      .where(lt(tasks.dueDate, before.toISOString()))
      .orderBy(asc(tasks.dueDate), asc(tasks.id))
      .all();
  }

  findOverdue(asOf: Date): Task[] {
    return this.db.select().from(tasks)
      .where(and(lt(tasks.dueDate, asOf.toISOString()), ne(tasks.status, TaskStatus.Completed)))
      .orderBy(asc(tasks.dueDate), asc(tasks.id))
      .all();
  }

  search(term: string | null): Task[] {
    if (term == null) return [];
    return this.db.select().from(tasks).where(matchesTerm(term)).orderBy(asc(tasks.id)).all();
  }

  searchPaginated(term: string | null, status: string | null, offset: number, limit: number): Task[] {
    const page = clampPaging(offset, limit);
    if (page.limit === 0) return [];
    return this.db.select().from(tasks)
      .where(filterConditions(term, status))
      .orderBy(desc(tasks.dueDate), desc(tasks.id))
      .limit(page.limit)
      .offset(page.offset)
      .all();
  }

  countFiltered(term: string | null, status: string | null): number {
    const row = this.db.select({ value: count() }).from(tasks).where(filterConditions(term, status)).get();
    return row?.value ?? 0;
  }

  countByStatus(): Record<string, number> {
    const rows = this.db.select({ status: tasks.status, value: count() })
      .from(tasks)
      .groupBy(tasks.status)
      .orderBy(asc(tasks.status))
      .all();
    const counts: Record<string, number> = {};
    for (const row of rows) counts[row.status] = row.value;
    return counts;
  }

  findAllOrderedByDueDateDesc(): Task[] {
    return this.db.select().from(tasks).orderBy(desc(tasks.dueDate), desc(tasks.id)).all();
  }

  findAllPaginated(offset: number, limit: number): Task[] {
    return this.searchPaginated(null, null, offset, limit);
  }

  findCreatedBetween(start: Date, end: Date): Task[] {
    return this.db.select().from(tasks)
      .where(and(gte(tasks.createdDate, start.toISOString()), lte(tasks.createdDate, end.toISOString())))
      .orderBy(desc(tasks.createdDate), desc(tasks.id))
      .all();
  }

  transaction<T>(fn: () => T): T {
    return getRawDb(this.db).transaction(fn)();
  }
}
