import type { TaskStatus } from './task-status.js';

export type TaskId = number;
export type CaseNumber = string;

export interface Task {
  readonly id: TaskId;
  readonly caseNumber: CaseNumber;
  readonly title: string;
  readonly description: string | null;
  readonly status: TaskStatus;
  readonly dueDate: string; // ISO string
  readonly createdDate: string; // ISO string
  readonly updatedDate: string; // ISO string
}

/** A task before the store has assigned its id and timestamps */
export type NewTask = Omit<Task, 'id' | 'createdDate' | 'updatedDate'>;

export type TaskStatistics = Record<string, number>;
