/**
 * chalk-based terminal output for tasks, statistics and command results.
 */

import chalk from 'chalk';
import { TaskStatus } from '@caseflow/core';
import type { Task, TaskStatistics } from '@caseflow/core';

type Paint = (s: string) => string;

const STATUS_COLORS: Record<TaskStatus, Paint> = {
  PENDING: chalk.gray,
  IN_PROGRESS: chalk.yellow,
  COMPLETED: chalk.green,
  CANCELLED: chalk.dim,
  ON_HOLD: chalk.magenta,
};

const STATUS_WIDTH = 'IN_PROGRESS'.length;

// --- Formatting functions ---

export function formatStatus(status: TaskStatus, width = 0): string {
  return STATUS_COLORS[status](status.padEnd(width));
}

/** Calendar day of an ISO timestamp, flagged when the task is overdue */
export function formatDueDate(dueDate: string, status: TaskStatus, now: Date = new Date()): string {
  const day = dueDate.slice(0, 10);
  if (status !== TaskStatus.Completed && dueDate < now.toISOString()) {
    return chalk.red(`OVERDUE ${day}`);
  }
  return chalk.dim(`due ${day}`);
}

export function formatTaskRow(task: Task, now: Date = new Date()): string {
  const id = chalk.dim(String(task.id).padStart(4));
  const title = chalk.bold(truncate(task.title, 48).padEnd(48));
  return `${id}  ${task.caseNumber}  ${formatStatus(task.status, STATUS_WIDTH)}  ${title}  ${formatDueDate(task.dueDate, task.status, now)}`;
}

// --- Task output ---

export function printTasks(tasks: Task[], emptyMessage: string, now: Date = new Date()): void {
  if (tasks.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const task of tasks) {
    console.log(formatTaskRow(task, now));
  }
}

export function printTask(task: Task): void {
  console.log(`${chalk.bold(task.caseNumber)}  ${task.title}`);
  console.log(`  Status:      ${formatStatus(task.status)}`);
  console.log(`  Due:         ${task.dueDate}`);
  console.log(`  Description: ${task.description ?? chalk.dim('(none)')}`);
  console.log(`  Created:     ${task.createdDate}`);
  console.log(`  Updated:     ${task.updatedDate}`);
}

export function printStatistics(stats: TaskStatistics): void {
  for (const [key, value] of Object.entries(stats)) {
    const label = key === 'overdue' && value > 0 ? chalk.red(key.padEnd(12)) : key.padEnd(12);
    console.log(`  ${label} ${chalk.bold(String(value))}`);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
