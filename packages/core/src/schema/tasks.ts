import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { TaskStatus } from '../types/task-status.js';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  caseNumber: text('case_number').notNull().unique(),
  title: text('title').notNull(),
  description: text('description'),
  /** Always stored in canonical upper-case form */
  status: text('status').$type<TaskStatus>().notNull(),
  /** ISO timestamps, so string order is chronological order */
  dueDate: text('due_date').notNull(),
  createdDate: text('created_date').notNull(),
  updatedDate: text('updated_date').notNull(),
}, (table) => ({
  statusIdx: index('idx_tasks_status').on(table.status),
  dueDateIdx: index('idx_tasks_due_date').on(table.dueDate),
}));
