/**
 * Task endpoints. Each handler takes the matched route and returns a response;
 * errors propagate to the app's central mapping.
 */

import type { Task, TaskService } from '@caseflow/core';
import type { ApiResponse } from '../http/types.js';
import { json, noContent } from '../http/types.js';
import { typeMismatch } from '../http/errors.js';
import { readJsonBody } from '../http/body.js';
import { createTaskSchema, updateStatusSchema, updateTaskSchema } from '../schemas/task-requests.js';
import type { RouteContext } from '../router.js';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/** Parse a 32-bit integer parameter or reject it with a type-mismatch error */
export function parseIntParam(name: string, raw: string): number {
  if (!/^[+-]?\d+$/.test(raw)) throw typeMismatch(name);
  const value = Number(raw);
  if (value < INT32_MIN || value > INT32_MAX) throw typeMismatch(name);
  return value;
}

function queryInt(ctx: RouteContext, name: string, fallback: number): number {
  const raw = ctx.query.get(name);
  return raw === null || raw.trim() === '' ? fallback : parseIntParam(name, raw.trim());
}

function taskId(ctx: RouteContext): number {
  return parseIntParam('id', ctx.params['id'] ?? '');
}

export interface TaskPage {
  tasks: Task[];
  totalTasks: number;
  totalPages: number;
  currentPage: number;
  pageSize: number;
}

export interface TaskHandlers {
  list(ctx: RouteContext): ApiResponse;
  create(ctx: RouteContext): ApiResponse;
  get(ctx: RouteContext): ApiResponse;
  updateStatus(ctx: RouteContext): ApiResponse;
  update(ctx: RouteContext): ApiResponse;
  remove(ctx: RouteContext): ApiResponse;
  byStatus(ctx: RouteContext): ApiResponse;
  overdue(ctx: RouteContext): ApiResponse;
  statistics(ctx: RouteContext): ApiResponse;
  statuses(ctx: RouteContext): ApiResponse;
}

export function createTaskHandlers(service: TaskService): TaskHandlers {
  return {
    list(ctx) {
      let page = queryInt(ctx, 'page', DEFAULT_PAGE);
      let pageSize = queryInt(ctx, 'pageSize', DEFAULT_PAGE_SIZE);
      if (page < 1) page = DEFAULT_PAGE;
      if (pageSize < 1 || pageSize > MAX_PAGE_SIZE) pageSize = DEFAULT_PAGE_SIZE;

      const search = ctx.query.get('search');
      const status = ctx.query.get('status');
      const tasks = service.searchTasks(search, status, (page - 1) * pageSize, pageSize);
      const totalTasks = service.countFilteredTasks(search, status);

      const body: TaskPage = {
        tasks,
        totalTasks,
        totalPages: Math.ceil(totalTasks / pageSize),
        currentPage: page,
        pageSize,
      };
      return json(200, body);
    },

    create(ctx) {
      const body = readJsonBody(ctx.request, createTaskSchema);
      return json(201, service.createTask(body.title, body.description, body.status, body.dueDate));
    },

    get(ctx) {
      return json(200, service.getTaskById(taskId(ctx)));
    },

    updateStatus(ctx) {
      const id = taskId(ctx);
      const body = readJsonBody(ctx.request, updateStatusSchema);
      return json(200, service.updateTaskStatus(id, body.status));
    },

    update(ctx) {
      const id = taskId(ctx);
      const body = readJsonBody(ctx.request, updateTaskSchema);
      return json(200, service.updateTask(id, body.title, body.description, body.status, body.dueDate));
    },

    remove(ctx) {
      service.deleteTask(taskId(ctx));
      return noContent();
    },

    byStatus(ctx) {
      return json(200, service.getTasksByStatus(ctx.params['status'] ?? ''));
    },

    overdue() {
      return json(200, service.getOverdueTasks());
    },

    statistics() {
      return json(200, service.getTaskStatistics());
    },

    statuses() {
      return json(200, service.getValidStatuses());
    },
  };
}
