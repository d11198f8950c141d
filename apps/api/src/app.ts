import type { TaskService } from '@caseflow/core';
import type { ApiRequest, ApiResponse, RequestHandler } from './http/types.js';
import { json, noContent } from './http/types.js';
import { toErrorResponse } from './http/errors.js';
import { createTaskHandlers } from './handlers/tasks.js';
import { Router } from './router.js';
import type { Route } from './router.js';

export const TASKS_BASE_PATH = '/api/v1/tasks';

const PREFLIGHT_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Max-Age': '3600',
};

export function createRoutes(service: TaskService): Route[] {
  const tasks = createTaskHandlers(service);
  const base = TASKS_BASE_PATH;
  return [
    { method: 'GET', pattern: '/health', handler: () => json(200, { status: 'UP' }) },
    { method: 'GET', pattern: base, handler: tasks.list },
    { method: 'POST', pattern: base, handler: tasks.create },
    // Literal paths first: they would otherwise match /:id
    { method: 'GET', pattern: `${base}/overdue`, handler: tasks.overdue },
    { method: 'GET', pattern: `${base}/statistics`, handler: tasks.statistics },
    { method: 'GET', pattern: `${base}/statuses`, handler: tasks.statuses },
    { method: 'GET', pattern: `${base}/status/:status`, handler: tasks.byStatus },
    { method: 'GET', pattern: `${base}/:id`, handler: tasks.get },
    { method: 'PUT', pattern: `${base}/:id/status`, handler: tasks.updateStatus },
    { method: 'PUT', pattern: `${base}/:id`, handler: tasks.update },
    { method: 'DELETE', pattern: `${base}/:id`, handler: tasks.remove },
  ];
}

/**
 * Build the request handler for the task API. The handler never throws: every
 * failure is mapped to an error response here.
 */
export function createApp(service: TaskService): RequestHandler {
  const router = new Router(createRoutes(service));

  return (request: ApiRequest): ApiResponse => {
    if (request.method.toUpperCase() === 'OPTIONS') return noContent(PREFLIGHT_HEADERS);
    try {
      return router.dispatch(request);
    } catch (err: unknown) {
      return toErrorResponse(err, request);
    }
  };
}
