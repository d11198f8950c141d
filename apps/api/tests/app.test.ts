import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  createTestDb, SqliteTaskRepository, TaskService, DuplicateCaseNumberError,
} from '@caseflow/core';
import type { Task } from '@caseflow/core';
import { createApp } from '../src/app.js';
import type { ApiRequest, ApiResponse, RequestHandler } from '../src/http/types.js';

const NOW = new Date('2030-01-15T10:00:00.000Z');
const DAY = 24 * 60 * 60 * 1000;
const BASE = '/api/v1/tasks';

let now: Date;
let service: TaskService;
let app: RequestHandler;

beforeEach(() => {
  now = NOW;
  const clock = () => now;
  service = new TaskService(new SqliteTaskRepository(createTestDb(), clock), { clock });
  app = createApp(service);
});

function send(method: string, url: string, body?: unknown, contentType = 'application/json'): ApiResponse {
  const request: ApiRequest = {
    method,
    url,
    contentType,
    body: body === undefined ? '' : typeof body === 'string' ? body : JSON.stringify(body),
  };
  return app(request);
}

function seed(title: string, status = 'PENDING', dueInDays = 7): Task {
  return service.createTask(title, null, status, new Date(NOW.getTime() + dueInDays * DAY));
}

describe('POST /api/v1/tasks', () => {
  it('creates a task and returns 201 with the stored entity', () => {
    const res = send('POST', BASE, { title: 'Review case file', dueDate: '2030-02-01T09:00:00' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      id: 1,
      caseNumber: 'TASK000001',
      title: 'Review case file',
      description: null,
      status: 'PENDING',
      dueDate: '2030-02-01T09:00:00.000Z',
      createdDate: '2030-01-15T10:00:00.000Z',
      updatedDate: '2030-01-15T10:00:00.000Z',
    });
  });

  it('accepts optional fields and ignores unknown ones', () => {
    const res = send('POST', BASE, {
      title: 'Call applicant',
      description: 'About the hearing',
      status: 'in_progress',
      dueDate: '2030-02-01T09:00:00.000+01:00',
      priority: 'high',
    });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      description: 'About the hearing',
      status: 'IN_PROGRESS',
      dueDate: '2030-02-01T08:00:00.000Z',
    });
    expect(res.body).not.toHaveProperty('priority');
  });

  it('accepts a media type with parameters', () => {
    const res = send('POST', BASE, { title: 'T', dueDate: '2030-02-01T09:00:00Z' }, 'application/json; charset=utf-8');
    expect(res.status).toBe(201);
  });

  it('reports missing required fields as a validation map', () => {
    const res = send('POST', BASE, { description: 'no title' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: 400,
      error: 'Validation Failed',
      message: 'Request validation failed',
      timestamp: expect.any(String),
      validationErrors: {
        title: 'Title is required',
        dueDate: 'Due date is required',
      },
    });
  });

  it('treats null and blank titles as missing', () => {
    const nullTitle = send('POST', BASE, { title: null, dueDate: '2030-02-01T09:00:00Z' });
    const blankTitle = send('POST', BASE, { title: '   ', dueDate: '2030-02-01T09:00:00Z' });

    expect(nullTitle.body).toMatchObject({ validationErrors: { title: 'Title is required' } });
    expect(blankTitle.body).toMatchObject({ validationErrors: { title: 'Title is required' } });
  });

  it('enforces field length limits', () => {
    const res = send('POST', BASE, {
      title: 'x'.repeat(256),
      description: 'y'.repeat(1001),
      dueDate: '2030-02-01T09:00:00Z',
    });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      validationErrors: {
        title: 'Title must not exceed 255 characters',
        description: 'Description must not exceed 1000 characters',
      },
    });
  });

  it('maps service validation errors to Invalid Request', () => {
    const res = send('POST', BASE, { title: 'T', status: 'DONE', dueDate: '2030-02-01T09:00:00Z' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: 400,
      error: 'Invalid Request',
      message: 'Invalid status: DONE. Valid statuses are: PENDING, IN_PROGRESS, COMPLETED, CANCELLED, ON_HOLD',
      timestamp: expect.any(String),
    });
  });

  it('rejects a due date in the past', () => {
    const res = send('POST', BASE, { title: 'T', dueDate: '2030-01-14T10:00:00Z' });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: 'Invalid Request', message: 'Due date cannot be in the past' });
  });

  it('rejects an unparseable due date', () => {
    const res = send('POST', BASE, { title: 'T', dueDate: 'next tuesday' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Bad Request', message: 'Invalid value for field: dueDate' });
  });

  it('rejects a calendar date that does not exist', () => {
    const res = send('POST', BASE, { title: 'T', dueDate: '2030-02-30T10:00:00' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Bad Request', message: 'Invalid value for field: dueDate' });
    expect(service.countAllTasks()).toBe(0);
  });

  it('accepts microsecond precision and keeps milliseconds', () => {
    const res = send('POST', BASE, { title: 'T', dueDate: '2030-02-01T09:00:00.123456' });
    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ dueDate: '2030-02-01T09:00:00.123Z' });
  });

  it('rejects a field of the wrong type', () => {
    const res = send('POST', BASE, { title: 42, dueDate: '2030-02-01T09:00:00Z' });
    expect(res.body).toEqual({ error: 'Bad Request', message: 'Invalid value for field: title' });
  });

  it('distinguishes malformed, missing and non-object bodies', () => {
    expect(send('POST', BASE, '{"title":').body).toEqual({ error: 'Bad Request', message: 'Malformed JSON request' });
    expect(send('POST', BASE, '').body).toEqual({ error: 'Bad Request', message: 'Request body is missing' });
    expect(send('POST', BASE, '[1, 2]').body).toEqual({ error: 'Bad Request', message: 'Malformed JSON request' });
  });

  it('rejects a missing or non-JSON content type with 415', () => {
    const body = { title: 'T', dueDate: '2030-02-01T09:00:00Z' };
    const expected = {
      error: 'Unsupported Media Type',
      message: 'Content-Type header is missing or not supported. Expected: application/json',
    };

    const plain = send('POST', BASE, body, 'text/plain');
    const missing = app({ method: 'POST', url: BASE, body: JSON.stringify(body) });

    expect(plain.status).toBe(415);
    expect(plain.body).toEqual(expected);
    expect(missing.status).toBe(415);
    expect(service.countAllTasks()).toBe(0);
  });

  it('maps a case-number conflict to 409', () => {
    vi.spyOn(service, 'createTask').mockImplementation(() => {
      throw new DuplicateCaseNumberError('TASK000001');
    });

    const res = send('POST', BASE, { title: 'T', dueDate: '2030-02-01T09:00:00Z' });

    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({
      status: 409,
      error: 'Duplicate Case Number',
      message: 'Case number TASK000001 already exists',
    });
  });
});

describe('GET /api/v1/tasks', () => {
  it('returns an empty first page for an empty store', () => {
    const res = send('GET', BASE);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ tasks: [], totalTasks: 0, totalPages: 0, currentPage: 1, pageSize: 10 });
  });

  it('pages through the results', () => {
    for (let i = 1; i <= 15; i++) seed(`Task ${i}`, 'PENDING', i);

    const first = send('GET', `${BASE}?page=1&pageSize=10`);
    const second = send('GET', `${BASE}?page=2&pageSize=10`);

    expect(first.body).toMatchObject({ totalTasks: 15, totalPages: 2, currentPage: 1, pageSize: 10 });
    expect(first.body).toHaveProperty('tasks.length', 10);
    expect(second.body).toMatchObject({ totalTasks: 15, totalPages: 2, currentPage: 2, pageSize: 10 });
    expect(second.body).toHaveProperty('tasks.length', 5);
    // Latest due first: the page starts at the task due on day 15
    expect(first.body).toHaveProperty('tasks.0.title', 'Task 15');
  });

  it('resets out-of-range paging values', () => {
    seed('Only');
    expect(send('GET', `${BASE}?page=0`).body).toMatchObject({ currentPage: 1 });
    expect(send('GET', `${BASE}?page=-4`).body).toMatchObject({ currentPage: 1 });
    expect(send('GET', `${BASE}?pageSize=0`).body).toMatchObject({ pageSize: 10 });
    expect(send('GET', `${BASE}?pageSize=101`).body).toMatchObject({ pageSize: 10 });
    expect(send('GET', `${BASE}?pageSize=100`).body).toMatchObject({ pageSize: 100 });
  });

  it('rejects a non-integer page parameter', () => {
    const res = send('GET', `${BASE}?page=two`);
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid path parameter: page', message: 'Expected type: int' });
  });

  it('filters by search term and status', () => {
    seed('Review case file', 'PENDING');
    seed('Call applicant', 'IN_PROGRESS');
    seed('Review bundle', 'COMPLETED');

    const res = send('GET', `${BASE}?search=review&status=pending`);

    expect(res.body).toMatchObject({ totalTasks: 1, totalPages: 1 });
    expect(res.body).toHaveProperty('tasks.0.title', 'Review case file');
  });
});

describe('GET /api/v1/tasks/:id', () => {
  it('returns the task', () => {
    const task = seed('Lookup');
    const res = send('GET', `${BASE}/${task.id}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual(task);
  });

  it('returns 404 for an unknown id', () => {
    const res = send('GET', `${BASE}/999`);
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      status: 404,
      error: 'Task Not Found',
      message: 'Task with ID 999 not found',
      timestamp: expect.any(String),
    });
  });

  it('rejects a non-integer id', () => {
    const expected = { error: 'Invalid path parameter: id', message: 'Expected type: int' };
    expect(send('GET', `${BASE}/abc`).body).toEqual(expected);
    expect(send('GET', `${BASE}/1.5`).body).toEqual(expected);
    expect(send('GET', `${BASE}/99999999999`).body).toEqual(expected);
    expect(send('GET', `${BASE}/abc`).status).toBe(400);
  });
});

describe('PUT /api/v1/tasks/:id/status', () => {
  it('updates the status', () => {
    const task = seed('Status change');
    now = new Date(NOW.getTime() + 60_000);

    const res = send('PUT', `${BASE}/${task.id}/status`, { status: 'completed' });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      id: task.id,
      status: 'COMPLETED',
      updatedDate: '2030-01-15T10:01:00.000Z',
    });
  });

  it('requires a status', () => {
    const task = seed('T');
    const res = send('PUT', `${BASE}/${task.id}/status`, { status: '' });
    expect(res.body).toMatchObject({ error: 'Validation Failed', validationErrors: { status: 'Status is required' } });
  });

  it('rejects an unknown status before looking up the task', () => {
    const res = send('PUT', `${BASE}/999/status`, { status: 'bogus' });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: 'Invalid Request' });
  });

  it('returns 404 for an unknown id', () => {
    expect(send('PUT', `${BASE}/999/status`, { status: 'PENDING' }).status).toBe(404);
  });
});

describe('PUT /api/v1/tasks/:id', () => {
  it('applies only the supplied fields', () => {
    const task = service.createTask('Original', 'Keep me', 'ON_HOLD', new Date(NOW.getTime() + DAY));

    const res = send('PUT', `${BASE}/${task.id}`, { title: 'Renamed' });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      title: 'Renamed',
      description: 'Keep me',
      status: 'ON_HOLD',
      dueDate: task.dueDate,
      caseNumber: task.caseNumber,
    });
  });

  it('clears the description and accepts a past due date', () => {
    const task = service.createTask('T', 'Something');
    const res = send('PUT', `${BASE}/${task.id}`, { description: '', dueDate: '2030-01-01T00:00:00Z' });

    expect(res.body).toMatchObject({ description: '', dueDate: '2030-01-01T00:00:00.000Z' });
  });

  it('returns 404 for an unknown id', () => {
    expect(send('PUT', `${BASE}/999`, { title: 'x' }).status).toBe(404);
  });
});

describe('DELETE /api/v1/tasks/:id', () => {
  it('returns 204 and then 404', () => {
    const task = seed('Delete me');

    const first = send('DELETE', `${BASE}/${task.id}`);
    const second = send('DELETE', `${BASE}/${task.id}`);

    expect(first).toEqual({ status: 204 });
    expect(second.status).toBe(404);
  });
});

describe('collection views', () => {
  it('lists tasks by status', () => {
    const pending = seed('Pending one', 'PENDING');
    seed('Done one', 'COMPLETED');

    expect(send('GET', `${BASE}/status/pending`).body).toEqual([pending]);
    expect(send('GET', `${BASE}/status/ARCHIVED`).body).toEqual([]);
  });

  it('lists overdue tasks', () => {
    const task = seed('Soon due', 'PENDING', 1);
    seed('Later', 'PENDING', 10);
    now = new Date(NOW.getTime() + 2 * DAY);

    expect(send('GET', `${BASE}/overdue`).body).toEqual([task]);
  });

  it('returns statistics', () => {
    seed('A', 'PENDING');
    seed('B', 'IN_PROGRESS');
    now = new Date(NOW.getTime() + 8 * DAY);

    expect(send('GET', `${BASE}/statistics`).body).toEqual({ total: 2, pending: 1, in_progress: 1, overdue: 2 });
  });

  it('returns the valid statuses', () => {
    expect(send('GET', `${BASE}/statuses`).body).toEqual(['PENDING', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED', 'ON_HOLD']);
  });
});

describe('routing', () => {
  it('answers the health check', () => {
    expect(send('GET', '/health')).toEqual({ status: 200, body: { status: 'UP' } });
  });

  it('returns 405 with the allowed methods for a known path', () => {
    const res = send('DELETE', BASE);
    expect(res.status).toBe(405);
    expect(res.body).toEqual({
      error: 'Method Not Allowed',
      message: "HTTP method 'DELETE' is not supported for this endpoint",
    });
    expect(res.headers).toEqual({ Allow: 'GET, POST' });
    expect(send('PATCH', `${BASE}/1`).headers).toEqual({ Allow: 'GET, PUT, DELETE' });
  });

  it('returns 404 for an unknown path', () => {
    expect(send('GET', '/nope').body).toEqual({ error: 'Not Found', message: 'No route for GET /nope' });
  });

  it('answers CORS preflight requests', () => {
    const res = send('OPTIONS', `${BASE}/1`);
    expect(res.status).toBe(204);
    expect(res.headers).toMatchObject({ 'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS' });
  });

  it('hides the detail of unexpected errors', () => {
    vi.spyOn(service, 'getTaskStatistics').mockImplementation(() => {
      throw new Error('disk on fire');
    });

    const res = send('GET', `${BASE}/statistics`);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      status: 500,
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      timestamp: expect.any(String),
    });
  });
});
