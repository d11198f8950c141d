export { createApp, createRoutes, TASKS_BASE_PATH } from './app.js';
export { ApiServer, startServer, MAX_BODY_SIZE } from './server.js';
export type { ApiServerOptions } from './server.js';
export { loadConfig, ConfigError } from './config.js';
export type { ApiConfig, ConfigOverrides } from './config.js';
export { Router, matchPath } from './router.js';
export type { Route, RouteContext, HttpMethod } from './router.js';
export { HttpError, toErrorResponse } from './http/errors.js';
export type { ErrorBody, ValidationErrorBody, ProblemBody } from './http/errors.js';
export type { ApiRequest, ApiResponse, RequestHandler } from './http/types.js';
export { parseDateTime } from './schemas/task-requests.js';
