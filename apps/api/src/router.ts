/**
 * Minimal path router. Patterns are `/`-separated segments where `:name`
 * captures one segment. Routes are tried in declaration order, so literal
 * paths must come before parameterized ones that would also match.
 */

import type { ApiRequest, ApiResponse } from './http/types.js';
import { methodNotAllowed, routeNotFound } from './http/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RouteContext {
  request: ApiRequest;
  params: Record<string, string>;
  query: URLSearchParams;
}

export interface Route {
  method: HttpMethod;
  pattern: string;
  handler: (ctx: RouteContext) => ApiResponse;
}

function segments(path: string): string[] {
  return path.split('/').filter(s => s.length > 0);
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err: unknown) {
    if (err instanceof URIError) return segment;
    throw err;
  }
}

/** Captured params when `path` fits `pattern`, otherwise null */
export function matchPath(pattern: string, path: string): Record<string, string> | null {
  const expected = segments(pattern);
  const actual = segments(path);
  if (expected.length !== actual.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < expected.length; i++) {
    const want = expected[i] ?? '';
    const got = actual[i] ?? '';
    if (want.startsWith(':')) {
      params[want.slice(1)] = decodeSegment(got);
    } else if (want !== got) {
      return null;
    }
  }
  return params;
}

export class Router {
  constructor(private readonly routes: readonly Route[]) {}

  /** Methods any route accepts for `path` */
  allowedMethods(path: string): HttpMethod[] {
    const methods = new Set<HttpMethod>();
    for (const route of this.routes) {
      if (matchPath(route.pattern, path)) methods.add(route.method);
    }
    return [...methods];
  }

  dispatch(request: ApiRequest): ApiResponse {
    const url = new URL(request.url, 'http://localhost');
    const method = request.method.toUpperCase();

    for (const route of this.routes) {
      if (route.method !== method) continue;
      const params = matchPath(route.pattern, url.pathname);
      if (params) return route.handler({ request, params, query: url.searchParams });
    }

    const allowed = this.allowedMethods(url.pathname);
    if (allowed.length > 0) throw methodNotAllowed(method, allowed);
    throw routeNotFound(method, url.pathname);
  }
}
