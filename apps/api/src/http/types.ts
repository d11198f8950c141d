/** Transport-neutral request as seen by the router */
export interface ApiRequest {
  method: string;
  /** Path plus query string, as received */
  url: string;
  contentType?: string;
  /** Raw body text; empty when the request has none */
  body: string;
}

export interface ApiResponse {
  status: number;
  /** Serialized as JSON; omitted entirely when undefined */
  body?: unknown;
  headers?: Record<string, string>;
}

export type RequestHandler = (request: ApiRequest) => ApiResponse;

export function json(status: number, body: unknown): ApiResponse {
  return { status, body };
}

export function noContent(headers?: Record<string, string>): ApiResponse {
  return headers ? { status: 204, headers } : { status: 204 };
}
