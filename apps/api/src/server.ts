import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { TaskService } from '@caseflow/core';
import { createLogger } from '@caseflow/core';
import { createApp } from './app.js';
import type { ApiResponse, RequestHandler } from './http/types.js';

const log = createLogger('ApiServer');

export const MAX_BODY_SIZE = 1_024 * 1_024; // 1MB

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
};

export interface ApiServerOptions {
  port: number;
  host: string;
}

/**
 * HTTP front end for the task API: reads request bodies (with a size limit),
 * hands them to the request handler and writes JSON responses.
 */
export class ApiServer {
  private server: Server | null = null;

  constructor(
    private readonly options: ApiServerOptions,
    private readonly handler: RequestHandler,
  ) {}

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  async start(): Promise<{ url: string; port: number }> {
    if (this.server) {
      throw new Error('API server already running');
    }

    const server = createServer((req, res) => this.handleRequest(req, res));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', (err) => {
        log.error(`API server error: ${String(err)}`);
        this.server = null;
        reject(err);
      });

      server.listen(this.options.port, this.options.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.options.port;
        const url = `http://${this.options.host}:${port}`;
        log.info(`API server listening on ${url}`);
        resolve({ url, port });
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        log.info('API server stopped');
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const started = Date.now();
    const method = req.method ?? 'GET';
    const url = req.url ?? '/';

    res.on('finish', () => {
      log.info(`${method} ${url} ${res.statusCode} ${Date.now() - started}ms`);
    });

    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    // Oversized bodies are drained and dropped; the 413 goes out on 'end'
    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (tooLarge) {
        this.send(res, {
          status: 413,
          body: { error: 'Payload Too Large', message: `Request body exceeds ${MAX_BODY_SIZE} bytes` },
        });
        return;
      }

      const response = this.handler({
        method,
        url,
        contentType: req.headers['content-type'],
        body: Buffer.concat(chunks).toString('utf8'),
      });
      this.send(res, response);
    });

    req.on('error', (err) => {
      log.warn(`Request stream error on ${method} ${url}: ${err.message}`);
    });
  }

  private send(res: ServerResponse, response: ApiResponse): void {
    const headers: Record<string, string> = { ...CORS_HEADERS, ...response.headers };
    if (response.body === undefined) {
      res.writeHead(response.status, headers);
      res.end();
      return;
    }
    const payload = JSON.stringify(response.body);
    res.writeHead(response.status, {
      ...headers,
      'Content-Type': 'application/json',
      'Content-Length': String(Buffer.byteLength(payload)),
    });
    res.end(payload);
  }
}

/** Create and start a server for `service` */
export async function startServer(options: ApiServerOptions, service: TaskService): Promise<ApiServer> {
  const server = new ApiServer(options, createApp(service));
  await server.start();
  return server;
}
