/**
 * Route server - HTTP front end for the route search
 */

import { EventEmitter } from 'node:events';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { isRouteSearchError } from './errors.js';
import type { RoutePage, SearchQuery } from './route-types.js';
import { toRoutePageView } from './route-view.js';
import { parseSearchParams } from './search-query.js';

export interface RouteSearcher {
  findRoutes(query: SearchQuery): Promise<RoutePage>;
}

export interface RouteServerOptions {
  port: number;
  finder: RouteSearcher;
  defaultLimit?: number;
}

export interface HttpReply {
  status: number;
  body: unknown;
}

/**
 * Answer GET /routes for the given query string
 */
export async function handleRoutesQuery(
  params: URLSearchParams,
  finder: RouteSearcher,
  defaultLimit?: number,
): Promise<HttpReply> {
  try {
    const query = parseSearchParams(params, { limit: defaultLimit });
    const page = await finder.findRoutes(query);
    return { status: 200, body: toRoutePageView(page) };
  } catch (error) {
    if (isRouteSearchError(error)) {
      return { status: error.status, body: { error: error.message, code: error.code } };
    }
    throw error;
  }
}

export class RouteServer extends EventEmitter {
  private server: Server | null = null;
  private readonly options: RouteServerOptions;

  constructor(options: RouteServerOptions) {
    super();
    this.options = options;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private log(message: string): void {
    console.log(`[${this.timestamp()}] ${message}`);
  }

  private warn(message: string): void {
    console.warn(`[${this.timestamp()}] ${message}`);
  }

  private error(message: string, error?: unknown): void {
    if (error !== undefined) {
      console.error(`[${this.timestamp()}] ${message}`, error);
    } else {
      console.error(`[${this.timestamp()}] ${message}`);
    }
  }

  /**
   * Port the server is bound to, or null when stopped
   */
  get port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') return null;
    return address.port;
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleHttpRequest(req, res).catch((err: unknown) => {
          this.error(`[HTTP] Unhandled failure for ${req.method} ${req.url}`, err);
          if (!res.headersSent) {
            this.sendJson(res, 500, { error: 'Internal server error' });
          } else {
            res.end();
          }
        });
      });
      this.server = server;

      server.once('error', (err) => {
        this.emit('error', err);
        reject(err);
      });

      server.listen(this.options.port, () => {
        this.log(`Route server listening on port ${this.port}`);
        this.emit('started');
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        this.emit('stopped');
        resolve();
      });
    });
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  /**
   * Handle HTTP requests
   */
  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';

    // CORS headers for local development
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === 'GET' && url.pathname === '/health') {
      this.sendJson(res, 200, { status: 'ok' });
    } else if (method === 'GET' && url.pathname === '/routes') {
      const started = Date.now();
      const reply = await handleRoutesQuery(url.searchParams, this.options.finder, this.options.defaultLimit);
      this.log(`[HTTP] GET /routes${url.search} -> ${reply.status} (${Date.now() - started}ms)`);
      this.sendJson(res, reply.status, reply.body);
    } else {
      this.warn(`[HTTP] Unhandled request ${method} ${url.pathname}`);
      this.sendJson(res, 404, { error: 'Not found' });
    }
  }
}
