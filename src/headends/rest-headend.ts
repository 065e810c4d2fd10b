import crypto from 'node:crypto';
import http from 'node:http';
import { URL } from 'node:url';

import { z } from 'zod/v3';

import type { DispatchService } from '../dispatch-service.js';
import type { LogEntry } from '../types.js';
import type { Headend, HeadendClosedEvent, HeadendContext, HeadendDescription } from './types.js';

import { toWireResponse } from '../dispatch-agent.js';
import { describeError } from '../dispatch-errors.js';
import { buildLogEntry } from '../logging/log-entry.js';

import { ConcurrencyLimiter } from './concurrency.js';
import { DEFAULT_BODY_LIMIT, HttpError, readJson, readValidatedJson, writeJson } from './http-utils.js';

export const ROUTE_PREFIX = '/llm/mcp-router';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => { /* replaced below */ };
  const promise = new Promise<T>((res) => { resolve = res; });
  return { promise, resolve };
};

export const DispatchBodySchema = z.object({
  system_prompt: z.string(),
  user_query: z.string().min(1, 'user_query must not be empty'),
  session_id: z.string().uuid('session_id must be a UUID'),
});

export interface RestHeadendOptions {
  host?: string;
  port: number;
  concurrency?: number;
  bodyLimit?: number;
}

type Method = 'GET' | 'POST';

interface RouteArgs {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  requestId: string;
  signal: AbortSignal;
}

interface Route {
  method: Method;
  // dispatches queue on the limiter; cheap routes do not
  limited: boolean;
  handler: (args: RouteArgs) => Promise<void> | void;
}

const sendError = (res: http.ServerResponse, error: HttpError): void => {
  writeJson(res, error.statusCode, { error: error.code, message: error.message }, error.headers);
};

export class RestHeadend implements Headend {
  public readonly id: string;
  public readonly closed: Promise<HeadendClosedEvent>;

  private readonly service: DispatchService;
  private readonly options: RestHeadendOptions;
  private readonly bodyLimit: number;
  private readonly closeDeferred = createDeferred<HeadendClosedEvent>();
  private readonly limiter: ConcurrencyLimiter;
  private readonly routes = new Map<string, Route>();
  private closedSignaled = false;
  private server?: http.Server;
  private context?: HeadendContext;

  public constructor(service: DispatchService, opts: RestHeadendOptions) {
    this.service = service;
    this.options = opts;
    this.bodyLimit = opts.bodyLimit ?? DEFAULT_BODY_LIMIT;
    this.id = `api:${String(opts.port)}`;
    this.closed = this.closeDeferred.promise;
    this.limiter = new ConcurrencyLimiter(opts.concurrency ?? 10);

    this.routes.set('/health', { method: 'GET', limited: false, handler: (args) => { this.handleHealth(args); } });
    this.routes.set(`${ROUTE_PREFIX}/echo`, { method: 'POST', limited: false, handler: async (args) => { await this.handleEcho(args); } });
    this.routes.set(`${ROUTE_PREFIX}/dispatch`, { method: 'POST', limited: true, handler: async (args) => { await this.handleDispatch(args); } });
    this.routes.set(`${ROUTE_PREFIX}/reload`, { method: 'POST', limited: false, handler: async (args) => { await this.handleReload(args); } });
  }

  public describe(): HeadendDescription {
    return {
      id: this.id,
      label: `REST API ${this.options.host ?? '0.0.0.0'}:${String(this.options.port)}`,
      details: { routes: [...this.routes.keys()] },
    };
  }

  /** Bound port; differs from the configured one when that was 0. */
  public get port(): number | undefined {
    const address = this.server?.address();
    return address !== null && typeof address === 'object' ? address.port : undefined;
  }

  public async start(context: HeadendContext): Promise<void> {
    if (this.server !== undefined) return;
    this.context = context;

    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    this.server = server;

    server.on('error', (err: unknown) => {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log(`server error: ${error.message}`, 'ERR', true);
      this.signalClosed({ reason: 'error', error });
    });
    server.on('close', () => {
      this.signalClosed({ reason: 'stopped', graceful: true });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: unknown): void => {
        server.off('listening', onListening);
        reject(err instanceof Error ? err : new Error(String(err)));
      };
      const onListening = (): void => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.options.port, this.options.host);
    });
    this.log(`listening on ${this.options.host ?? '0.0.0.0'}:${String(this.port ?? this.options.port)}`);
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (server === undefined) {
      this.signalClosed({ reason: 'stopped', graceful: true });
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve) => {
      server.close(() => { resolve(); });
      server.closeIdleConnections();
    });
    this.signalClosed({ reason: 'stopped', graceful: true });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const requestId = crypto.randomUUID();
    const method = (req.method ?? 'GET').toUpperCase();
    const path = this.normalizePath(new URL(req.url ?? '/', 'http://localhost').pathname);
    const route = this.routes.get(path);

    if (route === undefined) {
      sendError(res, new HttpError(404, 'not_found', `No route for ${path}`));
      return;
    }
    if (route.method !== method) {
      sendError(res, new HttpError(405, 'method_not_allowed', `${path} accepts ${route.method} only`, { Allow: route.method }));
      return;
    }

    const abortController = new AbortController();
    const onAbort = (): void => {
      if (abortController.signal.aborted) return;
      abortController.abort();
      if (!res.writableEnded) this.log(`request ${requestId} aborted before the response was sent`, 'WRN');
    };
    req.on('aborted', onAbort);
    res.on('close', onAbort);
    this.context?.shutdownSignal.addEventListener('abort', onAbort, { once: true });
    const cleanup = (): void => {
      req.removeListener('aborted', onAbort);
      res.removeListener('close', onAbort);
      this.context?.shutdownSignal.removeEventListener('abort', onAbort);
    };

    let release: (() => void) | undefined;
    try {
      if (route.limited) {
        try {
          release = await this.limiter.acquire({ signal: abortController.signal });
        } catch (err: unknown) {
          if (abortController.signal.aborted) return;
          throw new HttpError(503, 'concurrency_unavailable', describeError(err));
        }
      }
      await route.handler({ req, res, requestId, signal: abortController.signal });
    } catch (err: unknown) {
      if (err instanceof HttpError) {
        this.log(`request ${requestId} ${method} ${path} -> ${String(err.statusCode)} ${err.code}`, 'WRN');
        sendError(res, err);
        return;
      }
      this.log(`handler failure ${requestId}: ${describeError(err)}`, 'ERR');
      sendError(res, new HttpError(500, 'internal_error', 'Internal server error'));
    } finally {
      release?.();
      cleanup();
    }
  }

  private handleHealth({ res }: RouteArgs): void {
    const catalog = this.service.catalog();
    writeJson(res, 200, {
      status: 'ok',
      tools: catalog.size,
      catalogVersion: catalog.version,
      concurrency: this.limiter.stats(),
    });
  }

  private async handleEcho({ req, res }: RouteArgs): Promise<void> {
    const body = await readJson(req, this.bodyLimit);
    writeJson(res, 200, body);
  }

  private async handleReload({ res, requestId }: RouteArgs): Promise<void> {
    try {
      const catalog = await this.service.reload();
      writeJson(res, 200, { tools: catalog.names(), version: catalog.version });
    } catch (err: unknown) {
      this.log(`reload ${requestId} failed: ${describeError(err)}`, 'WRN');
      throw new HttpError(503, 'registry_unavailable', describeError(err));
    }
  }

  private async handleDispatch({ req, res, requestId, signal }: RouteArgs): Promise<void> {
    const body = await readValidatedJson(req, DispatchBodySchema, this.bodyLimit);
    this.log(`request ${requestId} session=${body.session_id}`, 'VRB', false, 'request');

    const outcome = await this.service.dispatch({
      systemPrompt: body.system_prompt,
      userQuery: body.user_query,
      sessionId: body.session_id,
    }, { signal });
    if (signal.aborted) return;
    writeJson(res, 200, toWireResponse(outcome));
    this.log(`response ${requestId} status=${outcome.status}`, outcome.status === 'completed' ? 'VRB' : 'WRN');
  }

  private normalizePath(pathname: string): string {
    const cleaned = pathname.replace(/\/+/g, '/');
    if (cleaned === '' || cleaned === '/') return '/';
    return cleaned.endsWith('/') ? cleaned.slice(0, -1) : cleaned;
  }

  private log(
    message: string,
    severity: LogEntry['severity'] = 'VRB',
    fatal = false,
    direction: LogEntry['direction'] = 'response'
  ): void {
    this.context?.log(buildLogEntry({ severity, type: 'server', remoteIdentifier: this.id, fatal, direction, message }));
  }

  private signalClosed(event: HeadendClosedEvent): void {
    if (this.closedSignaled) return;
    this.closedSignaled = true;
    this.closeDeferred.resolve(event);
  }
}
