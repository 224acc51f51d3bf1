/**
 * HTTP surface of the gateway.
 *
 * Routes:
 * - `POST /v1/chat/completions` (buffered or `stream: true`)
 * - `GET /health`
 * - `GET /api/stats`, `/api/stats/windows`, `/api/stats/tiers`
 * - `GET /api/calls/recent?limit=N`
 * - `GET /api/audit?from=&to=&tier=&limit=`, `GET /api/audit/summary?from=&to=`
 * - `POST /api/cache/clear`
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { PromptCache } from './cache/response-cache.js';
import { GatewayError, toErrorBody } from './errors.js';
import type { Gateway } from './gateway/ingress.js';
import { createHttpSink } from './gateway/streaming.js';
import { handleHealthRequest } from './health.js';
import { createLogger, type Logger } from './logger.js';
import type { MetricsService } from './metrics/service.js';
import type { AuditQuery } from './storage/store.js';
import type { RequestContext } from './types.js';

export interface GatewayServerDeps {
  gateway: Gateway;
  metrics: MetricsService;
  cache: PromptCache | null;
  /** Body size limit in bytes (default: 10MB) */
  maxBodyBytes?: number;
  /** Upper bound for /api/calls/recent (default: 100) */
  recentCallsLimit?: number;
  isDegraded?: () => boolean;
  logger?: Logger;
}

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'POST, GET, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-Agent-Type, X-Source, X-Request-Id',
};

const DEFAULT_RECENT_LIMIT = 20;

export function createGatewayServer(deps: GatewayServerDeps): http.Server {
  const log = deps.logger ?? createLogger('server');
  const maxBodyBytes = deps.maxBodyBytes ?? 10 * 1024 * 1024;
  const recentMax = deps.recentCallsLimit ?? 100;

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname;

    if (req.method === 'GET' && (pathname === '/health' || pathname === '/healthz')) {
      handleHealthRequest(res, { degraded: deps.isDegraded?.() ?? false });
      return;
    }

    if (req.method === 'POST' && pathname === '/v1/chat/completions') {
      const body = parseJson(await readRequestBody(req, maxBodyBytes));
      const ctx = extractRequestContext(req);

      if (isStreamRequest(body)) {
        const sink = createHttpSink(res);
        await deps.gateway.stream(body, ctx, sink);
        return;
      }

      const { body: completion } = await deps.gateway.complete(body, ctx);
      sendJson(res, 200, completion);
      return;
    }

    if (req.method === 'GET' && pathname === '/api/stats') {
      sendJson(res, 200, deps.metrics.stats(), { 'Cache-Control': 'max-age=1' });
      return;
    }

    if (req.method === 'GET' && pathname === '/api/stats/windows') {
      sendJson(res, 200, { windows: deps.metrics.windows() }, { 'Cache-Control': 'max-age=1' });
      return;
    }

    if (req.method === 'GET' && pathname === '/api/stats/tiers') {
      sendJson(res, 200, { tiers: deps.metrics.tiers() }, { 'Cache-Control': 'max-age=1' });
      return;
    }

    if (req.method === 'GET' && pathname === '/api/calls/recent') {
      const limit = Math.min(intParam(url, 'limit') ?? DEFAULT_RECENT_LIMIT, recentMax);
      sendJson(res, 200, { calls: deps.metrics.recentCalls(limit) });
      return;
    }

    if (req.method === 'GET' && pathname === '/api/audit') {
      const query: AuditQuery = { ...rangeParams(url) };
      const tier = url.searchParams.get('tier');
      if (tier) query.tier = tier;
      const limit = intParam(url, 'limit');
      if (limit !== undefined) query.limit = limit;
      sendJson(res, 200, { records: deps.metrics.audit(query) });
      return;
    }

    if (req.method === 'GET' && pathname === '/api/audit/summary') {
      sendJson(res, 200, { tiers: deps.metrics.auditSummary(rangeParams(url)) });
      return;
    }

    if (req.method === 'POST' && pathname === '/api/cache/clear') {
      const cleared = deps.cache ? deps.cache.stats().entries : 0;
      deps.cache?.clear();
      deps.metrics.invalidate();
      log.info(`Cache cleared (${cleared} entries)`);
      sendJson(res, 200, { cleared });
      return;
    }

    throw new GatewayError(`No route for ${req.method ?? 'GET'} ${pathname}`, 404, 'not_found');
  };

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      const { status, body } = toErrorBody(err);
      if (status >= 500) {
        log.error(`${req.method ?? ''} ${req.url ?? ''} failed: ${body.error['message']}`);
      }
      if (res.headersSent) {
        res.end();
        return;
      }
      sendJson(res, status, body);
    });
  });
}

function sendJson(res: http.ServerResponse, status: number, payload: unknown, headers: Record<string, string> = {}): void {
  const body = JSON.stringify(payload);
  res.writeHead(status, { ...headers, 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

/**
 * Read the request body, rejecting anything over `maxBytes`.
 */
export async function readRequestBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  // Keep draining past the limit so the socket stays usable for the 413
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size <= maxBytes) chunks.push(buf);
  }
  if (size > maxBytes) {
    throw new GatewayError(`Request body too large (max ${maxBytes} bytes)`, 413, 'payload_too_large');
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new GatewayError('Request body is not valid JSON', 400, 'invalid_json');
  }
}

function isStreamRequest(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'stream' in body && body.stream === true;
}

function extractRequestContext(req: http.IncomingMessage): RequestContext {
  return {
    agentType: headerValue(req, 'x-agent-type'),
    source: headerValue(req, 'x-source'),
    requestId: headerValue(req, 'x-request-id'),
  };
}

function headerValue(req: http.IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim().length > 0 ? first.trim() : undefined;
}

function intParam(url: URL, name: string): number | undefined {
  const raw = url.searchParams.get(name);
  if (raw === null || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new GatewayError(`Query parameter "${name}" must be a non-negative integer`, 400, 'invalid_request');
  }
  return value;
}

function rangeParams(url: URL): Pick<AuditQuery, 'from' | 'to'> {
  const range: Pick<AuditQuery, 'from' | 'to'> = {};
  const from = intParam(url, 'from');
  const to = intParam(url, 'to');
  if (from !== undefined) range.from = from;
  if (to !== undefined) range.to = to;
  return range;
}
