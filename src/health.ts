/**
 * Health endpoint handler + active health probe.
 * @packageDocumentation
 */

import * as http from 'node:http';

export const VERSION = '0.1.0';

const startTime = Date.now();

export interface HealthBody {
  ok: boolean;
  uptime: number;
  version: string;
  degraded: boolean;
}

/**
 * Handle GET /health. `degraded` reports the audit writer's state; the
 * gateway keeps serving either way.
 */
export function handleHealthRequest(res: http.ServerResponse, opts: { degraded?: boolean } = {}): void {
  const health: HealthBody = {
    ok: true,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    version: VERSION,
    degraded: opts.degraded ?? false,
  };
  const body = JSON.stringify(health);
  res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

/**
 * Probe a gateway's /health endpoint.
 * Resolves true if healthy, false on any error/timeout.
 */
export function probeHealth(baseUrl: string, timeoutMs = 2000): Promise<boolean> {
  const url = new URL('/health', baseUrl);
  return new Promise((resolve) => {
    const req = http.get(url, { timeout: timeoutMs }, (res) => {
      let data = '';
      res.on('data', (c: Buffer) => (data += c.toString('utf-8')));
      res.on('end', () => resolve(res.statusCode === 200 && isHealthy(data)));
    });
    req.on('error', () => resolve(false));
    req.on('timeout', () => {
      req.destroy();
      resolve(false);
    });
  });
}

function isHealthy(raw: string): boolean {
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'object' && parsed !== null && 'ok' in parsed && parsed.ok === true;
  } catch {
    return false;
  }
}
