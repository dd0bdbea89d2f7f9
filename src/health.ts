/**
 * Health endpoint handler and an active health check.
 * @packageDocumentation
 */

import * as http from 'node:http';
import type { StatsSnapshot } from './stats.js';

const startTime = Date.now();

export interface HealthReport {
  ok: true;
  /** Seconds since the module loaded. */
  uptime: number;
  /** Number of models currently served. */
  models: number;
  stats?: StatsSnapshot;
}

export interface HealthSource {
  modelCount(): number;
  stats?(): StatsSnapshot;
}

/**
 * Handle GET /health on the gateway.
 * Returns { ok: true, uptime, models, stats }.
 */
export function handleHealthRequest(res: http.ServerResponse, source?: HealthSource): void {
  const report: HealthReport = {
    ok: true,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    models: source?.modelCount() ?? 0,
  };
  const stats = source?.stats?.();
  if (stats) report.stats = stats;

  const body = JSON.stringify(report);
  res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

/**
 * Check a gateway's /health endpoint.
 * Resolves true if healthy, false on any error/timeout.
 */
export function checkHealth(gatewayUrl: string, timeoutMs = 2000): Promise<boolean> {
  const url = new URL('/health', gatewayUrl);
  return new Promise((resolve) => {
    const req = http.get(url, { timeout: timeoutMs }, (res) => {
      let data = '';
      res.on('data', (c) => (data += c));
      res.on('end', () => {
        try {
          const json: unknown = JSON.parse(data);
          resolve(typeof json === 'object' && json !== null && 'ok' in json && json.ok === true);
        } catch {
          resolve(false);
        }
      });
    });
    req.on('error', () => resolve(false));
    req.on('timeout', () => {
      req.destroy();
      resolve(false);
    });
  });
}
