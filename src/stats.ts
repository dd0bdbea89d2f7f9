/**
 * Stats Collector
 *
 * Tracks per-request metrics with a rolling 1-hour window.
 * No external dependencies.
 *
 * @packageDocumentation
 */

export type RequestRoute = 'completion' | 'upload';

export interface RequestRecord {
  timestamp: number;
  route: RequestRoute;
  latencyMs: number;
  streaming: boolean;
  success: boolean;
  /** Upstream attempts made; 0 when rejected before reaching the upstream. */
  attempts: number;
  cancelled: boolean;
  status: number;
}

export interface StatsSnapshot {
  totalRequests: number;
  completionRequests: number;
  uploadRequests: number;
  streamingRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cancelledRequests: number;
  /** Requests that needed more than one upstream attempt. */
  retriedRequests: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  statusCounts: Record<string, number>;
}

const ROLLING_WINDOW_MS = 60 * 60 * 1000; // 1 hour

export class StatsCollector {
  private requests: RequestRecord[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Record a completed request. */
  recordRequest(record: RequestRecord): void {
    this.requests.push(record);
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();
    const reqs = this.requests;
    const statusCounts: Record<string, number> = {};
    for (const r of reqs) {
      const key = String(r.status);
      statusCounts[key] = (statusCounts[key] ?? 0) + 1;
    }

    // Cancelled requests have no meaningful latency.
    const latencies = reqs.filter(r => !r.cancelled).map(r => r.latencyMs).sort((a, b) => a - b);

    return {
      totalRequests: reqs.length,
      completionRequests: reqs.filter(r => r.route === 'completion').length,
      uploadRequests: reqs.filter(r => r.route === 'upload').length,
      streamingRequests: reqs.filter(r => r.streaming).length,
      successfulRequests: reqs.filter(r => r.success).length,
      failedRequests: reqs.filter(r => !r.success && !r.cancelled).length,
      cancelledRequests: reqs.filter(r => r.cancelled).length,
      retriedRequests: reqs.filter(r => r.attempts > 1).length,
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
      statusCounts,
    };
  }

  private prune(): void {
    const cutoff = this.now() - ROLLING_WINDOW_MS;
    this.requests = this.requests.filter(r => r.timestamp >= cutoff);
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}
