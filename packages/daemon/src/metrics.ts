import type { MetricsResponse } from '@hookd/config';

export interface MetricsCounters {
  totalCalls: number;
  successCalls: number;
  errorCalls: number;
  totalLatencyMs: number;
  persistentHits: number;
  spawnFallbacks: number;
}

export interface LiveGauges {
  persistentCliActive: boolean;
  pendingRequests: number;
  /** PID the relay reports itself as, matching /health */
  pid: number;
}

/**
 * Process-wide request counters for the relay.
 */
export class RelayMetrics {
  private counters: MetricsCounters = {
    totalCalls: 0,
    successCalls: 0,
    errorCalls: 0,
    totalLatencyMs: 0,
    persistentHits: 0,
    spawnFallbacks: 0,
  };
  readonly startedAt: Date;
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = new Date(now());
  }

  recordCall(ok: boolean, latencyMs: number): void {
    this.counters.totalCalls++;
    if (ok) {
      this.counters.successCalls++;
    } else {
      this.counters.errorCalls++;
    }
    this.counters.totalLatencyMs += Math.max(0, latencyMs);
  }

  recordPersistentHit(): void {
    this.counters.persistentHits++;
  }

  recordSpawnFallback(): void {
    this.counters.spawnFallbacks++;
  }

  get counts(): Readonly<MetricsCounters> {
    return { ...this.counters };
  }

  snapshot(gauges: LiveGauges): MetricsResponse {
    const c = this.counters;
    return {
      ...c,
      avgLatencyMs: c.totalCalls > 0 ? Math.round(c.totalLatencyMs / c.totalCalls) : 0,
      uptime: Math.floor((this.now() - this.startedAt.getTime()) / 1000),
      persistentCliActive: gauges.persistentCliActive,
      pendingRequests: gauges.pendingRequests,
      pid: gauges.pid,
      memoryMB: Math.round((process.memoryUsage().rss / 1024 / 1024) * 10) / 10,
      startedAt: this.startedAt.toISOString(),
    };
  }
}
