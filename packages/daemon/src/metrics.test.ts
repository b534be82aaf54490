import { describe, it, expect } from 'vitest';
import { RelayMetrics } from './metrics.js';

describe('RelayMetrics', () => {
  it('derives averages and uptime from the counters', () => {
    let clock = Date.parse('2026-03-01T10:00:00.000Z');
    const metrics = new RelayMetrics(() => clock);

    metrics.recordCall(true, 30);
    metrics.recordCall(false, 11);
    metrics.recordPersistentHit();
    metrics.recordSpawnFallback();
    clock += 90_500;

    expect(metrics.snapshot({ persistentCliActive: true, pendingRequests: 2, pid: 4321 })).toMatchObject({
      totalCalls: 2,
      successCalls: 1,
      errorCalls: 1,
      totalLatencyMs: 41,
      persistentHits: 1,
      spawnFallbacks: 1,
      avgLatencyMs: 21,
      uptime: 90,
      persistentCliActive: true,
      pendingRequests: 2,
      pid: 4321,
      startedAt: '2026-03-01T10:00:00.000Z',
    });
  });

  it('reports zero average latency before any call', () => {
    const metrics = new RelayMetrics();
    expect(metrics.snapshot({ persistentCliActive: false, pendingRequests: 0, pid: 1 }).avgLatencyMs).toBe(0);
  });
});
