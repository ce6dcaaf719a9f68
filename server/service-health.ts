/**
 * Storage health checker
 * Probes the analysis store and reports connectivity for GET /health
 */

import type { IAnalysisStore } from './analysis-store';

export type StorageBackend = 'postgres' | 'memory';

export interface ServiceHealthCheck {
  service: string;
  status: 'up' | 'down' | 'warning';
  latencyMs: number;
  error?: string;
  details?: Record<string, unknown>;
}

/** Probes slower than this are reported as 'warning' rather than 'up'. */
const SLOW_PROBE_MS = 1000;

export async function checkStorage(
  store: IAnalysisStore,
  backend: StorageBackend,
  now: () => number = Date.now
): Promise<ServiceHealthCheck> {
  const service = backend === 'postgres' ? 'PostgreSQL' : 'In-memory store';
  const startTime = now();

  try {
    await store.ping();
    const analysisRuns = await store.countRuns();
    const latency = now() - startTime;

    return {
      service,
      status: latency < SLOW_PROBE_MS ? 'up' : 'warning',
      latencyMs: latency,
      details: { backend, analysisRuns },
    };
  } catch (error) {
    return {
      service,
      status: 'down',
      latencyMs: now() - startTime,
      error: error instanceof Error ? error.message : 'Unknown error',
      details: {
        backend,
        message: 'Storage configured but connection failed. Check network/credentials.',
      },
    };
  }
}
