/**
 * GET /health — storage connectivity status.
 *
 * 200 { status: 'healthy', database: 'connected', analysisRuns, ... }
 * 503 { status: 'unhealthy', database: 'disconnected', error, ... }
 */

import { Router } from 'express';
import type { IAnalysisStore } from './analysis-store';
import { checkStorage, type StorageBackend } from './service-health';

export function createHealthRoutes(store: IAnalysisStore, backend: StorageBackend): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    const check = await checkStorage(store, backend);
    const checkedAt = new Date().toISOString();

    if (check.status === 'down') {
      return res.status(503).json({
        status: 'unhealthy',
        database: 'disconnected',
        backend,
        error: check.error,
        checkedAt,
      });
    }

    return res.json({
      status: 'healthy',
      database: 'connected',
      backend,
      analysisRuns: check.details?.analysisRuns,
      latencyMs: check.latencyMs,
      checkedAt,
    });
  });

  return router;
}
