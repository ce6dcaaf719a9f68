/**
 * Metrics API Routes
 *
 * Single-metric views over one run (the latest unless `?analysis_id=` is given).
 *
 * Endpoints:
 *   GET /metrics/total-sites
 *   GET /metrics/region-highest
 *   GET /metrics/average-per-region
 *   GET /metrics/cities-exceeding-threshold?threshold=N
 */

import { Router, type Request, type Response } from 'express';
import type { AnalysisRunSummary, QueryResult } from '@shared/analysis-types';
import type { AnalysisQueryService } from './analysis-queries';
import {
  AnalysisIdQuerySchema,
  integerParam,
  sendInvalidParams,
  sendNotFound,
  sendRouteError,
} from './route-helpers';

const ThresholdQuerySchema = AnalysisIdQuerySchema.extend({
  threshold: integerParam(0).optional(),
});

export function createMetricsRoutes(queries: AnalysisQueryService): Router {
  const router = Router();

  /**
   * Resolve the run for a metrics request and hand its header to `render`.
   */
  async function withRun(
    req: Request,
    res: Response,
    render: (run: AnalysisRunSummary) => Record<string, unknown>
  ): Promise<Response> {
    const queryResult = AnalysisIdQuerySchema.safeParse(req.query);
    if (!queryResult.success) {
      return sendInvalidParams(res, queryResult.error);
    }

    try {
      const run: QueryResult<AnalysisRunSummary> = await queries.metricsSnapshot(
        queryResult.data.analysis_id
      );
      if (!run.found) {
        return sendNotFound(res, run.message);
      }
      return res.json({
        ...render(run.value),
        analysisId: run.value.id,
        createdAt: run.value.createdAt,
      });
    } catch (err) {
      return sendRouteError(res, err, 'metrics-routes');
    }
  }

  router.get('/total-sites', (req, res) =>
    withRun(req, res, (run) => ({ totalSites: run.totalSites }))
  );

  router.get('/region-highest', (req, res) =>
    withRun(req, res, (run) => ({ region: run.topRegion, sites: run.topRegionSites }))
  );

  router.get('/average-per-region', (req, res) =>
    withRun(req, res, (run) => ({ averagePerRegion: run.averagePerRegion }))
  );

  router.get('/cities-exceeding-threshold', async (req, res) => {
    const queryResult = ThresholdQuerySchema.safeParse(req.query);
    if (!queryResult.success) {
      return sendInvalidParams(res, queryResult.error);
    }

    try {
      const { analysis_id, threshold } = queryResult.data;
      const result = await queries.citiesExceedingThreshold(analysis_id, threshold);
      if (!result.found) {
        return sendNotFound(res, result.message);
      }
      return res.json(result.value.cities);
    } catch (err) {
      return sendRouteError(res, err, 'metrics-routes');
    }
  });

  return router;
}
