/**
 * City / Region lookup routes.
 *
 * Names match case-insensitively against the cleaned snapshot of the latest
 * run (or `?analysis_id=`). A city that is not in the run is a 404; a region
 * with no cities, or no run to look in, is an empty list.
 *
 * Endpoints:
 *   GET /city/:name
 *   GET /region/:name
 *   GET /region/:name/summary
 */

import { Router } from 'express';
import type { AnalysisQueryService } from './analysis-queries';
import {
  AnalysisIdQuerySchema,
  sendInvalidParams,
  sendNotFound,
  sendRouteError,
} from './route-helpers';

export function createLookupRoutes(queries: AnalysisQueryService): Router {
  const router = Router();

  router.get('/city/:name', async (req, res) => {
    const queryResult = AnalysisIdQuerySchema.safeParse(req.query);
    if (!queryResult.success) {
      return sendInvalidParams(res, queryResult.error);
    }

    try {
      const result = await queries.city(req.params.name, queryResult.data.analysis_id);
      if (!result.found) {
        return sendNotFound(res, result.message);
      }
      return res.json(result.value);
    } catch (err) {
      return sendRouteError(res, err, 'lookup-routes');
    }
  });

  router.get('/region/:name', async (req, res) => {
    const queryResult = AnalysisIdQuerySchema.safeParse(req.query);
    if (!queryResult.success) {
      return sendInvalidParams(res, queryResult.error);
    }

    try {
      const result = await queries.region(req.params.name, queryResult.data.analysis_id);
      // A collection: a missing run reads as no cities
      return res.json(result.found ? result.value.cities : []);
    } catch (err) {
      return sendRouteError(res, err, 'lookup-routes');
    }
  });

  router.get('/region/:name/summary', async (req, res) => {
    const queryResult = AnalysisIdQuerySchema.safeParse(req.query);
    if (!queryResult.success) {
      return sendInvalidParams(res, queryResult.error);
    }

    try {
      const result = await queries.regionSummary(req.params.name, queryResult.data.analysis_id);
      if (!result.found) {
        return sendNotFound(res, result.message);
      }
      return res.json(result.value);
    } catch (err) {
      return sendRouteError(res, err, 'lookup-routes');
    }
  });

  return router;
}
