/**
 * Analysis Runs API Routes
 *
 * Endpoints:
 *   GET /analyses?limit=N&offset=N  — paginated run headers, newest first
 *   GET /analyses/latest            — latest run with city data and over-threshold list
 *   GET /analyses/:id               — one run with its children
 */

import { Router } from 'express';
import { z } from 'zod';
import type { AnalysisQueryService } from './analysis-queries';
import {
  RunIdParamSchema,
  integerParam,
  sendInvalidParams,
  sendNotFound,
  sendRouteError,
} from './route-helpers';

/** Limit defaults to 10 (max 100); offset defaults to 0. */
const ListQuerySchema = z.object({
  limit: integerParam(1, 100).optional().default('10'),
  offset: integerParam(0).optional().default('0'),
});

export function createAnalysisRoutes(queries: AnalysisQueryService): Router {
  const router = Router();

  router.get('/', async (req, res) => {
    const queryResult = ListQuerySchema.safeParse(req.query);
    if (!queryResult.success) {
      return sendInvalidParams(res, queryResult.error);
    }

    try {
      const { limit, offset } = queryResult.data;
      return res.json(await queries.listRuns(offset, limit));
    } catch (err) {
      return sendRouteError(res, err, 'analysis-routes');
    }
  });

  // Registered before /:id so "latest" is never parsed as an id
  router.get('/latest', async (_req, res) => {
    try {
      const result = await queries.latestRun();
      if (!result.found) {
        return sendNotFound(res, result.message);
      }
      return res.json(result.value);
    } catch (err) {
      return sendRouteError(res, err, 'analysis-routes');
    }
  });

  router.get('/:id', async (req, res) => {
    const idResult = RunIdParamSchema.safeParse(req.params.id);
    if (!idResult.success) {
      return res.status(400).json({
        error: 'Invalid analysis id',
        message: 'Analysis id must be a positive integer',
      });
    }

    try {
      const result = await queries.runById(idResult.data);
      if (!result.found) {
        return sendNotFound(res, result.message);
      }
      return res.json(result.value);
    } catch (err) {
      return sendRouteError(res, err, 'analysis-routes');
    }
  });

  return router;
}
