import type { Express } from 'express';
import { createServer, type Server } from 'http';
import type { IAnalysisStore } from './analysis-store';
import { AnalysisQueryService } from './analysis-queries';
import { createAnalysisRoutes } from './analysis-routes';
import { createMetricsRoutes } from './metrics-routes';
import { createLookupRoutes } from './lookup-routes';
import { createHealthRoutes } from './health-routes';
import type { StorageBackend } from './service-health';

export const API_ENDPOINTS = {
  analyses: 'GET /analyses - List analysis runs (limit, offset)',
  latest_analysis: 'GET /analyses/latest - Most recent analysis with city data',
  analysis_detail: 'GET /analyses/{id} - Analysis run by ID',
  total_sites: 'GET /metrics/total-sites - Total galamsay sites',
  region_highest: 'GET /metrics/region-highest - Region with the most sites',
  avg_per_region: 'GET /metrics/average-per-region - Average sites per region',
  cities_exceeding: 'GET /metrics/cities-exceeding-threshold - Cities over the threshold',
  city: 'GET /city/{name} - Cleaned data for one city',
  region: 'GET /region/{name} - Cleaned data for every city in a region',
  region_summary: 'GET /region/{name}/summary - Totals and averages for a region',
  health: 'GET /health - Storage connectivity',
} as const;

export interface RouteDependencies {
  store: IAnalysisStore;
  backend: StorageBackend;
}

export async function registerRoutes(app: Express, deps: RouteDependencies): Promise<Server> {
  const queries = new AnalysisQueryService(deps.store);

  app.get('/', (_req, res) => {
    res.json({
      message: 'Galamsay Analysis API',
      endpoints: API_ENDPOINTS,
    });
  });

  // Audit trail of analysis runs
  app.use('/analyses', createAnalysisRoutes(queries));

  // Single-metric views over a run
  app.use('/metrics', createMetricsRoutes(queries));

  // City and region lookups (/city/:name, /region/:name)
  app.use('/', createLookupRoutes(queries));

  app.use('/health', createHealthRoutes(deps.store, deps.backend));

  const httpServer = createServer(app);

  return httpServer;
}
