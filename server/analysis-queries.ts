/**
 * Query service for analysis runs.
 *
 * Owns all read access and response shaping for the audit trail. Route
 * handlers delegate here instead of talking to the store. Every method is
 * total: missing data comes back as `{ found: false }` with a message,
 * never as a thrown error. Storage failures still propagate so the HTTP
 * layer can answer 503.
 */

import {
  SITE_THRESHOLD,
  type AnalysisRunDetail,
  type AnalysisRunSummary,
  type CityLookup,
  type CleanedRow,
  type OverThresholdCity,
  type PaginatedRunsResponse,
  type QueryResult,
  type RegionSummary,
} from '@shared/analysis-types';
import type { IAnalysisStore } from './analysis-store';

export const NO_RUNS_MESSAGE =
  'No analysis runs found in database. Run `npm run analyze` first.';

export interface RegionRows {
  analysisId: number;
  createdAt: Date;
  cities: CleanedRow[];
}

export interface ThresholdCities {
  analysisId: number;
  createdAt: Date;
  threshold: number;
  cities: OverThresholdCity[];
}

export class AnalysisQueryService {
  constructor(private readonly store: IAnalysisStore) {}

  async latestRun(): Promise<QueryResult<AnalysisRunDetail>> {
    const run = await this.store.getLatestRun();
    return run ? found(run) : noRuns();
  }

  async runById(id: number): Promise<QueryResult<AnalysisRunDetail>> {
    const run = await this.store.getRunById(id);
    return run ? found(run) : runNotFound(id);
  }

  async listRuns(offset: number, limit: number): Promise<PaginatedRunsResponse> {
    const [analyses, total] = await Promise.all([
      this.store.listRuns(offset, limit),
      this.store.countRuns(),
    ]);
    return { analyses, total, limit, offset };
  }

  /**
   * Run header used by the /metrics endpoints: the given run, or the latest
   * one when no id is passed.
   */
  async metricsSnapshot(runId?: number): Promise<QueryResult<AnalysisRunSummary>> {
    if (runId === undefined) {
      const latest = await this.store.getLatestRunSummary();
      return latest ? found(latest) : noRuns();
    }
    const run = await this.store.getRunSummaryById(runId);
    return run ? found(run) : runNotFound(runId);
  }

  /**
   * Over-threshold cities of a run. A `threshold` above the stored one
   * narrows the list further; it can never widen it, since cities at or
   * below the stored threshold were not kept.
   */
  async citiesExceedingThreshold(
    runId?: number,
    threshold?: number
  ): Promise<QueryResult<ThresholdCities>> {
    const run = await this.metricsSnapshot(runId);
    if (!run.found) return run;

    const stored = await this.store.getCitiesExceedingThreshold(run.value.id);
    const effective = Math.max(threshold ?? SITE_THRESHOLD, SITE_THRESHOLD);
    return found({
      analysisId: run.value.id,
      createdAt: run.value.createdAt,
      threshold: effective,
      cities: stored.filter((c) => c.siteCount > effective),
    });
  }

  async city(name: string, runId?: number): Promise<QueryResult<CityLookup>> {
    const run = await this.metricsSnapshot(runId);
    if (!run.found) return run;

    const row = await this.store.findCity(run.value.id, name);
    if (!row) {
      return {
        found: false,
        reason: 'city_not_found',
        message: `City '${name}' not found in analysis ${run.value.id}`,
      };
    }
    return found({ ...row, analysisId: run.value.id, createdAt: run.value.createdAt });
  }

  async region(name: string, runId?: number): Promise<QueryResult<RegionRows>> {
    const run = await this.metricsSnapshot(runId);
    if (!run.found) return run;

    const cities = await this.store.findRegion(run.value.id, name);
    return found({ analysisId: run.value.id, createdAt: run.value.createdAt, cities });
  }

  async regionSummary(name: string, runId?: number): Promise<QueryResult<RegionSummary>> {
    const result = await this.region(name, runId);
    if (!result.found) return result;

    const { cities, analysisId, createdAt } = result.value;
    const totalSites = cities.reduce((sum, c) => sum + c.siteCount, 0);
    return found({
      region: cities[0]?.region ?? name,
      totalSites,
      numberOfCities: cities.length,
      averagePerCity: cities.length > 0 ? totalSites / cities.length : 0,
      cities: [...cities].sort((a, b) => b.siteCount - a.siteCount),
      analysisId,
      createdAt,
    });
  }
}

function found<T>(value: T): QueryResult<T> {
  return { found: true, value };
}

function noRuns(): { found: false; reason: 'no_runs'; message: string } {
  return { found: false, reason: 'no_runs', message: NO_RUNS_MESSAGE };
}

function runNotFound(id: number): { found: false; reason: 'run_not_found'; message: string } {
  return { found: false, reason: 'run_not_found', message: `Analysis run with ID ${id} not found` };
}
