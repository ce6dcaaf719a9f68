/**
 * Audit store for analysis runs.
 *
 * Runs are append-only: saveRun() writes a run header together with its
 * cleaned city snapshot and over-threshold list as one unit, and nothing
 * ever updates a run afterwards. "Latest" means greatest createdAt, ties
 * broken by greatest id.
 *
 * PostgresAnalysisStore (postgres-analysis-store.ts) is the production
 * implementation. MemAnalysisStore keeps everything in process and backs the
 * server when no database is configured, and the tests.
 */

import { roundTo } from '@shared/utils/number-utils';
import {
  insertAnalysisRunSchema,
  insertCityDataSchema,
  insertCityExceedingThresholdSchema,
} from '@shared/analysis-schema';
import type {
  AnalysisRunDetail,
  AnalysisRunSummary,
  CleanedRow,
  NewAnalysisRun,
  OverThresholdCity,
} from '@shared/analysis-types';

export interface IAnalysisStore {
  saveRun(run: NewAnalysisRun): Promise<AnalysisRunDetail>;
  getLatestRun(): Promise<AnalysisRunDetail | undefined>;
  getRunById(id: number): Promise<AnalysisRunDetail | undefined>;
  getLatestRunSummary(): Promise<AnalysisRunSummary | undefined>;
  getRunSummaryById(id: number): Promise<AnalysisRunSummary | undefined>;
  /** Runs ordered by createdAt desc, then id desc. */
  listRuns(offset: number, limit: number): Promise<AnalysisRunSummary[]>;
  countRuns(): Promise<number>;
  /** Case-insensitive exact match on city within one run. */
  findCity(runId: number, city: string): Promise<CleanedRow | undefined>;
  /** Case-insensitive exact match on region within one run, in row order. */
  findRegion(runId: number, region: string): Promise<CleanedRow[]>;
  getCitiesExceedingThreshold(runId: number): Promise<OverThresholdCity[]>;
  /** Resolves when the backing storage is reachable. */
  ping(): Promise<void>;
}

// ============================================================================
// Errors
// ============================================================================

/** A run could not be written; nothing from it was committed. */
export class AnalysisPersistError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalysisPersistError';
  }
}

export class StorageUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET']);

/**
 * True for errors that mean "storage cannot be reached" rather than a bug:
 * StorageUnavailableError, PostgreSQL connection-exception (08xxx) and
 * operator-intervention shutdown codes (57P0x), and socket-level failures.
 */
export function isStorageUnavailable(err: unknown): boolean {
  if (err instanceof StorageUnavailableError) return true;
  if (typeof err !== 'object' || err === null) return false;

  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string') {
    if (CONNECTION_ERROR_CODES.has(code)) return true;
    if (code.startsWith('08') || code.startsWith('57P0')) return true;
  }

  // drizzle wraps driver errors; look one level down
  const cause = 'cause' in err ? err.cause : undefined;
  return cause !== undefined && cause !== err && isStorageUnavailable(cause);
}

// ============================================================================
// Shared helpers
// ============================================================================

/** Stored averages are rounded to two decimals. */
export function toStoredAverage(average: number): number {
  return roundTo(average, 2);
}

export function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function compareLatestFirst(a: AnalysisRunSummary, b: AnalysisRunSummary): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  return byTime !== 0 ? byTime : b.id - a.id;
}

// ============================================================================
// In-memory implementation
// ============================================================================

interface StoredRun {
  summary: AnalysisRunSummary;
  cityData: CleanedRow[];
  citiesExceedingThreshold: OverThresholdCity[];
}

export interface MemAnalysisStoreOptions {
  /** Clock used to stamp createdAt. */
  now?: () => Date;
}

export class MemAnalysisStore implements IAnalysisStore {
  private runs: Map<number, StoredRun>;
  private nextId = 1;
  private readonly now: () => Date;

  constructor(options: MemAnalysisStoreOptions = {}) {
    this.runs = new Map();
    this.now = options.now ?? (() => new Date());
  }

  async saveRun(run: NewAnalysisRun): Promise<AnalysisRunDetail> {
    const id = this.nextId;
    const createdAt = this.now();
    const { metrics } = run;

    // Validate every row before touching the map so a bad row leaves no
    // trace of the run.
    let stored: StoredRun;
    try {
      const header = insertAnalysisRunSchema.parse({
        createdAt,
        totalSites: metrics.totalSites,
        topRegion: metrics.topRegion,
        topRegionSites: metrics.topRegionSites,
        averagePerRegion: toStoredAverage(metrics.averagePerRegion),
        validCount: run.cleaned.length,
        rejectedCount: run.rejectedCount,
      });
      const cityData = run.cleaned.map((row, position) =>
        insertCityDataSchema.parse({ analysisRunId: id, position, ...row })
      );
      const overThreshold = metrics.citiesExceedingThreshold.map((row, position) =>
        insertCityExceedingThresholdSchema.parse({ analysisRunId: id, position, ...row })
      );

      stored = {
        summary: {
          id,
          createdAt,
          totalSites: header.totalSites,
          topRegion: header.topRegion ?? null,
          topRegionSites: header.topRegionSites ?? 0,
          averagePerRegion: header.averagePerRegion,
          validCount: header.validCount,
          rejectedCount: header.rejectedCount,
        },
        cityData: cityData.map((row) => ({
          city: row.city,
          region: row.region,
          siteCount: row.siteCount,
          flagged: row.flagged ?? false,
        })),
        citiesExceedingThreshold: overThreshold.map((row) => ({
          city: row.city,
          region: row.region,
          siteCount: row.siteCount,
          threshold: row.threshold,
        })),
      };
    } catch (err) {
      throw new AnalysisPersistError(
        `Failed to save analysis run: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    this.runs.set(id, stored);
    this.nextId++;
    return toDetail(stored);
  }

  async getLatestRun(): Promise<AnalysisRunDetail | undefined> {
    const latest = this.latest();
    return latest ? toDetail(latest) : undefined;
  }

  async getRunById(id: number): Promise<AnalysisRunDetail | undefined> {
    const run = this.runs.get(id);
    return run ? toDetail(run) : undefined;
  }

  async getLatestRunSummary(): Promise<AnalysisRunSummary | undefined> {
    const latest = this.latest();
    return latest ? { ...latest.summary } : undefined;
  }

  async getRunSummaryById(id: number): Promise<AnalysisRunSummary | undefined> {
    const run = this.runs.get(id);
    return run ? { ...run.summary } : undefined;
  }

  async listRuns(offset: number, limit: number): Promise<AnalysisRunSummary[]> {
    return this.sortedSummaries()
      .slice(offset, offset + limit)
      .map((summary) => ({ ...summary }));
  }

  async countRuns(): Promise<number> {
    return this.runs.size;
  }

  async findCity(runId: number, city: string): Promise<CleanedRow | undefined> {
    const match = this.runs.get(runId)?.cityData.find((row) => sameName(row.city, city));
    return match ? { ...match } : undefined;
  }

  async findRegion(runId: number, region: string): Promise<CleanedRow[]> {
    const rows = this.runs.get(runId)?.cityData ?? [];
    return rows.filter((row) => sameName(row.region, region)).map((row) => ({ ...row }));
  }

  async getCitiesExceedingThreshold(runId: number): Promise<OverThresholdCity[]> {
    return (this.runs.get(runId)?.citiesExceedingThreshold ?? []).map((row) => ({ ...row }));
  }

  async ping(): Promise<void> {
    // always reachable
  }

  private sortedSummaries(): AnalysisRunSummary[] {
    return Array.from(this.runs.values(), (run) => run.summary).sort(compareLatestFirst);
  }

  private latest(): StoredRun | undefined {
    const [first] = this.sortedSummaries();
    return first ? this.runs.get(first.id) : undefined;
  }
}

function toDetail(run: StoredRun): AnalysisRunDetail {
  return {
    ...run.summary,
    cityData: run.cityData.map((row) => ({ ...row })),
    citiesExceedingThreshold: run.citiesExceedingThreshold.map((row) => ({ ...row })),
  };
}
