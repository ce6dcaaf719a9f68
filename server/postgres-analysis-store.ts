/**
 * PostgreSQL-backed audit store (Drizzle ORM over node-postgres).
 *
 * saveRun() runs inside a single transaction: the run header, its city_data
 * snapshot and its cities_exceeding_threshold rows either all commit or all
 * roll back, so readers never see a partially written run. created_at comes
 * from the database clock (defaultNow()).
 */

import { and, asc, count, desc, eq, sql } from 'drizzle-orm';
import {
  analysisRuns,
  cityData,
  citiesExceedingThreshold,
  insertAnalysisRunSchema,
  insertCityDataSchema,
  insertCityExceedingThresholdSchema,
  type AnalysisRunRow,
  type CityDataRow,
  type CityExceedingThresholdRow,
} from '@shared/analysis-schema';
import type {
  AnalysisRunDetail,
  AnalysisRunSummary,
  CleanedRow,
  NewAnalysisRun,
  OverThresholdCity,
} from '@shared/analysis-types';
import { getAnalysisDb, type AnalysisDb } from './storage';
import {
  AnalysisPersistError,
  StorageUnavailableError,
  toStoredAverage,
  type IAnalysisStore,
} from './analysis-store';

export class PostgresAnalysisStore implements IAnalysisStore {
  constructor(private readonly resolveDb: () => AnalysisDb = getAnalysisDb) {}

  async saveRun(run: NewAnalysisRun): Promise<AnalysisRunDetail> {
    const db = this.db();
    const { metrics } = run;

    try {
      return await db.transaction(async (tx) => {
        const [header] = await tx
          .insert(analysisRuns)
          .values(
            insertAnalysisRunSchema.parse({
              totalSites: metrics.totalSites,
              topRegion: metrics.topRegion,
              topRegionSites: metrics.topRegionSites,
              averagePerRegion: toStoredAverage(metrics.averagePerRegion),
              validCount: run.cleaned.length,
              rejectedCount: run.rejectedCount,
            })
          )
          .returning();
        if (!header) {
          throw new Error('Insert into analysis_runs returned no row');
        }

        if (run.cleaned.length > 0) {
          await tx.insert(cityData).values(
            run.cleaned.map((row, position) =>
              insertCityDataSchema.parse({ analysisRunId: header.id, position, ...row })
            )
          );
        }

        if (metrics.citiesExceedingThreshold.length > 0) {
          await tx.insert(citiesExceedingThreshold).values(
            metrics.citiesExceedingThreshold.map((row, position) =>
              insertCityExceedingThresholdSchema.parse({
                analysisRunId: header.id,
                position,
                ...row,
              })
            )
          );
        }

        return {
          ...toSummary(header),
          cityData: run.cleaned.map((row) => ({ ...row })),
          citiesExceedingThreshold: metrics.citiesExceedingThreshold.map((row) => ({ ...row })),
        };
      });
    } catch (err) {
      throw new AnalysisPersistError(
        `Failed to save analysis run (rolled back): ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  async getLatestRun(): Promise<AnalysisRunDetail | undefined> {
    const summary = await this.getLatestRunSummary();
    return summary ? this.withChildren(summary) : undefined;
  }

  async getRunById(id: number): Promise<AnalysisRunDetail | undefined> {
    const summary = await this.getRunSummaryById(id);
    return summary ? this.withChildren(summary) : undefined;
  }

  async getLatestRunSummary(): Promise<AnalysisRunSummary | undefined> {
    const [row] = await this.db()
      .select()
      .from(analysisRuns)
      .orderBy(desc(analysisRuns.createdAt), desc(analysisRuns.id))
      .limit(1);
    return row ? toSummary(row) : undefined;
  }

  async getRunSummaryById(id: number): Promise<AnalysisRunSummary | undefined> {
    const [row] = await this.db()
      .select()
      .from(analysisRuns)
      .where(eq(analysisRuns.id, id))
      .limit(1);
    return row ? toSummary(row) : undefined;
  }

  async listRuns(offset: number, limit: number): Promise<AnalysisRunSummary[]> {
    const rows = await this.db()
      .select()
      .from(analysisRuns)
      .orderBy(desc(analysisRuns.createdAt), desc(analysisRuns.id))
      .limit(limit)
      .offset(offset);
    return rows.map(toSummary);
  }

  async countRuns(): Promise<number> {
    const [result] = await this.db().select({ count: count() }).from(analysisRuns);
    return result?.count ?? 0;
  }

  async findCity(runId: number, city: string): Promise<CleanedRow | undefined> {
    const [row] = await this.db()
      .select()
      .from(cityData)
      .where(
        and(
          eq(cityData.analysisRunId, runId),
          sql`lower(${cityData.city}) = ${city.toLowerCase()}`
        )
      )
      .orderBy(asc(cityData.position))
      .limit(1);
    return row ? toCleanedRow(row) : undefined;
  }

  async findRegion(runId: number, region: string): Promise<CleanedRow[]> {
    const rows = await this.db()
      .select()
      .from(cityData)
      .where(
        and(
          eq(cityData.analysisRunId, runId),
          sql`lower(${cityData.region}) = ${region.toLowerCase()}`
        )
      )
      .orderBy(asc(cityData.position));
    return rows.map(toCleanedRow);
  }

  async getCitiesExceedingThreshold(runId: number): Promise<OverThresholdCity[]> {
    const rows = await this.db()
      .select()
      .from(citiesExceedingThreshold)
      .where(eq(citiesExceedingThreshold.analysisRunId, runId))
      .orderBy(asc(citiesExceedingThreshold.position));
    return rows.map(toOverThresholdCity);
  }

  async ping(): Promise<void> {
    await this.db().execute(sql`SELECT 1`);
  }

  private db(): AnalysisDb {
    try {
      return this.resolveDb();
    } catch (err) {
      throw new StorageUnavailableError(
        err instanceof Error ? err.message : 'Database not configured',
        { cause: err }
      );
    }
  }

  private async withChildren(summary: AnalysisRunSummary): Promise<AnalysisRunDetail> {
    const db = this.db();
    const [cities, overThreshold] = await Promise.all([
      db
        .select()
        .from(cityData)
        .where(eq(cityData.analysisRunId, summary.id))
        .orderBy(asc(cityData.position)),
      db
        .select()
        .from(citiesExceedingThreshold)
        .where(eq(citiesExceedingThreshold.analysisRunId, summary.id))
        .orderBy(asc(citiesExceedingThreshold.position)),
    ]);

    return {
      ...summary,
      cityData: cities.map(toCleanedRow),
      citiesExceedingThreshold: overThreshold.map(toOverThresholdCity),
    };
  }
}

function toSummary(row: AnalysisRunRow): AnalysisRunSummary {
  return {
    id: row.id,
    createdAt: row.createdAt,
    totalSites: row.totalSites,
    topRegion: row.topRegion,
    topRegionSites: row.topRegionSites,
    averagePerRegion: row.averagePerRegion,
    validCount: row.validCount,
    rejectedCount: row.rejectedCount,
  };
}

function toCleanedRow(row: CityDataRow): CleanedRow {
  return { city: row.city, region: row.region, siteCount: row.siteCount, flagged: row.flagged };
}

function toOverThresholdCity(row: CityExceedingThresholdRow): OverThresholdCity {
  return {
    city: row.city,
    region: row.region,
    siteCount: row.siteCount,
    threshold: row.threshold,
  };
}
