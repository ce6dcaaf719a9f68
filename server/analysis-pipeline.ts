/**
 * Analysis pipeline: CSV -> cleaning -> metrics -> audit store.
 *
 * One sequential pass per invocation. Structural CSV errors abort before
 * anything is written; a persistence failure leaves no partial run (the
 * store writes all-or-nothing).
 */

import type {
  AnalysisMetrics,
  AnalysisRunDetail,
  CleaningResult,
  RawRow,
} from '@shared/analysis-types';
import { loadCsvFile } from './csv-loader';
import { cleanRows } from './site-cleaning';
import { computeMetrics } from './site-metrics';
import type { IAnalysisStore } from './analysis-store';

export interface PreparedAnalysis {
  rawCount: number;
  cleaning: CleaningResult;
  metrics: AnalysisMetrics;
}

export interface AnalysisReport extends PreparedAnalysis {
  run: AnalysisRunDetail;
}

/** Clean and compute without touching storage. */
export function analyzeRows(rows: readonly RawRow[]): PreparedAnalysis {
  const cleaning = cleanRows(rows);
  return {
    rawCount: rows.length,
    cleaning,
    metrics: computeMetrics(cleaning.cleaned),
  };
}

export async function prepareAnalysis(csvPath: string): Promise<PreparedAnalysis> {
  const rows = await loadCsvFile(csvPath);
  return analyzeRows(rows);
}

export async function persistAnalysis(
  prepared: PreparedAnalysis,
  store: IAnalysisStore
): Promise<AnalysisRunDetail> {
  const run = await store.saveRun({
    metrics: prepared.metrics,
    cleaned: prepared.cleaning.cleaned,
    rejectedCount: prepared.cleaning.rejectedCount,
  });
  console.log(
    `[pipeline] Stored analysis run ${run.id} (${run.validCount} valid, ${run.rejectedCount} rejected)`
  );
  return run;
}

export async function runAnalysis(csvPath: string, store: IAnalysisStore): Promise<AnalysisReport> {
  const prepared = await prepareAnalysis(csvPath);
  const run = await persistAnalysis(prepared, store);
  return { ...prepared, run };
}
