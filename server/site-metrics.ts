/**
 * Aggregate metrics over cleaned site counts.
 *
 * Pure: the same cleaned sequence always yields the same metrics. Region
 * totals keep first-appearance order (Map insertion order), and the top
 * region is the first region reaching the maximum, so ties resolve by row
 * order rather than alphabetically.
 */

import {
  SITE_THRESHOLD,
  type AnalysisMetrics,
  type CleanedRow,
  type OverThresholdCity,
  type RegionTotal,
} from '@shared/analysis-types';

export function computeRegionTotals(rows: readonly CleanedRow[]): RegionTotal[] {
  const totals = new Map<string, number>();
  for (const row of rows) {
    totals.set(row.region, (totals.get(row.region) ?? 0) + row.siteCount);
  }
  return Array.from(totals, ([region, sites]) => ({ region, sites }));
}

export function findTopRegion(regionTotals: readonly RegionTotal[]): RegionTotal | null {
  let top: RegionTotal | null = null;
  for (const entry of regionTotals) {
    // strict > keeps the earliest region on ties
    if (top === null || entry.sites > top.sites) {
      top = entry;
    }
  }
  return top;
}

export function citiesAboveThreshold(
  rows: readonly CleanedRow[],
  threshold: number = SITE_THRESHOLD
): OverThresholdCity[] {
  return rows
    .filter((row) => row.siteCount > threshold)
    .map((row) => ({ city: row.city, region: row.region, siteCount: row.siteCount, threshold }));
}

export function computeMetrics(rows: readonly CleanedRow[]): AnalysisMetrics {
  const totalSites = rows.reduce((sum, row) => sum + row.siteCount, 0);
  const regionTotals = computeRegionTotals(rows);
  const top = findTopRegion(regionTotals);

  return {
    totalSites,
    regionTotals,
    topRegion: top?.region ?? null,
    topRegionSites: top?.sites ?? 0,
    averagePerRegion: regionTotals.length > 0 ? totalSites / regionTotals.length : 0,
    citiesExceedingThreshold: citiesAboveThreshold(rows),
  };
}
