/**
 * Galamsay Analysis Types
 *
 * Shapes shared by the cleaning pipeline, the audit store and the HTTP API.
 * `CleanedRow` is the single value type that flows from cleaning into
 * persistence, so the two sides cannot drift apart.
 */

// ============================================================================
// Constants
// ============================================================================

/** Expected CSV header columns, in order. */
export const CSV_COLUMNS = ['City', 'Region', 'Number_of_Galamsay_Sites'] as const;

/** Cities with strictly more sites than this are listed as exceeding. */
export const SITE_THRESHOLD = 10;

/** Valid rows above this count are kept but flagged as possible outliers. */
export const OUTLIER_THRESHOLD = 200;

/** Placeholder values that mean "no data" rather than a real name. */
export const UNKNOWN_CITY = 'Unknown City';
export const INVALID_REGION = 'Invalid Region';

// ============================================================================
// Pipeline rows
// ============================================================================

/** One CSV data line, fields trimmed but not parsed. */
export interface RawRow {
  city: string;
  region: string;
  siteCount: string;
  /** 1-based line number in the source file (header is line 1). */
  line: number;
}

export interface CleanedRow {
  city: string;
  region: string;
  siteCount: number;
  /** True when siteCount exceeds OUTLIER_THRESHOLD. */
  flagged: boolean;
}

export type RejectReason = 'invalid_city' | 'invalid_region' | 'non_numeric_sites' | 'negative_sites';

export interface CleaningIssue {
  line: number;
  city: string;
  severity: 'rejected' | 'warning';
  reason: RejectReason | 'outlier';
  message: string;
}

export interface CleaningResult {
  cleaned: CleanedRow[];
  rejectedCount: number;
  issues: CleaningIssue[];
}

// ============================================================================
// Metrics
// ============================================================================

export interface OverThresholdCity {
  city: string;
  region: string;
  siteCount: number;
  threshold: number;
}

export interface RegionTotal {
  region: string;
  sites: number;
}

export interface AnalysisMetrics {
  totalSites: number;
  /** Region totals in order of first appearance. */
  regionTotals: RegionTotal[];
  topRegion: string | null;
  topRegionSites: number;
  averagePerRegion: number;
  citiesExceedingThreshold: OverThresholdCity[];
}

// ============================================================================
// Audit records
// ============================================================================

export interface AnalysisRunSummary {
  id: number;
  createdAt: Date;
  totalSites: number;
  topRegion: string | null;
  topRegionSites: number;
  averagePerRegion: number;
  validCount: number;
  rejectedCount: number;
}

export interface AnalysisRunDetail extends AnalysisRunSummary {
  cityData: CleanedRow[];
  citiesExceedingThreshold: OverThresholdCity[];
}

/** Everything needed to write one run; the store stamps id and createdAt. */
export interface NewAnalysisRun {
  metrics: AnalysisMetrics;
  cleaned: CleanedRow[];
  rejectedCount: number;
}

// ============================================================================
// Query results
// ============================================================================

export type NotFoundReason = 'no_runs' | 'run_not_found' | 'city_not_found';

export type QueryResult<T> =
  | { found: true; value: T }
  | { found: false; reason: NotFoundReason; message: string };

export interface PaginatedRunsResponse {
  analyses: AnalysisRunSummary[];
  total: number;
  limit: number;
  offset: number;
}

export interface CityLookup extends CleanedRow {
  analysisId: number;
  createdAt: Date;
}

export interface RegionSummary {
  region: string;
  totalSites: number;
  numberOfCities: number;
  averagePerCity: number;
  cities: CleanedRow[];
  analysisId: number;
  createdAt: Date;
}
