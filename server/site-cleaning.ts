/**
 * Site-count cleaning and validation.
 *
 * Rules are applied per row and the first failing rule wins:
 *   1. city empty or "Unknown City"        -> rejected (invalid_city)
 *   2. region empty or "Invalid Region"    -> rejected (invalid_region)
 *   3. site count not a base-10 integer    -> rejected (non_numeric_sites)
 *   4. site count negative                 -> rejected (negative_sites)
 *   5. otherwise kept; > OUTLIER_THRESHOLD is flagged with a warning
 *
 * Rejected rows are only counted and described; they are never returned.
 */

import {
  INVALID_REGION,
  OUTLIER_THRESHOLD,
  UNKNOWN_CITY,
  type CleanedRow,
  type CleaningIssue,
  type CleaningResult,
  type RawRow,
} from '@shared/analysis-types';
import { parseStrictInteger } from '@shared/utils/number-utils';

export type RowVerdict =
  | { kind: 'accepted'; row: CleanedRow; warning?: CleaningIssue }
  | { kind: 'rejected'; issue: CleaningIssue };

export function cleanRow(raw: RawRow): RowVerdict {
  const city = raw.city.trim();
  const region = raw.region.trim();
  const sitesText = raw.siteCount.trim();

  if (city === '' || city === UNKNOWN_CITY) {
    return reject(raw, city, 'invalid_city', `Invalid city: '${city}'`);
  }

  if (region === '' || region === INVALID_REGION) {
    return reject(raw, city, 'invalid_region', `Invalid region for city ${city}: '${region}'`);
  }

  const sites = parseStrictInteger(sitesText);
  if (sites === null) {
    return reject(
      raw,
      city,
      'non_numeric_sites',
      `Invalid sites count for ${city}: '${sitesText}' is not a number`
    );
  }

  if (sites < 0) {
    return reject(raw, city, 'negative_sites', `Negative sites count for ${city}: ${sites}`);
  }

  const flagged = sites > OUTLIER_THRESHOLD;
  const row: CleanedRow = { city, region, siteCount: sites, flagged };
  if (!flagged) {
    return { kind: 'accepted', row };
  }

  return {
    kind: 'accepted',
    row,
    warning: {
      line: raw.line,
      city,
      severity: 'warning',
      reason: 'outlier',
      message: `Possible outlier for ${city}: ${sites} sites`,
    },
  };
}

export function cleanRows(rows: readonly RawRow[]): CleaningResult {
  const cleaned: CleanedRow[] = [];
  const issues: CleaningIssue[] = [];
  let rejectedCount = 0;

  for (const raw of rows) {
    const verdict = cleanRow(raw);
    if (verdict.kind === 'rejected') {
      rejectedCount++;
      issues.push(verdict.issue);
      continue;
    }
    cleaned.push(verdict.row);
    if (verdict.warning) {
      issues.push(verdict.warning);
    }
  }

  return { cleaned, rejectedCount, issues };
}

function reject(
  raw: RawRow,
  city: string,
  reason: Exclude<CleaningIssue['reason'], 'outlier'>,
  message: string
): RowVerdict {
  return {
    kind: 'rejected',
    issue: { line: raw.line, city, severity: 'rejected', reason, message },
  };
}
