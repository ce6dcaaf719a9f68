/**
 * Plain-text report printed by the analyze CLI.
 */

import { SITE_THRESHOLD } from '@shared/analysis-types';
import type { PreparedAnalysis } from './analysis-pipeline';

const RULE = '='.repeat(60);

/** How many cleaning issues are listed by name in the data-quality section. */
export const SAMPLE_ISSUE_COUNT = 5;

export function formatAnalysisReport(prepared: PreparedAnalysis): string[] {
  const { metrics, cleaning } = prepared;
  const lines: string[] = [RULE, 'ANALYSIS RESULTS', RULE];

  lines.push(`Total Galamsay Sites: ${metrics.totalSites}`);
  lines.push(
    metrics.topRegion === null
      ? 'Region with Highest Sites: n/a (no valid rows)'
      : `Region with Highest Sites: ${metrics.topRegion} (${metrics.topRegionSites} sites)`
  );
  lines.push(`Average Sites per Region: ${metrics.averagePerRegion.toFixed(2)}`);

  lines.push('', `Cities Exceeding Threshold (${SITE_THRESHOLD} sites):`);
  const exceeding = [...metrics.citiesExceedingThreshold].sort(
    (a, b) => b.siteCount - a.siteCount
  );
  if (exceeding.length === 0) {
    lines.push('  (none)');
  }
  for (const city of exceeding) {
    lines.push(`  - ${city.city} (${city.region}): ${city.siteCount} sites`);
  }

  const warnings = cleaning.issues.filter((i) => i.severity === 'warning').length;
  lines.push('', 'Data Quality Report:');
  lines.push(`  Records read: ${prepared.rawCount}`);
  lines.push(`  Valid records: ${cleaning.cleaned.length}`);
  lines.push(`  Rejected records: ${cleaning.rejectedCount}`);
  lines.push(`  Warnings: ${warnings}`);

  const sample = cleaning.issues.slice(0, SAMPLE_ISSUE_COUNT);
  if (sample.length > 0) {
    lines.push('  Sample issues:');
    for (const issue of sample) {
      const label = issue.severity === 'warning' ? 'WARNING: ' : '';
      lines.push(`    - line ${issue.line}: ${label}${issue.message}`);
    }
  }

  return lines;
}
