import { describe, it, expect } from 'vitest';
import { analyzeRows } from '../analysis-pipeline';
import { formatAnalysisReport } from '../analysis-report';
import { SAMPLE_ROWS } from '../test/analysis-fixtures';

const RULE = '='.repeat(60);

describe('formatAnalysisReport', () => {
  it('prints metrics, the over-threshold list and data quality', () => {
    expect(formatAnalysisReport(analyzeRows(SAMPLE_ROWS))).toEqual([
      RULE,
      'ANALYSIS RESULTS',
      RULE,
      'Total Galamsay Sites: 73',
      'Region with Highest Sites: Greater Accra (30 sites)',
      'Average Sites per Region: 24.33',
      '',
      'Cities Exceeding Threshold (10 sites):',
      '  - Accra (Greater Accra): 30 sites',
      '  - Kumasi (Ashanti): 25 sites',
      '  - Takoradi (Western): 18 sites',
      '',
      'Data Quality Report:',
      '  Records read: 5',
      '  Valid records: 3',
      '  Rejected records: 2',
      '  Warnings: 0',
      '  Sample issues:',
      "    - line 5: Invalid city: 'Unknown City'",
      '    - line 6: Negative sites count for Tema: -1',
    ]);
  });

  it('sorts over-threshold cities by site count', () => {
    const lines = formatAnalysisReport(
      analyzeRows([
        { city: 'Kibi', region: 'Eastern', siteCount: '12', line: 2 },
        { city: 'Prestea', region: 'Western', siteCount: '250', line: 3 },
      ])
    );

    expect(lines.filter((l) => l.startsWith('  - '))).toEqual([
      '  - Prestea (Western): 250 sites',
      '  - Kibi (Eastern): 12 sites',
    ]);
    expect(lines).toContain('  Warnings: 1');
    expect(lines).toContain('    - line 3: WARNING: Possible outlier for Prestea: 250 sites');
  });

  it('handles a run without valid rows', () => {
    const lines = formatAnalysisReport(analyzeRows([]));

    expect(lines.slice(3, 9)).toEqual([
      'Total Galamsay Sites: 0',
      'Region with Highest Sites: n/a (no valid rows)',
      'Average Sites per Region: 0.00',
      '',
      'Cities Exceeding Threshold (10 sites):',
      '  (none)',
    ]);
    expect(lines).not.toContain('  Sample issues:');
  });

  it('lists at most five sample issues', () => {
    const rows = Array.from({ length: 8 }, (_, i) => ({
      city: 'Unknown City',
      region: 'Ashanti',
      siteCount: '1',
      line: i + 2,
    }));

    const lines = formatAnalysisReport(analyzeRows(rows));

    expect(lines.filter((l) => l.startsWith('    - line'))).toHaveLength(5);
    expect(lines).toContain('  Rejected records: 8');
  });
});
