import { describe, it, expect } from 'vitest';
import type { RawRow } from '@shared/analysis-types';
import { cleanRow, cleanRows } from '../site-cleaning';

function raw(city: string, region: string, siteCount: string, line = 2): RawRow {
  return { city, region, siteCount, line };
}

describe('cleanRow', () => {
  it('accepts a well-formed row', () => {
    expect(cleanRow(raw('Accra', 'Greater Accra', '30'))).toEqual({
      kind: 'accepted',
      row: { city: 'Accra', region: 'Greater Accra', siteCount: 30, flagged: false },
    });
  });

  it('accepts zero sites', () => {
    const verdict = cleanRow(raw('Kibi', 'Eastern', '0'));
    expect(verdict.kind).toBe('accepted');
  });

  it.each([
    ['Unknown City', 'invalid_city', "Invalid city: 'Unknown City'"],
    ['', 'invalid_city', "Invalid city: ''"],
  ])('rejects city %j', (city, reason, message) => {
    expect(cleanRow(raw(city, 'Ashanti', '5', 7))).toEqual({
      kind: 'rejected',
      issue: { line: 7, city, severity: 'rejected', reason, message },
    });
  });

  it('treats the sentinel city case-sensitively', () => {
    expect(cleanRow(raw('unknown city', 'Ashanti', '5')).kind).toBe('accepted');
  });

  it('rejects an invalid or empty region', () => {
    const invalid = cleanRow(raw('Obuasi', 'Invalid Region', '12'));
    const empty = cleanRow(raw('Obuasi', '  ', '12'));

    expect(invalid).toMatchObject({
      kind: 'rejected',
      issue: { reason: 'invalid_region', message: "Invalid region for city Obuasi: 'Invalid Region'" },
    });
    expect(empty).toMatchObject({ kind: 'rejected', issue: { reason: 'invalid_region' } });
  });

  it.each(['1.5', 'abc', '', '12abc', '1e3'])('rejects non-integer site count %j', (sites) => {
    const verdict = cleanRow(raw('Tarkwa', 'Western', sites));
    expect(verdict).toMatchObject({
      kind: 'rejected',
      issue: {
        reason: 'non_numeric_sites',
        message: `Invalid sites count for Tarkwa: '${sites}' is not a number`,
      },
    });
  });

  it('rejects a negative site count', () => {
    expect(cleanRow(raw('Tema', 'Greater Accra', '-5'))).toMatchObject({
      kind: 'rejected',
      issue: { reason: 'negative_sites', message: 'Negative sites count for Tema: -5' },
    });
  });

  it('checks the city before the region and the site count', () => {
    const verdict = cleanRow(raw('Unknown City', 'Invalid Region', 'abc'));
    expect(verdict).toMatchObject({ issue: { reason: 'invalid_city' } });
  });

  it('keeps but flags an outlier above 200 sites', () => {
    expect(cleanRow(raw('Prestea', 'Western', '250', 9))).toEqual({
      kind: 'accepted',
      row: { city: 'Prestea', region: 'Western', siteCount: 250, flagged: true },
      warning: {
        line: 9,
        city: 'Prestea',
        severity: 'warning',
        reason: 'outlier',
        message: 'Possible outlier for Prestea: 250 sites',
      },
    });
  });

  it('does not flag exactly 200 sites', () => {
    expect(cleanRow(raw('Prestea', 'Western', '200'))).toEqual({
      kind: 'accepted',
      row: { city: 'Prestea', region: 'Western', siteCount: 200, flagged: false },
    });
  });
});

describe('cleanRows', () => {
  const rows: RawRow[] = [
    raw('Accra', 'Greater Accra', '30', 2),
    raw('Kumasi', 'Ashanti', '25', 3),
    raw('Takoradi', 'Western', '18', 4),
    raw('Unknown City', 'X', '5', 5),
    raw('Tema', 'Greater Accra', '-1', 6),
  ];

  it('keeps valid rows in order and counts rejections', () => {
    const result = cleanRows(rows);

    expect(result.cleaned.map((r) => r.city)).toEqual(['Accra', 'Kumasi', 'Takoradi']);
    expect(result.rejectedCount).toBe(2);
    expect(result.issues.map((i) => [i.line, i.reason])).toEqual([
      [5, 'invalid_city'],
      [6, 'negative_sites'],
    ]);
  });

  it('accounts for every input row exactly once', () => {
    const result = cleanRows(rows);
    expect(result.cleaned.length + result.rejectedCount).toBe(rows.length);
  });

  it('reports outlier warnings without counting them as rejections', () => {
    const result = cleanRows([raw('Prestea', 'Western', '250', 2), raw('Kibi', 'Eastern', 'n/a', 3)]);

    expect(result.cleaned).toHaveLength(1);
    expect(result.rejectedCount).toBe(1);
    expect(result.issues.map((i) => i.severity)).toEqual(['warning', 'rejected']);
  });

  it('returns empty results for no input', () => {
    expect(cleanRows([])).toEqual({ cleaned: [], rejectedCount: 0, issues: [] });
  });

  it('never returns rows that break the cleaning rules', () => {
    const mixed = [
      raw('', 'Ashanti', '3'),
      raw('Bibiani', '', '3'),
      raw('Bibiani', 'Western North', '+7'),
      raw('Juaboso', 'Western North', '-0'),
    ];
    const { cleaned } = cleanRows(mixed);

    expect(cleaned).toEqual([
      { city: 'Bibiani', region: 'Western North', siteCount: 7, flagged: false },
      { city: 'Juaboso', region: 'Western North', siteCount: 0, flagged: false },
    ]);
  });
});
