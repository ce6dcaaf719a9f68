import { describe, it, expect } from 'vitest';
import { SITE_THRESHOLD, type CleanedRow } from '@shared/analysis-types';
import {
  citiesAboveThreshold,
  computeMetrics,
  computeRegionTotals,
  findTopRegion,
} from '../site-metrics';

function row(city: string, region: string, siteCount: number): CleanedRow {
  return { city, region, siteCount, flagged: siteCount > 200 };
}

const SAMPLE: CleanedRow[] = [
  row('Accra', 'Greater Accra', 30),
  row('Kumasi', 'Ashanti', 25),
  row('Takoradi', 'Western', 18),
];

describe('computeMetrics', () => {
  it('computes totals, top region and average for the sample rows', () => {
    const metrics = computeMetrics(SAMPLE);

    expect(metrics.totalSites).toBe(73);
    expect(metrics.topRegion).toBe('Greater Accra');
    expect(metrics.topRegionSites).toBe(30);
    expect(metrics.averagePerRegion).toBeCloseTo(24.333, 3);
    expect(metrics.regionTotals).toEqual([
      { region: 'Greater Accra', sites: 30 },
      { region: 'Ashanti', sites: 25 },
      { region: 'Western', sites: 18 },
    ]);
    expect(metrics.citiesExceedingThreshold.map((c) => c.city)).toEqual([
      'Accra',
      'Kumasi',
      'Takoradi',
    ]);
  });

  it('returns zeroed metrics for no rows', () => {
    expect(computeMetrics([])).toEqual({
      totalSites: 0,
      regionTotals: [],
      topRegion: null,
      topRegionSites: 0,
      averagePerRegion: 0,
      citiesExceedingThreshold: [],
    });
  });

  it('sums region totals back to the overall total', () => {
    const rows = [...SAMPLE, row('Tema', 'Greater Accra', 4), row('Obuasi', 'Ashanti', 34)];
    const metrics = computeMetrics(rows);

    const regionSum = metrics.regionTotals.reduce((sum, r) => sum + r.sites, 0);
    expect(regionSum).toBe(metrics.totalSites);
    expect(metrics.topRegion).toBe('Ashanti');
    expect(metrics.topRegionSites).toBe(59);
    expect(metrics.averagePerRegion).toBeCloseTo(111 / 3, 10);
  });

  it('splits the total between over-threshold and remaining cities', () => {
    const rows = [...SAMPLE, row('Kibi', 'Eastern', 10), row('Tema', 'Greater Accra', 4)];
    const metrics = computeMetrics(rows);

    const over = metrics.citiesExceedingThreshold.reduce((sum, c) => sum + c.siteCount, 0);
    const rest = rows
      .filter((r) => r.siteCount <= SITE_THRESHOLD)
      .reduce((sum, r) => sum + r.siteCount, 0);

    expect(over).toBe(73);
    expect(rest).toBe(14);
    expect(over + rest).toBe(metrics.totalSites);
  });

  it('gives the same answer for the same input', () => {
    expect(computeMetrics(SAMPLE)).toEqual(computeMetrics(SAMPLE));
  });
});

describe('findTopRegion', () => {
  it('keeps the first region seen when totals tie', () => {
    const totals = computeRegionTotals([row('Tarkwa', 'Western', 20), row('Kibi', 'Eastern', 20)]);
    expect(findTopRegion(totals)).toEqual({ region: 'Western', sites: 20 });
  });

  it('returns null when there are no regions', () => {
    expect(findTopRegion([])).toBeNull();
  });
});

describe('citiesAboveThreshold', () => {
  it('uses a strict greater-than comparison', () => {
    const rows = [row('Kibi', 'Eastern', 10), row('Akim Oda', 'Eastern', 11)];

    expect(citiesAboveThreshold(rows)).toEqual([
      { city: 'Akim Oda', region: 'Eastern', siteCount: 11, threshold: 10 },
    ]);
  });

  it('accepts a custom threshold', () => {
    expect(citiesAboveThreshold(SAMPLE, 25).map((c) => c.city)).toEqual(['Accra']);
  });

  it('keeps duplicate city names as separate entries', () => {
    const rows = [row('Accra', 'Greater Accra', 12), row('Accra', 'Greater Accra', 14)];
    expect(citiesAboveThreshold(rows)).toHaveLength(2);
  });
});
