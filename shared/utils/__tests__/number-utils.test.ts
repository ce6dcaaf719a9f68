import { describe, it, expect } from 'vitest';
import { parseStrictInteger, roundTo } from '../number-utils';

describe('parseStrictInteger', () => {
  it('parses plain and signed integers', () => {
    expect(parseStrictInteger('42')).toBe(42);
    expect(parseStrictInteger('+7')).toBe(7);
    expect(parseStrictInteger('-5')).toBe(-5);
    expect(parseStrictInteger('0')).toBe(0);
  });

  it('trims surrounding whitespace', () => {
    expect(parseStrictInteger('  18 ')).toBe(18);
  });

  it('rejects decimals instead of truncating them', () => {
    expect(parseStrictInteger('1.5')).toBeNull();
    expect(parseStrictInteger('10.0')).toBeNull();
  });

  it('rejects text, partial numbers and empty strings', () => {
    expect(parseStrictInteger('abc')).toBeNull();
    expect(parseStrictInteger('eleven')).toBeNull();
    expect(parseStrictInteger('12abc')).toBeNull();
    expect(parseStrictInteger('1e3')).toBeNull();
    expect(parseStrictInteger('')).toBeNull();
    expect(parseStrictInteger('   ')).toBeNull();
  });

  it('treats "-0" as zero', () => {
    expect(Object.is(parseStrictInteger('-0'), 0)).toBe(true);
  });

  it('rejects values beyond the safe integer range', () => {
    expect(parseStrictInteger('9007199254740993')).toBeNull();
  });
});

describe('roundTo', () => {
  it('rounds to two decimals by default', () => {
    expect(roundTo(73 / 3)).toBe(24.33);
    expect(roundTo(2 / 3)).toBe(0.67);
  });

  it('rounds halves up', () => {
    expect(roundTo(2.5, 0)).toBe(3);
    expect(roundTo(0.125)).toBe(0.13);
  });

  it('supports other precisions', () => {
    expect(roundTo(3.14159, 3)).toBe(3.142);
    expect(roundTo(7.6, 0)).toBe(8);
  });
});
