import { describe, it, expect } from 'vitest';
import { Temporal } from 'temporal-polyfill';
import { classifyTimestamp, isParsedTimestamp } from './classify.js';

describe('classifyTimestamp', () => {
  it('should tag Temporal values', () => {
    const zoned = Temporal.ZonedDateTime.from('2024-01-15T14:30:00[UTC]');
    const naive = Temporal.PlainDateTime.from('2024-01-15T14:30:00');
    const date = Temporal.PlainDate.from('2024-01-15');

    expect(classifyTimestamp(zoned)).toEqual({ kind: 'zoned', value: zoned });
    expect(classifyTimestamp(naive)).toEqual({ kind: 'naive', value: naive });
    expect(classifyTimestamp(date)).toEqual({ kind: 'date', value: date });
  });

  it('should tag JavaScript dates', () => {
    const date = new Date(0);
    expect(classifyTimestamp(date)).toEqual({ kind: 'jsDate', value: date });
  });

  it('should split numbers into integers and floats', () => {
    expect(classifyTimestamp(1705330200)).toEqual({ kind: 'integer', value: 1705330200 });
    expect(classifyTimestamp(-1)).toEqual({ kind: 'integer', value: -1 });
    expect(classifyTimestamp(1705330200.5)).toEqual({ kind: 'float', value: 1705330200.5 });
    expect(classifyTimestamp(Number.NaN)?.kind).toBe('float');
  });

  it('should tag strings without trimming them', () => {
    expect(classifyTimestamp(' 2024-01-15 ')).toEqual({ kind: 'string', value: ' 2024-01-15 ' });
  });

  it('should not classify other shapes', () => {
    expect(classifyTimestamp({})).toBeUndefined();
    expect(classifyTimestamp(null)).toBeUndefined();
    expect(classifyTimestamp(undefined)).toBeUndefined();
    expect(classifyTimestamp(true)).toBeUndefined();
    expect(classifyTimestamp(10n)).toBeUndefined();
    expect(classifyTimestamp([2024, 1, 15])).toBeUndefined();
  });
});

describe('isParsedTimestamp', () => {
  it('should accept calendar values only', () => {
    expect(isParsedTimestamp(Temporal.PlainDate.from('2024-01-15'))).toBe(true);
    expect(isParsedTimestamp(new Date(0))).toBe(false);
    expect(isParsedTimestamp('2024-01-15')).toBe(false);
  });
});
