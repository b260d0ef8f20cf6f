import { describe, it, expect } from 'vitest';
import {
  YEAR_FIRST,
  execPattern,
  fieldsFromGroups,
  parseGroups,
  plainDateTimeFrom,
  testPattern,
} from './fields.js';

describe('execPattern', () => {
  it('should match global patterns deterministically', () => {
    const pattern = /^(\d{4})$/g;
    expect(testPattern(pattern, '2024')).toBe(true);
    expect(testPattern(pattern, '2024')).toBe(true);
    expect(execPattern(pattern, '2024')?.[1]).toBe('2024');
  });

  it('should return null when the pattern does not match', () => {
    expect(execPattern(/^\d+$/, 'abc')).toBeNull();
  });
});

describe('fieldsFromGroups', () => {
  it('should read groups in the given order', () => {
    expect(fieldsFromGroups(['15', '01', '2024', '14', '30', '00'], ['day', 'month', 'year', 'hour', 'minute', 'second'])).toEqual({
      year: 2024,
      month: 1,
      day: 15,
      hour: 14,
      minute: 30,
      second: 0,
    });
  });

  it('should reject missing or non-decimal groups', () => {
    expect(fieldsFromGroups(['2024', '01', '15', '14', '30'], YEAR_FIRST)).toBeUndefined();
    expect(fieldsFromGroups(['2024', '01', '15', '14', '30', undefined], YEAR_FIRST)).toBeUndefined();
    expect(fieldsFromGroups(['2024', '0x1', '15', '14', '30', '00'], YEAR_FIRST)).toBeUndefined();
    expect(fieldsFromGroups(['2024', '-1', '15', '14', '30', '00'], YEAR_FIRST)).toBeUndefined();
  });
});

describe('plainDateTimeFrom', () => {
  const fields = { year: 2024, month: 2, day: 29, hour: 23, minute: 59, second: 59 };

  it('should build a naive local time', () => {
    const result = plainDateTimeFrom(fields);
    expect(result.ok && result.value.toString()).toBe('2024-02-29T23:59:59');
  });

  it('should include fractional seconds', () => {
    const result = plainDateTimeFrom(fields, { millisecond: 250 });
    expect(result.ok && result.value.toString()).toBe('2024-02-29T23:59:59.25');
  });

  it('should reject out-of-range fields', () => {
    expect(plainDateTimeFrom({ ...fields, month: 13 }).ok).toBe(false);
    expect(plainDateTimeFrom({ ...fields, year: 2023 }).ok).toBe(false);
    expect(plainDateTimeFrom({ ...fields, hour: 24 }).ok).toBe(false);
    expect(plainDateTimeFrom({ ...fields, second: 60 }).ok).toBe(false);
  });
});

describe('parseGroups', () => {
  const pattern = /^(\d{4})\.(\d{2})\.(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

  it('should parse a matching string', () => {
    const result = parseGroups('2024.01.15 14:30:00', pattern, YEAR_FIRST);
    expect(result.ok && result.value.toString()).toBe('2024-01-15T14:30:00');
  });

  it('should fail when the pattern does not match', () => {
    expect(parseGroups('2024-01-15 14:30:00', pattern, YEAR_FIRST)).toEqual({
      ok: false,
      reason: 'pattern did not match',
    });
  });

  it('should fail when the pattern has the wrong number of groups', () => {
    expect(parseGroups('2024.01.15', /^(\d{4})\.(\d{2})\.(\d{2})$/, YEAR_FIRST)).toEqual({
      ok: false,
      reason: 'expected 6 capture groups, got 3',
    });
  });
});
