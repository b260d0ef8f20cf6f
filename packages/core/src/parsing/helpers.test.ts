import { describe, it, expect } from 'vitest';
import { parseDayMonthYearFormat, parseDotFormat } from './helpers.js';

describe('parseDotFormat', () => {
  const pattern = /^(\d{4})\.(\d{2})\.(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

  it('should read year, month, day, hour, minute and second', () => {
    const result = parseDotFormat('2024.01.15 14:30:00', pattern);
    expect(result.ok && result.value.toString()).toBe('2024-01-15T14:30:00');
  });

  it('should fail on an invalid calendar date', () => {
    expect(parseDotFormat('2024.13.01 00:00:00', pattern).ok).toBe(false);
  });
});

describe('parseDayMonthYearFormat', () => {
  const pattern = /^(\d{2})-(\d{2})-(\d{4})\s+(\d{2}):(\d{2}):(\d{2})$/;

  it('should read day, month, year, hour, minute and second', () => {
    const result = parseDayMonthYearFormat('15-01-2024 14:30:00', pattern);
    expect(result.ok && result.value.toString()).toBe('2024-01-15T14:30:00');
  });

  it('should fail when the pattern does not match', () => {
    expect(parseDayMonthYearFormat('2024-01-15 14:30:00', pattern).ok).toBe(false);
  });
});
