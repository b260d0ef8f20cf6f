import { describe, it, expect } from 'vitest';
import { Temporal } from 'temporal-polyfill';
import { convertTimezone } from './convert.js';
import { createIntlTimezoneDatabase } from './database.js';
import type { TimezoneDatabase } from './database.js';

describe('convertTimezone', () => {
  const database = createIntlTimezoneDatabase();
  const instant = Temporal.Instant.from('2024-01-15T14:30:00Z').toZonedDateTimeISO('UTC');

  it('should re-anchor the instant to the target timezone', () => {
    const result = convertTimezone(instant, 'Asia/Tokyo', database);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.toString()).toBe('2024-01-15T23:30:00+09:00[Asia/Tokyo]');
    }
  });

  it('should report a failing shift as timezoneConversionFailed', () => {
    const broken: TimezoneDatabase = {
      ...database,
      shift: () => {
        throw new Error('tz data corrupted');
      },
    };
    expect(convertTimezone(instant, 'Asia/Tokyo', broken)).toEqual({
      ok: false,
      error: { kind: 'timezoneConversionFailed', reason: 'tz data corrupted' },
    });
  });
});
