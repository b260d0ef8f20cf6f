import { describe, it, expect } from 'vitest';
import { createIntlTimezoneDatabase } from './database.js';
import type { TimezoneDatabase } from './database.js';
import { isValidTimezone } from './validator.js';

describe('isValidTimezone', () => {
  const database = createIntlTimezoneDatabase();

  it('should accept identifiers from the database', () => {
    expect(isValidTimezone('America/New_York', database)).toBe(true);
    expect(isValidTimezone('Europe/London', database)).toBe(true);
    expect(isValidTimezone('UTC', database)).toBe(true);
  });

  it('should accept current names and links', () => {
    expect(isValidTimezone('Asia/Kolkata', database)).toBe(true);
    expect(isValidTimezone('Europe/Kyiv', database)).toBe(true);
    expect(isValidTimezone('Etc/UTC', database)).toBe(true);
    expect(isValidTimezone('US/Eastern', database)).toBe(true);
  });

  it('should reject unknown identifiers', () => {
    expect(isValidTimezone('Invalid/Timezone', database)).toBe(false);
    expect(isValidTimezone('', database)).toBe(false);
  });

  it('should reject identifiers with surrounding whitespace', () => {
    expect(isValidTimezone(' UTC', database)).toBe(false);
    expect(isValidTimezone('Europe/Paris\n', database)).toBe(false);
  });

  it('should check against the given database', () => {
    const tiny: TimezoneDatabase = {
      ...createIntlTimezoneDatabase(),
      listIdentifiers: () => ['Europe/Paris'],
      resolves: (timezone) => timezone === 'Europe/Berlin',
    };
    expect(isValidTimezone('Europe/Paris', tiny)).toBe(true);
    expect(isValidTimezone('Europe/Berlin', tiny)).toBe(true);
    expect(isValidTimezone('America/New_York', tiny)).toBe(false);
  });
});
