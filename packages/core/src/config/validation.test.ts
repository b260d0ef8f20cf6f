import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConfigStore } from './store.js';
import {
  dayMonthOrderSchema,
  resolveDayMonthOrder,
  resolveDbTimezone,
  resolveFormat,
  resolveUserTimezone,
} from './validation.js';

const KNOWN = new Set(['UTC', 'America/New_York', 'Europe/Paris']);
const isKnown = (timezone: string): boolean => KNOWN.has(timezone);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveDbTimezone', () => {
  it('should return the configured timezone', () => {
    const store = createConfigStore({ defaultDbTimezone: 'Europe/Paris' });
    expect(resolveDbTimezone(store)).toEqual({ ok: true, value: 'Europe/Paris' });
  });

  it('should fall back to UTC when unset', () => {
    const store = createConfigStore({ defaultDbTimezone: undefined });
    expect(resolveDbTimezone(store)).toEqual({ ok: true, value: 'UTC' });
  });

  it('should reject non-string and empty values', () => {
    expect(resolveDbTimezone(createConfigStore({ defaultDbTimezone: 42 }))).toEqual({
      ok: false,
      error: { kind: 'invalidDbTimezoneConfig' },
    });
    expect(resolveDbTimezone(createConfigStore({ defaultDbTimezone: '' }))).toEqual({
      ok: false,
      error: { kind: 'invalidDbTimezoneConfig' },
    });
  });
});

describe('resolveUserTimezone', () => {
  const store = createConfigStore();

  it('should prefer the explicit timezone', () => {
    expect(resolveUserTimezone(store, 'Europe/Paris', isKnown)).toEqual({
      ok: true,
      value: 'Europe/Paris',
    });
  });

  it('should reject an unknown explicit timezone', () => {
    expect(resolveUserTimezone(store, 'Invalid/Zone', isKnown)).toEqual({
      ok: false,
      error: { kind: 'invalidTimezone', timezone: 'Invalid/Zone' },
    });
  });

  it('should use the configured default when no timezone is passed', () => {
    expect(resolveUserTimezone(store, undefined, isKnown)).toEqual({
      ok: true,
      value: 'America/New_York',
    });
  });

  it('should fall back to UTC when the default is unset', () => {
    const unset = createConfigStore({ defaultUserTimezone: undefined });
    expect(resolveUserTimezone(unset, undefined, isKnown)).toEqual({ ok: true, value: 'UTC' });
  });

  it('should report a misconfigured default', () => {
    const broken = createConfigStore({ defaultUserTimezone: ['Europe/Paris'] });
    expect(resolveUserTimezone(broken, undefined, isKnown)).toEqual({
      ok: false,
      error: { kind: 'invalidUserTimezoneConfig' },
    });
  });

  it('should report an unknown configured default as an invalid timezone', () => {
    const unknown = createConfigStore({ defaultUserTimezone: 'Nowhere/Land' });
    expect(resolveUserTimezone(unknown, undefined, isKnown)).toEqual({
      ok: false,
      error: { kind: 'invalidTimezone', timezone: 'Nowhere/Land' },
    });
  });
});

describe('resolveFormat', () => {
  it('should prefer the explicit format, even an empty one', () => {
    const store = createConfigStore();
    expect(resolveFormat(store, '%H:%M')).toEqual({ ok: true, value: '%H:%M' });
    expect(resolveFormat(store, '')).toEqual({ ok: true, value: '' });
  });

  it('should use the configured default', () => {
    const store = createConfigStore({ defaultFormat: '%d/%m/%Y' });
    expect(resolveFormat(store, undefined)).toEqual({ ok: true, value: '%d/%m/%Y' });
  });

  it('should reject a non-string configured format', () => {
    const store = createConfigStore({ defaultFormat: 123 });
    expect(resolveFormat(store, undefined)).toEqual({
      ok: false,
      error: { kind: 'invalidFormatConfig' },
    });
  });
});

describe('resolveDayMonthOrder', () => {
  it('should accept the known policies', () => {
    expect(dayMonthOrderSchema.options).toEqual(['reject', 'us', 'eu']);
    expect(resolveDayMonthOrder(createConfigStore({ dayMonthOrder: 'eu' }))).toBe('eu');
    expect(resolveDayMonthOrder(createConfigStore({ dayMonthOrder: 'us' }))).toBe('us');
  });

  it('should fall back to reject and warn on an unknown policy', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(resolveDayMonthOrder(createConfigStore({ dayMonthOrder: 'sideways' }))).toBe('reject');
    expect(warn).toHaveBeenCalledWith(
      `[resolveDayMonthOrder] Unknown dayMonthOrder "sideways", using 'reject'`,
    );
  });
});
