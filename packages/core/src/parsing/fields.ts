import { Temporal } from 'temporal-polyfill';
import { reasonOf } from '../domain/errors.js';
import type { ParseResult } from '../domain/types.js';

/**
 * Calendar field carried by a capture group.
 */
export type FieldName = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second';

/**
 * Calendar date/time fields of a naive local time.
 */
export type DateTimeFields = Record<FieldName, number>;

/**
 * Fractional-second fields of a naive local time.
 */
export interface SubsecondFields {
  millisecond?: number;
  microsecond?: number;
  nanosecond?: number;
}

/** Capture order of year-first formats ("2024-01-15 14:30:00", "2024.01.15 14:30:00") */
export const YEAR_FIRST: readonly FieldName[] = ['year', 'month', 'day', 'hour', 'minute', 'second'];

/** Capture order of month-first formats ("01/15/2024 14:30:00") */
export const MONTH_FIRST: readonly FieldName[] = ['month', 'day', 'year', 'hour', 'minute', 'second'];

/** Capture order of day-first formats ("15/01/2024 14:30:00") */
export const DAY_FIRST: readonly FieldName[] = ['day', 'month', 'year', 'hour', 'minute', 'second'];

/**
 * Runs a pattern from the start of the string.
 * `lastIndex` is reset so global and sticky patterns match deterministically.
 */
export function execPattern(pattern: RegExp, raw: string): RegExpExecArray | null {
  pattern.lastIndex = 0;
  return pattern.exec(raw);
}

/**
 * Tests a pattern from the start of the string, see {@link execPattern}.
 */
export function testPattern(pattern: RegExp, raw: string): boolean {
  return execPattern(pattern, raw) !== null;
}

/**
 * Builds calendar fields from capture groups, or undefined if any group is
 * missing or not made of decimal digits.
 *
 * @param groups - Capture groups, without the full match
 * @param order - Which field each group holds
 */
export function fieldsFromGroups(
  groups: readonly (string | undefined)[],
  order: readonly FieldName[],
): DateTimeFields | undefined {
  const values: Partial<DateTimeFields> = {};

  for (let i = 0; i < order.length; i++) {
    const text = groups[i];
    if (text === undefined || !/^\d+$/.test(text)) {
      return undefined;
    }
    values[order[i]] = Number(text);
  }

  const { year, month, day, hour, minute, second } = values;
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return undefined;
  }

  return { year, month, day, hour, minute, second };
}

/**
 * Creates a naive local time, failing on any out-of-range field
 * (month 13, February 30, hour 24, second 60).
 */
export function plainDateTimeFrom(
  fields: DateTimeFields,
  subsecond: SubsecondFields = {},
): ParseResult {
  try {
    return {
      ok: true,
      value: Temporal.PlainDateTime.from({ ...fields, ...subsecond }, { overflow: 'reject' }),
    };
  } catch (thrown) {
    return { ok: false, reason: reasonOf(thrown) };
  }
}

/**
 * Matches `pattern` against `raw` and builds a naive local time from exactly
 * six capture groups, read in `order`.
 */
export function parseGroups(
  raw: string,
  pattern: RegExp,
  order: readonly FieldName[],
): ParseResult {
  const match = execPattern(pattern, raw);
  if (match === null) {
    return { ok: false, reason: 'pattern did not match' };
  }
  if (match.length !== order.length + 1) {
    return { ok: false, reason: `expected ${order.length} capture groups, got ${match.length - 1}` };
  }

  const fields = fieldsFromGroups(match.slice(1), order);
  if (fields === undefined) {
    return { ok: false, reason: 'capture groups are not decimal numbers' };
  }

  return plainDateTimeFrom(fields);
}
