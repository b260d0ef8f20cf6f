/**
 * Built-in string parsers, tried in a fixed order after custom formats.
 */

import { Temporal } from 'temporal-polyfill';
import { reasonOf } from '../domain/errors.js';
import type { DayMonthOrder, ParseResult } from '../domain/types.js';
import {
  MONTH_FIRST,
  DAY_FIRST,
  YEAR_FIRST,
  execPattern,
  fieldsFromGroups,
  parseGroups,
  plainDateTimeFrom,
} from './fields.js';

/**
 * Name of a built-in parser, in chain order.
 */
export type BuiltinParserName =
  | 'iso8601'
  | 'rfc3339'
  | 'dateOnly'
  | 'standard'
  | 'us'
  | 'eu'
  | 'isoLocal';

/**
 * A built-in parser and its name (used in diagnostics and tests).
 */
export interface BuiltinParser {
  readonly name: BuiltinParserName;
  readonly parse: (raw: string) => ParseResult;
}

/** "2024-01-15" */
const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** "2024-01-15 14:30:00" */
const STANDARD_PATTERN = /^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

/** "01/15/2024 14:30:00" (US) and "15/01/2024 14:30:00" (EU) */
const SLASH_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})\s+(\d{2}):(\d{2}):(\d{2})$/;

/**
 * "2024-01-15T14:30:00" or "2024-01-15 14:30:00.123456", optionally with up
 * to nine fractional digits
 */
const ISO_LOCAL_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/;

/**
 * ISO 8601 / RFC 3339 with a UTC designator or offset ("2024-01-15T14:30:00Z",
 * "2024-01-15T14:30:00+01:00"). The instant is expressed in UTC, unless the
 * string carries a bracketed IANA annotation ("...+01:00[Europe/Paris]"), in
 * which case it keeps that zone.
 */
export function parseZonedIso(raw: string): ParseResult {
  try {
    if (raw.includes('[')) {
      return { ok: true, value: Temporal.ZonedDateTime.from(raw) };
    }
    return { ok: true, value: Temporal.Instant.from(raw).toZonedDateTimeISO('UTC') };
  } catch (thrown) {
    return { ok: false, reason: reasonOf(thrown) };
  }
}

/**
 * Calendar date ("2024-01-15").
 */
export function parseDateOnly(raw: string): ParseResult {
  const match = execPattern(DATE_ONLY_PATTERN, raw);
  if (match === null) {
    return { ok: false, reason: 'not a YYYY-MM-DD date' };
  }

  const [, year, month, day] = match;
  try {
    return {
      ok: true,
      value: Temporal.PlainDate.from(
        { year: Number(year), month: Number(month), day: Number(day) },
        { overflow: 'reject' },
      ),
    };
  } catch (thrown) {
    return { ok: false, reason: reasonOf(thrown) };
  }
}

/**
 * Space-separated local datetime ("2024-01-15 14:30:00").
 */
export function parseStandardDatetime(raw: string): ParseResult {
  return parseGroups(raw, STANDARD_PATTERN, YEAR_FIRST);
}

/**
 * ISO local datetime without zone ("2024-01-15T14:30:00", "2024-01-15T14:30:00.250").
 * A single space may replace the "T", as in database text output
 * ("2024-01-15 14:30:00.250").
 */
export function parseIsoLocalDatetime(raw: string): ParseResult {
  const match = execPattern(ISO_LOCAL_PATTERN, raw);
  if (match === null) {
    return { ok: false, reason: 'not a YYYY-MM-DD[T ]HH:MM:SS datetime' };
  }

  const fields = fieldsFromGroups(match.slice(1, 7), YEAR_FIRST);
  if (fields === undefined) {
    return { ok: false, reason: 'capture groups are not decimal numbers' };
  }

  const fraction = (match[7] ?? '').padEnd(9, '0');
  return plainDateTimeFrom(fields, {
    millisecond: Number(fraction.slice(0, 3)),
    microsecond: Number(fraction.slice(3, 6)),
    nanosecond: Number(fraction.slice(6, 9)),
  });
}

/**
 * Creates the parser for one reading of "NN/NN/YYYY HH:MM:SS".
 *
 * When `rejectAmbiguous` is set, a string that is a valid date under both
 * readings and names two different days fails with `ambiguous: true`
 * (e.g. "03/04/2024 10:00:00"). "05/05/2024 ..." is the same day either way
 * and parses.
 */
function slashParser(
  reading: 'us' | 'eu',
  rejectAmbiguous: boolean,
): (raw: string) => ParseResult {
  const order = reading === 'us' ? MONTH_FIRST : DAY_FIRST;
  const otherOrder = reading === 'us' ? DAY_FIRST : MONTH_FIRST;

  return (raw) => {
    const result = parseGroups(raw, SLASH_PATTERN, order);
    if (!result.ok || !rejectAmbiguous) {
      return result;
    }

    const other = parseGroups(raw, SLASH_PATTERN, otherOrder);
    const [first, second] = raw.split('/');
    if (other.ok && first !== second) {
      return {
        ok: false,
        reason: 'day and month can be read either way',
        ambiguous: true,
      };
    }
    return result;
  };
}

function createBuiltinParsers(order: DayMonthOrder): readonly BuiltinParser[] {
  const rejectAmbiguous = order === 'reject';
  const parsers: BuiltinParser[] = [
    { name: 'iso8601', parse: parseZonedIso },
    // RFC 3339 is the ISO 8601 profile; both go through the same zoned parse
    { name: 'rfc3339', parse: parseZonedIso },
    { name: 'dateOnly', parse: parseDateOnly },
    { name: 'standard', parse: parseStandardDatetime },
  ];

  if (order !== 'eu') {
    parsers.push({ name: 'us', parse: slashParser('us', rejectAmbiguous) });
  }
  if (order !== 'us') {
    parsers.push({ name: 'eu', parse: slashParser('eu', rejectAmbiguous) });
  }

  parsers.push({ name: 'isoLocal', parse: parseIsoLocalDatetime });
  return parsers;
}

const BUILTIN_PARSERS: Record<DayMonthOrder, readonly BuiltinParser[]> = {
  reject: createBuiltinParsers('reject'),
  us: createBuiltinParsers('us'),
  eu: createBuiltinParsers('eu'),
};

/**
 * Returns the built-in parsers in chain order for a day/month policy.
 *
 * @example
 * builtinParsers('reject').map((p) => p.name)
 * // ['iso8601', 'rfc3339', 'dateOnly', 'standard', 'us', 'eu', 'isoLocal']
 * builtinParsers('eu').map((p) => p.name)
 * // ['iso8601', 'rfc3339', 'dateOnly', 'standard', 'eu', 'isoLocal']
 */
export function builtinParsers(order: DayMonthOrder): readonly BuiltinParser[] {
  return BUILTIN_PARSERS[order];
}
