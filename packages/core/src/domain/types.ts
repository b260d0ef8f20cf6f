/**
 * Core domain types for timestamp conversion.
 * These types represent the fundamental building blocks of the system.
 */

import type { Temporal } from 'temporal-polyfill';

/**
 * IANA timezone identifier (e.g., "America/New_York", "UTC").
 */
export type TimezoneId = string;

/**
 * Failure reported by any stage of the conversion pipeline (discriminated union).
 * Errors are values: no stage throws across a component boundary.
 */
export type ConversionError =
  | { readonly kind: 'invalidDbTimezoneConfig' }
  | { readonly kind: 'invalidUserTimezoneConfig' }
  | { readonly kind: 'invalidFormatConfig' }
  | { readonly kind: 'invalidTimezone'; readonly timezone: string }
  | { readonly kind: 'unparseableTimestamp'; readonly raw: string }
  | { readonly kind: 'ambiguousTimestamp'; readonly raw: string }
  | { readonly kind: 'unsupportedTimestampFormat' }
  | { readonly kind: 'datetimeConversionFailed'; readonly reason: string }
  | { readonly kind: 'dateConversionFailed'; readonly reason: string }
  | { readonly kind: 'unixConversionFailed'; readonly reason: string }
  | { readonly kind: 'timezoneConversionFailed'; readonly reason: string }
  | { readonly kind: 'formattingFailed'; readonly detail: string }
  | { readonly kind: 'invalidCustomFormat'; readonly detail: string };

/**
 * Discriminator of {@link ConversionError}.
 */
export type ConversionErrorKind = ConversionError['kind'];

/**
 * Outcome of a pipeline stage: either a value or a typed error.
 */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ConversionError };

/**
 * Value a parser may produce. Zoned instants are used as-is; naive local
 * times and calendar dates are anchored to the source timezone afterwards.
 */
export type ParsedTimestamp =
  | Temporal.ZonedDateTime
  | Temporal.PlainDateTime
  | Temporal.PlainDate;

/**
 * Outcome of a single parser attempt.
 * `ambiguous` marks input that matched but admits more than one reading.
 */
export type ParseResult =
  | { readonly ok: true; readonly value: ParsedTimestamp }
  | { readonly ok: false; readonly reason: string; readonly ambiguous?: boolean };

/**
 * Caller-supplied parser for a custom string format.
 * Receives the trimmed input and the pattern it was registered under.
 */
export type CustomParser = (raw: string, pattern: RegExp) => ParseResult;

/**
 * A custom string format: the pattern selects candidate strings, the parser
 * turns them into a calendar value.
 */
export interface FormatRegistration {
  readonly pattern: RegExp;
  readonly parser: CustomParser;
}

/**
 * Policy for slash-separated dates whose day and month could be swapped
 * (e.g. "03/04/2024 10:00:00").
 * - `reject`: parse only when a single reading is valid, otherwise report ambiguity
 * - `us`: always read as MM/DD/YYYY
 * - `eu`: always read as DD/MM/YYYY
 */
export type DayMonthOrder = 'reject' | 'us' | 'eu';

/**
 * Structural kind of a timestamp input.
 */
export type TimestampKind =
  | 'zoned'
  | 'naive'
  | 'date'
  | 'jsDate'
  | 'integer'
  | 'float'
  | 'string';

/**
 * Timestamp input (closed tagged union).
 * Produced from caller values by `classifyTimestamp`.
 */
export type TimestampInput =
  | { readonly kind: 'zoned'; readonly value: Temporal.ZonedDateTime }
  | { readonly kind: 'naive'; readonly value: Temporal.PlainDateTime }
  | { readonly kind: 'date'; readonly value: Temporal.PlainDate }
  | { readonly kind: 'jsDate'; readonly value: Date }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string };

/**
 * Creates a successful result.
 */
export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

/**
 * Creates a failed result.
 */
export function err<T = never>(error: ConversionError): Result<T> {
  return { ok: false, error };
}
