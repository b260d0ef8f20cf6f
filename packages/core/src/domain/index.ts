/**
 * Domain module public exports.
 * This module contains the result and error model shared by every stage.
 */

// Types
export type {
  TimezoneId,
  ConversionError,
  ConversionErrorKind,
  Result,
  ParsedTimestamp,
  ParseResult,
  CustomParser,
  FormatRegistration,
  DayMonthOrder,
  TimestampKind,
  TimestampInput,
} from './types.js';

export { ok, err } from './types.js';

// Errors
export {
  describeError,
  ConversionFailure,
  unwrap,
  reasonOf,
} from './errors.js';
