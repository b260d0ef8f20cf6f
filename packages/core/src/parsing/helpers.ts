/**
 * Ready-made parsers for custom format registrations.
 */

import type { ParseResult } from '../domain/types.js';
import { DAY_FIRST, YEAR_FIRST, parseGroups } from './fields.js';

/**
 * Parses strings whose pattern captures year, month, day, hour, minute and
 * second, in that order.
 *
 * @example
 * converter.addCustomFormat(
 *   /^(\d{4})\.(\d{2})\.(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/,
 *   parseDotFormat,
 * );
 */
export function parseDotFormat(raw: string, pattern: RegExp): ParseResult {
  return parseGroups(raw, pattern, YEAR_FIRST);
}

/**
 * Parses strings whose pattern captures day, month, year, hour, minute and
 * second, in that order.
 *
 * @example
 * converter.addCustomFormat(
 *   /^(\d{2})-(\d{2})-(\d{4})\s+(\d{2}):(\d{2}):(\d{2})$/,
 *   parseDayMonthYearFormat,
 * );
 */
export function parseDayMonthYearFormat(raw: string, pattern: RegExp): ParseResult {
  return parseGroups(raw, pattern, DAY_FIRST);
}
