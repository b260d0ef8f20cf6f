import { Temporal } from 'temporal-polyfill';
import type { ParsedTimestamp, TimestampInput } from '../domain/types.js';

/**
 * Classifies a caller-supplied value into a {@link TimestampInput} variant.
 *
 * Numbers are epoch seconds: integral values are `integer`, everything else
 * (fractions, NaN, Infinity) is `float`.
 *
 * @returns The tagged input, or undefined if the value's shape is not supported
 */
export function classifyTimestamp(value: unknown): TimestampInput | undefined {
  if (value instanceof Temporal.ZonedDateTime) {
    return { kind: 'zoned', value };
  }
  if (value instanceof Temporal.PlainDateTime) {
    return { kind: 'naive', value };
  }
  if (value instanceof Temporal.PlainDate) {
    return { kind: 'date', value };
  }
  if (value instanceof Date) {
    return { kind: 'jsDate', value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  return undefined;
}

/**
 * Checks that a value is something a parser may return.
 */
export function isParsedTimestamp(value: unknown): value is ParsedTimestamp {
  return (
    value instanceof Temporal.ZonedDateTime ||
    value instanceof Temporal.PlainDateTime ||
    value instanceof Temporal.PlainDate
  );
}
