import { Temporal } from 'temporal-polyfill';
import { reasonOf } from '../domain/errors.js';
import { err, ok } from '../domain/types.js';
import type {
  ParsedTimestamp,
  Result,
  TimestampInput,
  TimezoneId,
} from '../domain/types.js';
import type { TimezoneDatabase } from '../timezone/database.js';
import { runParserChain } from './chain.js';
import type { ParserChainContext } from './chain.js';
import { classifyTimestamp } from './classify.js';

/**
 * Collaborators and configuration snapshot used while normalizing.
 */
export interface NormalizeContext extends ParserChainContext {
  readonly database: TimezoneDatabase;
}

function anchor(
  local: Temporal.PlainDateTime,
  sourceTimezone: TimezoneId,
  database: TimezoneDatabase,
  failure: 'datetimeConversionFailed' | 'dateConversionFailed',
): Result<Temporal.ZonedDateTime> {
  try {
    return ok(database.anchor(local, sourceTimezone));
  } catch (thrown) {
    return err({ kind: failure, reason: reasonOf(thrown) });
  }
}

function fromEpochMilliseconds(epochMs: number): Result<Temporal.ZonedDateTime> {
  try {
    return ok(Temporal.Instant.fromEpochMilliseconds(epochMs).toZonedDateTimeISO('UTC'));
  } catch (thrown) {
    return err({ kind: 'unixConversionFailed', reason: reasonOf(thrown) });
  }
}

function normalizeParsed(
  value: ParsedTimestamp,
  sourceTimezone: TimezoneId,
  database: TimezoneDatabase,
): Result<Temporal.ZonedDateTime> {
  if (value instanceof Temporal.ZonedDateTime) {
    return ok(value);
  }
  if (value instanceof Temporal.PlainDateTime) {
    return anchor(value, sourceTimezone, database, 'datetimeConversionFailed');
  }
  return anchor(value.toPlainDateTime(), sourceTimezone, database, 'dateConversionFailed');
}

/**
 * Normalizes a classified input into a zoned instant.
 *
 * - `zoned`: returned unchanged
 * - `naive`: anchored to `sourceTimezone`
 * - `date`: midnight of that date, anchored to `sourceTimezone`
 * - `jsDate`: the same instant, in UTC
 * - `integer`: seconds since the Unix epoch, in UTC
 * - `float`: truncated toward zero, then as `integer`
 * - `string`: trimmed and run through the parser chain
 */
export function normalizeInput(
  input: TimestampInput,
  sourceTimezone: TimezoneId,
  context: NormalizeContext,
): Result<Temporal.ZonedDateTime> {
  switch (input.kind) {
    case 'zoned':
      return ok(input.value);
    case 'naive':
      return anchor(input.value, sourceTimezone, context.database, 'datetimeConversionFailed');
    case 'date':
      return anchor(
        input.value.toPlainDateTime(),
        sourceTimezone,
        context.database,
        'dateConversionFailed',
      );
    case 'jsDate':
      return fromEpochMilliseconds(input.value.getTime());
    case 'integer':
      return fromEpochMilliseconds(input.value * 1000);
    case 'float':
      return fromEpochMilliseconds(Math.trunc(input.value) * 1000);
    case 'string': {
      const raw = input.value.trim();
      const parsed = runParserChain(raw, context);
      if (!parsed.ok) {
        return err(
          parsed.ambiguous === true
            ? { kind: 'ambiguousTimestamp', raw }
            : { kind: 'unparseableTimestamp', raw },
        );
      }
      return normalizeParsed(parsed.value, sourceTimezone, context.database);
    }
    default: {
      // Exhaustive check - TypeScript will error if a TimestampKind is missing
      const _exhaustive: never = input;
      throw new Error(`Unknown timestamp input: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Normalizes any caller-supplied value into a zoned instant.
 *
 * @param value - Zoned/naive Temporal value, `Temporal.PlainDate`, `Date`, epoch seconds or string
 * @param sourceTimezone - Timezone naive values are interpreted in (the database timezone)
 * @returns The instant, or the error of the first failing step
 *
 * @example
 * normalizeTimestamp('2024-01-15 14:30:00', 'UTC', context)
 * // ok(2024-01-15T14:30:00+00:00[UTC])
 * normalizeTimestamp({}, 'UTC', context)
 * // err({ kind: 'unsupportedTimestampFormat' })
 */
export function normalizeTimestamp(
  value: unknown,
  sourceTimezone: TimezoneId,
  context: NormalizeContext,
): Result<Temporal.ZonedDateTime> {
  const input = classifyTimestamp(value);
  if (input === undefined) {
    return err({ kind: 'unsupportedTimestampFormat' });
  }
  return normalizeInput(input, sourceTimezone, context);
}
