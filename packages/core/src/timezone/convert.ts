import type { Temporal } from 'temporal-polyfill';
import { reasonOf } from '../domain/errors.js';
import { err, ok } from '../domain/types.js';
import type { Result, TimezoneId } from '../domain/types.js';
import type { TimezoneDatabase } from './database.js';

/**
 * Re-anchors an instant to the target timezone.
 * The identifier is assumed to have been validated already; a failure here
 * means the shift itself went wrong.
 *
 * @returns The same absolute time expressed in `target`, or `timezoneConversionFailed`
 */
export function convertTimezone(
  instant: Temporal.ZonedDateTime,
  target: TimezoneId,
  database: TimezoneDatabase,
): Result<Temporal.ZonedDateTime> {
  try {
    return ok(database.shift(instant, target));
  } catch (thrown) {
    return err({ kind: 'timezoneConversionFailed', reason: reasonOf(thrown) });
  }
}
