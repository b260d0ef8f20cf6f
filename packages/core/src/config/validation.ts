/**
 * Zod validation schemas for configuration values, and the resolvers that
 * turn raw store values into a typed configuration snapshot.
 */

import { z } from 'zod';
import { err, ok } from '../domain/types.js';
import type { DayMonthOrder, Result, TimezoneId } from '../domain/types.js';
import {
  DEFAULT_DAY_MONTH_ORDER,
  DEFAULT_FORMAT,
  FALLBACK_TIMEZONE,
} from './defaults.js';
import type { ConfigStore } from './store.js';

/**
 * Schema for a configured timezone identifier (non-empty string).
 * Membership in the timezone database is checked separately.
 */
export const timezoneIdSchema = z.string().min(1);

/**
 * Schema for a configured output format.
 */
export const formatSchema = z.string();

/**
 * Schema for {@link DayMonthOrder}.
 */
export const dayMonthOrderSchema = z.enum(['reject', 'us', 'eu']);

/**
 * Resolves the timezone database timestamps are stored in.
 */
export function resolveDbTimezone(store: ConfigStore): Result<TimezoneId> {
  const parsed = timezoneIdSchema.safeParse(
    store.get('defaultDbTimezone', FALLBACK_TIMEZONE),
  );
  return parsed.success ? ok(parsed.data) : err({ kind: 'invalidDbTimezoneConfig' });
}

/**
 * Resolves the viewer's timezone: the explicit argument when given, otherwise
 * the configured default. Either must be known to the timezone database.
 *
 * @param explicit - Timezone passed by the caller, if any
 * @param isValid - Membership check against the timezone database
 */
export function resolveUserTimezone(
  store: ConfigStore,
  explicit: string | undefined,
  isValid: (timezone: string) => boolean,
): Result<TimezoneId> {
  let timezone: string;

  if (explicit !== undefined) {
    timezone = explicit;
  } else {
    const parsed = timezoneIdSchema.safeParse(
      store.get('defaultUserTimezone', FALLBACK_TIMEZONE),
    );
    if (!parsed.success) {
      return err({ kind: 'invalidUserTimezoneConfig' });
    }
    timezone = parsed.data;
  }

  return isValid(timezone) ? ok(timezone) : err({ kind: 'invalidTimezone', timezone });
}

/**
 * Resolves the output format: the explicit argument when given, otherwise the configured default.
 */
export function resolveFormat(
  store: ConfigStore,
  explicit: string | undefined,
): Result<string> {
  if (explicit !== undefined) {
    return ok(explicit);
  }
  const parsed = formatSchema.safeParse(store.get('defaultFormat', DEFAULT_FORMAT));
  return parsed.success ? ok(parsed.data) : err({ kind: 'invalidFormatConfig' });
}

/**
 * Resolves the day/month policy. An unrecognized value falls back to the default.
 */
export function resolveDayMonthOrder(store: ConfigStore): DayMonthOrder {
  const raw = store.get('dayMonthOrder', DEFAULT_DAY_MONTH_ORDER);
  const parsed = dayMonthOrderSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(
      `[resolveDayMonthOrder] Unknown dayMonthOrder ${JSON.stringify(raw)}, using '${DEFAULT_DAY_MONTH_ORDER}'`,
    );
    return DEFAULT_DAY_MONTH_ORDER;
  }
  return parsed.data;
}
