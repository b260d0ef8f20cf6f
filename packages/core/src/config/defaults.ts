/**
 * Configuration defaults.
 */

import type { DayMonthOrder } from '../domain/types.js';

/**
 * Timezone used when a timezone key is missing from the store entirely.
 */
export const FALLBACK_TIMEZONE = 'UTC';

/**
 * Output format used when no format is passed or configured.
 */
export const DEFAULT_FORMAT = '%Y-%m-%d %H:%M:%S %Z';

/**
 * Day/month policy used when none is configured.
 */
export const DEFAULT_DAY_MONTH_ORDER: DayMonthOrder = 'reject';

/**
 * Values a fresh store is seeded with.
 * Database timestamps are stored in UTC; viewers default to US Eastern time.
 */
export const DEFAULT_SETTINGS = {
  defaultDbTimezone: 'UTC',
  defaultUserTimezone: 'America/New_York',
  defaultFormat: DEFAULT_FORMAT,
  dayMonthOrder: DEFAULT_DAY_MONTH_ORDER,
  customInputFormats: [],
} as const;
