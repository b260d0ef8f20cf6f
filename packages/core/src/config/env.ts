import type { ConfigValues } from './store.js';

/**
 * Environment variables read by {@link configFromEnv}, by configuration key.
 */
export const ENV_VARIABLES = {
  defaultDbTimezone: 'ZONESHIFT_DB_TIMEZONE',
  defaultUserTimezone: 'ZONESHIFT_USER_TIMEZONE',
  defaultFormat: 'ZONESHIFT_FORMAT',
  dayMonthOrder: 'ZONESHIFT_DAY_MONTH_ORDER',
} as const;

const ENV_KEYS: readonly (keyof typeof ENV_VARIABLES)[] = [
  'defaultDbTimezone',
  'defaultUserTimezone',
  'defaultFormat',
  'dayMonthOrder',
];

/**
 * Reads configuration overrides from environment variables.
 * Unset or empty variables are omitted so the store defaults apply.
 * Values are not validated here; invalid ones surface when a conversion resolves them.
 *
 * @param env - Environment to read, `process.env` by default
 *
 * @example
 * const store = createConfigStore(configFromEnv());
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): ConfigValues {
  const values: ConfigValues = {};

  for (const key of ENV_KEYS) {
    const value = env[ENV_VARIABLES[key]];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }

  return values;
}
