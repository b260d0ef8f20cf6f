import { DEFAULT_SETTINGS } from './defaults.js';

/**
 * Keys understood by the configuration store.
 * `customInputFormats` holds a list of format registrations.
 */
export type ConfigKey =
  | 'defaultDbTimezone'
  | 'defaultUserTimezone'
  | 'defaultFormat'
  | 'dayMonthOrder'
  | 'customInputFormats';

/**
 * All configuration keys, in a stable order.
 */
export const CONFIG_KEYS: readonly ConfigKey[] = [
  'defaultDbTimezone',
  'defaultUserTimezone',
  'defaultFormat',
  'dayMonthOrder',
  'customInputFormats',
];

/**
 * Raw configuration values. Values are untyped because they may come from
 * the environment or from JSON; they are validated when a conversion resolves them.
 */
export type ConfigValues = Partial<Record<ConfigKey, unknown>>;

/**
 * Key-value configuration store.
 *
 * `put` replaces a value wholesale, so a reader always observes either the
 * previous or the new value, never a partially updated list.
 */
export interface ConfigStore {
  /** Returns the stored value, or `fallback` when the key is unset */
  get(key: ConfigKey, fallback: unknown): unknown;
  /** Stores a value; `undefined` unsets the key */
  put(key: ConfigKey, value: unknown): void;
}

/**
 * Creates an in-memory configuration store.
 *
 * @param overrides - Values layered over {@link DEFAULT_SETTINGS}
 * @returns A store owned by the caller; nothing is shared between stores
 *
 * @example
 * const store = createConfigStore({ defaultUserTimezone: 'Europe/Paris' });
 * store.get('defaultUserTimezone', 'UTC') // 'Europe/Paris'
 * store.get('defaultDbTimezone', 'UTC') // 'UTC'
 */
export function createConfigStore(overrides: ConfigValues = {}): ConfigStore {
  const values = new Map<ConfigKey, unknown>();
  const seeded: ConfigValues = { ...DEFAULT_SETTINGS, ...overrides };

  for (const key of CONFIG_KEYS) {
    if (seeded[key] !== undefined) {
      values.set(key, seeded[key]);
    }
  }

  return {
    get(key, fallback) {
      return values.has(key) ? values.get(key) : fallback;
    },
    put(key, value) {
      if (value === undefined) {
        values.delete(key);
      } else {
        values.set(key, value);
      }
    },
  };
}
