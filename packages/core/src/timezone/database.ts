import type { Temporal } from 'temporal-polyfill';
import type { TimezoneId } from '../domain/types.js';

/**
 * Timezone database collaborator.
 * Implementations throw on failure; callers convert the throw into a typed error.
 */
export interface TimezoneDatabase {
  /** All identifiers the database knows, sorted */
  listIdentifiers(): readonly TimezoneId[];
  /**
   * Whether the database resolves an identifier. Covers links and
   * backward-compatible names that `listIdentifiers` may leave out.
   */
  resolves(timezone: string): boolean;
  /**
   * Attaches a timezone to a naive local time.
   * Must throw when the local time does not exist (spring forward) or
   * occurs twice (fall back) rather than pick one.
   */
  anchor(local: Temporal.PlainDateTime, timezone: TimezoneId): Temporal.ZonedDateTime;
  /** Re-expresses an instant in another timezone, preserving the absolute time */
  shift(instant: Temporal.ZonedDateTime, timezone: TimezoneId): Temporal.ZonedDateTime;
}

/**
 * Current IANA names that ICU still files under an older canonical name
 * ("Asia/Kolkata" under "Asia/Calcutta"), and the usual UTC spellings.
 * `Intl.supportedValuesOf` only lists canonical names, so these can be missing from it.
 */
const CURRENT_NAMES = [
  'UTC',
  'Etc/UTC',
  'Etc/GMT',
  'GMT',
  'America/Argentina/Buenos_Aires',
  'America/Argentina/Catamarca',
  'America/Argentina/Cordoba',
  'America/Argentina/Jujuy',
  'America/Argentina/Mendoza',
  'America/Atikokan',
  'America/Indiana/Indianapolis',
  'America/Kentucky/Louisville',
  'America/Nuuk',
  'Asia/Ho_Chi_Minh',
  'Asia/Kathmandu',
  'Asia/Kolkata',
  'Asia/Yangon',
  'Atlantic/Faroe',
  'Europe/Kyiv',
  'Pacific/Chuuk',
  'Pacific/Kanton',
  'Pacific/Pohnpei',
] as const;

/**
 * Whether `Intl` accepts an identifier. Identifiers never contain whitespace.
 *
 * @example
 * resolvesWithIntl('US/Eastern') // true
 * resolvesWithIntl('Invalid/Zone') // false
 */
export function resolvesWithIntl(timezone: string): boolean {
  if (timezone === '' || /\s/.test(timezone)) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone }).format(new Date());
    return true;
  } catch (thrown) {
    if (thrown instanceof RangeError) {
      return false;
    }
    throw thrown;
  }
}

/**
 * Creates a timezone database backed by the platform's ICU data (via `Intl`)
 * and `temporal-polyfill`.
 *
 * The identifier list is loaded on first use: the canonical zones from
 * `Intl.supportedValuesOf`, plus the current names ICU treats as aliases.
 * Any other identifier `Intl` accepts (e.g. "US/Eastern") resolves without
 * being listed.
 */
export function createIntlTimezoneDatabase(): TimezoneDatabase {
  let identifiers: readonly TimezoneId[] | undefined;

  return {
    listIdentifiers() {
      if (identifiers === undefined) {
        const zones = new Set(Intl.supportedValuesOf('timeZone'));
        for (const name of CURRENT_NAMES) {
          if (resolvesWithIntl(name)) {
            zones.add(name);
          }
        }
        identifiers = [...zones].sort();
      }
      return identifiers;
    },
    resolves(timezone) {
      return resolvesWithIntl(timezone);
    },
    anchor(local, timezone) {
      return local.toZonedDateTime(timezone, { disambiguation: 'reject' });
    },
    shift(instant, timezone) {
      return instant.withTimeZone(timezone);
    },
  };
}
