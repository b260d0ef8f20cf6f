import type { TimezoneDatabase } from './database.js';

const identifierSets = new WeakMap<readonly string[], ReadonlySet<string>>();

/**
 * Checks a timezone identifier against the database: listed identifiers
 * first, then anything else the database resolves (links such as "US/Eastern").
 *
 * @example
 * isValidTimezone('America/New_York', database) // true
 * isValidTimezone('Asia/Kolkata', database) // true
 * isValidTimezone('Invalid/Timezone', database) // false
 */
export function isValidTimezone(timezone: string, database: TimezoneDatabase): boolean {
  const identifiers = database.listIdentifiers();

  let known = identifierSets.get(identifiers);
  if (known === undefined) {
    known = new Set(identifiers);
    identifierSets.set(identifiers, known);
  }

  return known.has(timezone) || database.resolves(timezone);
}
