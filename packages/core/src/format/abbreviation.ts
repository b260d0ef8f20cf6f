import type { Temporal } from 'temporal-polyfill';

/**
 * Matches the "GMT+1" / "UTC-08:00" style ICU falls back to when a locale has
 * no short name for a zone.
 */
const OFFSET_NAME = /^(?:GMT|UTC)[+\-−]/;

/**
 * Matches offset-only timezone identifiers such as "+05:30".
 */
const OFFSET_ZONE = /^[+-]\d{2}(?::?\d{2})?$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function shortZoneName(locale: string, timezone: string, epochMs: number): string | undefined {
  const cacheKey = `${locale}|${timezone}`;
  let formatter = formatters.get(cacheKey);
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat(locale, {
      timeZone: timezone,
      timeZoneName: 'short',
    });
    formatters.set(cacheKey, formatter);
  }

  return formatter
    .formatToParts(new Date(epochMs))
    .find((p) => p.type === 'timeZoneName')?.value;
}

/**
 * Returns the short timezone name of an instant (e.g. "PST", "GMT", "CET").
 *
 * US English names cover the Americas and UTC/GMT; British English adds the
 * European names ("CET", "BST"). Zones neither locale names are shown in
 * "GMT+9" form. Offset-only zones are shown as their offset.
 *
 * @example
 * timezoneAbbreviation(Temporal.ZonedDateTime.from('2024-01-15T06:30[America/Los_Angeles]')) // 'PST'
 * timezoneAbbreviation(Temporal.ZonedDateTime.from('2024-01-15T15:30[Europe/Paris]')) // 'CET'
 * timezoneAbbreviation(Temporal.ZonedDateTime.from('2024-01-15T23:30[Asia/Tokyo]')) // 'GMT+9', not 'JST'
 */
export function timezoneAbbreviation(instant: Temporal.ZonedDateTime): string {
  const timezone = instant.timeZoneId;
  if (OFFSET_ZONE.test(timezone)) {
    return instant.offset;
  }

  const epochMs = instant.epochMilliseconds;
  const american = shortZoneName('en-US', timezone, epochMs);
  if (american !== undefined && !OFFSET_NAME.test(american)) {
    return american;
  }

  const british = shortZoneName('en-GB', timezone, epochMs);
  if (british !== undefined && !OFFSET_NAME.test(british)) {
    return british;
  }

  return american ?? instant.offset;
}
