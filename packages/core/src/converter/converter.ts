import { createConfigStore } from '../config/store.js';
import type { ConfigStore } from '../config/store.js';
import {
  resolveDayMonthOrder,
  resolveDbTimezone,
  resolveFormat,
  resolveUserTimezone,
} from '../config/validation.js';
import { err, ok } from '../domain/types.js';
import type {
  CustomParser,
  DayMonthOrder,
  FormatRegistration,
  Result,
  TimezoneId,
} from '../domain/types.js';
import { renderTimestamp } from '../format/render.js';
import { normalizeTimestamp } from '../parsing/normalize.js';
import { createFormatRegistry } from '../parsing/registry.js';
import { convertTimezone } from '../timezone/convert.js';
import { createIntlTimezoneDatabase } from '../timezone/database.js';
import type { TimezoneDatabase } from '../timezone/database.js';
import { isValidTimezone } from '../timezone/validator.js';

/**
 * Collaborators of a converter. Each converter owns its own store unless one is passed in.
 */
export interface ConverterOptions {
  /** Configuration store, a fresh default store if omitted */
  store?: ConfigStore;
  /** Timezone database, the Intl-backed database if omitted */
  database?: TimezoneDatabase;
}

/**
 * Configuration snapshot a conversion runs against.
 */
export interface ConversionSnapshot {
  readonly dbTimezone: TimezoneId;
  readonly userTimezone: TimezoneId;
  readonly format: string;
  readonly dayMonthOrder: DayMonthOrder;
  readonly registrations: readonly FormatRegistration[];
}

/**
 * Public conversion API.
 */
export interface Converter {
  /**
   * Converts one database timestamp to text in the viewer's timezone.
   *
   * @param timestamp - Temporal value, `Date`, epoch seconds or string
   * @param userTimezone - Target timezone, configured default if omitted
   * @param format - strftime-style format, configured default if omitted
   */
  convert(timestamp: unknown, userTimezone?: string, format?: string): Result<string>;
  /**
   * Converts every timestamp with the same resolved configuration.
   * All-or-nothing: the first failure in input order is returned and all
   * successes are discarded.
   */
  convertBatch(
    timestamps: readonly unknown[],
    userTimezone?: string,
    format?: string,
  ): Result<string[]>;
  /**
   * Adds a string format tried before all built-in formats.
   * The most recently added format is tried first.
   */
  addCustomFormat(pattern: RegExp, parser: CustomParser): Result<void>;
  /** All known timezone identifiers, sorted */
  availableTimezones(): string[];
  /** Whether the identifier is in the timezone database */
  isValidTimezone(timezone: string): boolean;
}

/**
 * Creates a converter.
 *
 * @example
 * const converter = createConverter();
 * converter.convert('2024-01-15T14:30:00Z', 'America/Los_Angeles')
 * // { ok: true, value: '2024-01-15 06:30:00 PST' }
 * converter.convert(1705330200, 'Europe/London')
 * // { ok: true, value: '2024-01-15 14:30:00 GMT' }
 */
export function createConverter(options: ConverterOptions = {}): Converter {
  const store = options.store ?? createConfigStore();
  const database = options.database ?? createIntlTimezoneDatabase();
  const registry = createFormatRegistry(store);

  const isKnownTimezone = (timezone: string): boolean => isValidTimezone(timezone, database);

  function resolveSnapshot(
    userTimezone: string | undefined,
    format: string | undefined,
  ): Result<ConversionSnapshot> {
    const dbTimezone = resolveDbTimezone(store);
    if (!dbTimezone.ok) {
      return dbTimezone;
    }
    const targetTimezone = resolveUserTimezone(store, userTimezone, isKnownTimezone);
    if (!targetTimezone.ok) {
      return targetTimezone;
    }
    const formatString = resolveFormat(store, format);
    if (!formatString.ok) {
      return formatString;
    }

    return ok({
      dbTimezone: dbTimezone.value,
      userTimezone: targetTimezone.value,
      format: formatString.value,
      dayMonthOrder: resolveDayMonthOrder(store),
      registrations: registry.list(),
    });
  }

  function convertWith(snapshot: ConversionSnapshot, timestamp: unknown): Result<string> {
    const instant = normalizeTimestamp(timestamp, snapshot.dbTimezone, {
      database,
      registrations: snapshot.registrations,
      dayMonthOrder: snapshot.dayMonthOrder,
    });
    if (!instant.ok) {
      return instant;
    }

    const converted = convertTimezone(instant.value, snapshot.userTimezone, database);
    if (!converted.ok) {
      return converted;
    }

    return renderTimestamp(converted.value, snapshot.format);
  }

  return {
    convert(timestamp, userTimezone, format) {
      const snapshot = resolveSnapshot(userTimezone, format);
      if (!snapshot.ok) {
        return snapshot;
      }
      return convertWith(snapshot.value, timestamp);
    },

    convertBatch(timestamps, userTimezone, format) {
      if (timestamps.length === 0) {
        return ok([]);
      }

      const snapshot = resolveSnapshot(userTimezone, format);
      if (!snapshot.ok) {
        return snapshot;
      }

      const converted: string[] = [];
      for (const timestamp of timestamps) {
        const result = convertWith(snapshot.value, timestamp);
        if (!result.ok) {
          return err(result.error);
        }
        converted.push(result.value);
      }
      return ok(converted);
    },

    addCustomFormat(pattern, parser) {
      return registry.register(pattern, parser);
    },

    availableTimezones() {
      return [...database.listIdentifiers()];
    },

    isValidTimezone(timezone) {
      return isKnownTimezone(timezone);
    },
  };
}
