import { z } from 'zod';
import type { ConfigStore } from '../config/store.js';
import { err, ok } from '../domain/types.js';
import type { CustomParser, FormatRegistration, Result } from '../domain/types.js';
import { testPattern } from './fields.js';

/**
 * Schema for a parser: a function declaring exactly (raw, pattern).
 */
const customParserSchema = z.custom<CustomParser>(
  (value) => typeof value === 'function' && value.length === 2,
  { message: 'parser must be a function accepting (raw, pattern)' },
);

/**
 * Schema for a custom format registration.
 */
export const formatRegistrationSchema = z.object({
  pattern: z.instanceof(RegExp, { message: 'pattern must be a RegExp' }),
  parser: customParserSchema,
});

/**
 * Custom format registry, backed by the `customInputFormats` configuration key.
 */
export interface FormatRegistry {
  /**
   * Adds a format in front of all existing ones. Duplicate patterns are kept
   * and all of them are tried, most recent first.
   */
  register(pattern: RegExp, parser: CustomParser): Result<void>;
  /** All well-formed registrations, most recent first */
  list(): readonly FormatRegistration[];
  /** Registrations whose pattern matches `raw`, most recent first */
  matching(raw: string): readonly FormatRegistration[];
}

/**
 * Reads the registrations stored under `customInputFormats`.
 * Entries that are not well-formed (e.g. seeded from untyped configuration)
 * are skipped.
 */
export function readRegistrations(store: ConfigStore): readonly FormatRegistration[] {
  const stored = store.get('customInputFormats', []);
  if (!Array.isArray(stored)) {
    return [];
  }

  const registrations: FormatRegistration[] = [];
  for (const entry of stored) {
    const parsed = formatRegistrationSchema.safeParse(entry);
    if (parsed.success) {
      registrations.push(parsed.data);
    }
  }
  return registrations;
}

/**
 * Returns the registrations whose pattern matches `raw`, keeping their order.
 */
export function matchingRegistrations(
  registrations: readonly FormatRegistration[],
  raw: string,
): readonly FormatRegistration[] {
  return registrations.filter((registration) => testPattern(registration.pattern, raw));
}

/**
 * Creates a registry over a configuration store.
 *
 * Registering replaces the stored list with a new array rather than mutating
 * it, so a conversion that already read the list keeps a consistent snapshot.
 *
 * @example
 * const registry = createFormatRegistry(store);
 * registry.register(/^(\d{4})\|(\d{2})\|(\d{2})$/, (raw, pattern) => ...);
 */
export function createFormatRegistry(store: ConfigStore): FormatRegistry {
  return {
    register(pattern, parser) {
      const parsed = formatRegistrationSchema.safeParse({ pattern, parser });
      if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => issue.message).join('; ');
        return err({ kind: 'invalidCustomFormat', detail });
      }

      const current = store.get('customInputFormats', []);
      const existing: readonly unknown[] = Array.isArray(current) ? current : [];
      store.put('customInputFormats', [parsed.data, ...existing]);
      return ok(undefined);
    },
    list() {
      return readRegistrations(store);
    },
    matching(raw) {
      return matchingRegistrations(readRegistrations(store), raw);
    },
  };
}
