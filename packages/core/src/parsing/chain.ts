import { reasonOf } from '../domain/errors.js';
import type { DayMonthOrder, FormatRegistration, ParseResult } from '../domain/types.js';
import { builtinParsers } from './builtin.js';
import { isParsedTimestamp } from './classify.js';
import { matchingRegistrations } from './registry.js';

/**
 * Inputs of the parser chain, taken from one configuration snapshot.
 */
export interface ParserChainContext {
  readonly registrations: readonly FormatRegistration[];
  readonly dayMonthOrder: DayMonthOrder;
}

/**
 * Runs one custom parser. A parser that throws, or that returns something
 * other than a calendar value, counts as a match failure.
 */
function runCustomParser(registration: FormatRegistration, raw: string): ParseResult {
  try {
    const result = registration.parser(raw, registration.pattern);
    if (result.ok && !isParsedTimestamp(result.value)) {
      return { ok: false, reason: 'custom parser returned an unsupported value' };
    }
    return result;
  } catch (thrown) {
    console.warn(
      `[runParserChain] Custom parser for ${String(registration.pattern)} threw: ${reasonOf(thrown)}`,
    );
    return { ok: false, reason: reasonOf(thrown) };
  }
}

/**
 * Interprets a trimmed string as a calendar value.
 *
 * Order:
 * 1. custom formats whose pattern matches, most recently registered first
 * 2. built-in parsers (see `builtinParsers`)
 *
 * The first parser that returns a valid calendar value wins. A failed parser,
 * including one whose pattern matched but whose fields are out of range,
 * passes the string on to the next one.
 *
 * @returns The winning parser's value, or a failure flagged `ambiguous` if
 *          any parser rejected the string as ambiguous
 */
export function runParserChain(raw: string, context: ParserChainContext): ParseResult {
  let ambiguous = false;

  for (const registration of matchingRegistrations(context.registrations, raw)) {
    const result = runCustomParser(registration, raw);
    if (result.ok) {
      return result;
    }
    ambiguous = ambiguous || result.ambiguous === true;
  }

  for (const parser of builtinParsers(context.dayMonthOrder)) {
    const result = parser.parse(raw);
    if (result.ok) {
      return result;
    }
    ambiguous = ambiguous || result.ambiguous === true;
  }

  return { ok: false, reason: 'no parser matched', ambiguous };
}
