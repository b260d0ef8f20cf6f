import type { ConversionError, Result } from './types.js';

/**
 * Renders a conversion error as a one-line message.
 */
export function describeError(error: ConversionError): string {
  switch (error.kind) {
    case 'invalidDbTimezoneConfig':
      return 'configured database timezone is not a timezone identifier';
    case 'invalidUserTimezoneConfig':
      return 'configured user timezone is not a timezone identifier';
    case 'invalidFormatConfig':
      return 'configured output format is not a string';
    case 'invalidTimezone':
      return `unknown timezone: ${error.timezone}`;
    case 'unparseableTimestamp':
      return `unparseable timestamp: ${error.raw}`;
    case 'ambiguousTimestamp':
      return `ambiguous day/month order in timestamp: ${error.raw}`;
    case 'unsupportedTimestampFormat':
      return 'unsupported timestamp format';
    case 'datetimeConversionFailed':
      return `datetime conversion failed: ${error.reason}`;
    case 'dateConversionFailed':
      return `date conversion failed: ${error.reason}`;
    case 'unixConversionFailed':
      return `unix conversion failed: ${error.reason}`;
    case 'timezoneConversionFailed':
      return `timezone conversion failed: ${error.reason}`;
    case 'formattingFailed':
      return `formatting failed: ${error.detail}`;
    case 'invalidCustomFormat':
      return `invalid custom format: ${error.detail}`;
    default: {
      // Exhaustive check - TypeScript will error if a kind is missing
      const _exhaustive: never = error;
      throw new Error(`Unknown conversion error: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Error thrown by {@link unwrap} for callers that prefer exceptions.
 */
export class ConversionFailure extends Error {
  readonly error: ConversionError;

  constructor(error: ConversionError) {
    super(describeError(error));
    this.name = 'ConversionFailure';
    this.error = error;
  }
}

/**
 * Returns the value of a successful result, throwing {@link ConversionFailure} otherwise.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new ConversionFailure(result.error);
  }
  return result.value;
}

/**
 * Extracts a message from anything thrown by a collaborator.
 */
export function reasonOf(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.message;
  }
  return String(thrown);
}
