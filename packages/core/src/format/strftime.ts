/**
 * strftime-style rendering of zoned instants.
 *
 * Supported directives:
 * - `%a` / `%A`: abbreviated / full weekday name
 * - `%b` / `%B`: abbreviated / full month name
 * - `%c`: preferred datetime, `%Y-%m-%d %H:%M:%S`
 * - `%d`: day of month (01-31)
 * - `%f`: microseconds (000000-999999)
 * - `%H` / `%I`: hour, 24-hour (00-23) / 12-hour (01-12)
 * - `%j`: day of year (001-366)
 * - `%m`: month (01-12)
 * - `%M`: minute (00-59)
 * - `%p` / `%P`: "AM"/"PM" / "am"/"pm"
 * - `%q`: quarter (1-4)
 * - `%S`: second (00-59)
 * - `%u`: day of week, Monday = 1 (1-7)
 * - `%x` / `%X`: preferred date `%Y-%m-%d` / time `%H:%M:%S`
 * - `%y` / `%Y`: two-digit / four-digit year
 * - `%z`: UTC offset as `+hhmm`
 * - `%Z`: timezone abbreviation
 * - `%%`: literal percent sign
 *
 * A directive may carry a padding flag (`-` no padding, `0` zeros, `_` spaces)
 * and a minimum width, e.g. `%-d`, `%_H`, `%10B`.
 * Characters outside directives are copied as-is.
 */

import type { Temporal } from 'temporal-polyfill';
import { timezoneAbbreviation } from './abbreviation.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/** Indexed by ISO day of week minus one (Monday = 0) */
const DAY_NAMES = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];

const DIRECTIVE = /^%([-0_]?)(\d*)([A-Za-z%])/;

/**
 * Rendered directive value with its default padding.
 */
interface Field {
  readonly text: string;
  readonly pad: '0' | ' ';
  readonly width: number;
}

function numeric(value: number, width: number): Field {
  return { text: String(value), pad: '0', width };
}

function textual(text: string): Field {
  return { text, pad: ' ', width: 0 };
}

function renderDirective(instant: Temporal.ZonedDateTime, conversion: string): Field {
  switch (conversion) {
    case 'a':
      return textual(DAY_NAMES[instant.dayOfWeek - 1].slice(0, 3));
    case 'A':
      return textual(DAY_NAMES[instant.dayOfWeek - 1]);
    case 'b':
      return textual(MONTH_NAMES[instant.month - 1].slice(0, 3));
    case 'B':
      return textual(MONTH_NAMES[instant.month - 1]);
    case 'c':
      return textual(strftime(instant, '%Y-%m-%d %H:%M:%S'));
    case 'd':
      return numeric(instant.day, 2);
    case 'f':
      return numeric(instant.millisecond * 1000 + instant.microsecond, 6);
    case 'H':
      return numeric(instant.hour, 2);
    case 'I':
      return numeric(instant.hour % 12 === 0 ? 12 : instant.hour % 12, 2);
    case 'j':
      return numeric(instant.dayOfYear, 3);
    case 'm':
      return numeric(instant.month, 2);
    case 'M':
      return numeric(instant.minute, 2);
    case 'p':
      return textual(instant.hour < 12 ? 'AM' : 'PM');
    case 'P':
      return textual(instant.hour < 12 ? 'am' : 'pm');
    case 'q':
      return numeric(Math.ceil(instant.month / 3), 1);
    case 'S':
      return numeric(instant.second, 2);
    case 'u':
      return numeric(instant.dayOfWeek, 1);
    case 'x':
      return textual(strftime(instant, '%Y-%m-%d'));
    case 'X':
      return textual(strftime(instant, '%H:%M:%S'));
    case 'y':
      return numeric(instant.year % 100, 2);
    case 'Y':
      return numeric(instant.year, 4);
    case 'z':
      return textual(instant.offset.replace(/:/g, ''));
    case 'Z':
      return textual(timezoneAbbreviation(instant));
    case '%':
      return textual('%');
    default:
      throw new Error(`invalid strftime directive: %${conversion}`);
  }
}

/**
 * Renders an instant using a strftime-style format string.
 *
 * @param instant - Instant to render, in the timezone it should be shown in
 * @param format - Format string, see module documentation for directives
 * @returns Rendered text
 * @throws Error on an unknown directive or a `%` that starts no directive
 *
 * @example
 * strftime(instant, '%Y-%m-%d %H:%M:%S %Z') // '2024-01-15 06:30:00 PST'
 * strftime(instant, '%B %-d, %Y at %I:%M %p') // 'January 15, 2024 at 06:30 AM'
 */
export function strftime(instant: Temporal.ZonedDateTime, format: string): string {
  let output = '';
  let index = 0;

  while (index < format.length) {
    const char = format[index];
    if (char !== '%') {
      output += char;
      index += 1;
      continue;
    }

    const match = DIRECTIVE.exec(format.slice(index));
    if (match === null) {
      throw new Error(`invalid strftime format at position ${index}: ${format.slice(index)}`);
    }

    const [directive, flag = '', widthText = '', conversion = ''] = match;
    const field = renderDirective(instant, conversion);

    if (flag === '-') {
      output += field.text;
    } else {
      const pad = flag === '0' ? '0' : flag === '_' ? ' ' : field.pad;
      const width = widthText === '' ? field.width : Number(widthText);
      output += field.text.padStart(width, pad);
    }

    index += directive.length;
  }

  return output;
}
