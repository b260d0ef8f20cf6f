import type { Temporal } from 'temporal-polyfill';
import { reasonOf } from '../domain/errors.js';
import { err, ok } from '../domain/types.js';
import type { Result } from '../domain/types.js';
import { strftime } from './strftime.js';

/**
 * Renders an instant, converting any renderer fault into `formattingFailed`.
 * This is the only boundary where a thrown error from rendering is caught.
 */
export function renderTimestamp(
  instant: Temporal.ZonedDateTime,
  format: string,
): Result<string> {
  try {
    return ok(strftime(instant, format));
  } catch (thrown) {
    return err({ kind: 'formattingFailed', detail: reasonOf(thrown) });
  }
}
