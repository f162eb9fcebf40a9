/**
 * Date normalization.
 *
 * A date string with an explicit offset (or `Z`) names an instant. One
 * without (including a bare `yyyy-MM-dd`) is wall-clock time in the
 * configured zone. Either way the result is rendered in the target zone.
 */

import { isValid, parseISO } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";
import { JournalUpdateError } from "./types.js";

export const STORED_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ssXXX";

const EXPLICIT_OFFSET = /\d{2}:\d{2}(:\d{2}(\.\d+)?)?\s*(Z|[+-]\d{2}(:?\d{2})?)$/i;

export interface ResolvedDate {
  /** Formatted with STORED_DATE_FORMAT in `timezone`. */
  readonly value: string;
  /** Zone label stored beside the value. */
  readonly timezone: string;
}

/**
 * Parse `input` and render it in `timezone` (or UTC when `forceUtc`).
 *
 * @throws {JournalUpdateError} INVALID_DATE
 */
export function resolveDate(
  input: string,
  options: { readonly timezone: string; readonly forceUtc: boolean },
): ResolvedDate {
  const trimmed = input.trim();
  if (trimmed === "" || !isValid(parseISO(trimmed))) {
    throw new JournalUpdateError("INVALID_DATE", `Not a valid date: "${input}"`);
  }

  const instant = EXPLICIT_OFFSET.test(trimmed)
    ? parseISO(trimmed)
    : fromZonedTime(trimmed, options.timezone);
  if (!isValid(instant)) {
    throw new JournalUpdateError("INVALID_DATE", `Not a valid date: "${input}"`);
  }

  const zone = options.forceUtc ? "UTC" : options.timezone;
  return {
    value: formatInTimeZone(instant, zone, STORED_DATE_FORMAT),
    timezone: zone,
  };
}
