import "../lib/luxonSettings.js";
import { DateTime, FixedOffsetZone, IANAZone, type Zone } from "luxon";
import type { CalendarDate } from "./calendarDate.js";
import { InvalidTimezoneError } from "./errors.js";

/**
 * Accepts IANA names (Europe/Zagreb) and fixed offsets (UTC, UTC+1, UTC-03:30).
 */
export function toZone(name: string): Zone {
  const trimmed = name.trim();
  const fixed: FixedOffsetZone | null = FixedOffsetZone.parseSpecifier(trimmed);
  if (fixed) return fixed;
  if (IANAZone.isValidZone(trimmed)) return IANAZone.create(trimmed);
  throw new InvalidTimezoneError(name);
}

/**
 * First instant of `date` in `zone`. Where a zone skips local midnight, luxon
 * moves forward to the first wall-clock time that exists.
 */
export function localMidnight(date: CalendarDate, zone: Zone): DateTime {
  return DateTime.fromISO(date, { zone });
}

export function millisOfDay(dt: DateTime): number {
  return ((dt.hour * 60 + dt.minute) * 60 + dt.second) * 1000 + dt.millisecond;
}
