import "../lib/luxonSettings.js";
import type { DateTime, Zone } from "luxon";
import { addDays } from "./calendarDate.js";
import { tomorrow, type DateRange, type DateSpecifier } from "./dateSpecifier.js";
import { resolveDate } from "./resolveDate.js";
import { localMidnight, millisOfDay } from "./zone.js";

/** Half-open `[start, end)`, both expressed in the target zone. */
export type TimeInterval = {
  start: DateTime;
  end: DateTime;
};

/**
 * Open-Meteo stamps hourly points at the top of the hour, so after 23:00 there
 * is nothing left of "today" once start is clamped to now. 22:55 leaves room
 * for request latency.
 */
export const LATE_DAY_CUTOFF_MS = (22 * 60 + 55) * 60 * 1000;

function shiftTodayPastCutoff(specifier: DateSpecifier): DateSpecifier {
  return specifier.kind === "today" ? tomorrow() : specifier;
}

/**
 * Convert an inclusive date range into a half-open interval in `zone`.
 *
 * Only a literal "today" moves past the cutoff. A weekday that happens to be
 * today stays put, as do absolute dates.
 */
export function resolveTimeRange(range: DateRange, zone: Zone, now: DateTime): TimeInterval {
  const local = now.setZone(zone);
  const referenceDate = local.toISODate();

  const pastCutoff = millisOfDay(local) > LATE_DAY_CUTOFF_MS;
  const start = pastCutoff ? shiftTodayPastCutoff(range.start) : range.start;
  const end = pastCutoff ? shiftTodayPastCutoff(range.end) : range.end;

  const startDate = resolveDate(start, referenceDate, referenceDate);
  const endDate = resolveDate(end, referenceDate, startDate);

  const startMidnight = localMidnight(startDate, zone);
  return {
    start: startMidnight.toMillis() >= local.toMillis() ? startMidnight : local,
    end: localMidnight(addDays(endDate, 1), zone),
  };
}

export function isWithin(interval: TimeInterval, t: DateTime): boolean {
  const ms = t.toMillis();
  return interval.start.toMillis() <= ms && ms < interval.end.toMillis();
}

/** `[2025-01-17T00:00:00.000+01:00, 2025-01-19T00:00:00.000+01:00)` */
export function formatInterval(interval: TimeInterval): string {
  return `[${interval.start.toISO()}, ${interval.end.toISO()})`;
}
