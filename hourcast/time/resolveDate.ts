import { addDays, weekdayOf, type CalendarDate } from "./calendarDate.js";
import type { DateSpecifier } from "./dateSpecifier.js";

/**
 * Resolve a specifier to a calendar date.
 *
 * `weekdaySearchStart` only matters for weekday specifiers: the result is the
 * first date on or after it with the wanted weekday. Range ends pass the
 * resolved range start here so `fri..sun` never ends before it begins.
 */
export function resolveDate(
  specifier: DateSpecifier,
  referenceDate: CalendarDate,
  weekdaySearchStart: CalendarDate
): CalendarDate {
  switch (specifier.kind) {
    case "today":
      return referenceDate;
    case "tomorrow":
      return addDays(referenceDate, 1);
    case "relative_days":
      return addDays(referenceDate, specifier.days);
    case "weekday": {
      let date = weekdaySearchStart;
      while (weekdayOf(date) !== specifier.weekday) {
        date = addDays(date, 1);
      }
      return date;
    }
    case "absolute":
      return specifier.date;
    default: {
      const unreachable: never = specifier;
      return unreachable;
    }
  }
}
