import { isCalendarDate, type Weekday } from "./calendarDate.js";
import {
  MAX_FORECAST_DAYS,
  absolute,
  relativeDays,
  today,
  tomorrow,
  weekday,
  type DateSpecifier,
} from "./dateSpecifier.js";
import { DateSpecifierParseError } from "./errors.js";

const WEEKDAY_NAMES: Record<string, Weekday> = {
  mon: "mon",
  monday: "mon",
  tue: "tue",
  tuesday: "tue",
  wed: "wed",
  wednesday: "wed",
  thu: "thu",
  thursday: "thu",
  fri: "fri",
  friday: "fri",
  sat: "sat",
  saturday: "sat",
  sun: "sun",
  sunday: "sun",
};

const RELATIVE_DAYS = /^\+(\d+)$/;

function parseWeekday(s: string): Weekday | undefined {
  return Object.hasOwn(WEEKDAY_NAMES, s) ? WEEKDAY_NAMES[s] : undefined;
}

function parseRelativeDays(s: string): number | undefined {
  const m = RELATIVE_DAYS.exec(s);
  if (!m) return undefined;
  const days = Number(m[1]);
  return days <= MAX_FORECAST_DAYS ? days : undefined;
}

/**
 * Parse one date token: today, tomorrow, a weekday, +N or YYYY-MM-DD.
 * Case-insensitive.
 */
export function parseDateSpecifier(token: string): DateSpecifier {
  const s = token.toLowerCase();

  if (s === "today") return today();
  if (s === "tomorrow") return tomorrow();

  const w = parseWeekday(s);
  if (w) return weekday(w);

  const days = parseRelativeDays(s);
  if (days !== undefined) return relativeDays(days);

  if (isCalendarDate(s)) return absolute(s);

  throw new DateSpecifierParseError(token);
}
