import "../lib/luxonSettings.js";
import { DateTime } from "luxon";

/** Zone-free calendar date, YYYY-MM-DD. */
export type CalendarDate = string;

export const WEEKDAYS = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const YYYY_MM_DD = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDate(s: string): boolean {
  const m = YYYY_MM_DD.exec(s);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= DateTime.utc(year, month).daysInMonth;
}

// Calendar arithmetic runs in UTC so a DST transition never moves a date.
function atUtcMidnight(date: CalendarDate): DateTime {
  return DateTime.fromISO(date, { zone: "utc" });
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return atUtcMidnight(date).plus({ days }).toISODate();
}

export function weekdayOf(date: CalendarDate): Weekday {
  // luxon numbers Monday as 1 and Sunday as 7
  return WEEKDAYS[atUtcMidnight(date).weekday - 1];
}
