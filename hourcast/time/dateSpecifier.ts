import type { CalendarDate, Weekday } from "./calendarDate.js";

/** Furthest day Open-Meteo forecasts, counted from today. */
export const MAX_FORECAST_DAYS = 16;

export type DateSpecifier =
  | { readonly kind: "today" }
  | { readonly kind: "tomorrow" }
  | { readonly kind: "relative_days"; readonly days: number }
  | { readonly kind: "weekday"; readonly weekday: Weekday }
  | { readonly kind: "absolute"; readonly date: CalendarDate };

export type DateRange = {
  readonly start: DateSpecifier;
  readonly end: DateSpecifier;
};

export const today = (): DateSpecifier => Object.freeze({ kind: "today" });

export const tomorrow = (): DateSpecifier => Object.freeze({ kind: "tomorrow" });

export const relativeDays = (days: number): DateSpecifier =>
  Object.freeze({ kind: "relative_days", days });

export const weekday = (w: Weekday): DateSpecifier =>
  Object.freeze({ kind: "weekday", weekday: w });

export const absolute = (date: CalendarDate): DateSpecifier =>
  Object.freeze({ kind: "absolute", date });

export function sameDateSpecifier(a: DateSpecifier, b: DateSpecifier): boolean {
  switch (a.kind) {
    case "today":
    case "tomorrow":
      return b.kind === a.kind;
    case "relative_days":
      return b.kind === "relative_days" && b.days === a.days;
    case "weekday":
      return b.kind === "weekday" && b.weekday === a.weekday;
    case "absolute":
      return b.kind === "absolute" && b.date === a.date;
    default: {
      const unreachable: never = a;
      return unreachable;
    }
  }
}

/** Human-readable form, accepted back by parseDateSpecifier. */
export function describeDateSpecifier(specifier: DateSpecifier): string {
  switch (specifier.kind) {
    case "today":
    case "tomorrow":
      return specifier.kind;
    case "relative_days":
      return `+${specifier.days}`;
    case "weekday":
      return specifier.weekday;
    case "absolute":
      return specifier.date;
    default: {
      const unreachable: never = specifier;
      return unreachable;
    }
  }
}

/** `fri..sun`, or a single token when both ends are the same. */
export function describeDateRange(range: DateRange): string {
  const start = describeDateSpecifier(range.start);
  return sameDateSpecifier(range.start, range.end) ? start : `${start}..${describeDateSpecifier(range.end)}`;
}
