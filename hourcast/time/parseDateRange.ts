import { MAX_FORECAST_DAYS, relativeDays, today, type DateRange, type DateSpecifier } from "./dateSpecifier.js";
import { EmptyDateRangeError } from "./errors.js";
import { parseDateSpecifier } from "./parseDateSpecifier.js";

export const RANGE_SEPARATOR = "..";

function parseDateSpecifierOr(s: string, fallback: DateSpecifier): DateSpecifier {
  return s === "" ? fallback : parseDateSpecifier(s);
}

/**
 * Parse `d`, `a..b`, `..b` (from today) or `a..` (to the forecast horizon).
 */
export function parseDateRange(expr: string): DateRange {
  const pos = expr.indexOf(RANGE_SEPARATOR);
  if (pos === -1) {
    const d = parseDateSpecifier(expr);
    return { start: d, end: d };
  }

  const left = expr.slice(0, pos);
  const right = expr.slice(pos + RANGE_SEPARATOR.length);
  if (left === "" && right === "") {
    throw new EmptyDateRangeError();
  }

  return {
    start: parseDateSpecifierOr(left, today()),
    end: parseDateSpecifierOr(right, relativeDays(MAX_FORECAST_DAYS)),
  };
}
