/**
 * Date input errors.
 * Raised synchronously at parse time; never defaulted to "today".
 */

export const ACCEPTED_DATE_FORMS =
  "dates must be YYYY-MM-DD, +N, weekday name, 'today' or 'tomorrow'";

export class DateSpecifierParseError extends Error {
  constructor(public input: string) {
    super(`${ACCEPTED_DATE_FORMS} (got '${input}')`);
    this.name = "DateSpecifierParseError";
  }
}

export class EmptyDateRangeError extends Error {
  constructor() {
    super("empty range '..' not allowed");
    this.name = "EmptyDateRangeError";
  }
}

export class InvalidTimezoneError extends Error {
  constructor(public timezone: string) {
    super(`Unknown timezone '${timezone}'`);
    this.name = "InvalidTimezoneError";
  }
}
