import { describe, expect, it } from "vitest";
import { DateTime } from "luxon";
import { formatInterval, isWithin, resolveTimeRange, type TimeInterval } from "../resolveTimeRange.js";
import { parseDateRange } from "../parseDateRange.js";
import { toZone } from "../zone.js";
import { InvalidTimezoneError } from "../errors.js";

const UTC = toZone("UTC");

// Wednesday 2025-01-15 at the given UTC wall-clock time.
function makeTime(hour: number, minute: number, second = 0): DateTime {
  return DateTime.utc(2025, 1, 15, hour, minute, second);
}

function resolveUtc(dates: string, now: DateTime): TimeInterval {
  return resolveTimeRange(parseDateRange(dates), UTC, now);
}

function utcIso(dt: DateTime): string {
  return dt.toUTC().toISO();
}

describe("resolveTimeRange", () => {
  it("clamps today's start to now and ends at the next midnight", () => {
    const { start, end } = resolveUtc("today", makeTime(12, 0));
    expect(utcIso(start)).toBe("2025-01-15T12:00:00.000Z");
    expect(utcIso(end)).toBe("2025-01-16T00:00:00.000Z");
  });

  it("keeps the clamped start to the minute", () => {
    const { start } = resolveUtc("today", makeTime(15, 30));
    expect(start.hour).toBe(15);
    expect(start.minute).toBe(30);
  });

  it("resolves relative offsets end to end", () => {
    const { start, end } = resolveUtc("+2..+3", makeTime(10, 0));
    expect(utcIso(start)).toBe("2025-01-17T00:00:00.000Z");
    expect(utcIso(end)).toBe("2025-01-19T00:00:00.000Z");
  });

  it("searches the end weekday from the resolved start", () => {
    const { start, end } = resolveUtc("fri..sun", makeTime(10, 0));
    expect(utcIso(start)).toBe("2025-01-17T00:00:00.000Z");
    expect(utcIso(end)).toBe("2025-01-20T00:00:00.000Z");
  });

  it("never ends fri..sun before it starts, whatever today is", () => {
    for (let day = 13; day <= 19; day++) {
      const now = DateTime.utc(2025, 1, day, 9, 0);
      const { start, end } = resolveUtc("fri..sun", now);
      expect(end.toMillis(), `reference 2025-01-${day}`).toBeGreaterThan(start.toMillis());
      expect(end.diff(start, "days").days).toBeLessThanOrEqual(3);
    }
  });

  describe("late-day cutoff", () => {
    it("does not shift exactly at 22:55:00", () => {
      const { start, end } = resolveUtc("today", makeTime(22, 55, 0));
      expect(start.toISODate()).toBe("2025-01-15");
      expect(utcIso(start)).toBe("2025-01-15T22:55:00.000Z");
      expect(utcIso(end)).toBe("2025-01-16T00:00:00.000Z");
    });

    it("shifts today to tomorrow at 22:55:01", () => {
      const { start, end } = resolveUtc("today", makeTime(22, 55, 1));
      expect(start.toISODate()).toBe("2025-01-16");
      expect(utcIso(start)).toBe("2025-01-16T00:00:00.000Z");
      expect(utcIso(end)).toBe("2025-01-17T00:00:00.000Z");
    });

    it("shifts a today on either side of the range", () => {
      const { start, end } = resolveUtc("+0..today", makeTime(23, 0));
      expect(utcIso(start)).toBe("2025-01-15T23:00:00.000Z");
      expect(utcIso(end)).toBe("2025-01-17T00:00:00.000Z");
    });

    it("leaves absolute dates alone", () => {
      const { start, end } = resolveUtc("2025-01-15", makeTime(23, 30));
      expect(start.hour).toBe(23);
      expect(start.minute).toBe(30);
      expect(utcIso(end)).toBe("2025-01-16T00:00:00.000Z");
    });

    it("leaves a weekday that is today alone", () => {
      const { start, end } = resolveUtc("wed", makeTime(23, 30));
      expect(utcIso(start)).toBe("2025-01-15T23:30:00.000Z");
      expect(utcIso(end)).toBe("2025-01-16T00:00:00.000Z");
    });

    it("reads the cutoff on the wall clock of the target zone", () => {
      const now = DateTime.utc(2025, 1, 15, 22, 30);
      const range = parseDateRange("today");

      const utc = resolveTimeRange(range, UTC, now);
      expect(utcIso(utc.start)).toBe("2025-01-15T22:30:00.000Z");
      expect(utcIso(utc.end)).toBe("2025-01-16T00:00:00.000Z");

      // 23:30 local in UTC+1
      const plusOne = resolveTimeRange(range, toZone("UTC+1"), now);
      expect(plusOne.start.toISO()).toBe("2025-01-16T00:00:00.000+01:00");
      expect(plusOne.end.toISO()).toBe("2025-01-17T00:00:00.000+01:00");
    });
  });

  describe("timezones", () => {
    const now = DateTime.utc(2025, 1, 15, 10, 0);

    it("resolves the same calendar date to different instants per zone", () => {
      const range = parseDateRange("tomorrow");
      const utc = resolveTimeRange(range, UTC, now);
      const plusOne = resolveTimeRange(range, toZone("UTC+1"), now);

      expect(utcIso(utc.start)).toBe("2025-01-16T00:00:00.000Z");
      expect(utcIso(plusOne.start)).toBe("2025-01-15T23:00:00.000Z");
      expect(plusOne.start.offset).toBe(60);
      expect(plusOne.start.hour).toBe(0);
      expect(utc.start.toMillis() - plusOne.start.toMillis()).toBe(3_600_000);
    });

    it("honours IANA zones", () => {
      const { start } = resolveTimeRange(parseDateRange("tomorrow"), toZone("Europe/Zagreb"), now);
      expect(start.toISO()).toBe("2025-01-16T00:00:00.000+01:00");
      expect(utcIso(start)).toBe("2025-01-15T23:00:00.000Z");
    });

    it("handles a day shortened by daylight saving", () => {
      const chicago = toZone("America/Chicago");
      const { start, end } = resolveTimeRange(
        parseDateRange("2026-03-08"),
        chicago,
        DateTime.utc(2026, 3, 1, 12, 0)
      );
      expect(utcIso(start)).toBe("2026-03-08T06:00:00.000Z");
      expect(utcIso(end)).toBe("2026-03-09T05:00:00.000Z");
      expect(end.diff(start, "hours").hours).toBe(23);
    });

    it("returns the bounds expressed in the target zone", () => {
      const { start, end } = resolveTimeRange(parseDateRange("+1"), toZone("America/New_York"), now);
      expect(start.zoneName).toBe("America/New_York");
      expect(end.zoneName).toBe("America/New_York");
      expect(start.toISO()).toBe("2025-01-16T00:00:00.000-05:00");
    });
  });

  it("may produce an inverted interval for inverted input", () => {
    const { start, end } = resolveUtc("+3..+1", makeTime(10, 0));
    expect(end.toMillis()).toBeLessThan(start.toMillis());
  });

  it("filters half-open", () => {
    const interval = resolveUtc("+1", makeTime(10, 0));
    expect(isWithin(interval, DateTime.utc(2025, 1, 16, 0, 0))).toBe(true);
    expect(isWithin(interval, DateTime.utc(2025, 1, 16, 23, 0))).toBe(true);
    expect(isWithin(interval, DateTime.utc(2025, 1, 17, 0, 0))).toBe(false);
    expect(isWithin(interval, DateTime.utc(2025, 1, 15, 23, 0))).toBe(false);
  });

  it("formats an interval", () => {
    const interval = resolveTimeRange(parseDateRange("+2..+3"), toZone("UTC+1"), makeTime(10, 0));
    expect(formatInterval(interval)).toBe(
      "[2025-01-17T00:00:00.000+01:00, 2025-01-19T00:00:00.000+01:00)"
    );
  });
});

describe("toZone", () => {
  it("accepts fixed offsets and IANA names", () => {
    expect(toZone("UTC").isUniversal).toBe(true);
    expect(toZone("UTC+1").offset(0)).toBe(60);
    expect(toZone("utc-03:30").offset(0)).toBe(-210);
    expect(toZone("Europe/Zagreb").name).toBe("Europe/Zagreb");
  });

  it("rejects unknown zones", () => {
    expect(() => toZone("Mars/Olympus_Mons")).toThrow(InvalidTimezoneError);
  });
});
