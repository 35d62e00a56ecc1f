import { describe, expect, it } from "vitest";
import { resolveDate } from "../resolveDate.js";
import { absolute, relativeDays, today, tomorrow, weekday } from "../dateSpecifier.js";
import { addDays, isCalendarDate, weekdayOf } from "../calendarDate.js";

// 2025-01-15 is a Wednesday.
const WED = "2025-01-15";

describe("resolveDate", () => {
  it("resolves today, tomorrow and relative offsets from the reference date", () => {
    expect(resolveDate(today(), WED, WED)).toBe("2025-01-15");
    expect(resolveDate(tomorrow(), WED, WED)).toBe("2025-01-16");
    expect(resolveDate(relativeDays(0), WED, WED)).toBe("2025-01-15");
    expect(resolveDate(relativeDays(16), WED, WED)).toBe("2025-01-31");
  });

  it("crosses month, year and leap-day boundaries", () => {
    expect(resolveDate(tomorrow(), "2024-12-31", "2024-12-31")).toBe("2025-01-01");
    expect(resolveDate(tomorrow(), "2024-02-28", "2024-02-28")).toBe("2024-02-29");
    expect(resolveDate(relativeDays(2), "2025-02-27", "2025-02-27")).toBe("2025-03-01");
  });

  it("finds the first matching weekday on or after the search start", () => {
    expect(resolveDate(weekday("wed"), WED, WED)).toBe("2025-01-15");
    expect(resolveDate(weekday("thu"), WED, WED)).toBe("2025-01-16");
    expect(resolveDate(weekday("tue"), WED, WED)).toBe("2025-01-21");
  });

  it("searches weekdays from the search start, not the reference date", () => {
    expect(resolveDate(weekday("sun"), WED, "2025-01-17")).toBe("2025-01-19");
    expect(resolveDate(weekday("fri"), WED, "2025-01-18")).toBe("2025-01-24");
  });

  it("returns absolute dates verbatim", () => {
    expect(resolveDate(absolute("2020-06-01"), WED, WED)).toBe("2020-06-01");
  });

  it("does not depend on the reference date for weekdays", () => {
    expect(resolveDate(weekday("sat"), "1999-01-01", "2025-01-15")).toBe("2025-01-18");
  });
});

describe("calendar helpers", () => {
  it("knows weekdays", () => {
    expect(weekdayOf("2025-01-13")).toBe("mon");
    expect(weekdayOf("2025-01-19")).toBe("sun");
  });

  it("adds days without DST effects", () => {
    expect(addDays("2026-03-07", 1)).toBe("2026-03-08");
    expect(addDays("2026-03-08", 1)).toBe("2026-03-09");
    expect(addDays("2026-11-01", -1)).toBe("2026-10-31");
  });

  it("validates calendar dates", () => {
    expect(isCalendarDate("2024-02-29")).toBe(true);
    expect(isCalendarDate("2025-02-29")).toBe(false);
    expect(isCalendarDate("2025-04-31")).toBe(false);
    expect(isCalendarDate("2025-00-10")).toBe(false);
    expect(isCalendarDate("2025-01-00")).toBe(false);
  });
});
