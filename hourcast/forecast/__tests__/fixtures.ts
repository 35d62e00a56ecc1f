import { DateTime } from "luxon";
import { toZone } from "../../time/zone.js";
import type { Forecast, WeatherPoint } from "../types.js";

export function hourlyTimes(startLocal: string, hours: number, timezone = "UTC"): DateTime[] {
  const start = DateTime.fromISO(startLocal, { zone: toZone(timezone) });
  return Array.from({ length: hours }, (_, i) => start.plus({ hours: i }));
}

export function pt(temp: number | null, precip: number | null, code: number | null): WeatherPoint {
  return { temp, precip, code };
}

export function makeForecast(
  times: DateTime[],
  byModel: Record<string, WeatherPoint[]>,
  timezone = "UTC"
): Forecast {
  return {
    times,
    by_model: Object.entries(byModel).map(([model, points]) => ({ model, points })),
    timezone,
    location: { latitude: 45.82, longitude: 15.98 },
  };
}

/** Hour-of-day labels, e.g. ["21", "22", "00"]. */
export function hoursOf(times: DateTime[]): string[] {
  return times.map((t) => t.toFormat("HH"));
}
