import type { DateTime } from "luxon";
import type { CalendarDate } from "../time/calendarDate.js";
import type { Forecast, WeatherPoint } from "./types.js";
import { wmoSeverity } from "./wmoCode.js";

export const BUCKET_HOURS = 3;

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function sum(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0);
}

function present(values: Array<number | null>): number[] {
  return values.filter((v): v is number => v !== null);
}

/** Most severe present code; the earliest one wins a tie. */
export function mostSevereCode(codes: Array<number | null>): number | null {
  let best: number | null = null;
  for (const code of present(codes)) {
    if (best === null || wmoSeverity(code) > wmoSeverity(best)) best = code;
  }
  return best;
}

export function aggregatePoints(points: WeatherPoint[]): WeatherPoint {
  return {
    temp: mean(present(points.map((p) => p.temp))),
    precip: sum(present(points.map((p) => p.precip))),
    code: mostSevereCode(points.map((p) => p.code)),
  };
}

function bucketEndHour(t: DateTime): number {
  return Math.floor(t.hour / BUCKET_HOURS) * BUCKET_HOURS + BUCKET_HOURS;
}

/**
 * Keep hourly points for `today`; collapse every other day into 3-hour buckets
 * (00-03, 03-06, ...) stamped with the bucket's first time.
 *
 * Temperature is averaged, precipitation summed, and the most severe weather
 * code kept. Returns a new forecast; the input is left untouched.
 */
export function compactForecast(forecast: Forecast, today: CalendarDate): Forecast {
  const { times } = forecast;
  const newTimes: DateTime[] = [];
  const buckets: Array<{ indices: number[]; hourly: boolean }> = [];

  let i = 0;
  while (i < times.length) {
    const time = times[i];
    const date = time.toISODate();

    if (date === today) {
      newTimes.push(time);
      buckets.push({ indices: [i], hourly: true });
      i += 1;
      continue;
    }

    const endHour = bucketEndHour(time);
    const indices = [i];
    let j = i + 1;
    while (j < times.length && times[j].toISODate() === date && times[j].hour < endHour) {
      indices.push(j);
      j += 1;
    }

    newTimes.push(time);
    buckets.push({ indices, hourly: false });
    i = j;
  }

  return {
    ...forecast,
    times: newTimes,
    by_model: forecast.by_model.map(({ model, points }) => ({
      model,
      points: buckets.map(({ indices, hourly }) =>
        hourly ? { ...points[indices[0]] } : aggregatePoints(indices.map((idx) => points[idx]))
      ),
    })),
  };
}
