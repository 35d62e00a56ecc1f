import type { DateTime } from "luxon";
import { isWithin, type TimeInterval } from "../time/resolveTimeRange.js";
import type { Coord, Current, Forecast, WeatherPoint } from "../forecast/types.js";
import { wmoSymbol } from "../forecast/wmoCode.js";

// Always a numeric offset, +00:00 rather than Z for UTC.
const OUTPUT_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ssZZ";

export type WeatherPointOutput = {
  model?: string;
  time: string;
  latitude: number;
  longitude: number;
  temperature: number;
  precipitation: number;
  weather_code: number;
  weather_symbol: string;
};

function toOutput(
  model: string | undefined,
  time: DateTime,
  location: Coord,
  point: WeatherPoint | undefined
): WeatherPointOutput | null {
  if (!point || point.temp === null || point.precip === null || point.code === null) return null;
  return {
    ...(model !== undefined ? { model } : {}),
    time: time.toFormat(OUTPUT_TIME_FORMAT),
    latitude: location.latitude,
    longitude: location.longitude,
    temperature: point.temp,
    precipitation: point.precip,
    weather_code: point.code,
    weather_symbol: wmoSymbol(point.code, time.hour),
  };
}

/**
 * One JSON line per (model, time) inside the interval, ordered by time.
 * Points missing any field are left out.
 */
export function forecastJsonLines(forecast: Forecast, interval: TimeInterval): string[] {
  const rows: Array<{ at: number; out: WeatherPointOutput }> = [];

  for (const { model, points } of forecast.by_model) {
    forecast.times.forEach((time, i) => {
      if (!isWithin(interval, time)) return;
      const out = toOutput(model, time, forecast.location, points[i]);
      if (out) rows.push({ at: time.toMillis(), out });
    });
  }

  return rows.sort((a, b) => a.at - b.at).map(({ out }) => JSON.stringify(out));
}

export function currentJsonLine(current: Current): string | null {
  const out = toOutput(undefined, current.time, current.location, current.weather);
  return out ? JSON.stringify(out) : null;
}
