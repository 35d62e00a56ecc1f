import type { DateTime } from "luxon";
import type { DateRange } from "../time/dateSpecifier.js";
import { resolveTimeRange, type TimeInterval } from "../time/resolveTimeRange.js";
import { toZone } from "../time/zone.js";
import { compactForecast } from "./compactForecast.js";
import type { Forecast } from "./types.js";

export type ForecastView = {
  forecast: Forecast;
  interval: TimeInterval;
};

/**
 * One display cycle: resolve the requested range in the forecast's timezone and,
 * unless `full`, compact the series once against today's date in that zone.
 */
export function prepareForecastView(params: {
  forecast: Forecast;
  range: DateRange;
  now: DateTime;
  full: boolean;
}): ForecastView {
  const zone = toZone(params.forecast.timezone);
  const interval = resolveTimeRange(params.range, zone, params.now);
  const today = params.now.setZone(zone).toISODate();

  return {
    forecast: params.full ? params.forecast : compactForecast(params.forecast, today),
    interval,
  };
}
