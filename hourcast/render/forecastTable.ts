import { isWithin, type TimeInterval } from "../time/resolveTimeRange.js";
import type { Current, Forecast } from "../forecast/types.js";
import { Table } from "./table.js";
import { dedupConsecutive, formatPrecip, formatTemp, wmoCellSymbol } from "./formatWeather.js";

/**
 * Date and Hour columns, then one group per model (symbol, Temp, Precip).
 * Only times inside the interval are shown; each date is printed once.
 */
export function buildForecastTable(forecast: Forecast, interval: TimeInterval): Table {
  const shown = forecast.times.flatMap((t, i) => (isWithin(interval, t) ? [i] : []));
  const times = shown.map((i) => forecast.times[i]);

  const table = new Table()
    .column("Date", dedupConsecutive(times.map((t) => t.toISODate())))
    .column("Hour", times.map((t) => t.toFormat("HH'h'")));

  for (const { model, points } of forecast.by_model) {
    const rows = shown.map((i) => ({ time: forecast.times[i], point: points[i] }));
    table
      .group(model)
      .column("", rows.map(({ time, point }) => wmoCellSymbol(point?.code ?? null, time.hour)))
      .column("Temp", rows.map(({ point }) => formatTemp(point?.temp ?? null)))
      .column("Precip", rows.map(({ point }) => formatPrecip(point?.precip ?? null)));
  }

  return table;
}

export function buildCurrentTable(current: Current): Table {
  return new Table()
    .column("Time", [current.time.toFormat("yyyy-MM-dd HH:mm")])
    .column("", [wmoCellSymbol(current.weather.code, current.time.hour)])
    .column("Temp", [formatTemp(current.weather.temp)])
    .column("Precip", [formatPrecip(current.weather.precip)]);
}
