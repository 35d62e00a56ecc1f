import type { DateTime } from "luxon";

/** One hourly sample. `null` is "no data", never zero. */
export type WeatherPoint = {
  temp: number | null;
  precip: number | null;
  code: number | null;
};

export type ModelSeries = {
  model: string;
  points: WeatherPoint[];
};

export type Coord = {
  latitude: number;
  longitude: number;
};

/**
 * Multi-model hourly forecast sharing one time axis: `by_model[m].points[i]`
 * is the sample at `times[i]`.
 */
export type Forecast = {
  times: DateTime[];
  by_model: ModelSeries[];
  timezone: string;
  location: Coord;
};

export type Current = {
  time: DateTime;
  weather: WeatherPoint;
  location: Coord;
};

export function mapLink(coord: Coord): string {
  return `https://www.google.com/maps/place/${coord.latitude},${coord.longitude}`;
}
