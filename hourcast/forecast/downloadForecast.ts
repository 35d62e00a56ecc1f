import "../lib/luxonSettings.js";
import { DateTime } from "luxon";
import type { z } from "zod";
import { loadConfig } from "../lib/config.js";
import { getJson, HttpResponseError, type ServiceDeps } from "../lib/http.js";
import { toZone } from "../time/zone.js";
import { MAX_FORECAST_DAYS } from "../time/dateSpecifier.js";
import { errorFields, silentLogger } from "../../logging/hourcastLog.js";
import {
  ForecastResponseSchema,
  HOURLY_FIELDS,
  MeasurementArraySchema,
  WeatherCodeArraySchema,
  type ForecastResponse,
  type HourlyField,
} from "./schema/openMeteo.schema.js";
import type { Forecast, WeatherPoint } from "./types.js";

export const FORECAST_SERVICE = "Forecast";

/** With several models Open-Meteo suffixes every field with the model name. */
export function hourlyFieldKey(field: HourlyField, model: string, modelCount: number): string {
  return modelCount === 1 ? field : `${field}_${model}`;
}

/**
 * Read one hourly array. A missing or malformed array counts as no data, and
 * is padded (or cut) to the length of the time axis.
 */
function takeFieldArray(
  hourly: ForecastResponse["hourly"],
  key: string,
  length: number,
  schema: z.ZodType<Array<number | null>>
): Array<number | null> {
  const parsed = schema.safeParse(hourly[key]);
  const values = parsed.success ? parsed.data : [];
  return Array.from({ length }, (_, i) => values[i] ?? null);
}

export function parseForecastResponse(body: unknown, models: string[]): Forecast {
  const parsed = ForecastResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new HttpResponseError(FORECAST_SERVICE, parsed.error.issues.map((i) => i.message).join("; "));
  }
  const data = parsed.data;
  const zone = toZone(data.timezone);
  const times = data.hourly.time.map((t) => DateTime.fromISO(t, { zone }));
  const n = times.length;

  const by_model = models.map((model) => {
    const key = (field: HourlyField) => hourlyFieldKey(field, model, models.length);
    const temps = takeFieldArray(data.hourly, key("temperature_2m"), n, MeasurementArraySchema);
    const precips = takeFieldArray(data.hourly, key("precipitation"), n, MeasurementArraySchema);
    const codes = takeFieldArray(data.hourly, key("weather_code"), n, WeatherCodeArraySchema);

    const points: WeatherPoint[] = times.map((_, i) => ({
      temp: temps[i],
      precip: precips[i],
      code: codes[i],
    }));
    return { model, points };
  });

  return {
    times,
    by_model,
    timezone: data.timezone,
    location: { latitude: data.latitude, longitude: data.longitude },
  };
}

export function buildForecastUrl(
  baseUrl: string,
  params: { latitude: number; longitude: number; models: string[] }
): URL {
  const url = new URL(baseUrl);
  url.searchParams.set("latitude", String(params.latitude));
  url.searchParams.set("longitude", String(params.longitude));
  url.searchParams.set("hourly", HOURLY_FIELDS.join(","));
  url.searchParams.set("models", params.models.join(","));
  url.searchParams.set("forecast_days", String(MAX_FORECAST_DAYS));
  url.searchParams.set("timezone", "auto");
  return url;
}

/**
 * Download the hourly forecast for every requested model, on the time axis of
 * the location's own timezone.
 */
export async function downloadForecast(
  params: { latitude: number; longitude: number; models: string[] },
  deps: ServiceDeps = {}
): Promise<Forecast> {
  const config = deps.config ?? loadConfig();
  const log = deps.log ?? silentLogger;
  const started = Date.now();

  log({
    event: "forecast.download.started",
    latitude: params.latitude,
    longitude: params.longitude,
    models: params.models,
  });

  try {
    const body = await getJson({
      service: FORECAST_SERVICE,
      url: buildForecastUrl(config.forecastUrl, params),
      fetchImpl: deps.fetch ?? fetch,
      timeoutMs: config.httpTimeoutMs,
    });
    const forecast = parseForecastResponse(body, params.models);

    log({
      event: "forecast.download.succeeded",
      timezone: forecast.timezone,
      points: forecast.times.length,
      duration_ms: Date.now() - started,
    });
    return forecast;
  } catch (e) {
    log({ event: "forecast.download.failed", duration_ms: Date.now() - started, ...errorFields(e) });
    throw e;
  }
}
