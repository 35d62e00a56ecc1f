import "../lib/luxonSettings.js";
import { DateTime } from "luxon";
import { loadConfig } from "../lib/config.js";
import { getJson, HttpResponseError, type ServiceDeps } from "../lib/http.js";
import { toZone } from "../time/zone.js";
import { errorFields, silentLogger } from "../../logging/hourcastLog.js";
import { CurrentResponseSchema, HOURLY_FIELDS } from "./schema/openMeteo.schema.js";
import { FORECAST_SERVICE } from "./downloadForecast.js";
import type { Current } from "./types.js";

export function parseCurrentResponse(body: unknown): Current {
  const parsed = CurrentResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new HttpResponseError(FORECAST_SERVICE, parsed.error.issues.map((i) => i.message).join("; "));
  }
  const { current, timezone, latitude, longitude } = parsed.data;

  return {
    time: DateTime.fromISO(current.time, { zone: toZone(timezone) }),
    weather: {
      temp: current.temperature_2m ?? null,
      precip: current.precipitation ?? null,
      code: current.weather_code ?? null,
    },
    location: { latitude, longitude },
  };
}

export function buildCurrentUrl(baseUrl: string, params: { latitude: number; longitude: number }): URL {
  const url = new URL(baseUrl);
  url.searchParams.set("latitude", String(params.latitude));
  url.searchParams.set("longitude", String(params.longitude));
  url.searchParams.set("current", HOURLY_FIELDS.join(","));
  url.searchParams.set("timezone", "auto");
  return url;
}

export async function downloadCurrent(
  params: { latitude: number; longitude: number },
  deps: ServiceDeps = {}
): Promise<Current> {
  const config = deps.config ?? loadConfig();
  const log = deps.log ?? silentLogger;
  const started = Date.now();

  log({ event: "current.download.started", latitude: params.latitude, longitude: params.longitude });

  try {
    const body = await getJson({
      service: FORECAST_SERVICE,
      url: buildCurrentUrl(config.forecastUrl, params),
      fetchImpl: deps.fetch ?? fetch,
      timeoutMs: config.httpTimeoutMs,
    });
    const current = parseCurrentResponse(body);
    log({ event: "current.download.succeeded", duration_ms: Date.now() - started });
    return current;
  } catch (e) {
    log({ event: "current.download.failed", duration_ms: Date.now() - started, ...errorFields(e) });
    throw e;
  }
}
