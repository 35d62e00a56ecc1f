import { z } from "zod";
import { loadConfig } from "../lib/config.js";
import { getJson, HttpResponseError, type ServiceDeps } from "../lib/http.js";
import { errorFields, silentLogger } from "../../logging/hourcastLog.js";
import { LocationError } from "./errors.js";

export type Location = {
  display_name: string;
  latitude: number;
  longitude: number;
};

export const GEOCODING_SERVICE = "Geocoding";

const COORD_RE = /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/;

// Nominatim returns coordinates as decimal strings.
const NominatimResultSchema = z.object({
  display_name: z.string(),
  lat: z.string(),
  lon: z.string(),
});

const NominatimResponseSchema = z.array(NominatimResultSchema);

/** `lat,lon` pair, or null when the query is a place name. */
export function parseCoordinates(query: string): Location | null {
  const m = COORD_RE.exec(query);
  if (!m) return null;

  const latitude = Number(m[1]);
  const longitude = Number(m[2]);
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
    throw new LocationError(
      "Latitude must be between -90 and 90, longitude between -180 and 180",
      query
    );
  }
  return { display_name: query, latitude, longitude };
}

function parseDegrees(value: string, what: string, query: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new LocationError(`Invalid ${what} '${value}' for ${query}`, query);
  }
  return n;
}

/**
 * Resolve a `lat,lon` pair directly, or a place name through Nominatim (first
 * hit wins).
 */
export async function resolveLocation(query: string, deps: ServiceDeps = {}): Promise<Location> {
  const literal = parseCoordinates(query);
  if (literal) return literal;

  const config = deps.config ?? loadConfig();
  const log = deps.log ?? silentLogger;
  const url = new URL(config.geocodeUrl);
  url.searchParams.set("q", query);
  url.searchParams.set("format", "jsonv2");

  log({ event: "location.resolve.started", query });

  try {
    const body = await getJson({
      service: GEOCODING_SERVICE,
      url,
      fetchImpl: deps.fetch ?? fetch,
      timeoutMs: config.httpTimeoutMs,
      headers: { "User-Agent": config.userAgent },
    });

    const parsed = NominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new HttpResponseError(GEOCODING_SERVICE, parsed.error.issues.map((i) => i.message).join("; "));
    }

    const first = parsed.data[0];
    if (!first) {
      throw new LocationError(`unknown location ${query}`, query);
    }

    const location: Location = {
      display_name: first.display_name,
      latitude: parseDegrees(first.lat, "latitude", query),
      longitude: parseDegrees(first.lon, "longitude", query),
    };
    log({
      event: "location.resolve.succeeded",
      query,
      latitude: location.latitude,
      longitude: location.longitude,
    });
    return location;
  } catch (e) {
    log({ event: "location.resolve.failed", query, ...errorFields(e) });
    throw e;
  }
}
