import { z } from "zod";

export const DEFAULT_FORECAST_URL = "https://api.open-meteo.com/v1/forecast";
export const DEFAULT_GEOCODE_URL = "https://nominatim.openstreetmap.org/search.php";
export const DEFAULT_MODELS = "ecmwf_ifs,gfs_graphcast025";

const EnvSchema = z.object({
  HOURCAST_FORECAST_URL: z.string().url().default(DEFAULT_FORECAST_URL),
  HOURCAST_GEOCODE_URL: z.string().url().default(DEFAULT_GEOCODE_URL),
  // Nominatim rejects requests without an identifying User-Agent.
  HOURCAST_USER_AGENT: z.string().min(1).default("hourcast/0.1"),
  HOURCAST_DEFAULT_MODELS: z.string().min(1).default(DEFAULT_MODELS),
  HOURCAST_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  HOURCAST_LOG_EVENTS: z.enum(["0", "1"]).default("0"),
});

export type HourcastConfig = {
  forecastUrl: string;
  geocodeUrl: string;
  userAgent: string;
  defaultModels: string[];
  httpTimeoutMs: number;
  logEvents: boolean;
};

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function splitModels(s: string): string[] {
  return s
    .split(",")
    .map((m) => m.trim())
    .filter((m) => m.length > 0);
}

/**
 * Build config from an env map (process.env once dotenv has run).
 * Blank values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): HourcastConfig {
  const nonBlank = Object.fromEntries(
    Object.entries(env).filter(([k, v]) => k.startsWith("HOURCAST_") && v !== undefined && v.trim() !== "")
  );

  const parsed = EnvSchema.safeParse(nonBlank);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const models = splitModels(parsed.data.HOURCAST_DEFAULT_MODELS);
  if (models.length === 0) {
    throw new ConfigError(["HOURCAST_DEFAULT_MODELS: no model names"]);
  }

  return {
    forecastUrl: parsed.data.HOURCAST_FORECAST_URL,
    geocodeUrl: parsed.data.HOURCAST_GEOCODE_URL,
    userAgent: parsed.data.HOURCAST_USER_AGENT,
    defaultModels: models,
    httpTimeoutMs: parsed.data.HOURCAST_HTTP_TIMEOUT_MS,
    logEvents: parsed.data.HOURCAST_LOG_EVENTS === "1",
  };
}
