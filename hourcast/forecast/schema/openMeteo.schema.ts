import { z } from "zod";

/** Local wall-clock time in the response's timezone, e.g. 2025-01-15T13:00. */
const LocalTimeSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/);

export const HOURLY_FIELDS = ["temperature_2m", "precipitation", "weather_code"] as const;

export type HourlyField = (typeof HOURLY_FIELDS)[number];

export const ForecastResponseSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  timezone: z.string().min(1),
  hourly: z
    .object({
      time: z.array(LocalTimeSchema),
    })
    .catchall(z.unknown()),
});

export type ForecastResponse = z.infer<typeof ForecastResponseSchema>;

export const CurrentResponseSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  timezone: z.string().min(1),
  current: z.object({
    time: LocalTimeSchema,
    temperature_2m: z.number().nullish(),
    precipitation: z.number().nullish(),
    weather_code: z.number().int().nonnegative().nullish(),
  }),
});

export type CurrentResponse = z.infer<typeof CurrentResponseSchema>;

export const MeasurementArraySchema = z.array(z.number().nullable());

export const WeatherCodeArraySchema = z.array(z.number().int().min(0).max(255).nullable());
