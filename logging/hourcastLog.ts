/**
 * Structured events for the network edges (forecast, current, geocoding).
 *
 * One JSON object per line on stderr so stdout stays clean for --json output.
 */

export type HourcastLogEvent =
  | "forecast.download.started"
  | "forecast.download.succeeded"
  | "forecast.download.failed"
  | "current.download.started"
  | "current.download.succeeded"
  | "current.download.failed"
  | "location.resolve.started"
  | "location.resolve.succeeded"
  | "location.resolve.failed";

export type HourcastLogData = {
  event: HourcastLogEvent;
  latitude?: number;
  longitude?: number;
  models?: string[];
  query?: string;
  timezone?: string;
  points?: number;
  duration_ms?: number;
  error_name?: string;
  error_message?: string;
  [key: string]: unknown;
};

export type EventLogger = (data: HourcastLogData) => void;

export const silentLogger: EventLogger = () => undefined;

export function createEventLogger(params: {
  enabled: boolean;
  write?: (line: string) => void;
  clock?: () => Date;
}): EventLogger {
  if (!params.enabled) return silentLogger;
  const write = params.write ?? ((line: string) => console.error(line));
  const clock = params.clock ?? (() => new Date());

  return (data) => {
    write(
      JSON.stringify({
        timestamp: clock().toISOString(),
        ...data,
      })
    );
  };
}

export function errorFields(e: unknown): { error_name: string; error_message: string } {
  if (e instanceof Error) return { error_name: e.name, error_message: e.message };
  return { error_name: "unknown", error_message: String(e) };
}
