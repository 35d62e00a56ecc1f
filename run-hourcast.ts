#!/usr/bin/env node
import "dotenv/config";
import { DateTime } from "luxon";

import { loadConfig, splitModels, type HourcastConfig } from "./hourcast/lib/config.js";
import type { ServiceDeps } from "./hourcast/lib/http.js";
import { isMainModule } from "./hourcast/lib/isMainModule.js";
import { createEventLogger } from "./logging/hourcastLog.js";
import { parseDateRange } from "./hourcast/time/parseDateRange.js";
import { describeDateRange } from "./hourcast/time/dateSpecifier.js";
import { formatInterval } from "./hourcast/time/resolveTimeRange.js";
import { resolveLocation } from "./hourcast/location/resolveLocation.js";
import { downloadForecast } from "./hourcast/forecast/downloadForecast.js";
import { downloadCurrent } from "./hourcast/forecast/downloadCurrent.js";
import { prepareForecastView } from "./hourcast/forecast/prepareForecastView.js";
import { mapLink } from "./hourcast/forecast/types.js";
import { buildCurrentTable, buildForecastTable } from "./hourcast/render/forecastTable.js";
import { currentJsonLine, forecastJsonLines } from "./hourcast/render/forecastJson.js";

export const USAGE = [
  "Usage:",
  "  hourcast forecast <location> [DATE_RANGE] [--models a,b] [--full] [--json] [-v|--verbose]",
  "  hourcast current <location> [--json] [-v|--verbose]",
  "",
  "  location    place name, or lat,lon",
  "  DATE_RANGE  YYYY-MM-DD, +N, today, tomorrow, weekday, or date1..date2 (default: today)",
  "  --models    comma-separated forecast models",
  "  --full      hourly rows for every day (default: 3-hour rows after today)",
  "  --json      one JSON object per line instead of a table",
].join("\n");

export type ForecastCommand = {
  command: "forecast";
  location: string;
  dates: string;
  models: string[] | null;
  full: boolean;
  json: boolean;
  verbose: boolean;
};

export type CurrentCommand = {
  command: "current";
  location: string;
  json: boolean;
  verbose: boolean;
};

export type CliCommand = ForecastCommand | CurrentCommand | { command: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseCliArgs(args: string[]): CliCommand {
  const [command, ...rest] = args;
  if (!command || command === "-h" || command === "--help" || command === "help") {
    return { command: "help" };
  }
  if (command !== "forecast" && command !== "current") {
    throw new UsageError(`unknown command '${command}'`);
  }

  const positional: string[] = [];
  let models: string[] | null = null;
  let full = false;
  let json = false;
  let verbose = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-v" || arg === "--verbose") {
      verbose = true;
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--full" && command === "forecast") {
      full = true;
    } else if ((arg === "--models" || arg.startsWith("--models=")) && command === "forecast") {
      const value = arg === "--models" ? rest[++i] : arg.slice("--models=".length);
      const parsed = value === undefined ? [] : splitModels(value);
      if (parsed.length === 0) {
        throw new UsageError("--models needs at least one model name");
      }
      models = parsed;
    } else if (arg === "-h" || arg === "--help") {
      return { command: "help" };
    } else if (arg.startsWith("-") && arg.length > 1 && !/^-\d/.test(arg)) {
      throw new UsageError(`unknown option '${arg}'`);
    } else {
      positional.push(arg);
    }
  }

  const maxPositional = command === "forecast" ? 2 : 1;
  if (positional.length === 0) {
    throw new UsageError("missing <location>");
  }
  if (positional.length > maxPositional) {
    throw new UsageError(`unexpected argument '${positional[maxPositional]}'`);
  }

  const location = positional[0];
  if (command === "current") {
    return { command, location, json, verbose };
  }
  return { command, location, dates: positional[1] ?? "today", models, full, json, verbose };
}

export type RunContext = {
  config: HourcastConfig;
  deps: ServiceDeps;
  now: () => DateTime;
  out: (line: string) => void;
};

export async function runForecast(cmd: ForecastCommand, ctx: RunContext): Promise<void> {
  // Bad dates fail before any network call.
  const range = parseDateRange(cmd.dates);
  const location = await resolveLocation(cmd.location, ctx.deps);
  const models = cmd.models ?? ctx.config.defaultModels;

  const downloaded = await downloadForecast(
    { latitude: location.latitude, longitude: location.longitude, models },
    ctx.deps
  );
  const { forecast, interval } = prepareForecastView({
    forecast: downloaded,
    range,
    now: ctx.now(),
    // JSON consumers always get the hourly series
    full: cmd.full || cmd.json,
  });

  if (cmd.json) {
    for (const line of forecastJsonLines(forecast, interval)) ctx.out(line);
    return;
  }

  ctx.out(`Forecast for ${location.display_name}`);
  if (cmd.verbose) {
    ctx.out(`Grid-cell location: ${mapLink(forecast.location)}`);
    ctx.out(`Timezone: ${forecast.timezone}`);
    ctx.out(`Dates: ${describeDateRange(range)}`);
    ctx.out(`Interval: ${formatInterval(interval)}`);
  }
  buildForecastTable(forecast, interval).print(ctx.out);
}

export async function runCurrent(cmd: CurrentCommand, ctx: RunContext): Promise<void> {
  const location = await resolveLocation(cmd.location, ctx.deps);
  const current = await downloadCurrent(
    { latitude: location.latitude, longitude: location.longitude },
    ctx.deps
  );

  if (cmd.json) {
    const line = currentJsonLine(current);
    if (line) ctx.out(line);
    return;
  }

  ctx.out(`Current weather for ${location.display_name}`);
  if (cmd.verbose) {
    ctx.out(`Grid-cell location: ${mapLink(current.location)}`);
  }
  buildCurrentTable(current).print(ctx.out);
}

async function main(): Promise<number> {
  let cmd: CliCommand;
  try {
    cmd = parseCliArgs(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`[hourcast] ${e.message}`);
    console.error(USAGE);
    return 2;
  }

  if (cmd.command === "help") {
    console.log(USAGE);
    return process.argv.length > 2 ? 0 : 2;
  }

  const config = loadConfig();
  const ctx: RunContext = {
    config,
    deps: { config, log: createEventLogger({ enabled: config.logEvents }) },
    now: () => DateTime.now(),
    out: (line) => console.log(line),
  };

  if (cmd.command === "forecast") {
    await runForecast(cmd, ctx);
  } else {
    await runCurrent(cmd, ctx);
  }
  return 0;
}

// Run CLI if invoked directly
if (isMainModule(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(`[hourcast] ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    });
}
