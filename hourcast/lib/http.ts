/**
 * GET-and-parse-JSON with a timeout. No retries: a failed call surfaces to the
 * caller as one of the errors below.
 */

import type { HourcastConfig } from "./config.js";
import type { EventLogger } from "../../logging/hourcastLog.js";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** Injection points for the network edges; tests pass a fake fetch here. */
export type ServiceDeps = {
  fetch?: FetchLike;
  config?: HourcastConfig;
  log?: EventLogger;
};

export class HttpRequestError extends Error {
  constructor(public service: string, public url: string, cause: unknown) {
    super(`${service} request failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "HttpRequestError";
  }
}

export class HttpStatusError extends Error {
  constructor(public service: string, public status: number, public body: string) {
    super(`${service} API error: ${status}${body ? ` ${body}` : ""}`);
    this.name = "HttpStatusError";
  }
}

export class HttpResponseError extends Error {
  constructor(public service: string, public detail: string) {
    super(`${service} JSON parsing failed: ${detail}`);
    this.name = "HttpResponseError";
  }
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    return (await res.text()).slice(0, 300);
  } catch (e) {
    return `<unreadable body: ${e instanceof Error ? e.message : String(e)}>`;
  }
}

export async function getJson(params: {
  service: string;
  url: URL;
  fetchImpl: FetchLike;
  timeoutMs: number;
  headers?: Record<string, string>;
}): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

  try {
    let res: Response;
    try {
      res = await params.fetchImpl(params.url, {
        method: "GET",
        signal: controller.signal,
        headers: { Accept: "application/json", ...params.headers },
      });
    } catch (e) {
      const cause = controller.signal.aborted ? new Error(`timed out after ${params.timeoutMs}ms`) : e;
      throw new HttpRequestError(params.service, params.url.toString(), cause);
    }

    if (!res.ok) {
      throw new HttpStatusError(params.service, res.status, await safeReadBody(res));
    }

    try {
      return await res.json();
    } catch (e) {
      throw new HttpResponseError(params.service, e instanceof Error ? e.message : String(e));
    }
  } finally {
    clearTimeout(timeout);
  }
}
