import type { Handler, HttpRequest, HttpResponse, QueryValue, RequestOptions } from "./types.js";
import { ApiError, NetworkError, TimeoutError } from "./errors.js";
import { pathOf } from "./message.js";
import { log } from "../utils/logger.js";

export interface FetchTransportOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number; // default 30_000, overridable per request
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Append query parameters to a URL. Arrays use Canvas' `key[]=value` form;
 * undefined values are skipped.
 */
export function appendQuery(url: string, query: Record<string, QueryValue | undefined> | undefined): string {
  if (!query) return url;

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      const name = key.endsWith("[]") ? key : `${key}[]`;
      for (const item of value) params.append(name, String(item));
    } else {
      params.append(key, String(value));
    }
  }

  const encoded = params.toString();
  if (!encoded) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${encoded}`;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/**
 * Innermost handler: sends the request with fetch and buffers the response.
 * Status >= 400 rejects with ApiError unless `httpErrors: false`.
 */
export function createFetchTransport(transportOptions: FetchTransportOptions = {}): Handler {
  const fetchImpl = transportOptions.fetchImpl ?? fetch;
  const defaultTimeout = transportOptions.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return async (request: HttpRequest, options: RequestOptions): Promise<HttpResponse> => {
    const url = appendQuery(request.url, options.query);
    const endpoint = pathOf(url);
    const timeoutMs = options.timeoutMs ?? defaultTimeout;
    const headers = { ...request.headers, ...options.headers };

    let raw: Response;
    try {
      raw = await fetchImpl(url, {
        method: request.method,
        headers,
        body: request.body,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new TimeoutError(endpoint, timeoutMs, error instanceof Error ? error : undefined);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(
        `Request to ${endpoint} failed: ${message}`,
        error instanceof Error ? error : undefined,
      );
    }

    const responseHeaders: Record<string, string> = {};
    raw.headers.forEach((value, name) => {
      responseHeaders[name.toLowerCase()] = value;
    });

    let body: string;
    try {
      body = await raw.text();
    } catch (error) {
      if (isTimeout(error)) {
        throw new TimeoutError(endpoint, timeoutMs, error instanceof Error ? error : undefined);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(
        `Reading response from ${endpoint} failed: ${message}`,
        error instanceof Error ? error : undefined,
      );
    }

    const response: HttpResponse = {
      status: raw.status,
      statusText: raw.statusText,
      headers: responseHeaders,
      body,
    };

    if (response.status >= 400 && options.httpErrors !== false) {
      log("DEBUG", `${request.method} ${endpoint} returned ${response.status}`);
      throw new ApiError(response.status, endpoint, body || response.statusText, response);
    }

    return response;
  };
}
