import { ApiError } from "./errors.js";
import type { HttpRequest, HttpResponse } from "./types.js";

export const RATE_LIMIT_REMAINING_HEADER = "X-Rate-Limit-Remaining";
export const REQUEST_COST_HEADER = "X-Request-Cost";
const RATE_LIMIT_BODY_MARKER = "Rate Limit Exceeded";

// Case-insensitive header lookup
export function getHeader(
  headers: Readonly<Record<string, string>>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export function hasHeader(headers: Readonly<Record<string, string>>, name: string): boolean {
  return getHeader(headers, name) !== undefined;
}

/**
 * Return a copy of the request with the header replaced, dropping any
 * existing header of the same name in a different case.
 */
export function withHeader(request: HttpRequest, name: string, value: string): HttpRequest {
  const wanted = name.toLowerCase();
  const headers: Record<string, string> = {};
  for (const [key, existing] of Object.entries(request.headers)) {
    if (key.toLowerCase() !== wanted) headers[key] = existing;
  }
  headers[name] = value;
  return { ...request, headers };
}

/**
 * Parse an integer header the way Canvas sends them ("2987.5" is accepted
 * and truncated). Returns undefined when absent or not numeric.
 */
export function getNumericHeader(
  headers: Readonly<Record<string, string>>,
  name: string,
): number | undefined {
  const raw = getHeader(headers, name);
  if (raw === undefined) return undefined;
  const value = Number.parseFloat(raw);
  return Number.isNaN(value) ? undefined : Math.trunc(value);
}

export function hostOf(url: string): string {
  if (!URL.canParse(url)) return "";
  return new URL(url).hostname;
}

export function pathOf(url: string): string {
  if (URL.canParse(url)) return new URL(url).pathname;
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

/**
 * Canvas reports throttling as 403 rather than 429. A 403 is a rate-limit
 * response only when X-Rate-Limit-Remaining is present and <= 0, or the body
 * says "Rate Limit Exceeded". Any other 403 is a real authorization failure.
 */
export function isCanvasRateLimit(response: HttpResponse): boolean {
  if (response.status !== 403) return false;

  if (hasHeader(response.headers, RATE_LIMIT_REMAINING_HEADER)) {
    const remaining = getNumericHeader(response.headers, RATE_LIMIT_REMAINING_HEADER) ?? 0;
    return remaining <= 0;
  }

  return response.body.includes(RATE_LIMIT_BODY_MARKER);
}

// Pull the HTTP response out of a rejection reason, when it carries one
export function responseFromError(reason: unknown): HttpResponse | undefined {
  return reason instanceof ApiError ? reason.response : undefined;
}

export function isCanvasRateLimitError(reason: unknown): boolean {
  const response = responseFromError(reason);
  return response !== undefined && isCanvasRateLimit(response);
}

export function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
