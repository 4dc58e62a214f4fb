/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2026 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { Logger } from "../utils/logger.js";
import type { CredentialSource } from "../auth/credentials.js";
import type { Middleware } from "../middleware/middleware.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

// Outgoing request. Bodies are plain strings so a retried request always
// re-sends the full payload.
export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}

// Fully buffered response. Header names are lower-cased.
export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

export type QueryValue = string | number | boolean | Array<string | number | boolean>;

/**
 * Per-request options threaded through the middleware chain.
 * Open-ended: unknown keys pass through untouched.
 */
export interface RequestOptions {
  query?: Record<string, QueryValue | undefined>;
  headers?: Record<string, string>;
  /** false bypasses the cache entirely for this request */
  cache?: boolean;
  /** true skips the cache read and writes the fresh response through */
  cacheRefresh?: boolean;
  /** explicit TTL override in seconds */
  cacheTtl?: number;
  /** explicit rate-limit bucket key */
  rateLimitBucket?: string;
  /** retry attempt counter, managed by RetryMiddleware */
  retryAttempt?: number;
  /** false resolves 4xx/5xx responses instead of rejecting with ApiError */
  httpErrors?: boolean;
  timeoutMs?: number;
  [key: string]: unknown;
}

export type Handler = (
  request: HttpRequest,
  options: RequestOptions,
) => Promise<HttpResponse>;

// Takes the next handler in the chain and returns the wrapped handler
export type HandlerWrapper = (next: Handler) => Handler;

// Options accepted by the client's verb helpers
export interface ClientRequestOptions extends RequestOptions {
  /** serialized as JSON with Content-Type application/json */
  json?: unknown;
  /** form fields, serialized as application/x-www-form-urlencoded */
  form?: Record<string, string | number | boolean>;
  /** raw body, sent as-is */
  body?: string;
}

export interface CanvasHttpClientOptions {
  baseUrl: string;
  apiVersion?: string; // default "v1"
  credentials?: CredentialSource;
  /** ordered outermost first; omit to get the default stack */
  middleware?: Middleware[];
  /** custom transport; when given, no default middleware is installed */
  transport?: Handler;
  logger?: Logger;
  timeoutMs?: number; // default 30_000
}
