/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2026 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Main client
export { CanvasHttpClient } from "./client.js";

// Transport
export { createFetchTransport, appendQuery } from "./transport.js";
export type { FetchTransportOptions } from "./transport.js";

// Message helpers
export {
  getHeader,
  withHeader,
  isCanvasRateLimit,
  RATE_LIMIT_REMAINING_HEADER,
  REQUEST_COST_HEADER,
} from "./message.js";

// Errors
export {
  ApiError,
  RateLimitError,
  RateLimitWaitExceededError,
  NetworkError,
  TimeoutError,
} from "./errors.js";

// Types
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  QueryValue,
  RequestOptions,
  Handler,
  HandlerWrapper,
  ClientRequestOptions,
  CanvasHttpClientOptions,
} from "./types.js";
