/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { CanvasSdkError } from "../utils/errors.js";
import type { HttpResponse } from "./types.js";

// Base class for all HTTP API errors. Carries the response when one exists.
export class ApiError extends CanvasSdkError {
  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    message: string,
    public readonly response?: HttpResponse,
    cause?: Error,
    code: string = "CANVAS-1100",
  ) {
    super(`API error (${status}) at ${endpoint}: ${message}`, cause, code);
    this.name = "ApiError";
  }

  get responseBody(): string | undefined {
    return this.response?.body;
  }
}

// Local rate limiter refused to wait (waitOnLimit disabled)
export class RateLimitError extends ApiError {
  constructor(
    endpoint: string,
    public readonly waitSeconds: number,
    message: string = `Rate limit would be exceeded. Would need to wait ${waitSeconds} seconds.`,
    code: string = "CANVAS-1101",
  ) {
    super(
      429,
      endpoint,
      message,
      { status: 429, statusText: "Too Many Requests", headers: {}, body: message },
      undefined,
      code,
    );
    this.name = "RateLimitError";
  }
}

// Required wait is longer than maxWaitTime
export class RateLimitWaitExceededError extends RateLimitError {
  constructor(
    endpoint: string,
    waitSeconds: number,
    public readonly maxWaitSeconds: number,
  ) {
    super(
      endpoint,
      waitSeconds,
      `Rate limit wait time (${waitSeconds}s) exceeds maximum (${maxWaitSeconds}s).`,
      "CANVAS-1102",
    );
    this.name = "RateLimitWaitExceededError";
  }
}

// Network-level error (no HTTP status code)
// For fetch failures, DNS errors, refused connections
export class NetworkError extends CanvasSdkError {
  constructor(message: string, cause?: Error, code: string = "CANVAS-1200") {
    super(`Network error: ${message}`, cause, code);
    this.name = "NetworkError";
  }
}

export class TimeoutError extends NetworkError {
  constructor(
    endpoint: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(`Request to ${endpoint} timed out after ${timeoutMs}ms`, cause, "CANVAS-1201");
    this.name = "TimeoutError";
  }
}
