/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export class CanvasSdkError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
    public readonly code: string = "CANVAS-1000",
  ) {
    super(`[${code}] ${message}`);
    this.name = "CanvasSdkError";
  }
}

export class ConfigurationError extends CanvasSdkError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(`Configuration error: ${message}`, undefined, "CANVAS-1001");
    this.name = "ConfigurationError";
  }
}

export class OAuthRefreshError extends CanvasSdkError {
  constructor(message: string, cause?: Error) {
    super(`OAuth token refresh failed: ${message}`, cause, "CANVAS-1300");
    this.name = "OAuthRefreshError";
  }
}

export class MissingOAuthTokenError extends CanvasSdkError {
  constructor(which: "access" | "refresh") {
    super(`No OAuth ${which} token available`, undefined, "CANVAS-1301");
    this.name = "MissingOAuthTokenError";
  }
}

export class TokenStoreError extends CanvasSdkError {
  constructor(message: string, cause?: Error) {
    super(`Token store error: ${message}`, cause, "CANVAS-1302");
    this.name = "TokenStoreError";
  }
}
