/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export * from "./api/index.js";
export * from "./auth/index.js";
export * from "./cache/index.js";
export * from "./middleware/index.js";

export { createClient, createCredentials } from "./create-client.js";
export type { CreateClientOverrides } from "./create-client.js";
export { loadConfig } from "./utils/config.js";
export {
  CanvasSdkError,
  ConfigurationError,
  OAuthRefreshError,
  MissingOAuthTokenError,
  TokenStoreError,
} from "./utils/errors.js";
export { log, setLogLevel, getLogLevel, redact, defaultLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export type { AppConfig, AuthMode, LogLevel, OAuthConfig, TokenData } from "./types/index.js";
