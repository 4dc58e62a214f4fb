/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export { ApiKeyCredentials, isRefreshable } from "./credentials.js";
export type { CredentialSource, RefreshableCredentialSource } from "./credentials.js";
export { OAuthTokenManager } from "./token-manager.js";
export type { OAuthTokenManagerOptions, TokenResponse } from "./token-manager.js";
export { TokenStore } from "./token-store.js";
