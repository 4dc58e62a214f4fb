/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// OAuth token held by the token manager
export interface TokenData {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: number; // Unix timestamp ms, absent when Canvas issued a non-expiring token
  scope?: string;
}

// Encrypted token stored on disk
export interface EncryptedData {
  iv: string; // hex-encoded initialization vector
  authTag: string; // hex-encoded GCM auth tag
  data: string; // hex-encoded ciphertext
}

// Token file persisted to the session directory
export interface TokenFile {
  version: 1;
  encrypted: EncryptedData;
  savedAt: number; // Unix timestamp ms
}

// "token" = static developer/API key, "oauth" = refreshable OAuth2 access token
export type AuthMode = "token" | "oauth";

export interface OAuthConfig {
  clientId?: string;
  clientSecret?: string;
  accessToken?: string;
  refreshToken?: string;
  expiresAt?: number; // Unix timestamp ms
}

// Application configuration
export interface AppConfig {
  baseUrl: string;
  apiVersion: string;
  authMode: AuthMode;
  apiKey?: string;
  oauth: OAuthConfig;
  timeoutMs: number;
  cacheEnabled: boolean;
  cacheDir?: string;
  sessionDir?: string;
  logLevel: LogLevel;
}

// Log levels
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";
