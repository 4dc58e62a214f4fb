import * as path from "node:path";
import type { AppConfig, TokenData } from "./types/index.js";
import type { Handler } from "./api/types.js";
import { CanvasHttpClient } from "./api/client.js";
import { ApiKeyCredentials, type CredentialSource } from "./auth/credentials.js";
import { OAuthTokenManager } from "./auth/token-manager.js";
import { TokenStore } from "./auth/token-store.js";
import { FileSystemAdapter } from "./cache/file-adapter.js";
import { InMemoryAdapter } from "./cache/memory-adapter.js";
import { buildMiddlewareStack } from "./middleware/stack.js";
import { ConfigurationError } from "./utils/errors.js";
import { defaultLogger, setLogLevel, type Logger } from "./utils/logger.js";

export interface CreateClientOverrides {
  logger?: Logger;
  transport?: Handler;
  fetchImpl?: typeof fetch;
}

/**
 * Credential source for the configured auth mode. OAuth tokens are persisted
 * under the session directory when one is configured.
 */
export async function createCredentials(
  config: AppConfig,
  fetchImpl?: typeof fetch,
): Promise<CredentialSource> {
  if (config.authMode === "token") {
    if (!config.apiKey) {
      throw new ConfigurationError("an API key is required in token mode", ["CANVAS_API_KEY"]);
    }
    return new ApiKeyCredentials(config.apiKey);
  }

  const { oauth } = config;
  const manager = new OAuthTokenManager({
    baseUrl: config.baseUrl,
    clientId: oauth.clientId,
    clientSecret: oauth.clientSecret,
    token: initialToken(config),
    store: config.sessionDir ? new TokenStore(config.sessionDir) : undefined,
    fetchImpl,
    timeoutMs: config.timeoutMs,
  });

  // A stored token is newer than whatever the environment carries
  await manager.loadFromStore();
  return manager;
}

// Refresh-token-only configuration starts out expired so the first request refreshes
function initialToken({ oauth }: AppConfig): TokenData | undefined {
  if (oauth.accessToken) {
    return { accessToken: oauth.accessToken, refreshToken: oauth.refreshToken, expiresAt: oauth.expiresAt };
  }
  if (oauth.refreshToken) {
    return { accessToken: "", refreshToken: oauth.refreshToken, expiresAt: 0 };
  }
  return undefined;
}

/**
 * Client wired from configuration: credentials for the auth mode, the
 * default middleware stack, and a cache when caching is enabled.
 */
export async function createClient(
  config: AppConfig,
  overrides: CreateClientOverrides = {},
): Promise<CanvasHttpClient> {
  setLogLevel(config.logLevel);
  const credentials = await createCredentials(config, overrides.fetchImpl);
  const logger = overrides.logger ?? defaultLogger;

  const middleware = buildMiddlewareStack({
    credentials,
    logger,
    rateLimit: { baseUrl: config.baseUrl },
    cache: config.cacheEnabled ? {} : false,
    cacheDependencies: config.cacheEnabled
      ? { adapter: config.cacheDir ? new FileSystemAdapter(path.resolve(config.cacheDir)) : new InMemoryAdapter() }
      : undefined,
    logging: { logLevel: "DEBUG" },
  });

  return new CanvasHttpClient({
    baseUrl: config.baseUrl,
    apiVersion: config.apiVersion,
    credentials,
    middleware,
    transport: overrides.transport,
    logger,
    timeoutMs: config.timeoutMs,
  });
}
