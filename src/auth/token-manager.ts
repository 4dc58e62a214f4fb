import { z } from "zod";
import type { TokenData } from "../types/index.js";
import type { TokenStore } from "./token-store.js";
import type { RefreshableCredentialSource } from "./credentials.js";
import { ConfigurationError, MissingOAuthTokenError, OAuthRefreshError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

/**
 * Token refresh buffer - tokens within this time of expiry are considered expired.
 * This prevents sending tokens that might expire during a request.
 */
const REFRESH_BUFFER_MS = 5 * 60 * 1000; // 5 minutes

const DEFAULT_TIMEOUT_MS = 30_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export interface OAuthTokenManagerOptions {
  baseUrl: string;
  clientId?: string;
  clientSecret?: string;
  token?: TokenData;
  store?: TokenStore;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  refreshBufferMs?: number;
}

/**
 * OAuth2 credential source. Holds the access/refresh token pair in memory,
 * refreshes it against Canvas and optionally persists it through a TokenStore.
 */
export class OAuthTokenManager implements RefreshableCredentialSource {
  readonly authMode = "oauth" as const;

  private token: TokenData | null;
  private inFlight: Promise<TokenData> | null = null;
  private readonly fetchImpl: typeof fetch;
  private readonly refreshBufferMs: number;
  private readonly timeoutMs: number;

  constructor(private readonly options: OAuthTokenManagerOptions) {
    this.token = options.token ?? null;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.refreshBufferMs = options.refreshBufferMs ?? REFRESH_BUFFER_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  getCredential(): string | undefined {
    return this.token?.accessToken || undefined;
  }

  getToken(): TokenData | null {
    return this.token;
  }

  /**
   * True when there is no access token or it expires within the refresh buffer.
   * Tokens without an expiry never expire.
   */
  isExpired(): boolean {
    if (!this.token) return true;
    if (this.token.expiresAt === undefined) return false;
    return this.token.expiresAt - Date.now() <= this.refreshBufferMs;
  }

  async setToken(token: TokenData): Promise<void> {
    this.token = token;
    if (this.options.store) {
      await this.options.store.save(token);
    }
  }

  // Replaces the in-memory token with the stored one, if any
  async loadFromStore(): Promise<boolean> {
    const stored = await this.options.store?.load();
    if (!stored) return false;
    this.token = stored;
    log("DEBUG", "Loaded OAuth token from store");
    return true;
  }

  async clearToken(): Promise<void> {
    this.token = null;
    await this.options.store?.clear();
  }

  /**
   * Exchanges the refresh token for a new access token. Concurrent callers
   * share one request.
   */
  refreshToken(): Promise<TokenData> {
    if (!this.inFlight) {
      this.inFlight = this.performRefresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async performRefresh(): Promise<TokenData> {
    const refreshToken = this.token?.refreshToken;
    if (!refreshToken) {
      log("ERROR", "No refresh token available for OAuth refresh");
      throw new MissingOAuthTokenError("refresh");
    }

    const { clientId, clientSecret } = this.options;
    if (!clientId || !clientSecret) {
      throw new ConfigurationError("OAuth client credentials must be configured", [
        "CANVAS_OAUTH_CLIENT_ID",
        "CANVAS_OAUTH_CLIENT_SECRET",
      ]);
    }

    log("INFO", "Refreshing OAuth access token");

    const body = new URLSearchParams({
      grant_type: "refresh_token",
      client_id: clientId,
      client_secret: clientSecret,
      refresh_token: refreshToken,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.tokenEndpoint(), {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new OAuthRefreshError(err.message, err);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new OAuthRefreshError(`token endpoint returned ${response.status}: ${text}`);
    }
    if (!text) {
      throw new OAuthRefreshError("empty response from token endpoint");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new OAuthRefreshError("invalid JSON from token endpoint", err);
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new OAuthRefreshError("invalid response from token endpoint");
    }

    const data = parsed.data;
    // Canvas keeps the refresh token unless it sends a new one
    const next: TokenData = {
      accessToken: data.access_token,
      refreshToken: data.refresh_token ?? refreshToken,
      expiresAt: data.expires_in !== undefined ? Date.now() + data.expires_in * 1000 : undefined,
      scope: data.scope ?? this.token?.scope,
    };

    await this.setToken(next);
    log("INFO", `OAuth access token refreshed (expires in ${data.expires_in ?? "never"}s)`);
    return next;
  }

  private tokenEndpoint(): string {
    const base = this.options.baseUrl.replace(/\/+$/, "").replace(/\/api\/v\d+$/, "");
    return `${base}/login/oauth2/token`;
  }
}
