import type { AuthMode } from "../types/index.js";

/**
 * Where the client gets the credential it sends as a Bearer token.
 * The rate limiter fingerprints it; the OAuth middleware refreshes it.
 */
export interface CredentialSource {
  readonly authMode: AuthMode;
  getCredential(): string | undefined;
}

/**
 * OAuth-capable credential source.
 */
export interface RefreshableCredentialSource extends CredentialSource {
  readonly authMode: "oauth";
  isExpired(): boolean;
  refreshToken(): Promise<unknown>;
}

export function isRefreshable(source: CredentialSource): source is RefreshableCredentialSource {
  return source.authMode === "oauth" && "refreshToken" in source && "isExpired" in source;
}

// Static developer key / personal access token
export class ApiKeyCredentials implements CredentialSource {
  readonly authMode = "token" as const;

  constructor(private readonly apiKey: string) {}

  getCredential(): string | undefined {
    return this.apiKey.length > 0 ? this.apiKey : undefined;
  }
}
