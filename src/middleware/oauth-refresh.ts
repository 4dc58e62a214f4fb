import type { Handler, HandlerWrapper, HttpRequest, RequestOptions } from "../api/types.js";
import { responseFromError, toError, withHeader } from "../api/message.js";
import {
  isRefreshable,
  type CredentialSource,
  type RefreshableCredentialSource,
} from "../auth/credentials.js";
import { log } from "../utils/logger.js";
import { AbstractMiddleware, type ConfigOptions } from "./middleware.js";

export interface OAuthRefreshConfig {
  autoRefresh: boolean; // refresh before sending when the token is known expired
  retryOn401: boolean; // refresh and retry once when Canvas answers 401
}

export const DEFAULT_OAUTH_REFRESH_CONFIG: OAuthRefreshConfig = {
  autoRefresh: true,
  retryOn401: true,
};

/**
 * Keeps the OAuth bearer token fresh. Passes requests through untouched
 * unless the credential source is in OAuth mode.
 */
export class OAuth2RefreshMiddleware extends AbstractMiddleware<OAuthRefreshConfig> {
  constructor(
    private readonly credentials: CredentialSource,
    config: ConfigOptions<OAuthRefreshConfig> = {},
  ) {
    super(DEFAULT_OAUTH_REFRESH_CONFIG, config);
  }

  getName(): string {
    return "oauth2_refresh";
  }

  handler(): HandlerWrapper {
    return (next: Handler): Handler => async (request: HttpRequest, options: RequestOptions) => {
      const source = this.credentials;
      if (!isRefreshable(source)) {
        return next(request, options);
      }

      let outgoing = request;
      if (this.config.autoRefresh && source.isExpired()) {
        try {
          await source.refreshToken();
          outgoing = this.authorize(outgoing, source);
        } catch (error) {
          // Send the old token; a 401 lands in the reactive path below
          log("WARN", `Proactive OAuth refresh failed: ${toError(error).message}`);
        }
      }

      if (!this.config.retryOn401) {
        return next(outgoing, options);
      }

      try {
        return await next(outgoing, options);
      } catch (error) {
        if (responseFromError(error)?.status !== 401) {
          throw error;
        }

        try {
          await source.refreshToken();
        } catch (refreshError) {
          log("WARN", `OAuth refresh after 401 failed: ${toError(refreshError).message}`);
          throw error;
        }

        log("DEBUG", `Retrying ${outgoing.method} ${outgoing.url} with refreshed token`);
        return next(this.authorize(outgoing, source), options);
      }
    };
  }

  private authorize(request: HttpRequest, source: RefreshableCredentialSource): HttpRequest {
    const token = source.getCredential();
    return token ? withHeader(request, "Authorization", `Bearer ${token}`) : request;
  }
}
