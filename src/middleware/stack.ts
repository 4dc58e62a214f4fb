import type { CredentialSource } from "../auth/credentials.js";
import type { Logger } from "../utils/logger.js";
import type { Middleware, ConfigOptions } from "./middleware.js";
import { OAuth2RefreshMiddleware, type OAuthRefreshConfig } from "./oauth-refresh.js";
import { RateLimitMiddleware, type RateLimitConfig, type RateLimitDependencies } from "./rate-limit.js";
import { CacheMiddleware, type CacheConfig, type CacheDependencies } from "./cache.js";
import { RetryMiddleware, type RetryConfig } from "./retry.js";
import { LoggingMiddleware, type LoggingConfig } from "./logging.js";

// `false` leaves the middleware out; an object configures it
export interface MiddlewareStackOptions {
  credentials?: CredentialSource;
  logger?: Logger;
  oauth?: ConfigOptions<OAuthRefreshConfig> | false;
  rateLimit?: ConfigOptions<RateLimitConfig> | false;
  rateLimitStore?: RateLimitDependencies["store"];
  cache?: ConfigOptions<CacheConfig> | false;
  cacheDependencies?: CacheDependencies;
  retry?: ConfigOptions<RetryConfig> | false;
  logging?: ConfigOptions<LoggingConfig> | false;
}

/**
 * Build middleware in the order they must nest:
 * OAuth refresh, rate limit, cache, retry, logging.
 *
 * Rate limiting and caching sit outside retry, so a logical call is charged
 * and cached once however many attempts it takes. Logging sits inside, so
 * every attempt is logged.
 *
 * OAuth refresh is added only for an OAuth credential source, cache only when
 * configured, and logging only when a logger or logging config is given.
 */
export function buildMiddlewareStack(options: MiddlewareStackOptions = {}): Middleware[] {
  const stack: Middleware[] = [];

  if (options.oauth !== false && options.credentials?.authMode === "oauth") {
    stack.push(new OAuth2RefreshMiddleware(options.credentials, options.oauth ?? {}));
  }

  if (options.rateLimit !== false) {
    stack.push(
      new RateLimitMiddleware(options.rateLimit ?? {}, {
        credentials: options.credentials,
        store: options.rateLimitStore,
      }),
    );
  }

  if (options.cache !== undefined && options.cache !== false) {
    stack.push(new CacheMiddleware({ enabled: true, ...options.cache }, options.cacheDependencies));
  }

  if (options.retry !== false) {
    stack.push(new RetryMiddleware(options.retry ?? {}));
  }

  if (options.logging !== false && (options.logger !== undefined || options.logging !== undefined)) {
    stack.push(new LoggingMiddleware(options.logger, options.logging ?? {}));
  }

  return stack;
}
