export { AbstractMiddleware } from "./middleware.js";
export type { Middleware, ConfigOptions } from "./middleware.js";
export { composeMiddleware } from "./compose.js";
export { buildMiddlewareStack } from "./stack.js";
export type { MiddlewareStackOptions } from "./stack.js";

export { RetryMiddleware, DEFAULT_RETRY_CONFIG, calculateBackoffDelay } from "./retry.js";
export type { RetryConfig, BackoffSettings } from "./retry.js";
export { RateLimitMiddleware, DEFAULT_RATE_LIMIT_CONFIG } from "./rate-limit.js";
export type { RateLimitConfig, RateLimitDependencies } from "./rate-limit.js";
export { MemoryBucketStore, LeakyBucket, sharedBucketStore } from "./bucket-store.js";
export type { BucketState, BucketSettings, BucketStore } from "./bucket-store.js";
export { CacheMiddleware, DEFAULT_CACHE_CONFIG, invalidationPatterns } from "./cache.js";
export type { CacheConfig, CacheDependencies } from "./cache.js";
export { LoggingMiddleware, DEFAULT_LOGGING_CONFIG, REDACTED } from "./logging.js";
export type { LoggingConfig } from "./logging.js";
export { OAuth2RefreshMiddleware, DEFAULT_OAUTH_REFRESH_CONFIG } from "./oauth-refresh.js";
export type { OAuthRefreshConfig } from "./oauth-refresh.js";
