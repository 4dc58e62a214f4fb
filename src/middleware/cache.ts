import type { Handler, HandlerWrapper, HttpRequest, HttpResponse, RequestOptions } from "../api/types.js";
import { pathOf, toError } from "../api/message.js";
import type { CacheAdapter, CacheRecord, CacheStats } from "../cache/adapter.js";
import { InMemoryAdapter } from "../cache/memory-adapter.js";
import { CacheKeyGenerator } from "../cache/key-generator.js";
import { TtlStrategy } from "../cache/ttl-strategy.js";
import { ResponseSerializer } from "../cache/response-serializer.js";
import { log } from "../utils/logger.js";
import { AbstractMiddleware, type ConfigOptions } from "./middleware.js";

export interface CacheConfig {
  enabled: boolean; // opt-in
  defaultTtl: number; // seconds, used when no TtlStrategy is injected
  cacheGetOnly: boolean;
  cacheSuccessOnly: boolean;
  invalidateOnMutation: boolean;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: false,
  defaultTtl: 300,
  cacheGetOnly: true,
  cacheSuccessOnly: true,
  invalidateOnMutation: true,
};

export interface CacheDependencies {
  adapter?: CacheAdapter;
  keyGenerator?: CacheKeyGenerator;
  ttlStrategy?: TtlStrategy;
  serializer?: ResponseSerializer;
}

const MUTATING_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

// Mutating one of these may change what the parent course returns
const COURSE_CHILD_RESOURCES = new Set(["assignments", "modules", "pages"]);

// Resources whose own subtree goes stale when they change
const NESTED_RESOURCES = new Set(["courses", "users"]);

/**
 * Glob patterns of cached GET keys made stale by a mutation of `path`.
 */
export function invalidationPatterns(path: string): string[] {
  const patterns = new Set<string>();

  const root = /\/api\/v1\/(\w+)(?:\/(\d+))?/.exec(path);
  if (!root) return [];

  const resource = root[1];
  const id = root[2];
  patterns.add(`*:GET:/api/v1/${resource}*`);

  if (id !== undefined) {
    patterns.add(`*:GET:/api/v1/${resource}/${id}*`);
    if (NESTED_RESOURCES.has(resource)) {
      patterns.add(`*:GET:/api/v1/${resource}/${id}/*`);
    }
  }

  // Innermost resource segment, e.g. "assignments" in /courses/5/assignments/7
  const segments = path.split("/").filter((segment) => segment !== "" && !/^\d+$/.test(segment));
  const innermost = segments[segments.length - 1];
  const course = /\/courses\/(\d+)\//.exec(path);
  if (innermost !== undefined && COURSE_CHILD_RESOURCES.has(innermost) && course) {
    patterns.add(`*:GET:/api/v1/courses/${course[1]}/*`);
  }

  return [...patterns];
}

/**
 * Caches successful GET responses and purges related entries when a
 * mutating request goes out.
 *
 * Per-request options: `cache: false` bypasses, `cacheRefresh: true` skips
 * the read and writes the fresh response through, `cacheTtl` overrides the TTL.
 */
export class CacheMiddleware extends AbstractMiddleware<CacheConfig> {
  private adapter: CacheAdapter;
  private readonly keyGenerator: CacheKeyGenerator;
  private readonly ttlStrategy: TtlStrategy;
  private readonly serializer: ResponseSerializer;

  constructor(config: ConfigOptions<CacheConfig> = {}, deps: CacheDependencies = {}) {
    super(DEFAULT_CACHE_CONFIG, config);
    this.adapter = deps.adapter ?? new InMemoryAdapter();
    this.keyGenerator = deps.keyGenerator ?? new CacheKeyGenerator();
    this.ttlStrategy = deps.ttlStrategy ?? new TtlStrategy(this.config.defaultTtl);
    this.serializer = deps.serializer ?? new ResponseSerializer();
  }

  getName(): string {
    return "cache";
  }

  configure(options: ConfigOptions<CacheConfig>): void {
    super.configure(options);
    if (options.defaultTtl !== undefined) {
      this.ttlStrategy.setDefaultTtl(this.config.defaultTtl);
    }
  }

  handler(): HandlerWrapper {
    return (next: Handler): Handler => async (request: HttpRequest, options: RequestOptions) => {
      if (!this.isCachingEnabled(options)) {
        return next(request, options);
      }

      if (this.config.cacheGetOnly && request.method !== "GET") {
        if (this.config.invalidateOnMutation) {
          await this.invalidateOnMutation(request);
        }
        return next(request, options);
      }

      if (options.cacheRefresh === true) {
        return this.executeAndCache(request, next, options);
      }

      const cacheKey = this.keyGenerator.generate(request, options);
      const cached = await this.readEntry(cacheKey);
      if (cached !== null) {
        const response = this.serializer.deserialize(cached);
        if (response !== null) {
          log("DEBUG", `Cache hit: ${request.method} ${request.url}`);
          return response;
        }
        // Unusable entry counts as a miss
      }

      return this.executeAndCache(request, next, options, cacheKey);
    };
  }

  private async executeAndCache(
    request: HttpRequest,
    next: Handler,
    options: RequestOptions,
    cacheKey: string = this.keyGenerator.generate(request, options),
  ): Promise<HttpResponse> {
    const response = await next(request, options);

    if (this.shouldCacheResponse(response)) {
      const ttl = this.ttlStrategy.getTtl(request, options);
      if (ttl > 0) {
        const data = this.serializer.serialize(response);
        if (data.cacheable === true) {
          try {
            await this.adapter.set(cacheKey, data, ttl);
            log("DEBUG", `Cached ${request.method} ${request.url} (TTL: ${ttl}s)`);
          } catch (error) {
            log("WARN", `Cache write failed for ${request.method} ${request.url}: ${toError(error).message}`);
          }
        }
      }
    }

    return response;
  }

  private isCachingEnabled(options: RequestOptions): boolean {
    if (options.cache === false) return false;
    return this.config.enabled;
  }

  private shouldCacheResponse(response: HttpResponse): boolean {
    if (!this.config.cacheSuccessOnly) return true;
    return response.status >= 200 && response.status < 300;
  }

  private async invalidateOnMutation(request: HttpRequest): Promise<void> {
    if (!MUTATING_METHODS.has(request.method)) return;

    for (const pattern of invalidationPatterns(pathOf(request.url))) {
      try {
        const removed = await this.adapter.deleteByPattern(pattern);
        if (removed > 0) {
          log("DEBUG", `Invalidated ${removed} cache entries matching ${pattern}`);
        }
      } catch (error) {
        log("WARN", `Cache invalidation failed for ${pattern}: ${toError(error).message}`);
      }
    }
  }

  // Adapter faults read as a miss
  private async readEntry(cacheKey: string): Promise<CacheRecord | null> {
    try {
      return await this.adapter.get(cacheKey);
    } catch (error) {
      log("WARN", `Cache read failed for ${cacheKey}: ${toError(error).message}`);
      return null;
    }
  }

  setAdapter(adapter: CacheAdapter): void {
    this.adapter = adapter;
  }

  getAdapter(): CacheAdapter {
    return this.adapter;
  }

  getStatistics(): Promise<CacheStats> {
    return this.adapter.getStats();
  }

  clearCache(): Promise<void> {
    return this.adapter.clear();
  }
}
