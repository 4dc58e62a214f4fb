import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CacheMiddleware, invalidationPatterns } from "../../src/middleware/cache.js";
import type { CacheAdapter, CacheRecord, CacheStats } from "../../src/cache/adapter.js";
import { FileSystemAdapter } from "../../src/cache/file-adapter.js";
import { InMemoryAdapter } from "../../src/cache/memory-adapter.js";
import { CacheKeyGenerator } from "../../src/cache/key-generator.js";
import type { Handler, HttpRequest } from "../../src/api/types.js";
import { setLogLevel } from "../../src/utils/logger.js";
import { fakeHandler, makeRequest, makeResponse } from "../support/http.js";

describe("invalidationPatterns", () => {
  it("covers the collection for a mutation without an id", () => {
    expect(invalidationPatterns("/api/v1/users")).toEqual(["*:GET:/api/v1/users*"]);
  });

  it("covers the item for a mutation with an id", () => {
    expect(invalidationPatterns("/api/v1/accounts/3")).toEqual([
      "*:GET:/api/v1/accounts*",
      "*:GET:/api/v1/accounts/3*",
    ]);
  });

  it("covers the whole course for a nested assignment change", () => {
    expect(invalidationPatterns("/api/v1/courses/5/assignments/7")).toEqual([
      "*:GET:/api/v1/courses*",
      "*:GET:/api/v1/courses/5*",
      "*:GET:/api/v1/courses/5/*",
    ]);
  });

  it("ignores paths outside the API", () => {
    expect(invalidationPatterns("/login/oauth2/token")).toEqual([]);
  });
});

// Every storage call fails, as with a read-only or vanished cache directory
class BrokenAdapter implements CacheAdapter {
  private fail(): Promise<never> {
    return Promise.reject(new Error("EACCES: permission denied"));
  }

  get(_key: string): Promise<CacheRecord | null> {
    return this.fail();
  }

  set(_key: string, _data: CacheRecord, _ttlSeconds?: number): Promise<void> {
    return this.fail();
  }

  delete(_key: string): Promise<boolean> {
    return this.fail();
  }

  clear(): Promise<void> {
    return this.fail();
  }

  has(_key: string): Promise<boolean> {
    return this.fail();
  }

  deleteByPattern(_pattern: string): Promise<number> {
    return this.fail();
  }

  getStats(): Promise<CacheStats> {
    return this.fail();
  }
}

describe("CacheMiddleware", () => {
  let adapter: InMemoryAdapter;
  let next: ReturnType<typeof fakeHandler>;
  let handler: Handler;

  beforeEach(() => {
    setLogLevel("ERROR");
    adapter = new InMemoryAdapter();
    next = fakeHandler().mockImplementation(async (request: HttpRequest) =>
      makeResponse(request.method === "GET" ? 200 : 201, `body of ${request.url}`, {}, "OK"),
    );
    handler = new CacheMiddleware({ enabled: true }, { adapter }).handler()(next);
  });

  afterEach(() => {
    vi.useRealTimers();
    setLogLevel("INFO");
  });

  it("is disabled unless enabled in config", async () => {
    const disabled = new CacheMiddleware({}, { adapter }).handler()(next);
    const request = makeRequest("GET", "/api/v1/courses");

    await disabled(request, {});
    await disabled(request, {});

    expect(next).toHaveBeenCalledTimes(2);
    expect(adapter.size).toBe(0);
  });

  it("serves a repeated GET from the cache", async () => {
    const request = makeRequest("GET", "/api/v1/courses");

    const first = await handler(request, {});
    const second = await handler(request, {});

    expect(next).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
    expect(second.body).toBe("body of https://canvas.test/api/v1/courses");
  });

  it("bypasses the cache when the cache option is false", async () => {
    const request = makeRequest("GET", "/api/v1/courses");

    await handler(request, { cache: false });
    await handler(request, { cache: false });

    expect(next).toHaveBeenCalledTimes(2);
    expect(adapter.size).toBe(0);
  });

  it("refreshes the entry when cacheRefresh is set", async () => {
    const request = makeRequest("GET", "/api/v1/courses");
    await handler(request, {});

    next.mockResolvedValueOnce(makeResponse(200, "fresh"));
    const refreshed = await handler(request, { cacheRefresh: true });
    const cached = await handler(request, {});

    expect(refreshed.body).toBe("fresh");
    expect(cached.body).toBe("fresh");
    expect(next).toHaveBeenCalledTimes(2);
  });

  it("does not cache error responses", async () => {
    next.mockResolvedValue(makeResponse(404, "not found"));
    const request = makeRequest("GET", "/api/v1/courses/9");

    await handler(request, {});
    await handler(request, {});

    expect(next).toHaveBeenCalledTimes(2);
  });

  it("does not cache paths whose TTL is zero", async () => {
    const request = makeRequest("GET", "/api/v1/courses/1/grades");

    await handler(request, {});
    await handler(request, {});

    expect(next).toHaveBeenCalledTimes(2);
  });

  it("expires entries after their TTL", async () => {
    vi.useFakeTimers();
    const request = makeRequest("GET", "/api/v1/courses");

    await handler(request, {});
    vi.advanceTimersByTime(3_600_000);
    await handler(request, {});

    expect(next).toHaveBeenCalledTimes(2);
  });

  it("honours a per-request TTL", async () => {
    vi.useFakeTimers();
    const request = makeRequest("GET", "/api/v1/courses");

    await handler(request, { cacheTtl: 10 });
    vi.advanceTimersByTime(9_999);
    await handler(request, {});
    vi.advanceTimersByTime(1);
    await handler(request, {});

    expect(next).toHaveBeenCalledTimes(2);
  });

  it("keeps responses for different users apart", async () => {
    await handler(makeRequest("GET", "/api/v1/courses", { Authorization: "Bearer test-token-a" }), {});
    await handler(makeRequest("GET", "/api/v1/courses", { Authorization: "Bearer test-token-b" }), {});

    expect(next).toHaveBeenCalledTimes(2);
    expect(adapter.size).toBe(2);
  });

  it("invalidates related GETs before a mutation is sent", async () => {
    await handler(makeRequest("GET", "/api/v1/courses"), {});
    await handler(makeRequest("GET", "/api/v1/courses/5"), {});
    await handler(makeRequest("GET", "/api/v1/users/self"), {});
    expect(adapter.size).toBe(3);

    let sizeWhenSent = -1;
    next.mockImplementationOnce(async () => {
      sizeWhenSent = adapter.size;
      return makeResponse(200);
    });
    await handler(makeRequest("PUT", "/api/v1/courses/5"), {});

    expect(sizeWhenSent).toBe(1);
    expect(await adapter.has("canvas:v1:GET:/api/v1/users/self")).toBe(true);
  });

  it("leaves the cache alone on mutation when invalidation is off", async () => {
    const keep = new CacheMiddleware({ enabled: true, invalidateOnMutation: false }, { adapter }).handler()(next);
    await keep(makeRequest("GET", "/api/v1/courses/5"), {});

    await keep(makeRequest("DELETE", "/api/v1/courses/5"), {});

    expect(adapter.size).toBe(1);
  });

  it("treats an unreadable entry as a miss", async () => {
    const request = makeRequest("GET", "/api/v1/courses");
    await adapter.set(new CacheKeyGenerator().generate(request, {}), { garbage: true }, 60);

    const response = await handler(request, {});

    expect(response.status).toBe(200);
    expect(next).toHaveBeenCalledTimes(1);
  });

  it("reports statistics and clears the cache", async () => {
    const middleware = new CacheMiddleware({ enabled: true }, { adapter });
    const cached = middleware.handler()(next);
    const request = makeRequest("GET", "/api/v1/courses");

    await cached(request, {});
    await cached(request, {});

    expect(await middleware.getStatistics()).toMatchObject({ hits: 1, misses: 1, entries: 1 });

    await middleware.clearCache();
    expect(await middleware.getStatistics()).toMatchObject({ hits: 0, misses: 0, entries: 0 });
  });

  it("swaps the storage adapter", () => {
    const middleware = new CacheMiddleware({ enabled: true }, { adapter });
    const replacement = new InMemoryAdapter(10);

    middleware.setAdapter(replacement);

    expect(middleware.getAdapter()).toBe(replacement);
  });

  it("fetches again after a mutation of the same resource", async () => {
    const request = makeRequest("GET", "/api/v1/courses/5");

    await handler(request, {});
    await handler(makeRequest("PUT", "/api/v1/courses/5"), {});
    const response = await handler(request, {});

    expect(next).toHaveBeenCalledTimes(3);
    expect(next.mock.calls.map(([sent]) => sent.method)).toEqual(["GET", "PUT", "GET"]);
    expect(response.body).toBe("body of https://canvas.test/api/v1/courses/5");
  });

  it("applies a reconfigured default TTL", async () => {
    const middleware = new CacheMiddleware({ enabled: true }, { adapter });
    const cached = middleware.handler()(next);
    const request = makeRequest("GET", "/api/v1/users/self/profile");

    middleware.configure({ defaultTtl: 0 });
    await cached(request, {});
    await cached(request, {});

    expect(middleware.getConfig("defaultTtl")).toBe(0);
    expect(next).toHaveBeenCalledTimes(2);
    expect(adapter.size).toBe(0);
  });

  describe("when the storage adapter fails", () => {
    let broken: Handler;

    beforeEach(() => {
      broken = new CacheMiddleware({ enabled: true }, { adapter: new BrokenAdapter() }).handler()(next);
    });

    it("serves GETs from the inner handler", async () => {
      const response = await broken(makeRequest("GET", "/api/v1/courses"), {});

      expect(response).toEqual(makeResponse(200, "body of https://canvas.test/api/v1/courses", {}, "OK"));
      expect(next).toHaveBeenCalledTimes(1);
    });

    it("still writes through on a forced refresh", async () => {
      const response = await broken(makeRequest("GET", "/api/v1/courses"), { cacheRefresh: true });

      expect(response.status).toBe(200);
    });

    it("still sends mutations", async () => {
      const response = await broken(makeRequest("DELETE", "/api/v1/courses/5"), {});

      expect(response.status).toBe(201);
      expect(next).toHaveBeenCalledTimes(1);
    });
  });
});

describe("CacheMiddleware with a FileSystemAdapter", () => {
  let testDir: string;

  beforeEach(() => {
    setLogLevel("ERROR");
    testDir = path.join(os.tmpdir(), `cache-middleware-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  });

  afterEach(async () => {
    setLogLevel("INFO");
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it("answers concurrent identical GETs and caches one entry", async () => {
    const next = fakeHandler().mockImplementation(async () => makeResponse(200, '{"id":5}'));
    const handler = new CacheMiddleware({ enabled: true }, { adapter: new FileSystemAdapter(testDir) }).handler()(next);
    const request = makeRequest("GET", "/api/v1/courses/5");

    const results = await Promise.allSettled(Array.from({ length: 8 }, () => handler(request, {})));

    expect(results.filter((result) => result.status === "rejected")).toHaveLength(0);
    expect(next).toHaveBeenCalledTimes(8);

    const cached = await handler(request, {});
    expect(cached.body).toBe('{"id":5}');
    expect(next).toHaveBeenCalledTimes(8);
    expect((await fs.readdir(testDir)).filter((name) => name.endsWith(".tmp"))).toEqual([]);
  });
});
