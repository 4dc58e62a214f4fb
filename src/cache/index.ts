export { globToRegExp } from "./adapter.js";
export type { CacheAdapter, CacheRecord, CacheStats } from "./adapter.js";
export { InMemoryAdapter } from "./memory-adapter.js";
export { FileSystemAdapter } from "./file-adapter.js";
export { CacheKeyGenerator } from "./key-generator.js";
export { TtlStrategy } from "./ttl-strategy.js";
export { ResponseSerializer } from "./response-serializer.js";
