/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// JSON-compatible record, as produced by ResponseSerializer
export type CacheRecord = Record<string, unknown>;

export interface CacheStats {
  hits: number;
  misses: number;
  size: number; // approximate bytes held
  entries: number;
}

/**
 * Storage backend for cached responses. Async so external stores fit the
 * same contract as the in-memory one.
 */
export interface CacheAdapter {
  /** Stored record, or null when absent or expired. */
  get(key: string): Promise<CacheRecord | null>;

  /** Store a record. ttlSeconds of 0 means no expiry. */
  set(key: string, data: CacheRecord, ttlSeconds?: number): Promise<void>;

  delete(key: string): Promise<boolean>;

  clear(): Promise<void>;

  has(key: string): Promise<boolean>;

  /** Delete every key matching a glob where `*` matches any run of characters. */
  deleteByPattern(pattern: string): Promise<number>;

  getStats(): Promise<CacheStats>;
}

/**
 * Compile a `*` glob into an anchored regular expression.
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*");
  return new RegExp(`^${escaped}$`);
}
