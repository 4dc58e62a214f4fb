/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { globToRegExp, type CacheAdapter, type CacheRecord, type CacheStats } from "./adapter.js";

// In-memory TTL cache using a Map
// Expiry is checked on read; nothing sweeps in the background

interface CacheEntry {
  data: CacheRecord;
  expiresAt: number; // Unix ms, 0 = never
  bytes: number;
}

export class InMemoryAdapter implements CacheAdapter {
  private cache = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private bytes = 0;

  /**
   * @param maxEntries - oldest entry is evicted past this count (0 = unlimited)
   */
  constructor(private readonly maxEntries: number = 1000) {}

  async get(key: string): Promise<CacheRecord | null> {
    const entry = this.liveEntry(key);
    if (!entry) {
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.data;
  }

  async set(key: string, data: CacheRecord, ttlSeconds: number = 0): Promise<void> {
    // Overwriting keeps the slot; only new keys can push the size over
    if (this.cache.has(key)) {
      this.remove(key);
    } else if (this.maxEntries > 0 && this.cache.size >= this.maxEntries) {
      this.evictOldest();
    }

    const bytes = Buffer.byteLength(JSON.stringify(data));
    this.cache.set(key, {
      data,
      expiresAt: ttlSeconds > 0 ? Date.now() + ttlSeconds * 1000 : 0,
      bytes,
    });
    this.bytes += bytes;
  }

  async delete(key: string): Promise<boolean> {
    return this.remove(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.bytes = 0;
    this.hits = 0;
    this.misses = 0;
  }

  async has(key: string): Promise<boolean> {
    return this.liveEntry(key) !== undefined;
  }

  async deleteByPattern(pattern: string): Promise<number> {
    const regex = globToRegExp(pattern);
    let deleted = 0;
    for (const key of [...this.cache.keys()]) {
      if (regex.test(key) && this.remove(key)) {
        deleted++;
      }
    }
    return deleted;
  }

  async getStats(): Promise<CacheStats> {
    for (const key of [...this.cache.keys()]) {
      this.liveEntry(key);
    }
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.bytes,
      entries: this.cache.size,
    };
  }

  get size(): number {
    return this.cache.size;
  }

  // Entry if present and unexpired; expired entries are dropped on the way
  private liveEntry(key: string): CacheEntry | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt > 0 && entry.expiresAt <= Date.now()) {
      this.remove(key);
      return undefined;
    }
    return entry;
  }

  private remove(key: string): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;
    this.bytes -= entry.bytes;
    this.cache.delete(key);
    return true;
  }

  // Map iterates in insertion order, so the first key is the oldest
  private evictOldest(): void {
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.remove(oldest.value);
    }
  }
}
