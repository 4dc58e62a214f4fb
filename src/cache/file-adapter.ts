/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { log } from "../utils/logger.js";
import { globToRegExp, type CacheAdapter, type CacheRecord, type CacheStats } from "./adapter.js";

const ENTRY_SUFFIX = ".cache.json";

const CacheFileSchema = z.object({
  key: z.string(),
  expiresAt: z.number(), // Unix ms, 0 = never
  data: z.record(z.string(), z.unknown()),
});

type CacheFile = z.infer<typeof CacheFileSchema>;

/**
 * Cache adapter that keeps one JSON file per key in a directory.
 * Survives process restarts; pattern deletes scan the directory.
 */
export class FileSystemAdapter implements CacheAdapter {
  private hits = 0;
  private misses = 0;

  constructor(private readonly directory: string) {}

  async get(key: string): Promise<CacheRecord | null> {
    const entry = await this.readEntry(this.fileFor(key));
    if (!entry || entry.key !== key) {
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.data;
  }

  async set(key: string, data: CacheRecord, ttlSeconds: number = 0): Promise<void> {
    const isWindows = process.platform === "win32";
    await fs.mkdir(this.directory, {
      recursive: true,
      ...(isWindows ? {} : { mode: 0o700 }),
    });

    const entry: CacheFile = {
      key,
      expiresAt: ttlSeconds > 0 ? Date.now() + ttlSeconds * 1000 : 0,
      data,
    };

    // Write then rename so readers never see a half-written file
    const target = this.fileFor(key);
    // Unique per write: concurrent sets of one key must not share a temp file
    const temp = `${target}.${crypto.randomUUID()}.tmp`;
    try {
      await fs.writeFile(temp, JSON.stringify(entry), {
        encoding: "utf-8",
        ...(isWindows ? {} : { mode: 0o600 }),
      });
      await fs.rename(temp, target);
    } catch (error) {
      await this.unlink(temp);
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    return this.unlink(this.fileFor(key));
  }

  async clear(): Promise<void> {
    for (const file of await this.entryFiles()) {
      await this.unlink(file);
    }
    this.hits = 0;
    this.misses = 0;
  }

  async has(key: string): Promise<boolean> {
    const entry = await this.readEntry(this.fileFor(key));
    return entry !== null && entry.key === key;
  }

  async deleteByPattern(pattern: string): Promise<number> {
    const regex = globToRegExp(pattern);
    let deleted = 0;
    for (const file of await this.entryFiles()) {
      const entry = await this.readEntry(file);
      if (entry && regex.test(entry.key) && (await this.unlink(file))) {
        deleted++;
      }
    }
    return deleted;
  }

  async getStats(): Promise<CacheStats> {
    let size = 0;
    let entries = 0;
    for (const file of await this.entryFiles()) {
      const entry = await this.readEntry(file);
      if (!entry) continue;
      entries++;
      size += Buffer.byteLength(JSON.stringify(entry.data));
    }
    return { hits: this.hits, misses: this.misses, size, entries };
  }

  private fileFor(key: string): string {
    const digest = crypto.createHash("sha256").update(key).digest("hex");
    return path.join(this.directory, `${digest}${ENTRY_SUFFIX}`);
  }

  private async entryFiles(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return names.filter((name) => name.endsWith(ENTRY_SUFFIX)).map((name) => path.join(this.directory, name));
  }

  /**
   * Parsed, unexpired entry or null. Expired and unreadable files are removed.
   */
  private async readEntry(file: string): Promise<CacheFile | null> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      log("WARN", `Discarding unreadable cache file ${file}`);
      await this.unlink(file);
      return null;
    }

    const result = CacheFileSchema.safeParse(parsed);
    if (!result.success) {
      log("WARN", `Discarding malformed cache file ${file}`);
      await this.unlink(file);
      return null;
    }

    const entry = result.data;
    if (entry.expiresAt > 0 && entry.expiresAt <= Date.now()) {
      await this.unlink(file);
      return null;
    }
    return entry;
  }

  private async unlink(file: string): Promise<boolean> {
    try {
      await fs.unlink(file);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
