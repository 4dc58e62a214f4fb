/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import type { TokenData, EncryptedData, TokenFile } from "../types/index.js";
import { TokenStoreError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const DEFAULT_TOKEN_DIR = path.join(os.homedir(), ".canvas-lms");
const TOKEN_FILE_NAME = "oauth-token.json";
const TOKEN_FILE_VERSION = 1;

// Encryption constants
const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12; // GCM recommended IV length
const KEY_SALT = "canvas-lms-http-token-store";

const TokenFileSchema = z.object({
  version: z.literal(TOKEN_FILE_VERSION),
  encrypted: z.object({
    iv: z.string(),
    authTag: z.string(),
    data: z.string(),
  }),
  savedAt: z.number(),
});

const TokenDataSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().optional(),
  expiresAt: z.number().optional(),
  scope: z.string().optional(),
});

/**
 * Persists OAuth tokens to disk, encrypted with AES-256-GCM.
 * The key is derived from the OS user and hostname, so the file is useless
 * when copied to another machine or account.
 */
export class TokenStore {
  private readonly directory: string;
  private readonly filePath: string;

  constructor(directory?: string) {
    this.directory = directory ?? DEFAULT_TOKEN_DIR;
    this.filePath = path.join(this.directory, TOKEN_FILE_NAME);
  }

  private deriveKey(): Buffer {
    const keyMaterial = `${os.userInfo().username}@${os.hostname()}`;
    return crypto.scryptSync(keyMaterial, KEY_SALT, 32);
  }

  encrypt(plaintext: string): EncryptedData {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.deriveKey(), iv);
    const data = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);

    return {
      iv: iv.toString("hex"),
      authTag: cipher.getAuthTag().toString("hex"),
      data: data.toString("hex"),
    };
  }

  // Throws when the auth tag does not verify
  decrypt(encrypted: EncryptedData): string {
    const decipher = crypto.createDecipheriv(ALGORITHM, this.deriveKey(), Buffer.from(encrypted.iv, "hex"));
    decipher.setAuthTag(Buffer.from(encrypted.authTag, "hex"));
    return Buffer.concat([
      decipher.update(Buffer.from(encrypted.data, "hex")),
      decipher.final(),
    ]).toString("utf8");
  }

  async save(token: TokenData): Promise<void> {
    const isWindows = process.platform === "win32";
    try {
      await fs.mkdir(this.directory, {
        recursive: true,
        ...(isWindows ? {} : { mode: 0o700 }),
      });

      const file: TokenFile = {
        version: TOKEN_FILE_VERSION,
        encrypted: this.encrypt(JSON.stringify(token)),
        savedAt: Date.now(),
      };

      await fs.writeFile(this.filePath, JSON.stringify(file, null, 2), {
        encoding: "utf-8",
        ...(isWindows ? {} : { mode: 0o600 }),
      });
      log("DEBUG", `OAuth token saved to ${this.filePath}`);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new TokenStoreError(`failed to save ${this.filePath}`, err);
    }
  }

  /**
   * Stored token, or null when there is none or it cannot be read back
   * (corrupted, tampered with, or written on another machine).
   */
  async load(): Promise<TokenData | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch {
      log("DEBUG", "No stored OAuth token");
      return null;
    }

    try {
      const file = TokenFileSchema.parse(JSON.parse(raw));
      return TokenDataSchema.parse(JSON.parse(this.decrypt(file.encrypted)));
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log("WARN", `Ignoring unreadable OAuth token file: ${err.message}`);
      return null;
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
      log("DEBUG", `OAuth token cleared: ${this.filePath}`);
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        const err = error instanceof Error ? error : new Error(String(error));
        throw new TokenStoreError(`failed to clear ${this.filePath}`, err);
      }
    }
  }

  get path(): string {
    return this.filePath;
  }
}
