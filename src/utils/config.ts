/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as path from "node:path";
import * as os from "node:os";
import dotenv from "dotenv";
import { z } from "zod";
import type { AppConfig } from "../types/index.js";
import { ConfigurationError } from "./errors.js";

type Environment = Record<string, string | undefined>;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z
  .object({
    CANVAS_BASE_URL: z
      .string()
      .trim()
      .min(1, "is required")
      .refine((value) => URL.canParse(value), "must be a valid URL")
      .refine((value) => value.startsWith("https://"), "must use HTTPS"),
    CANVAS_API_VERSION: z.string().regex(/^v\d+$/, "must look like v1").default("v1"),
    CANVAS_AUTH_MODE: z.enum(["token", "oauth"]).default("token"),
    CANVAS_API_KEY: optionalString,
    CANVAS_OAUTH_CLIENT_ID: optionalString,
    CANVAS_OAUTH_CLIENT_SECRET: optionalString,
    CANVAS_OAUTH_TOKEN: optionalString,
    CANVAS_OAUTH_REFRESH_TOKEN: optionalString,
    CANVAS_OAUTH_EXPIRES_AT: z.coerce.number().int().positive().optional(), // Unix seconds
    CANVAS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    CANVAS_CACHE_ENABLED: z.stringbool().default(false),
    CANVAS_CACHE_DIR: optionalString,
    CANVAS_SESSION_DIR: optionalString,
    CANVAS_LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR"]).default("INFO"),
  })
  .superRefine((env, ctx) => {
    if (env.CANVAS_AUTH_MODE === "token" && !env.CANVAS_API_KEY) {
      ctx.addIssue({
        code: "custom",
        path: ["CANVAS_API_KEY"],
        message: "is required when CANVAS_AUTH_MODE is token",
      });
    }
    if (env.CANVAS_AUTH_MODE === "oauth") {
      if (!env.CANVAS_OAUTH_TOKEN && !env.CANVAS_OAUTH_REFRESH_TOKEN) {
        ctx.addIssue({
          code: "custom",
          path: ["CANVAS_OAUTH_TOKEN"],
          message: "an access or refresh token is required when CANVAS_AUTH_MODE is oauth",
        });
      }
      if (env.CANVAS_OAUTH_REFRESH_TOKEN && (!env.CANVAS_OAUTH_CLIENT_ID || !env.CANVAS_OAUTH_CLIENT_SECRET)) {
        ctx.addIssue({
          code: "custom",
          path: ["CANVAS_OAUTH_CLIENT_ID"],
          message: "client id and secret are required to refresh OAuth tokens",
        });
      }
    }
  });

/**
 * Load configuration from the environment. Without an explicit environment,
 * a `.env` file in the working directory is read into process.env first.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env?: Environment): AppConfig {
  const source = env ?? loadDotenv();
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`invalid environment (${issues.join("; ")})`, issues);
  }

  const parsed = result.data;
  return {
    baseUrl: parsed.CANVAS_BASE_URL.replace(/\/+$/, ""),
    apiVersion: parsed.CANVAS_API_VERSION,
    authMode: parsed.CANVAS_AUTH_MODE,
    apiKey: parsed.CANVAS_API_KEY,
    oauth: {
      clientId: parsed.CANVAS_OAUTH_CLIENT_ID,
      clientSecret: parsed.CANVAS_OAUTH_CLIENT_SECRET,
      accessToken: parsed.CANVAS_OAUTH_TOKEN,
      refreshToken: parsed.CANVAS_OAUTH_REFRESH_TOKEN,
      expiresAt:
        parsed.CANVAS_OAUTH_EXPIRES_AT !== undefined ? parsed.CANVAS_OAUTH_EXPIRES_AT * 1000 : undefined,
    },
    timeoutMs: parsed.CANVAS_TIMEOUT_MS,
    cacheEnabled: parsed.CANVAS_CACHE_ENABLED,
    cacheDir: parsed.CANVAS_CACHE_DIR ? expandTilde(parsed.CANVAS_CACHE_DIR) : undefined,
    sessionDir: parsed.CANVAS_SESSION_DIR ? expandTilde(parsed.CANVAS_SESSION_DIR) : undefined,
    logLevel: parsed.CANVAS_LOG_LEVEL,
  };
}

function loadDotenv(): Environment {
  dotenv.config({ quiet: true });
  return process.env;
}

export function expandTilde(filePath: string): string {
  if (filePath.startsWith("~")) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

export type { AppConfig };
