/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { LogLevel } from "../types/index.js";

let currentLevel: LogLevel = "INFO";

export const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Redact sensitive patterns from log output.
 * Tokens are replaced with first 8 chars + "...REDACTED".
 */
export function redact(value: string): string {
  // Redact Bearer tokens
  value = value.replace(
    /Bearer\s+([A-Za-z0-9._~+/=-]{8})[A-Za-z0-9._~+/=-]*/g,
    "Bearer $1...REDACTED"
  );
  // Canvas access tokens look like "1234~AbCd..."
  value = value.replace(
    /\b(\d{1,6}~[A-Za-z0-9]{4})[A-Za-z0-9]*/g,
    "$1...REDACTED"
  );
  // Redact anything that looks like a long token (40+ chars of base64-like)
  value = value.replace(
    /([A-Za-z0-9._~+/=-]{40,})/g,
    (match) => match.substring(0, 8) + "...REDACTED"
  );
  return value;
}

export function log(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const timestamp = new Date().toISOString();
  const safeMessage = redact(message);
  console.error(`[${timestamp}] [${level}] ${safeMessage}`, ...args);
}

/**
 * Structured logger accepted by the middleware.
 * Anything with this shape can be plugged in (pino/winston adapters, test spies).
 */
export interface Logger {
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
}

export const defaultLogger: Logger = {
  log(level, message, context) {
    if (context === undefined) {
      log(level, message);
      return;
    }
    log(level, message, context);
  },
};
