/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { HandlerWrapper } from "../api/types.js";

/**
 * A named, configurable request/response interceptor.
 */
export interface Middleware {
  /** Stable identifier used for lookup and diagnostics. Never empty. */
  getName(): string;

  /** Merge options over the current configuration. Later calls win per key. */
  configure(options: Record<string, unknown>): void;

  /** Produce the handler-wrapping function installed into the chain. */
  handler(): HandlerWrapper;
}

// Unknown keys are accepted and kept, so newer options never break older middleware
export type ConfigOptions<T extends object> = Partial<T> & Record<string, unknown>;

export abstract class AbstractMiddleware<TConfig extends object> implements Middleware {
  protected config: TConfig;

  constructor(
    private readonly defaults: TConfig,
    config: ConfigOptions<TConfig> = {},
  ) {
    this.config = { ...defaults, ...definedEntries(config) };
  }

  abstract getName(): string;

  abstract handler(): HandlerWrapper;

  /** Defaults for every option, independent of instance configuration. */
  getDefaultConfig(): TConfig {
    return { ...this.defaults };
  }

  configure(options: ConfigOptions<TConfig>): void {
    this.config = { ...this.getDefaultConfig(), ...this.config, ...definedEntries(options) };
  }

  getConfig<K extends keyof TConfig>(key: K): TConfig[K] {
    return this.config[key];
  }

  /** Read any merged option by name, including keys this middleware does not know. */
  getOption(name: string): unknown {
    return Reflect.get(this.config, name);
  }
}

// `undefined` means "not supplied", so it never clobbers a default
function definedEntries<T extends object>(options: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in options) {
    if (options[key] !== undefined) result[key] = options[key];
  }
  return result;
}
