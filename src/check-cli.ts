#!/usr/bin/env node
/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2026 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import { loadConfig } from "./utils/config.js";
import { createClient } from "./create-client.js";
import { RateLimitMiddleware } from "./middleware/rate-limit.js";
import { CanvasSdkError } from "./utils/errors.js";

// ANSI color helpers
const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;

const SelfSchema = z.object({
  id: z.number(),
  name: z.string(),
  login_id: z.string().optional(),
});

async function main(): Promise<void> {
  console.log("");
  console.log(bold("=== Canvas connection check ==="));
  console.log("");

  const config = loadConfig();
  console.log(`  Instance:  ${config.baseUrl}`);
  console.log(`  Auth mode: ${config.authMode}`);
  console.log("");

  const client = await createClient(config);
  const self = await client.json("GET", "/users/self", { cache: false }, SelfSchema);
  console.log(green(`  Authenticated as ${self.name} (id ${self.id})`));

  const rateLimit = client.getMiddleware().get("rate-limit");
  if (rateLimit instanceof RateLimitMiddleware) {
    const key = rateLimit.makeBucketKey(
      { method: "GET", url: client.resolveUrl("/users/self"), headers: {} },
      {},
    );
    const state = rateLimit.getBucketState(key);
    console.log(dim(`  Rate limit: ${Math.floor(state.remaining)} of ${rateLimit.getConfig("bucketSize")} remaining`));
  }
  console.log("");
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(red(`  Error: ${message}`));
  if (error instanceof CanvasSdkError && error.cause) {
    console.error(dim(`  Caused by: ${error.cause.message}`));
  }
  process.exit(1);
});
