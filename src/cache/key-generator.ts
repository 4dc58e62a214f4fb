import { createHash } from "node:crypto";
import { getHeader } from "../api/message.js";
import type { HttpRequest, RequestOptions } from "../api/types.js";

const KEY_VERSION = "v1";
const HASH_LENGTH = 16;

function shortHash(value: string): string {
  return createHash("md5").update(value).digest("hex").slice(0, HASH_LENGTH);
}

// Recursively sort object keys so equal inputs always serialize the same way
function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonical(v)]),
    );
  }
  return value;
}

/**
 * Builds cache keys of the form
 * `prefix:v1:METHOD:/path?sorted=query[:authHash][:optionsHash]`.
 *
 * The Authorization header is hashed into the key so two users never share
 * a cached response.
 */
export class CacheKeyGenerator {
  constructor(private readonly prefix: string = "canvas") {}

  generate(request: HttpRequest, options: RequestOptions = {}): string {
    const parts = [
      this.prefix,
      KEY_VERSION,
      request.method,
      this.normalizeUrl(request.url),
      this.authHash(request),
      this.optionsHash(options),
    ];
    return parts.filter((part) => part !== "").join(":");
  }

  normalizeUrl(url: string): string {
    const parsed = new URL(url, "http://localhost");
    const params = new URLSearchParams(parsed.search);
    params.sort();
    const query = params.toString();
    return query ? `${parsed.pathname}?${query}` : parsed.pathname;
  }

  private authHash(request: HttpRequest): string {
    const authorization = getHeader(request.headers, "Authorization");
    return authorization ? shortHash(authorization) : "";
  }

  // Only options that can change the response body take part
  private optionsHash(options: RequestOptions): string {
    const affecting: Record<string, unknown> = {};

    for (const [name, value] of Object.entries(options.headers ?? {})) {
      if (name.toLowerCase() !== "authorization") {
        affecting[`h_${name}`] = value;
      }
    }
    if (options.query !== undefined) {
      affecting.query = options.query;
    }

    if (Object.keys(affecting).length === 0) return "";
    return shortHash(JSON.stringify(canonical(affecting)));
  }
}
