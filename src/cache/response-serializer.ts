import { z } from "zod";
import type { HttpResponse } from "../api/types.js";
import type { CacheRecord } from "./adapter.js";

const DEFAULT_MAX_BODY_SIZE = 1_048_576; // 1 MiB

const CachedResponseSchema = z.object({
  cacheable: z.literal(true),
  status: z.number().int().min(100).max(599),
  statusText: z.string().default(""),
  headers: z.record(z.string(), z.string()).default({}),
  body: z.string().default(""),
});

/**
 * Converts responses to plain records for cache storage and back.
 */
export class ResponseSerializer {
  constructor(private readonly maxBodySize: number = DEFAULT_MAX_BODY_SIZE) {}

  serialize(response: HttpResponse): CacheRecord {
    if (Buffer.byteLength(response.body) > this.maxBodySize) {
      return { cacheable: false, reason: "Response too large" };
    }
    return {
      cacheable: true,
      status: response.status,
      statusText: response.statusText,
      headers: { ...response.headers },
      body: response.body,
    };
  }

  /** Rebuilt response, or null when the record is not a usable cached response. */
  deserialize(data: unknown): HttpResponse | null {
    const result = CachedResponseSchema.safeParse(data);
    if (!result.success) return null;
    const { status, statusText, headers, body } = result.data;
    return { status, statusText, headers, body };
  }
}
