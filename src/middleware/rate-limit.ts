import { createHash } from "node:crypto";
import type { Handler, HandlerWrapper, HttpRequest, HttpResponse, RequestOptions } from "../api/types.js";
import { RateLimitError, RateLimitWaitExceededError } from "../api/errors.js";
import {
  RATE_LIMIT_REMAINING_HEADER,
  REQUEST_COST_HEADER,
  getNumericHeader,
  hostOf,
  isCanvasRateLimitError,
  responseFromError,
} from "../api/message.js";
import type { CredentialSource } from "../auth/credentials.js";
import { log } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import { AbstractMiddleware, type ConfigOptions } from "./middleware.js";
import {
  LeakyBucket,
  sharedBucketStore,
  type BucketState,
  type BucketStore,
} from "./bucket-store.js";

export interface RateLimitConfig {
  enabled: boolean;
  bucketSize: number; // Canvas default bucket size
  leakRate: number; // units refilled per second
  initialCost: number; // Canvas charges this upfront per request
  minRemaining: number; // start throttling when this many units remain
  waitOnLimit: boolean; // wait for refill instead of failing
  maxWaitTime: number; // seconds
  baseUrl?: string; // host fallback for requests without one
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  enabled: true,
  bucketSize: 3000,
  leakRate: 50,
  initialCost: 50,
  minRemaining: 100,
  waitOnLimit: true,
  maxWaitTime: 60,
};

export interface RateLimitDependencies {
  credentials?: CredentialSource;
  store?: BucketStore;
}

const FINGERPRINT_LENGTH = 8;

/**
 * Client-side leaky bucket that tracks Canvas's quota per host + credential.
 *
 * Each request pre-charges initialCost, waits when the bucket is too low,
 * then trusts the server's X-Rate-Limit-Remaining and reconciles
 * X-Request-Cost once the response arrives. Buckets live in a store shared by
 * every instance in the process unless another store is injected.
 */
export class RateLimitMiddleware extends AbstractMiddleware<RateLimitConfig> {
  private readonly store: BucketStore;
  private readonly credentials?: CredentialSource;

  constructor(config: ConfigOptions<RateLimitConfig> = {}, deps: RateLimitDependencies = {}) {
    super(DEFAULT_RATE_LIMIT_CONFIG, config);
    this.store = deps.store ?? sharedBucketStore;
    this.credentials = deps.credentials;
  }

  getName(): string {
    return "rate-limit";
  }

  handler(): HandlerWrapper {
    return (next: Handler): Handler => async (request: HttpRequest, options: RequestOptions) => {
      if (!this.config.enabled) {
        return next(request, options);
      }

      const bucketKey = this.makeBucketKey(request, options);
      const bucket = this.bucket(bucketKey);
      const { initialCost, minRemaining } = this.config;

      const delay = bucket.secondsUntil(minRemaining + initialCost);
      if (delay > 0) {
        if (!this.config.waitOnLimit) {
          throw new RateLimitError(request.url, delay);
        }
        if (delay > this.config.maxWaitTime) {
          throw new RateLimitWaitExceededError(request.url, delay, this.config.maxWaitTime);
        }
        log("INFO", `Rate limit bucket ${bucketKey} is low, waiting ${delay}s`);
        await sleep(delay * 1000);
      }

      // Reserve budget before dispatch so concurrent requests see it spent
      bucket.consume(initialCost);

      let response: HttpResponse;
      try {
        response = await next(request, options);
      } catch (error) {
        // Canvas already reported the quota as exhausted; take its numbers, no refund
        const limited = responseFromError(error);
        if (limited !== undefined && isCanvasRateLimitError(error)) {
          this.updateFromResponse(bucket, limited);
        } else {
          bucket.refund(initialCost);
        }
        throw error;
      }

      this.updateFromResponse(bucket, response);
      return response;
    };
  }

  /**
   * Bucket key: explicit override, else `{host}_{sha1(credential)[0..8]}`,
   * else the bare host, else "default". The raw credential never leaves here.
   */
  makeBucketKey(request: HttpRequest, options: RequestOptions): string {
    if (typeof options.rateLimitBucket === "string" && options.rateLimitBucket.length > 0) {
      return options.rateLimitBucket;
    }

    const host = hostOf(request.url) || (this.config.baseUrl ? hostOf(this.config.baseUrl) : "");
    if (host === "") {
      return "default";
    }

    const credential = this.credentials?.getCredential();
    if (!credential) {
      return host;
    }

    const fingerprint = createHash("sha1").update(credential).digest("hex").slice(0, FINGERPRINT_LENGTH);
    return `${host}_${fingerprint}`;
  }

  getBucketState(bucketKey: string): BucketState {
    return this.bucket(bucketKey).read();
  }

  private bucket(bucketKey: string): LeakyBucket {
    return new LeakyBucket(this.store, bucketKey, {
      bucketSize: this.config.bucketSize,
      leakRate: this.config.leakRate,
    });
  }

  private updateFromResponse(bucket: LeakyBucket, response: HttpResponse): void {
    const remaining = getNumericHeader(response.headers, RATE_LIMIT_REMAINING_HEADER);
    if (remaining !== undefined) {
      bucket.overwrite(remaining);
    }

    const actualCost = getNumericHeader(response.headers, REQUEST_COST_HEADER);
    if (actualCost === undefined) return;

    const { initialCost } = this.config;
    if (actualCost < initialCost) {
      bucket.refund(initialCost - actualCost);
    } else if (actualCost > initialCost) {
      bucket.consume(actualCost - initialCost);
    }
  }

  /**
   * Drop one bucket, or all of them. Administrative use only.
   */
  static resetBuckets(bucketKey?: string, store: BucketStore = sharedBucketStore): void {
    if (bucketKey === undefined) {
      store.clear();
    } else {
      store.delete(bucketKey);
    }
  }
}
