import type { Handler, HandlerWrapper, HttpRequest, HttpResponse, RequestOptions } from "../api/types.js";
import { NetworkError } from "../api/errors.js";
import { isCanvasRateLimit, responseFromError } from "../api/message.js";
import { log } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import { AbstractMiddleware, type ConfigOptions } from "./middleware.js";

export interface RetryConfig {
  maxAttempts: number;
  delay: number; // initial delay, ms
  multiplier: number;
  maxDelay: number; // ms
  jitter: boolean;
  retryOnStatus: number[];
  retryOnTimeout: boolean;
}

// 403 is listed because Canvas throttles with 403; see isCanvasRateLimit
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delay: 1000,
  multiplier: 2,
  maxDelay: 16_000,
  jitter: true,
  retryOnStatus: [500, 502, 503, 504, 403],
  retryOnTimeout: true,
};

export type BackoffSettings = Pick<RetryConfig, "delay" | "multiplier" | "maxDelay" | "jitter">;

/**
 * Exponential backoff for the given retry attempt (1-based):
 * min(delay * multiplier^(attempt-1), maxDelay), plus 0-25% jitter.
 */
export function calculateBackoffDelay(
  attempt: number,
  settings: BackoffSettings,
  random: () => number = Math.random,
): number {
  const exponential = settings.delay * Math.pow(settings.multiplier, attempt - 1);
  let delay = Math.min(exponential, settings.maxDelay);

  if (settings.jitter) {
    const jitterPercent = Math.floor(random() * 26);
    delay += delay * (jitterPercent / 100);
  }

  return Math.trunc(delay);
}

/**
 * Retries transient failures with exponential backoff.
 *
 * Retryable: statuses in retryOnStatus (403 only when it is a Canvas
 * rate-limit response), and connection/timeout errors when retryOnTimeout is
 * set. Rejections carrying a response are judged by their status.
 */
export class RetryMiddleware extends AbstractMiddleware<RetryConfig> {
  constructor(config: ConfigOptions<RetryConfig> = {}) {
    super(DEFAULT_RETRY_CONFIG, config);
  }

  getName(): string {
    return "retry";
  }

  handler(): HandlerWrapper {
    return (next: Handler): Handler => {
      const attempt = async (request: HttpRequest, options: RequestOptions): Promise<HttpResponse> => {
        const current = options.retryAttempt ?? 0;
        const attemptOptions: RequestOptions = { ...options, retryAttempt: current };

        let response: HttpResponse;
        try {
          response = await next(request, attemptOptions);
        } catch (error) {
          if (this.shouldRetry(current, undefined, error)) {
            return this.retry(attempt, request, attemptOptions);
          }
          throw error;
        }

        if (this.shouldRetry(current, response, undefined)) {
          return this.retry(attempt, request, attemptOptions);
        }
        return response;
      };
      return attempt;
    };
  }

  /**
   * Decide whether a finished attempt should be retried.
   */
  shouldRetry(attempt: number, response: HttpResponse | undefined, reason: unknown): boolean {
    if (attempt >= this.config.maxAttempts) {
      return false;
    }

    if (response !== undefined) {
      if (!this.config.retryOnStatus.includes(response.status)) {
        return false;
      }
      // A 403 without rate-limit markers is a genuine authorization failure
      return response.status !== 403 || isCanvasRateLimit(response);
    }

    const carried = responseFromError(reason);
    if (carried !== undefined) {
      return this.shouldRetry(attempt, carried, undefined);
    }

    return reason instanceof NetworkError && this.config.retryOnTimeout;
  }

  calculateDelay(attempt: number): number {
    return calculateBackoffDelay(attempt, this.config);
  }

  private async retry(
    attempt: Handler,
    request: HttpRequest,
    options: RequestOptions,
  ): Promise<HttpResponse> {
    const nextAttempt = (options.retryAttempt ?? 0) + 1;
    const delay = this.calculateDelay(nextAttempt);

    log(
      "DEBUG",
      `Retrying ${request.method} ${request.url} (attempt ${nextAttempt}/${this.config.maxAttempts}) in ${delay}ms`,
    );
    await sleep(delay);

    return attempt(request, { ...options, retryAttempt: nextAttempt });
  }
}
