import { randomUUID } from "node:crypto";
import type { Handler, HandlerWrapper, HttpRequest, HttpResponse, RequestOptions } from "../api/types.js";
import {
  RATE_LIMIT_REMAINING_HEADER,
  REQUEST_COST_HEADER,
  getHeader,
  responseFromError,
} from "../api/message.js";
import type { LogLevel } from "../types/index.js";
import { defaultLogger, type Logger } from "../utils/logger.js";
import { AbstractMiddleware, type ConfigOptions } from "./middleware.js";

export interface LoggingConfig {
  enabled: boolean;
  logRequests: boolean;
  logResponses: boolean;
  logErrors: boolean;
  logTiming: boolean;
  logLevel: LogLevel;
  errorLogLevel: LogLevel;
  sanitizeFields: string[];
  maxBodyLength: number;
}

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  enabled: true,
  logRequests: true,
  logResponses: true,
  logErrors: true,
  logTiming: true,
  logLevel: "INFO",
  errorLogLevel: "ERROR",
  sanitizeFields: ["password", "token", "api_key", "secret", "authorization"],
  maxBodyLength: 1000,
};

export const REDACTED = "***REDACTED***";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function formatElapsed(startedAt: number): string {
  const ms = performance.now() - startedAt;
  return `${Math.round(ms * 100) / 100}ms`;
}

/**
 * Logs every request, response and failure with a per-request correlation id.
 * Sensitive headers and body fields are redacted before anything is written.
 */
export class LoggingMiddleware extends AbstractMiddleware<LoggingConfig> {
  constructor(
    private readonly logger: Logger = defaultLogger,
    config: ConfigOptions<LoggingConfig> = {},
  ) {
    super(DEFAULT_LOGGING_CONFIG, config);
  }

  getName(): string {
    return "logging";
  }

  handler(): HandlerWrapper {
    return (next: Handler): Handler => async (request: HttpRequest, options: RequestOptions) => {
      if (!this.config.enabled) {
        return next(request, options);
      }

      const startedAt = performance.now();
      const requestId = `req_${randomUUID()}`;

      if (this.config.logRequests) {
        this.logRequest(request, requestId, options);
      }

      let response: HttpResponse;
      try {
        response = await next(request, options);
      } catch (error) {
        if (this.config.logErrors) {
          this.logError(error, request, requestId, startedAt);
        }
        throw error;
      }

      if (this.config.logResponses) {
        this.logResponse(response, requestId, startedAt);
      }
      return response;
    };
  }

  private logRequest(request: HttpRequest, requestId: string, options: RequestOptions): void {
    const context: Record<string, unknown> = {
      requestId,
      method: request.method,
      uri: request.url,
      headers: this.sanitizeHeaders(request.headers),
    };

    if (request.body) {
      context.body = this.truncate(this.sanitizeBody(request.body));
      if (request.body.length > this.config.maxBodyLength) {
        context.bodyLength = request.body.length;
      }
    }

    if (options.rateLimitBucket !== undefined) {
      context.rateLimitBucket = options.rateLimitBucket;
    }
    if (options.retryAttempt !== undefined && options.retryAttempt > 0) {
      context.retryAttempt = options.retryAttempt;
    }

    this.logger.log(this.config.logLevel, `HTTP Request: ${request.method} ${request.url}`, context);
  }

  private logResponse(response: HttpResponse, requestId: string, startedAt: number): void {
    const context: Record<string, unknown> = {
      requestId,
      statusCode: response.status,
      reasonPhrase: response.statusText,
      headers: this.sanitizeHeaders(response.headers),
    };

    if (this.config.logTiming) {
      context.elapsedTime = formatElapsed(startedAt);
    }

    const remaining = getHeader(response.headers, RATE_LIMIT_REMAINING_HEADER);
    if (remaining !== undefined) {
      context.rateLimitRemaining = remaining;
    }
    const cost = getHeader(response.headers, REQUEST_COST_HEADER);
    if (cost !== undefined) {
      context.requestCost = cost;
    }

    const failed = response.status >= 400;
    if (failed && response.body) {
      context.body = this.truncate(this.sanitizeBody(response.body));
    }

    this.logger.log(
      failed ? this.config.errorLogLevel : this.config.logLevel,
      `HTTP Response: ${response.status} ${response.statusText}`.trimEnd(),
      context,
    );
  }

  private logError(reason: unknown, request: HttpRequest, requestId: string, startedAt: number): void {
    const errorType = reason instanceof Error ? reason.name : typeof reason;
    const errorMessage = reason instanceof Error ? reason.message : String(reason);

    const context: Record<string, unknown> = {
      requestId,
      method: request.method,
      uri: request.url,
      errorType,
      errorMessage,
    };

    if (this.config.logTiming) {
      context.elapsedTime = formatElapsed(startedAt);
    }

    const response = responseFromError(reason);
    if (response !== undefined) {
      context.statusCode = response.status;
      context.headers = this.sanitizeHeaders(response.headers);
      if (response.body) {
        context.responseBody = this.truncate(this.sanitizeBody(response.body));
      }
    }

    this.logger.log(this.config.errorLogLevel, `HTTP Error: ${errorType} - ${errorMessage}`, context);
  }

  private isSensitive(name: string): boolean {
    const lower = name.toLowerCase();
    return this.config.sanitizeFields.some((field) => lower.includes(field.toLowerCase()));
  }

  sanitizeHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
    const sanitized: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
      sanitized[name] = this.isSensitive(name) ? REDACTED : value;
    }
    return sanitized;
  }

  /**
   * JSON bodies are redacted field by field; anything else gets a
   * best-effort `field=value` / `field: value` replacement.
   */
  sanitizeBody(body: string): string {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      parsed = undefined;
    }

    if (parsed !== null && typeof parsed === "object") {
      return JSON.stringify(this.sanitizeValue(parsed));
    }

    let sanitized = body;
    for (const field of this.config.sanitizeFields) {
      const pattern = new RegExp(`(${escapeRegExp(field)}\\s*[=:]\\s*)([^\\s&,}"']+)`, "gi");
      sanitized = sanitized.replace(pattern, `$1${REDACTED}`);
    }
    return sanitized;
  }

  private sanitizeValue(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.sanitizeValue(item));
    }
    if (value !== null && typeof value === "object") {
      const sanitized: Record<string, unknown> = {};
      for (const [key, nested] of Object.entries(value)) {
        sanitized[key] = this.isSensitive(key) ? REDACTED : this.sanitizeValue(nested);
      }
      return sanitized;
    }
    return value;
  }

  private truncate(body: string): string {
    const { maxBodyLength } = this.config;
    return body.length > maxBodyLength ? `${body.slice(0, maxBodyLength)}... (truncated)` : body;
  }
}
