import type { z } from "zod";
import type {
  CanvasHttpClientOptions,
  ClientRequestOptions,
  Handler,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  RequestOptions,
} from "./types.js";
import type { CredentialSource } from "../auth/credentials.js";
import type { Middleware } from "../middleware/middleware.js";
import { composeMiddleware } from "../middleware/compose.js";
import { buildMiddlewareStack } from "../middleware/stack.js";
import { createFetchTransport, appendQuery } from "./transport.js";
import { ApiError } from "./errors.js";
import { pathOf } from "./message.js";
import { ConfigurationError } from "../utils/errors.js";
import { defaultLogger, log, type Logger } from "../utils/logger.js";

const DEFAULT_API_VERSION = "v1";

/**
 * Canvas HTTP client: resolves API paths, attaches the bearer credential and
 * sends every request through an ordered middleware chain.
 *
 * Middleware are keyed by name. When none are passed the client installs
 * retry and rate limiting (plus OAuth refresh for an OAuth credential source,
 * and logging when a logger is given). A custom transport gets no defaults.
 */
export class CanvasHttpClient {
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly credentials?: CredentialSource;
  private readonly logger?: Logger;
  private readonly transport: Handler;
  private readonly middleware = new Map<string, Middleware>();
  private chain: Handler | null = null;

  constructor(options: CanvasHttpClientOptions) {
    // HTTPS-only enforcement
    if (!options.baseUrl.startsWith("https://")) {
      throw new ConfigurationError("Canvas base URL must use HTTPS", ["baseUrl"]);
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.credentials = options.credentials;
    this.logger = options.logger;
    this.transport =
      options.transport ?? createFetchTransport({ timeoutMs: options.timeoutMs });

    const initial =
      options.middleware ??
      (options.transport
        ? []
        : buildMiddlewareStack({
            credentials: options.credentials,
            logger: options.logger,
          }));
    for (const middleware of initial) {
      this.middleware.set(middleware.getName(), middleware);
    }

    log("DEBUG", `CanvasHttpClient initialized for ${this.baseUrl} (${this.middleware.size} middleware)`);
  }

  // Same name replaces the existing middleware in place
  addMiddleware(middleware: Middleware): void {
    this.middleware.set(middleware.getName(), middleware);
    this.chain = null;
  }

  removeMiddleware(name: string): boolean {
    const removed = this.middleware.delete(name);
    if (removed) this.chain = null;
    return removed;
  }

  getMiddleware(): Map<string, Middleware> {
    return new Map(this.middleware);
  }

  getLogger(): Logger {
    return this.logger ?? defaultLogger;
  }

  get(path: string, options?: ClientRequestOptions): Promise<HttpResponse> {
    return this.request("GET", path, options);
  }

  post(path: string, options?: ClientRequestOptions): Promise<HttpResponse> {
    return this.request("POST", path, options);
  }

  put(path: string, options?: ClientRequestOptions): Promise<HttpResponse> {
    return this.request("PUT", path, options);
  }

  patch(path: string, options?: ClientRequestOptions): Promise<HttpResponse> {
    return this.request("PATCH", path, options);
  }

  delete(path: string, options?: ClientRequestOptions): Promise<HttpResponse> {
    return this.request("DELETE", path, options);
  }

  async request(
    method: HttpMethod,
    path: string,
    options: ClientRequestOptions = {},
  ): Promise<HttpResponse> {
    const { json, form, body, query, headers: extraHeaders, ...rest } = options;

    const headers: Record<string, string> = { Accept: "application/json" };
    const credential = this.credentials?.getCredential();
    if (credential) {
      headers.Authorization = `Bearer ${credential}`;
    }

    let payload: string | undefined;
    if (json !== undefined) {
      payload = JSON.stringify(json);
      headers["Content-Type"] = "application/json";
    } else if (form !== undefined) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(form)) params.append(key, String(value));
      payload = params.toString();
      headers["Content-Type"] = "application/x-www-form-urlencoded";
    } else {
      payload = body;
    }

    const request: HttpRequest = {
      method,
      url: appendQuery(this.resolveUrl(path), query),
      headers: { ...headers, ...extraHeaders },
      body: payload,
    };

    const requestOptions: RequestOptions = rest;
    return this.handler()(request, requestOptions);
  }

  /**
   * Send a request and parse the JSON body. With a schema the payload is
   * validated and typed; without one it comes back as `unknown`.
   */
  json(method: HttpMethod, path: string, options?: ClientRequestOptions): Promise<unknown>;
  json<T>(
    method: HttpMethod,
    path: string,
    options: ClientRequestOptions | undefined,
    schema: z.ZodType<T>,
  ): Promise<T>;
  async json<T>(
    method: HttpMethod,
    path: string,
    options?: ClientRequestOptions,
    schema?: z.ZodType<T>,
  ): Promise<unknown> {
    const response = await this.request(method, path, options);
    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new ApiError(response.status, pathOf(path), `Invalid JSON response: ${err.message}`, response, err);
    }
    return schema ? schema.parse(data) : data;
  }

  /**
   * Absolute URLs pass through, `/api/...` and `/login/...` paths are
   * host-relative, anything else is relative to `/api/{version}`.
   */
  resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    const normalized = path.startsWith("/") ? path : `/${path}`;
    if (normalized.startsWith("/api/") || normalized.startsWith("/login/")) {
      return `${this.baseUrl}${normalized}`;
    }
    return `${this.baseUrl}/api/${this.apiVersion}${normalized}`;
  }

  private handler(): Handler {
    if (!this.chain) {
      this.chain = composeMiddleware([...this.middleware.values()], this.transport);
    }
    return this.chain;
  }
}
