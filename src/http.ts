// ---------------------------------------------------------------------------
// GoCardless Client – HTTP Transport Layer
// ---------------------------------------------------------------------------
// A thin HTTP client built on the global `fetch()` API (Node 20+).
// Handles:
//   - Bearer token authentication and API version pinning
//   - Path templating (`/mandates/:identity`) and query serialization
//   - Automatic retries with exponential back-off + jitter
//   - Idempotency keys, and resolution of idempotent creation conflicts
//   - Structured error mapping via GoCardlessError
//   - Timeouts via AbortController
//
// Not exported from the package root; services are the public surface.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";

import {
  ApiConnectionError,
  GoCardlessError,
  IdempotentCreationConflictError,
  InvalidApiUsageError,
  parseErrorBody,
} from "./errors";
import type {
  Environment,
  GoCardlessConfig,
  Logger,
  RequestOptions,
} from "./types";

/** Client version – sent in the User-Agent header. */
export const SDK_VERSION = "0.1.0";

export const DEFAULT_API_VERSION = "2015-07-06";

export const BASE_URLS: Readonly<Record<Environment, string>> = {
  live: "https://api.gocardless.com",
  sandbox: "https://api-sandbox.gocardless.com",
};

export type HttpMethod = "GET" | "POST" | "PUT";

/** Options forwarded to an individual request. */
export interface HttpRequestOptions<T> {
  /** Values substituted for `:name` segments of the path template. */
  params?: Record<string, string>;
  /** Query parameters; nested objects become `key[sub]=value`. */
  query?: object;
  /** JSON body (for POST/PUT). */
  body?: unknown;
  /** Extra headers merged with defaults. */
  headers?: Record<string, string>;
  /** Override per-attempt timeout (ms). */
  timeout?: number;
  /**
   * Sent as `Idempotency-Key`. A POST is only retried when it carries
   * one, since otherwise a retry could create the resource twice.
   */
  idempotencyKey?: string;
  /** Loads the resource an earlier request with the same key created. */
  onIdempotencyConflict?: (conflictingId: string) => Promise<T>;
}

/** Rate limiting and every 5xx are worth another attempt. */
function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

const TRAILING_SLASH_REGEX = /\/+$/;

const PATH_PARAM_REGEX = /:([a-z_]+)/g;

const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Internal HTTP client shared by every service. Owns authentication,
 * retries and error parsing.
 */
export class HttpClient {
  private readonly accessToken: string;
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly raiseOnIdempotencyConflict: boolean;
  private readonly logger: Logger;

  constructor(config: GoCardlessConfig) {
    if (!config.accessToken || config.accessToken.trim().length === 0) {
      throw new InvalidApiUsageError(
        "An access token is required. " +
          "Pass it as `accessToken` in the client config.",
        401,
      );
    }

    this.accessToken = config.accessToken.trim();
    this.baseUrl = (
      config.baseUrl ?? BASE_URLS[config.environment ?? "live"]
    ).replace(TRAILING_SLASH_REGEX, "");
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this.timeout = config.timeout ?? 30_000;
    this.maxRetries = config.maxRetries ?? 3;
    this.raiseOnIdempotencyConflict =
      config.raiseOnIdempotencyConflict ?? false;
    this.logger = config.logger ?? noopLogger;
  }

  // ── Public request method ────────────────────────────────────────────────

  /**
   * Execute an HTTP request against the API.
   *
   * @param path - Path template, e.g. `/customers/:identity`.
   * @returns Parsed JSON response body of type `T`.
   * @throws  {GoCardlessError} on any non-2xx response or network failure.
   */
  async request<T>(
    method: HttpMethod,
    path: string,
    opts: HttpRequestOptions<T> = {},
  ): Promise<T> {
    try {
      return await this.send<T>(method, path, opts);
    } catch (error) {
      if (
        error instanceof IdempotentCreationConflictError &&
        opts.onIdempotencyConflict &&
        !this.raiseOnIdempotencyConflict
      ) {
        this.logger.info(
          "Idempotent creation conflict, fetching existing resource",
          {
            path,
            idempotencyKey: opts.idempotencyKey,
            conflictingResourceId: error.conflictingResourceId,
          },
        );
        return opts.onIdempotencyConflict(error.conflictingResourceId);
      }
      throw error;
    }
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  private async send<T>(
    method: HttpMethod,
    path: string,
    opts: HttpRequestOptions<T>,
  ): Promise<T> {
    const url = this.buildUrl(buildPath(path, opts.params ?? {}), opts.query);
    const requestTimeout = opts.timeout ?? this.timeout;
    const headers = this.buildHeaders(opts.headers, opts.idempotencyKey);
    const maxRetries =
      method !== "POST" || opts.idempotencyKey !== undefined
        ? this.maxRetries
        : 0;

    const baseInit: RequestInit = { method, headers };

    if (opts.body !== undefined && method !== "GET") {
      baseInit.body = JSON.stringify(opts.body);
    }

    let lastError: GoCardlessError | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), requestTimeout);

      let retryAfterMs = 0;

      this.logger.debug("Sending request", {
        method,
        url: url.toString(),
        attempt,
      });

      try {
        const response = await fetch(url.toString(), {
          ...baseInit,
          signal: controller.signal,
        });

        clearTimeout(timer);

        // ── 2xx success ──
        if (response.ok) {
          if (response.status === 204) return {} as T;
          const text = await response.text();
          if (text.length === 0) return {} as T;
          const payload = parseJson(text);
          if (payload === undefined) {
            throw new GoCardlessError(
              `Response body is not valid JSON (HTTP ${response.status})`,
              response.status,
              "unknown_error",
            );
          }
          return payload as T;
        }

        // ── Non-2xx: parse error envelope ──
        const errorBody = parseErrorBody(parseJson(await response.text()));

        lastError = GoCardlessError.generate(
          response.status,
          errorBody,
          response.statusText || undefined,
        );

        if (response.status === 429) {
          retryAfterMs = retryAfterFromHeaders(response.headers);
        }

        // Client errors (4xx) are deterministic, except rate limiting
        if (!isRetryableStatus(response.status)) {
          throw lastError;
        }
      } catch (error) {
        clearTimeout(timer);

        if (error instanceof GoCardlessError) {
          lastError = error;
          if (error.statusCode > 0 && !isRetryableStatus(error.statusCode)) {
            throw error;
          }
        } else if (error instanceof Error && error.name === "AbortError") {
          lastError = new ApiConnectionError(
            `Request timed out after ${requestTimeout}ms`,
          );
        } else {
          const reason = error instanceof Error ? error.message : String(error);
          lastError = new ApiConnectionError(`Network error: ${reason}`);
        }
      }

      // Prefer the server's Retry-After, else exponential back-off
      if (attempt < maxRetries) {
        const delay =
          retryAfterMs > 0
            ? retryAfterMs
            : 500 * Math.pow(2, attempt) + Math.random() * 200;

        this.logger.warn("Retrying request", {
          method,
          url: url.toString(),
          attempt: attempt + 1,
          statusCode: lastError?.statusCode,
          delayMs: Math.round(delay),
        });

        await this.sleep(delay);
      }
    }

    throw (
      lastError ??
      new GoCardlessError("Request failed after retries", 0, "unknown_error")
    );
  }

  /** Construct the full URL with serialized query parameters. */
  private buildUrl(path: string, query?: object): URL {
    const url = new URL(`${this.baseUrl}${path}`);

    if (query) {
      for (const [key, value] of serializeQuery(query)) {
        url.searchParams.append(key, value);
      }
    }

    return url;
  }

  /** Build default + custom headers for every request. */
  private buildHeaders(
    extra?: Record<string, string>,
    idempotencyKey?: string,
  ): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.accessToken}`,
      "GoCardless-Version": this.apiVersion,
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": `gocardless-client-node/${SDK_VERSION}`,
    };

    if (idempotencyKey !== undefined) {
      headers["Idempotency-Key"] = idempotencyKey;
    }

    if (extra) {
      Object.assign(headers, extra);
    }

    return headers;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Substitute `:name` segments of a path template with URL-encoded values.
 *
 * @throws {InvalidApiUsageError} if a segment has no (or an empty) value.
 */
export function buildPath(
  template: string,
  params: Record<string, string>,
): string {
  return template.replace(PATH_PARAM_REGEX, (_, name: string) => {
    const value = params[name];
    if (value === undefined || value.length === 0) {
      throw new InvalidApiUsageError(
        `A value for path parameter "${name}" is required.`,
        400,
      );
    }
    return encodeURIComponent(value);
  });
}

/**
 * Flatten a query object into `[key, value]` pairs.
 *
 * `undefined` and `null` are dropped, dates are sent as ISO 8601, arrays
 * are comma-joined and nested objects become `key[sub]`.
 */
export function serializeQuery(query: object): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  const entries: Array<[string, unknown]> = Object.entries(query);
  for (const [key, value] of entries) {
    appendQueryValue(pairs, key, value);
  }
  return pairs;
}

function appendQueryValue(
  pairs: Array<[string, string]>,
  key: string,
  value: unknown,
): void {
  if (value === undefined || value === null) return;

  if (value instanceof Date) {
    pairs.push([key, value.toISOString()]);
  } else if (Array.isArray(value)) {
    if (value.length > 0) pairs.push([key, value.map(String).join(",")]);
  } else if (typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    for (const [subKey, subValue] of entries) {
      appendQueryValue(pairs, `${key}[${subKey}]`, subValue);
    }
  } else {
    pairs.push([key, String(value)]);
  }
}

/** Map the caller's per-call options onto transport options. */
export function requestSettings(
  options: RequestOptions,
): Pick<HttpRequestOptions<unknown>, "headers" | "timeout" | "idempotencyKey"> {
  return {
    headers: options.headers,
    timeout: options.timeout,
    idempotencyKey: options.idempotencyKey,
  };
}

/** A fresh idempotency key for a create request. */
export function generateIdempotencyKey(): string {
  return randomUUID();
}

/**
 * Read the back-off the server asked for, in ms. Accepts delta-seconds or
 * an HTTP date, from `Retry-After` or the API's `RateLimit-Reset`.
 */
function retryAfterFromHeaders(headers: Headers): number {
  const header = headers.get("Retry-After") ?? headers.get("RateLimit-Reset");
  if (!header) return 0;

  if (/^\d+$/.test(header)) {
    return parseInt(header, 10) * 1000;
  }

  const date = Date.parse(header);
  return isNaN(date) ? 0 : Math.max(0, date - Date.now());
}

function parseJson(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
