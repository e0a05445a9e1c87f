// ---------------------------------------------------------------------------
// GoCardless Client – Error Classes
// ---------------------------------------------------------------------------
// Every failure surfaces as a GoCardlessError subclass chosen by the `type`
// field of the API's error envelope:
//
//   { "error": { "type": "invalid_state", "message": "...", "errors": [...] } }
//
// Bodies without an envelope (proxies, load balancers) fall back to a type
// derived from the HTTP status.
// ---------------------------------------------------------------------------

import type { ApiErrorBody, ApiErrorDetail } from "./types";

/** Classification of an SDK error. */
export type GoCardlessErrorType =
  | "gocardless" // 5xx – internal failure on the API side
  | "invalid_api_usage" // bad token, unknown route, malformed request
  | "invalid_state" // the resource cannot perform the action now
  | "validation_failed" // one or more fields failed validation
  | "connection_error" // fetch failed (DNS, reset, timeout)
  | "unknown_error"; // catch-all

const API_ERROR_TYPES: ReadonlySet<string> = new Set([
  "gocardless",
  "invalid_api_usage",
  "invalid_state",
  "validation_failed",
]);

const IDEMPOTENT_CREATION_CONFLICT = "idempotent_creation_conflict";

/**
 * Base error class for all GoCardless client errors.
 *
 * @example
 * ```ts
 * try {
 *   await client.mandates.cancel('MD123');
 * } catch (err) {
 *   if (err instanceof InvalidStateError) {
 *     // already cancelled
 *   } else if (err instanceof ValidationFailedError) {
 *     for (const e of err.errors) console.log(e.field, e.message);
 *   }
 * }
 * ```
 */
export class GoCardlessError extends Error {
  /** HTTP status code (0 for network-level failures). */
  public readonly statusCode: number;
  public readonly type: GoCardlessErrorType;
  /** Numeric error code from the API, when present. */
  public readonly code?: number;
  /** Quote this when contacting support. */
  public readonly requestId?: string;
  public readonly documentationUrl?: string;
  /** Field-level details from the API (empty if none). */
  public readonly errors: readonly ApiErrorDetail[];
  /** The `error` object of the response body, when available. */
  public readonly raw?: ApiErrorBody;

  constructor(
    message: string,
    statusCode: number,
    type: GoCardlessErrorType,
    raw?: ApiErrorBody,
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.type = type;
    this.raw = raw;
    this.code = raw?.code;
    this.requestId = raw?.request_id;
    this.documentationUrl = raw?.documentation_url;
    this.errors = raw?.errors ?? [];

    // Required for `instanceof` to work on subclasses when compiled down
    // or when errors cross realm boundaries.
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Build the most specific error for a failed response.
   *
   * @param statusCode - HTTP status (0 for network failures).
   * @param body - The parsed `error` object, if the body had one.
   * @param fallbackMessage - Used when the body carries no message.
   */
  static generate(
    statusCode: number,
    body?: ApiErrorBody,
    fallbackMessage?: string,
  ): GoCardlessError {
    const message =
      body?.message ??
      fallbackMessage ??
      `Request failed with HTTP ${statusCode}`;
    const type =
      body && API_ERROR_TYPES.has(body.type)
        ? body.type
        : body
          ? "unknown_error"
          : errorTypeFromStatus(statusCode);

    switch (type) {
      case "gocardless":
        return new GoCardlessInternalError(message, statusCode, body);
      case "invalid_api_usage":
        return new InvalidApiUsageError(message, statusCode, body);
      case "validation_failed":
        return new ValidationFailedError(message, statusCode, body);
      case "invalid_state": {
        const conflictId = conflictingResourceId(body);
        return conflictId
          ? new IdempotentCreationConflictError(
              message,
              statusCode,
              conflictId,
              body,
            )
          : new InvalidStateError(message, statusCode, body);
      }
      case "connection_error":
        return new ApiConnectionError(message);
      default:
        return new GoCardlessError(message, statusCode, "unknown_error", body);
    }
  }

  override toString(): string {
    return (
      `[${this.name}: ${this.type}] ${this.message} ` +
      `(HTTP ${this.statusCode})`
    );
  }

  /** Serialise to a plain object for structured logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      type: this.type,
      statusCode: this.statusCode,
      code: this.code,
      requestId: this.requestId,
      errors: this.errors,
    };
  }
}

/** The API failed internally. Safe to retry create calls with the same key. */
export class GoCardlessInternalError extends GoCardlessError {
  constructor(message: string, statusCode = 500, raw?: ApiErrorBody) {
    super(message, statusCode, "gocardless", raw);
  }
}

/** Invalid token, insufficient permissions, unknown route or bad input. */
export class InvalidApiUsageError extends GoCardlessError {
  constructor(message: string, statusCode = 400, raw?: ApiErrorBody) {
    super(message, statusCode, "invalid_api_usage", raw);
  }
}

/** The resource is in a state that doesn't allow the requested action. */
export class InvalidStateError extends GoCardlessError {
  constructor(message: string, statusCode = 409, raw?: ApiErrorBody) {
    super(message, statusCode, "invalid_state", raw);
  }
}

/**
 * A create call reused an idempotency key. The resource from the first
 * call exists with ID `conflictingResourceId`.
 */
export class IdempotentCreationConflictError extends InvalidStateError {
  public readonly conflictingResourceId: string;

  constructor(
    message: string,
    statusCode: number,
    conflictingResourceId: string,
    raw?: ApiErrorBody,
  ) {
    super(message, statusCode, raw);
    this.conflictingResourceId = conflictingResourceId;
  }
}

/** One or more request fields failed validation; see `errors`. */
export class ValidationFailedError extends GoCardlessError {
  constructor(message: string, statusCode = 422, raw?: ApiErrorBody) {
    super(message, statusCode, "validation_failed", raw);
  }
}

/** The request never produced an HTTP response. */
export class ApiConnectionError extends GoCardlessError {
  constructor(message: string) {
    super(message, 0, "connection_error");
  }
}

/** A webhook's signature or body could not be verified. */
export class InvalidSignatureError extends GoCardlessError {
  constructor(message: string) {
    super(message, 0, "invalid_api_usage");
  }
}

/**
 * Derive an error type from an HTTP status, for bodies that carry no
 * error envelope.
 */
export function errorTypeFromStatus(status: number): GoCardlessErrorType {
  if (status === 0) return "connection_error";
  if (status === 401 || status === 403) return "invalid_api_usage";
  if (status === 400 || status === 422) return "validation_failed";
  if (status === 409) return "invalid_state";
  if (status >= 500) return "gocardless";
  return "unknown_error";
}

/** Extract the `error` object from a parsed response body, if it has one. */
export function parseErrorBody(payload: unknown): ApiErrorBody | undefined {
  if (!isRecord(payload)) return undefined;
  const error = payload.error;
  if (!isRecord(error)) return undefined;
  const { message, type, code, request_id, documentation_url, errors } = error;
  if (typeof message !== "string" || typeof type !== "string") {
    return undefined;
  }
  return {
    message,
    type,
    code: typeof code === "number" ? code : undefined,
    request_id: typeof request_id === "string" ? request_id : undefined,
    documentation_url:
      typeof documentation_url === "string" ? documentation_url : undefined,
    errors: Array.isArray(errors) ? errors.filter(isErrorDetail) : undefined,
  };
}

function conflictingResourceId(body?: ApiErrorBody): string | undefined {
  const detail = body?.errors?.find(
    (e) => e.reason === IDEMPOTENT_CREATION_CONFLICT,
  );
  return detail?.links?.conflicting_resource_id;
}

function isErrorDetail(value: unknown): value is ApiErrorDetail {
  return isRecord(value) && typeof value.message === "string";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
