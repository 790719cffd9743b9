// ---------------------------------------------------------------------------
// Tessera SDK – Custom Error Classes
// ---------------------------------------------------------------------------
// Structured, inspectable errors that keep the HTTP context of a failed
// call. Every failure the SDK surfaces is a TesseraError subclass.
// ---------------------------------------------------------------------------

import type { TesseraErrorBody } from "./types";

/** Machine-readable error codes emitted by the SDK. */
export type TesseraErrorCode =
  | "authentication_error" // 401 – invalid or missing API key
  | "forbidden_error" // 403 – valid auth but insufficient permissions
  | "invalid_request_error" // 400/422 – bad request params
  | "not_found_error" // 404 – resource does not exist
  | "rate_limit_error" // 429 – too many requests
  | "api_error" // 5xx – server-side failure
  | "network_error" // fetch failed (DNS, timeout, reset)
  | "serialization_error" // query encoding or response decoding failed
  | "unsupported_version_error" // list url belongs to another API version
  | "protocol_error" // response breaks the list contract
  | "unknown_error"; // catch-all

/**
 * Base error class for all Tessera SDK errors.
 *
 * - `statusCode` – the HTTP status, or 0 when no HTTP response was involved
 * - `code`       – a machine-readable error type
 * - `raw`        – the API's error body, if there was one
 *
 * @example
 * ```ts
 * try {
 *   await tessera.subscriptions.cancel('sub_123');
 * } catch (err) {
 *   if (err instanceof TesseraError && err.code === 'not_found_error') {
 *     // already gone
 *   }
 * }
 * ```
 */
export class TesseraError extends Error {
  /** HTTP status code returned by the API (0 for non-HTTP failures). */
  public readonly statusCode: number;
  /** Machine-readable error classification. */
  public readonly code: TesseraErrorCode;
  /** Raw error payload from the API, when available. */
  public readonly raw?: TesseraErrorBody;

  constructor(
    message: string,
    statusCode: number,
    code: TesseraErrorCode,
    raw?: TesseraErrorBody,
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.raw = raw;

    // Keeps `instanceof` working for subclasses across realms and ES5 output.
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Build the error subclass matching an HTTP status.
   *
   * The API's own `error.message` wins over the fallback message.
   */
  static generate(
    statusCode: number,
    body?: TesseraErrorBody,
    message?: string,
  ): TesseraError {
    const text =
      body?.error.message ?? message ?? `Request failed with status ${statusCode}`;

    switch (errorCodeFromStatus(statusCode)) {
      case "authentication_error":
        return new TesseraAuthenticationError(text, statusCode, body);
      case "forbidden_error":
        return new TesseraPermissionError(text, statusCode, body);
      case "invalid_request_error":
        return new TesseraInvalidRequestError(text, statusCode, body);
      case "not_found_error":
        return new TesseraNotFoundError(text, statusCode, body);
      case "rate_limit_error":
        return new TesseraRateLimitError(text, statusCode, body);
      case "api_error":
        return new TesseraAPIError(text, statusCode, body);
      default:
        return new TesseraError(text, statusCode, "unknown_error", body);
    }
  }

  /** Human-readable representation for logging/debugging. */
  override toString(): string {
    return `[${this.name}: ${this.code}] ${this.message} (HTTP ${this.statusCode})`;
  }

  /** Serialise to a plain object – useful for structured logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      raw: this.raw,
    };
  }
}

// ── HTTP status errors ─────────────────────────────────────────────────────

export class TesseraAuthenticationError extends TesseraError {
  constructor(message: string, statusCode = 401, raw?: TesseraErrorBody) {
    super(message, statusCode, "authentication_error", raw);
  }
}

export class TesseraPermissionError extends TesseraError {
  constructor(message: string, statusCode = 403, raw?: TesseraErrorBody) {
    super(message, statusCode, "forbidden_error", raw);
  }
}

export class TesseraInvalidRequestError extends TesseraError {
  constructor(message: string, statusCode = 400, raw?: TesseraErrorBody) {
    super(message, statusCode, "invalid_request_error", raw);
  }
}

export class TesseraNotFoundError extends TesseraError {
  constructor(message: string, statusCode = 404, raw?: TesseraErrorBody) {
    super(message, statusCode, "not_found_error", raw);
  }
}

export class TesseraRateLimitError extends TesseraError {
  constructor(message: string, statusCode = 429, raw?: TesseraErrorBody) {
    super(message, statusCode, "rate_limit_error", raw);
  }
}

export class TesseraAPIError extends TesseraError {
  constructor(message: string, statusCode = 500, raw?: TesseraErrorBody) {
    super(message, statusCode, "api_error", raw);
  }
}

// ── Client-side errors (statusCode 0) ──────────────────────────────────────

/** The request never produced an HTTP response (DNS, reset, timeout). */
export class TesseraConnectionError extends TesseraError {
  constructor(message: string) {
    super(message, 0, "network_error");
  }
}

/**
 * Query params could not be encoded, or a response body could not be
 * decoded into the expected shape. `statusCode` is the response status
 * when the failure happened while decoding one.
 */
export class TesseraSerializationError extends TesseraError {
  constructor(message: string, statusCode = 0) {
    super(message, statusCode, "serialization_error");
  }
}

/** A list url carries an API version prefix this client does not speak. */
export class TesseraUnsupportedVersionError extends TesseraError {
  constructor(message: string) {
    super(message, 0, "unsupported_version_error");
  }
}

/** A list page claims more results but carries no items to continue from. */
export class TesseraProtocolError extends TesseraError {
  constructor(message: string) {
    super(message, 0, "protocol_error");
  }
}

/**
 * Derive a machine-readable error code from an HTTP status code.
 */
export function errorCodeFromStatus(status: number): TesseraErrorCode {
  if (status === 401) return "authentication_error";
  if (status === 403) return "forbidden_error";
  if (status === 400 || status === 422) return "invalid_request_error";
  if (status === 404) return "not_found_error";
  if (status === 429) return "rate_limit_error";
  if (status >= 500) return "api_error";
  return "unknown_error";
}
