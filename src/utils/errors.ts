/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for tana-web-clipper.
 *
 * Every error extends {@link ClipperError}, which carries a machine-readable
 * `code` and the HTTP status the route answers with when that error ends a
 * clip.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── ClipperError (base)      ─── code, httpStatus
 *         ├── InvalidRequestError   ─── "INVALID_REQUEST"        422
 *         ├── FetchError            ─── "FETCH_FAILED"           400 + optional statusCode
 *         ├── TimeoutError          ─── "TIMEOUT"                400
 *         ├── SecurityError         ─── "SSRF_BLOCKED"           400
 *         ├── ResponseTooLargeError ─── "RESPONSE_TOO_LARGE"     400
 *         ├── ContentTypeError      ─── "CONTENT_TYPE_REJECTED"  400
 *         └── PublishError          ─── "PUBLISH_FAILED"         502 + statusCode, responseBody
 * ```
 *
 * Fetch and publish operations do not throw these; they return them inside
 * a {@link Result} (see `utils/result.ts`). Throwing is reserved for the
 * request parser and for bugs.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * formatError(new FetchError("HTTP 404 Not Found for https://example.com/x", 404));
 * // => "[FETCH_FAILED] HTTP 404 Not Found for https://example.com/x"
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** Statuses the service answers a failed clip with. */
export type ClipperStatus = 400 | 422 | 502;

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base class for all tana-web-clipper errors.
 */
export class ClipperError extends Error {
  /**
   * Stable machine-readable code (SCREAMING_SNAKE_CASE). Codes are part of
   * the HTTP response body, so renaming one is a breaking change.
   */
  public readonly code: string;

  /** HTTP status returned to the caller when this error ends a request. */
  public readonly httpStatus: ClipperStatus;

  constructor(message: string, code: string, httpStatus: ClipperStatus) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.httpStatus = httpStatus;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * The inbound request body is not JSON, or lacks `url`, `api_token` or
 * `target_node_id`.
 */
export class InvalidRequestError extends ClipperError {
  /** Human-readable list of the fields that failed validation. */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "INVALID_REQUEST", 422);
    this.issues = issues;
  }
}

/**
 * The page or image could not be retrieved.
 *
 * Covers network-level failures (DNS, TCP, TLS) and non-2xx responses. The
 * failure is reported to the caller as a problem with the URL they sent.
 */
export class FetchError extends ClipperError {
  /**
   * HTTP status from the remote server, `undefined` when no response was
   * received.
   */
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, "FETCH_FAILED", 400);
    this.statusCode = statusCode;
  }
}

/**
 * An outbound request exceeded `config.fetchTimeout`.
 */
export class TimeoutError extends ClipperError {
  constructor(message: string) {
    super(message, "TIMEOUT", 400);
  }
}

/**
 * The URL targets a loopback, private or link-local address and
 * `config.blockPrivateNetworks` is on. Never retried.
 */
export class SecurityError extends ClipperError {
  constructor(message: string) {
    super(message, "SSRF_BLOCKED", 400);
  }
}

/**
 * The response body exceeded `config.maxResponseSize`.
 */
export class ResponseTooLargeError extends ClipperError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE", 400);
  }
}

/**
 * The page answered with something other than HTML (JSON, PDF, an image…).
 */
export class ContentTypeError extends ClipperError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED", 400);
  }
}

/**
 * The Tana Input API rejected the node tree or could not be reached.
 *
 * @example
 * ```ts
 * new PublishError("Tana Input API returned 400", 400, '{"error":"Invalid node"}');
 * ```
 */
export class PublishError extends ClipperError {
  /** Status returned by Tana, `undefined` when the request never completed. */
  public readonly statusCode?: number;

  /** Raw response body, kept for diagnostics. Empty when there was none. */
  public readonly responseBody: string;

  constructor(message: string, statusCode?: number, responseBody = "") {
    super(message, "PUBLISH_FAILED", 502);
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Render any caught value as a single log-friendly line.
 *
 * - {@link ClipperError} subclasses: `"[CODE] message"`.
 * - Other `Error` instances: their `message`.
 * - Anything else: `String(value)`.
 *
 * @example
 * ```ts
 * formatError(new TimeoutError("Request to https://example.com timed out after 10000ms"));
 * // => "[TIMEOUT] Request to https://example.com timed out after 10000ms"
 *
 * formatError("boom"); // => "boom"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof ClipperError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
