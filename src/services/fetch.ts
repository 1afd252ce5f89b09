/**
 * @fileoverview Outbound HTTP client for pages and cover images.
 *
 * Wraps Node's native `fetch()` with the controls every clip needs:
 *
 * 1. **Scheme check** - only `http:` and `https:`.
 * 2. **Private-network refusal** - hostnames resolving to loopback, private
 *    or link-local addresses are refused when `config.blockPrivateNetworks`
 *    is on. Redirects are followed by hand, at most five hops, and every
 *    hop is checked again.
 * 3. **Queueing** - requests go through {@link outboundQueue}.
 * 4. **Timeout** - `AbortSignal.timeout(config.fetchTimeout)`.
 * 5. **Status check** - anything outside 2xx is a {@link FetchError}.
 * 6. **Content-Type check** - HTML-like responses for pages, `image/*` for
 *    images.
 * 7. **Size limit** - the body is streamed with a byte counter.
 *
 * Failures come back as the `error` side of a {@link Result}; nothing in
 * this module throws for a remote-side problem.
 *
 * ```
 *   fetchPage(url) / fetchBinary(url)
 *     |
 *     +--> scheme + hostname checks  <--+
 *     +--> outboundQueue.enqueue(host, fetch)
 *     +--> 30x: resolve Location -------+
 *     +--> status, Content-Type, body size
 *     +--> Result<FetchResult | BinaryResult, FetchFailure>
 * ```
 *
 * @module services/fetch
 */

import { config as defaultConfig, type AppConfig } from "../config.js";
import { logger } from "../logger.js";
import {
  ContentTypeError,
  FetchError,
  ResponseTooLargeError,
  SecurityError,
  TimeoutError,
} from "../utils/errors.js";
import { checkHostname, type HostResolver } from "../utils/network.js";
import { err, ok, type Result } from "../utils/result.js";
import { resolveUrl } from "../utils/url.js";
import { outboundQueue, type OutboundQueue } from "./queue.js";

const log = logger.child({ module: "services/fetch" });

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * A successfully downloaded HTML page.
 */
export interface FetchResult {
  /**
   * Raw response body. Decoding is left to the parser, which weighs
   * `charset` against a BOM and any `<meta charset>`.
   */
  bytes: Buffer;

  /** `charset` parameter of the Content-Type header, if any. */
  charset?: string;

  /** Final URL after redirects. */
  url: string;

  /** Content-Type header, `"text/html"` when the server sent none. */
  contentType: string;

  statusCode: number;
}

/**
 * A successfully downloaded binary resource (the cover image).
 */
export interface BinaryResult {
  bytes: Uint8Array;

  /** Final URL after redirects. */
  url: string;

  /** Content-Type header as sent, if any. */
  contentType?: string;
}

/** A 2xx response and the URL it came from after redirects. */
interface FetchedResponse {
  response: Response;
  url: string;
}

/** Every way a page or image download can fail. */
export type FetchFailure =
  | FetchError
  | TimeoutError
  | SecurityError
  | ResponseTooLargeError
  | ContentTypeError;

/**
 * Collaborators a caller may swap out. Production code passes nothing.
 */
export interface FetchOptions {
  config?: AppConfig;
  queue?: OutboundQueue;
  resolver?: HostResolver;
}

// ---------------------------------------------------------------------------
// Request Headers
// ---------------------------------------------------------------------------

/**
 * Headers of a desktop Chrome navigation. Several news and blog hosts answer
 * bare library requests with 403, so the page fetch impersonates a browser.
 */
function browserHeaders(userAgent: string, accept: string): Record<string, string> {
  return {
    "User-Agent": userAgent,
    Accept: accept,
    "Accept-Language": "en-US,en;q=0.9",
    "Accept-Encoding": "gzip, deflate, br",
    "Cache-Control": "no-cache",
    Pragma: "no-cache",
    "Upgrade-Insecure-Requests": "1",
  };
}

const PAGE_ACCEPT =
  "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

const IMAGE_ACCEPT = "image/avif,image/webp,image/apng,image/*,*/*;q=0.8";

// ---------------------------------------------------------------------------
// Redirects
// ---------------------------------------------------------------------------

const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

/** Hops followed before a request is given up. */
const MAX_REDIRECTS = 5;

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types accepted as a page. A response with no Content-Type at all is
 * also accepted and parsed as HTML.
 */
const ALLOWED_PAGE_TYPES = new Set<string>([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
]);

/**
 * Media type of a Content-Type header, lowercased, without parameters.
 *
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8"); // "text/html"
 * extractMimeType(null);                       // ""
 * ```
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  return contentType.split(";")[0].trim().toLowerCase();
}

/**
 * `charset` parameter of a Content-Type header, unquoted, or `undefined`.
 *
 * @example
 * ```typescript
 * extractCharset("text/html; charset=ISO-8859-1"); // "ISO-8859-1"
 * extractCharset('text/html; charset="utf-8"');    // "utf-8"
 * extractCharset("text/html");                     // undefined
 * ```
 */
export function extractCharset(contentType: string | null): string | undefined {
  const match = contentType?.match(/;\s*charset\s*=\s*"?([^";\s]+)"?/i);
  return match?.[1];
}

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

function isTimeout(error: unknown): boolean {
  return (
    error instanceof DOMException &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    // undici reports the real reason ("ECONNREFUSED", "ENOTFOUND") on `cause`.
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * Read a response body into memory, refusing it once it grows past
 * `maxBytes`. Content-Length is checked first when the server sends it, but
 * the streamed byte count is what decides.
 */
async function readBodyWithLimit(
  response: Response,
  url: string,
  maxBytes: number,
  timeoutMs: number
): Promise<Result<Buffer, FetchFailure>> {
  const declared = parseInt(response.headers.get("content-length") ?? "", 10);
  if (!Number.isNaN(declared) && declared > maxBytes) {
    await response.body?.cancel();
    return err(
      new ResponseTooLargeError(
        `Response Content-Length (${declared} bytes) exceeds limit of ${maxBytes} bytes for ${url}`,
      ),
    );
  }

  if (!response.body) {
    return ok(Buffer.alloc(0));
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      total += value.byteLength;
      if (total > maxBytes) {
        await reader.cancel();
        return err(
          new ResponseTooLargeError(
            `Response body exceeds limit of ${maxBytes} bytes (read ${total} bytes so far) for ${url}`,
          ),
        );
      }
      chunks.push(value);
    }
  } catch (error) {
    if (isTimeout(error)) {
      return err(new TimeoutError(`Reading ${url} timed out after ${timeoutMs}ms`));
    }
    return err(new FetchError(`Error reading response body from ${url}: ${describe(error)}`));
  }

  return ok(Buffer.concat(chunks, total));
}

/**
 * Scheme and private-network checks for one hop.
 */
async function checkTarget(
  url: string,
  cfg: AppConfig,
  resolver: HostResolver | undefined
): Promise<Result<URL, FetchFailure>> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return err(new FetchError(`Invalid URL: ${url}`));
  }

  if (!FETCHABLE_SCHEMES.has(parsed.protocol)) {
    return err(
      new FetchError(`Unsupported protocol: ${parsed.protocol} (only http: and https: are allowed)`),
    );
  }

  if (cfg.blockPrivateNetworks) {
    const hostCheck = await checkHostname(parsed.hostname, resolver);
    if (!hostCheck.ok) {
      return hostCheck;
    }
  }

  return ok(parsed);
}

/**
 * Shared path of {@link fetchPage} and {@link fetchBinary}: validation,
 * queueing, the request itself, redirects and the status check.
 *
 * Redirects are followed here rather than by `fetch`, so every hop's target
 * goes through {@link checkTarget} before it is requested.
 */
async function request(
  url: string,
  accept: string,
  options: FetchOptions
): Promise<Result<FetchedResponse, FetchFailure>> {
  const cfg = options.config ?? defaultConfig;
  const queue = options.queue ?? outboundQueue;

  let current = url;
  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    const target = await checkTarget(current, cfg, options.resolver);
    if (!target.ok) {
      return target;
    }
    const href = target.value.href;

    let response: Response;
    try {
      response = await queue.enqueue(target.value.hostname, () =>
        fetch(href, {
          signal: AbortSignal.timeout(cfg.fetchTimeout),
          headers: browserHeaders(cfg.userAgent, accept),
          redirect: "manual",
        }),
      );
    } catch (error) {
      if (isTimeout(error)) {
        return err(new TimeoutError(`Request to ${href} timed out after ${cfg.fetchTimeout}ms`));
      }
      return err(new FetchError(`Failed to fetch ${href}: ${describe(error)}`));
    }

    if (REDIRECT_STATUSES.has(response.status)) {
      await response.body?.cancel();
      const location = response.headers.get("location");
      const next = location ? resolveUrl(href, location) : undefined;
      if (!next) {
        return err(
          new FetchError(`HTTP ${response.status} without a usable Location for ${href}`, response.status),
        );
      }
      log.debug({ from: href, to: next, status: response.status }, "Following redirect");
      current = next;
      continue;
    }

    if (!response.ok) {
      await response.body?.cancel();
      const status = [response.status, response.statusText].filter(Boolean).join(" ");
      return err(new FetchError(`HTTP ${status} for ${href}`, response.status));
    }

    return ok({ response, url: href });
  }

  return err(new FetchError(`More than ${MAX_REDIRECTS} redirects starting at ${url}`));
}

// ---------------------------------------------------------------------------
// Main Exports
// ---------------------------------------------------------------------------

/**
 * Download an HTML page.
 *
 * @returns The raw page, or one of:
 * - {@link FetchError} for an invalid URL, network failure, non-2xx status
 *   or too many redirects
 * - {@link TimeoutError} after `config.fetchTimeout` milliseconds
 * - {@link SecurityError} for a private-network hostname, on any hop
 * - {@link ContentTypeError} when the response is not HTML-like
 * - {@link ResponseTooLargeError} past `config.maxResponseSize`
 *
 * @example
 * ```typescript
 * const page = await fetchPage("https://example.com/post");
 * if (page.ok) {
 *   const $ = cheerio.loadBuffer(page.value.bytes, {
 *     encoding: { transportLayerEncodingLabel: page.value.charset },
 *   });
 * } else {
 *   console.error(page.error.code);
 * }
 * ```
 */
export async function fetchPage(
  url: string,
  options: FetchOptions = {}
): Promise<Result<FetchResult, FetchFailure>> {
  const cfg = options.config ?? defaultConfig;

  const fetched = await request(url, PAGE_ACCEPT, options);
  if (!fetched.ok) {
    log.warn({ url, code: fetched.error.code, err: fetched.error.message }, "Page fetch failed");
    return fetched;
  }
  const { response } = fetched.value;

  const contentType = response.headers.get("content-type");
  const mimeType = extractMimeType(contentType);
  if (mimeType && !ALLOWED_PAGE_TYPES.has(mimeType)) {
    await response.body?.cancel();
    const failure = new ContentTypeError(
      `Unacceptable Content-Type: "${mimeType}" for ${url}. ` +
        `Expected one of: ${Array.from(ALLOWED_PAGE_TYPES).join(", ")}`,
    );
    log.warn({ url, mimeType }, "Page fetch returned non-HTML content");
    return err(failure);
  }

  const body = await readBodyWithLimit(response, url, cfg.maxResponseSize, cfg.fetchTimeout);
  if (!body.ok) {
    log.warn({ url, code: body.error.code, err: body.error.message }, "Page body could not be read");
    return body;
  }

  log.info(
    { url, finalUrl: fetched.value.url, status: response.status, bytes: body.value.byteLength },
    "Fetched page",
  );

  return ok({
    bytes: body.value,
    charset: extractCharset(contentType),
    url: fetched.value.url,
    contentType: contentType ?? "text/html",
    statusCode: response.status,
  });
}

/**
 * Download an image with the same controls as {@link fetchPage}. Only
 * `image/*` responses, or responses with no Content-Type, are accepted.
 */
export async function fetchBinary(
  url: string,
  options: FetchOptions = {}
): Promise<Result<BinaryResult, FetchFailure>> {
  const cfg = options.config ?? defaultConfig;

  const fetched = await request(url, IMAGE_ACCEPT, options);
  if (!fetched.ok) {
    return fetched;
  }
  const { response } = fetched.value;

  const contentType = response.headers.get("content-type");
  const mimeType = extractMimeType(contentType);
  if (mimeType && !mimeType.startsWith("image/")) {
    await response.body?.cancel();
    log.warn({ url, mimeType }, "Image fetch returned non-image content");
    return err(
      new ContentTypeError(`Unacceptable Content-Type: "${mimeType}" for ${url}. Expected image/*`),
    );
  }

  const body = await readBodyWithLimit(response, url, cfg.maxResponseSize, cfg.fetchTimeout);
  if (!body.ok) {
    return body;
  }

  return ok({
    bytes: body.value,
    url: fetched.value.url,
    contentType: contentType ?? undefined,
  });
}
