/**
 * @module utils/result
 * @fileoverview Success-or-failure value returned by the network operations.
 *
 * ## Design Decisions
 *
 * **Failures are data.** The fetcher and the publisher hand their failures
 * back instead of throwing, so the caller decides in one place which ones
 * end a clip and which are recovered: a missing cover image is dropped, a
 * 404 page is answered with a 400. The error side is always a
 * `ClipperError` subclass, which carries the response status with it.
 *
 * **Throwing means a bug.** Anything that still throws out of a clip is
 * unexpected and reaches the application's 500 handler.
 *
 * @example
 * ```ts
 * const page = await fetchPage(url);
 * if (!page.ok) {
 *   return c.json({ detail: "Failed to fetch the given URL." }, page.error.httpStatus);
 * }
 * page.value.bytes;
 * ```
 */

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

/**
 * @example
 * ```ts
 * ok(42); // { ok: true, value: 42 }
 * ```
 */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * @example
 * ```ts
 * err(new TimeoutError("Request timed out")); // { ok: false, error: TimeoutError }
 * ```
 */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
