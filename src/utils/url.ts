/**
 * @module utils/url
 * @fileoverview URL helpers shared by the fetcher and the extractor.
 *
 * All functions go through the WHATWG `URL` class. None of them throw: a
 * value that does not parse yields `undefined` or the documented fallback.
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

function tryParse(url: string, base?: string): URL | undefined {
  try {
    return new URL(url, base);
  } catch {
    return undefined;
  }
}

/**
 * Resolve `relative` against `base`.
 *
 * Cover image URLs are often root-relative (`/img/cover.png`), so they are
 * resolved against the page URL before fetching.
 *
 * @example
 * ```ts
 * resolveUrl("https://example.com/blog/post", "/img/a.png");
 * // => "https://example.com/img/a.png"
 * resolveUrl("https://example.com", "https://cdn.example.net/a.png");
 * // => "https://cdn.example.net/a.png"
 * ```
 */
export function resolveUrl(base: string, relative: string): string | undefined {
  return tryParse(relative, base)?.href;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Derived Names
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Host plus path of `url`, the stand-in title for pages without `<title>`.
 * Returns `url` unchanged when it does not parse.
 *
 * @example
 * ```ts
 * hostAndPath("https://example.com/docs/start?tab=1"); // "example.com/docs/start"
 * ```
 */
export function hostAndPath(url: string): string {
  const parsed = tryParse(url);
  if (!parsed) {
    return url;
  }
  return `${parsed.host}${parsed.pathname}`;
}

/**
 * Last segment of the URL path, percent-decoded, or `fallback` when the path
 * ends with a slash or the URL does not parse.
 *
 * @example
 * ```ts
 * fileNameFromUrl("https://cdn.example.com/img/cover%20art.png"); // "cover art.png"
 * fileNameFromUrl("https://cdn.example.com/");                     // "image.jpg"
 * ```
 */
export function fileNameFromUrl(url: string, fallback = "image.jpg"): string {
  const parsed = tryParse(url);
  if (!parsed) {
    return fallback;
  }

  const segments = parsed.pathname.split("/");
  const last = segments[segments.length - 1] ?? "";
  if (!last) {
    return fallback;
  }

  try {
    return decodeURIComponent(last);
  } catch {
    // Malformed escape such as "%E0%A4%A"; keep the raw segment.
    return last;
  }
}
