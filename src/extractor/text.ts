/**
 * @fileoverview Whitespace normalization for every string that ends up in a
 * Tana node.
 *
 * Text pulled out of HTML carries non-breaking spaces, indentation newlines
 * and tab runs from the source markup. Some CMS templates also render a
 * missing field as the literal word `undefined`, which must never become a
 * node name.
 *
 * @module extractor/text
 */

const NBSP_REGEX = /\u00a0/g;
const CONTROL_RUN_REGEX = /[\r\n\t]+/g;
const WHITESPACE_RUN_REGEX = /\s+/g;

/** Matches `undefined` and `"undefined"` in any case. */
const UNDEFINED_SENTINEL_REGEX = /^"?undefined"?$/i;

/**
 * Collapse whitespace in `value` and trim it.
 *
 * Steps, in order:
 *   1. U+00A0 becomes a plain space.
 *   2. Each run of `\r`, `\n` and `\t` becomes one space.
 *   3. Each whitespace run becomes one space.
 *   4. Leading and trailing whitespace is removed.
 *
 * @returns The cleaned string, or `undefined` when the input is absent,
 *   blank, or the sentinel `undefined` / `"undefined"`.
 *
 * @example
 * ```typescript
 * normalizeText("  Hello\r\n\t world  ");  // "Hello world"
 * normalizeText("\"UNDEFINED\"");              // undefined
 * normalizeText(null);                        // undefined
 * ```
 */
export function normalizeText(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  const normalized = value
    .replace(NBSP_REGEX, " ")
    .replace(CONTROL_RUN_REGEX, " ")
    .replace(WHITESPACE_RUN_REGEX, " ")
    .trim();

  if (!normalized || UNDEFINED_SENTINEL_REGEX.test(normalized)) {
    return undefined;
  }

  return normalized;
}
