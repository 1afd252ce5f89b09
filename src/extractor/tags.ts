/**
 * @fileoverview The element kinds the section walk reacts to.
 *
 * Each element is classified once through {@link TAG_CATEGORIES}; the walk
 * and the rich-text extractor switch on the category instead of comparing
 * tag names.
 *
 * @module extractor/tags
 */

export type TagCategory = "heading" | "paragraph" | "excluded" | "anchor" | "other";

/**
 * Tag name → category. Tags not listed are `"other"`.
 *
 * - `h1`–`h3` open a new section; `h4`–`h6` are treated as body content
 *   containers and do not.
 * - `p` and `li` are the text blocks that become section children.
 * - `nav`, `summary` and `details` hold menus and disclosure widgets whose
 *   whole subtree is skipped.
 */
export const TAG_CATEGORIES: ReadonlyMap<string, TagCategory> = new Map<string, TagCategory>([
  ["h1", "heading"],
  ["h2", "heading"],
  ["h3", "heading"],
  ["p", "paragraph"],
  ["li", "paragraph"],
  ["nav", "excluded"],
  ["summary", "excluded"],
  ["details", "excluded"],
  ["a", "anchor"],
]);

/**
 * @example
 * ```typescript
 * categorize("H2");      // "heading"
 * categorize("section"); // "other"
 * ```
 */
export function categorize(tagName: string): TagCategory {
  return TAG_CATEGORIES.get(tagName.toLowerCase()) ?? "other";
}
