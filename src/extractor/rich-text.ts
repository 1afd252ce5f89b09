/**
 * @fileoverview Flattens one block element into a single line of text with
 * inline links kept as `[text](href)`.
 *
 * Tana renders that link syntax inside node names, so a paragraph keeps its
 * links without needing child nodes for them.
 *
 * @module extractor/rich-text
 */

import { isTag, isText, type AnyNode, type Element } from "domhandler";
import { categorize } from "./tags.js";
import { normalizeText } from "./text.js";

/**
 * Concatenated text of every text node under `node`, without any cleanup.
 * Comments and processing instructions contribute nothing.
 */
export function rawText(node: AnyNode): string {
  if (isText(node)) {
    return node.data;
  }
  if (!isTag(node)) {
    return "";
  }
  return node.children.map(rawText).join("");
}

/**
 * Push the fragments of `node` onto `fragments` in document order.
 *
 * An anchor with a non-blank href is emitted whole, or dropped when it has
 * no text, and its subtree is not visited again. An anchor with a missing
 * or blank href is treated like any other element.
 */
function collectFragments(node: AnyNode, fragments: string[]): void {
  if (isText(node)) {
    const text = normalizeText(node.data);
    if (text) {
      fragments.push(text);
    }
    return;
  }

  if (!isTag(node)) {
    return;
  }

  if (categorize(node.name) === "anchor") {
    const href = normalizeText(node.attribs.href);
    if (href) {
      const label = normalizeText(rawText(node));
      if (label) {
        fragments.push(`[${label}](${href})`);
      }
      return;
    }
  }

  for (const child of node.children) {
    collectFragments(child, fragments);
  }
}

/**
 * Text of `element` as one normalized string.
 *
 * @returns `undefined` when the element holds no text.
 *
 * @example
 * ```typescript
 * // <p>Hello <a href="http://x.com">world</a>!</p>
 * extractRichText(p); // "Hello [world](http://x.com) !"
 * ```
 */
export function extractRichText(element: Element): string | undefined {
  const fragments: string[] = [];
  for (const child of element.children) {
    collectFragments(child, fragments);
  }
  return normalizeText(fragments.join(" "));
}
