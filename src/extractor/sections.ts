/**
 * @fileoverview Groups a page body into sections: a heading plus the
 * paragraph and list-item text that follows it until the next heading.
 *
 * The walk is split in two so each half can be tested on its own:
 *
 * ```
 * collectSectionElements(body)   document-order elements, excluded subtrees pruned
 *        |
 *        v
 * reduce(reduceSections, initialSectionState())
 *        |
 *        v
 * flushSection(state)            final section appended if it has content
 * ```
 *
 * Content before the first heading lands in a section marked `leading`,
 * with the empty string as its heading. Naming it is left to the node
 * assembler; a later heading without text is not leading, even when it
 * ends up first.
 *
 * @module extractor/sections
 */

import { isTag, type Element } from "domhandler";
import { extractRichText, rawText } from "./rich-text.js";
import { categorize } from "./tags.js";
import { normalizeText } from "./text.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Section {
  /** Normalized heading text; `""` for leading content or an empty heading. */
  heading: string;

  /** Holds the content before the first heading. */
  leading: boolean;

  /** Normalized paragraph and list-item texts, in document order. */
  paragraphs: string[];
}

/**
 * Fold state threaded through {@link reduceSections}.
 */
export interface SectionState {
  /** Sections already closed by a later heading, all non-empty. */
  completed: readonly Section[];

  /** Section currently collecting paragraphs. */
  current: Section;
}

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

/**
 * Every element below `root` in document order. The subtree of a `nav`,
 * `summary` or `details` element is never entered, and the container
 * itself is not yielded either. `root` is not yielded.
 */
export function* collectSectionElements(root: Element): Generator<Element> {
  for (const child of root.children) {
    if (!isTag(child) || categorize(child.name) === "excluded") {
      continue;
    }
    yield child;
    yield* collectSectionElements(child);
  }
}

// ---------------------------------------------------------------------------
// Fold
// ---------------------------------------------------------------------------

export function initialSectionState(): SectionState {
  return { completed: [], current: { heading: "", leading: true, paragraphs: [] } };
}

/**
 * Completed sections plus the current one when it holds at least one
 * paragraph.
 */
export function flushSection(state: SectionState): Section[] {
  return state.current.paragraphs.length > 0
    ? [...state.completed, state.current]
    : [...state.completed];
}

/**
 * One step of the walk.
 *
 * - heading: closes the current section and opens a new one.
 * - paragraph: appends its rich text, if any, to the current section.
 * - anything else: leaves the state as it is.
 */
export function reduceSections(state: SectionState, element: Element): SectionState {
  switch (categorize(element.name)) {
    case "heading":
      return {
        completed: flushSection(state),
        current: {
          heading: normalizeText(rawText(element)) ?? "",
          leading: false,
          paragraphs: [],
        },
      };

    case "paragraph": {
      const text = extractRichText(element);
      if (!text) {
        return state;
      }
      return {
        completed: state.completed,
        current: {
          heading: state.current.heading,
          leading: state.current.leading,
          paragraphs: state.current.paragraphs.concat(text),
        },
      };
    }

    default:
      return state;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Split the content under `root` (normally `<body>`) into sections.
 * Sections without paragraphs are dropped.
 *
 * @example
 * ```typescript
 * const $ = cheerio.load("<h1>A</h1><p>x</p><h2>B</h2>");
 * buildSections($("body").get(0));
 * // => [{ heading: "A", leading: false, paragraphs: ["x"] }]
 * ```
 */
export function buildSections(root: Element): Section[] {
  let state = initialSectionState();
  for (const element of collectSectionElements(root)) {
    state = reduceSections(state, element);
  }
  return flushSection(state);
}
