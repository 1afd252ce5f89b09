/**
 * @fileoverview Builds the Tana node tree and the Input API request envelope
 * from the extracted page.
 *
 * The root node is named after the page and holds, in this order:
 *
 * ```
 * <title>
 *   ├── Image                      (file attachment, only if og:image downloads)
 *   ├── <section heading>          (one per section, at most maxSections)
 *   │     └── <paragraph text>
 *   ├── ⚠️ Content clipped          (only when sections were dropped)
 *   └── <meta key>: <meta value>   (one per merged meta/og tag)
 * ```
 *
 * @module extractor/nodes
 */

import mime from "mime-types";
import { config } from "../config.js";
import { logger } from "../logger.js";
import { fetchBinary, type BinaryResult, type FetchFailure } from "../services/fetch.js";
import type { Result } from "../utils/result.js";
import { fileNameFromUrl } from "../utils/url.js";
import type { Section } from "./sections.js";
import { normalizeText } from "./text.js";

const log = logger.child({ module: "extractor/nodes" });

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface FileAttachment {
  name: string;
  mimeType: string;
  /** Base64-encoded file bytes. */
  content: string;
}

/**
 * A node in the Tana Input API schema.
 */
export interface TanaNode {
  name: string;
  description?: string;
  file?: FileAttachment;
  children: TanaNode[];
}

/**
 * Body of a Tana Input API call. The API accepts several root nodes; the
 * clipper always sends exactly one.
 */
export interface TanaRequest {
  targetNodeId: string;
  nodes: [TanaNode];
}

export interface AssemblyInput {
  /** Page URL, the root name when the title is unusable. */
  url: string;
  title: string;
  coverImageUrl?: string;
  sections: readonly Section[];
  metaTags: ReadonlyMap<string, string>;
  ogTags: ReadonlyMap<string, string>;
  targetNodeId: string;
}

export type ImageFetcher = (url: string) => Promise<Result<BinaryResult, FetchFailure>>;

export interface AssemblyOptions {
  /** Downloads the cover image; defaults to {@link fetchBinary}. */
  fetchImage?: ImageFetcher;

  /** Defaults to `config.maxSections`. */
  maxSections?: number;

  /** Defaults to `config.introHeading`. */
  introHeading?: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const IMAGE_NODE_NAME = "Image";
export const CLIP_MARKER_NAME = "⚠️ Content clipped";
const DEFAULT_IMAGE_NAME = "image.jpg";
const DEFAULT_IMAGE_TYPE = "image/jpeg";

// ---------------------------------------------------------------------------
// Node Builders
// ---------------------------------------------------------------------------

/**
 * File attachment node for the cover image, or `undefined` when the
 * download fails. A failed download never fails the clip.
 */
async function buildImageNode(
  imageUrl: string,
  fetchImage: ImageFetcher
): Promise<TanaNode | undefined> {
  const image = await fetchImage(imageUrl);
  if (!image.ok) {
    log.warn(
      { imageUrl, code: image.error.code, err: image.error.message },
      "Cover image download failed; clipping without it",
    );
    return undefined;
  }

  const name = fileNameFromUrl(imageUrl, DEFAULT_IMAGE_NAME);
  const mimeType = mime.lookup(name) || DEFAULT_IMAGE_TYPE;

  return {
    name: IMAGE_NODE_NAME,
    file: {
      name,
      mimeType,
      content: Buffer.from(image.value.bytes).toString("base64"),
    },
    children: [],
  };
}

function sectionToNode(section: Section, name: string): TanaNode | undefined {
  const children = section.paragraphs.map((paragraph): TanaNode => ({
    name: paragraph,
    children: [],
  }));

  if (!name && children.length === 0) {
    return undefined;
  }
  return { name, children };
}

/**
 * Section nodes in order, capped at `maxSections`. When a section beyond the
 * cap exists, a single clip marker replaces all of them.
 *
 * The section holding the content before the first heading is named
 * `introHeading`.
 */
export function buildSectionNodes(
  sections: readonly Section[],
  maxSections: number,
  introHeading: string
): TanaNode[] {
  const nodes: TanaNode[] = [];

  for (const section of sections) {
    const name = section.leading ? introHeading : section.heading;
    const node = sectionToNode(section, name);
    if (!node) {
      continue;
    }

    if (nodes.length >= maxSections) {
      nodes.push({
        name: CLIP_MARKER_NAME,
        description: `Only the first ${maxSections} sections were included.`,
        children: [],
      });
      break;
    }

    nodes.push(node);
  }

  return nodes;
}

/**
 * Merge `<meta name>` and Open Graph tags. Keys are normalized first, so an
 * og tag replaces a meta tag whose key normalizes to the same string. Keys
 * that normalize to nothing are dropped; values are left raw.
 */
export function mergeTags(
  metaTags: ReadonlyMap<string, string>,
  ogTags: ReadonlyMap<string, string>
): Map<string, string> {
  const merged = new Map<string, string>();
  for (const tags of [metaTags, ogTags]) {
    for (const [key, value] of tags) {
      const name = normalizeText(key);
      if (name) {
        merged.set(name, value);
      }
    }
  }
  return merged;
}

/**
 * One `{ name: key, description: value }` node per merged tag whose value
 * survives normalization.
 */
export function buildMetadataNodes(
  metaTags: ReadonlyMap<string, string>,
  ogTags: ReadonlyMap<string, string>
): TanaNode[] {
  const nodes: TanaNode[] = [];
  for (const [name, value] of mergeTags(metaTags, ogTags)) {
    const description = normalizeText(value);
    if (description) {
      nodes.push({ name, description, children: [] });
    }
  }
  return nodes;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Assemble the root node and wrap it in a Tana Input API request.
 *
 * Makes at most one network call, for the cover image.
 *
 * @example
 * ```typescript
 * const request = await assembleNodes({
 *   url: "https://example.com/post",
 *   title: "My Post",
 *   sections: [{ heading: "Intro", leading: false, paragraphs: ["Hello"] }],
 *   metaTags: new Map([["author", "Sam"]]),
 *   ogTags: new Map(),
 *   targetNodeId: "INBOX",
 * });
 * request.nodes[0].children.map((n) => n.name); // ["Intro", "author"]
 * ```
 */
export async function assembleNodes(
  input: AssemblyInput,
  options: AssemblyOptions = {}
): Promise<TanaRequest> {
  const fetchImage = options.fetchImage ?? ((url: string) => fetchBinary(url));
  const maxSections = options.maxSections ?? config.maxSections;
  const introHeading = options.introHeading ?? config.introHeading;

  const children: TanaNode[] = [];

  if (input.coverImageUrl) {
    const imageNode = await buildImageNode(input.coverImageUrl, fetchImage);
    if (imageNode) {
      children.push(imageNode);
    }
  }

  children.push(...buildSectionNodes(input.sections, maxSections, introHeading));
  children.push(...buildMetadataNodes(input.metaTags, input.ogTags));

  const root: TanaNode = {
    name: normalizeText(input.title) ?? input.url,
    children,
  };

  return { targetNodeId: input.targetNodeId, nodes: [root] };
}
