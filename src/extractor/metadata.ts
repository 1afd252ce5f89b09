/**
 * @fileoverview Page-level metadata: title, Open Graph tags, other `<meta>`
 * tags and the cover image candidate.
 *
 * @module extractor/metadata
 */

import type { CheerioAPI } from "cheerio";
import { hostAndPath, resolveUrl } from "../utils/url.js";
import { normalizeText } from "./text.js";

export interface PageMetadata {
  /** Normalized `<title>` text, or host + path of the page URL. */
  title: string;

  /** `og:*` properties, keyed by the full property name. `og:image` is removed. */
  ogTags: Map<string, string>;

  /** `<meta name>` entries that are not Open Graph properties. */
  metaTags: Map<string, string>;

  /** Absolute `og:image` URL, when the page declares one. */
  coverImageUrl?: string;
}

const OG_PREFIX = "og:";
const OG_IMAGE = "og:image";

/**
 * Read the metadata of a loaded page.
 *
 * For every `<meta>`: a `property` starting with `og:` goes to `ogTags`;
 * otherwise a `name` attribute sends it to `metaTags`. A missing `content`
 * is stored as `""`. Later duplicates overwrite earlier ones.
 *
 * @param $   - The page loaded with `cheerio.load`.
 * @param url - Page URL, for the title fallback and relative `og:image` values.
 *
 * @example
 * ```typescript
 * const meta = extractMetadata(cheerio.load(html), "https://example.com/post");
 * meta.title;          // "My Post"
 * meta.coverImageUrl;  // "https://example.com/cover.png"
 * ```
 */
export function extractMetadata($: CheerioAPI, url: string): PageMetadata {
  const title = normalizeText($("title").first().text()) ?? hostAndPath(url);

  const ogTags = new Map<string, string>();
  const metaTags = new Map<string, string>();

  $("meta").each((_index, element) => {
    const meta = $(element);
    const property = meta.attr("property") ?? "";
    const content = meta.attr("content") ?? "";

    if (property.startsWith(OG_PREFIX)) {
      ogTags.set(property, content);
      return;
    }

    const name = meta.attr("name");
    if (name) {
      metaTags.set(name, content);
    }
  });

  const metadata: PageMetadata = { title, ogTags, metaTags };

  const image = ogTags.get(OG_IMAGE);
  ogTags.delete(OG_IMAGE);

  const imageRef = normalizeText(image);
  if (imageRef) {
    metadata.coverImageUrl = resolveUrl(url, imageRef);
  }

  return metadata;
}
