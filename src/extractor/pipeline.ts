/**
 * @fileoverview Clip pipeline, the orchestration layer.
 *
 * {@link clipPage} runs one clip end to end:
 *
 *   1. **Fetch** the page via {@link fetchPage}. Failure ends the clip.
 *   2. **Parse** it with cheerio, which picks the character encoding from a
 *      BOM, the Content-Type charset or `<meta charset>`, in that order.
 *   3. **Extract** metadata ({@link extractMetadata}) and sections
 *      ({@link buildSections}).
 *   4. **Assemble** the Tana node tree ({@link assembleNodes}), which may
 *      download the cover image. A failed image download is not fatal.
 *   5. **Publish** the tree ({@link publishToTana}). Failure ends the clip,
 *      after an optional per-node diagnosis.
 *
 * Network failures are returned, not thrown. Anything thrown out of this
 * function is a bug and is answered with a 500 by the route.
 *
 * @module extractor/pipeline
 */

import * as cheerio from "cheerio";
import { config as defaultConfig, type AppConfig } from "../config.js";
import { logger } from "../logger.js";
import { fetchBinary, fetchPage, type FetchFailure, type FetchOptions } from "../services/fetch.js";
import { diagnoseRejectedNodes, publishToTana } from "../services/tana.js";
import type { PublishError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";
import { extractMetadata } from "./metadata.js";
import { assembleNodes, CLIP_MARKER_NAME } from "./nodes.js";
import { buildSections } from "./sections.js";

const log = logger.child({ module: "extractor/pipeline" });

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

export interface ClipRequest {
  /** Page to clip. */
  url: string;

  /** Tana API token; sent to Tana only, never logged. */
  apiToken: string;

  /** Tana node the clip is inserted under; `"INBOX"` for the inbox. */
  targetNodeId: string;
}

/**
 * What was sent to Tana, for the log line and the tests.
 */
export interface ClipSummary {
  title: string;
  sectionCount: number;
  metadataCount: number;
  hasImage: boolean;
}

export type ClipFailure = FetchFailure | PublishError;

/**
 * Collaborators for tests. Production code passes nothing.
 */
export interface ClipOptions extends FetchOptions {
  config?: AppConfig;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Clip a web page into Tana.
 *
 * @example
 * ```typescript
 * const clip = await clipPage({
 *   url: "https://example.com/post",
 *   apiToken: token,
 *   targetNodeId: "INBOX",
 * });
 * if (!clip.ok) {
 *   console.error(clip.error.code); // "FETCH_FAILED", "PUBLISH_FAILED", ...
 * }
 * ```
 */
export async function clipPage(
  request: ClipRequest,
  options: ClipOptions = {}
): Promise<Result<ClipSummary, ClipFailure>> {
  const cfg = options.config ?? defaultConfig;
  const fetchOptions: FetchOptions = { ...options, config: cfg };

  // Step 1: fetch
  const page = await fetchPage(request.url, fetchOptions);
  if (!page.ok) {
    return page;
  }

  // Steps 2-3: parse and extract. Relative og:image values resolve against
  // the final URL after redirects.
  const $ = cheerio.loadBuffer(page.value.bytes, {
    encoding: { transportLayerEncodingLabel: page.value.charset },
  });
  const metadata = extractMetadata($, page.value.url);
  const body = $("body").get(0);
  const sections = body ? buildSections(body) : [];

  log.debug(
    {
      url: request.url,
      sections: sections.length,
      metaTags: metadata.metaTags.size,
      ogTags: metadata.ogTags.size,
      coverImage: metadata.coverImageUrl,
    },
    "Extracted page",
  );

  // Step 4: assemble
  const tanaRequest = await assembleNodes(
    {
      url: request.url,
      title: metadata.title,
      coverImageUrl: metadata.coverImageUrl,
      sections,
      metaTags: metadata.metaTags,
      ogTags: metadata.ogTags,
      targetNodeId: request.targetNodeId,
    },
    {
      fetchImage: (imageUrl) => fetchBinary(imageUrl, fetchOptions),
      maxSections: cfg.maxSections,
      introHeading: cfg.introHeading,
    },
  );

  const [root] = tanaRequest.nodes;
  const summary: ClipSummary = {
    title: root.name,
    sectionCount: Math.min(sections.length, cfg.maxSections),
    metadataCount: root.children.filter(
      (child) => child.description !== undefined && child.name !== CLIP_MARKER_NAME,
    ).length,
    hasImage: root.children.some((child) => child.file !== undefined),
  };

  // Step 5: publish
  const published = await publishToTana(tanaRequest, request.apiToken, { config: cfg });
  if (!published.ok) {
    if (cfg.diagnoseRejections) {
      const diagnoses = await diagnoseRejectedNodes(tanaRequest, request.apiToken, { config: cfg });
      log.warn(
        {
          url: request.url,
          rejected: diagnoses.filter((diagnosis) => !diagnosis.accepted).map((diagnosis) => diagnosis.name),
        },
        "Per-node diagnosis finished",
      );
    }
    return err(published.error);
  }

  log.info({ url: request.url, ...summary }, "Clip sent to Tana");
  return ok(summary);
}
