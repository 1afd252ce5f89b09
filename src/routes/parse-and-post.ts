/**
 * @module routes/parse-and-post
 * @fileoverview `POST /parse_and_post`: clip the page at `url` into Tana.
 *
 * ## Request Body
 * ```json
 * {
 *   "url": "https://example.com/article",
 *   "api_token": "<Tana API token>",
 *   "target_node_id": "INBOX"
 * }
 * ```
 * Some clients (iOS Shortcuts among them) send that object JSON-encoded a
 * second time, as a JSON string. Both forms are accepted.
 *
 * ## Responses
 * | Status | Body                                                                 |
 * |--------|----------------------------------------------------------------------|
 * | 200    | `{"message": "Content extracted and sent to Tana successfully."}`    |
 * | 422    | `{"detail": "Invalid request format", "code": "INVALID_REQUEST"}`    |
 * | 400    | `{"detail": "Failed to fetch the given URL.", "code": "<code>"}`     |
 * | 502    | `{"detail": "Failed to post data to Tana.", "code": "PUBLISH_FAILED"}` |
 *
 * Anything thrown past this handler is answered with a 500 by the app.
 */
import { Hono } from "hono";
import { z } from "zod";
import { clipPage, type ClipOptions, type ClipRequest } from "../extractor/pipeline.js";
import { logger } from "../logger.js";
import { formatError, InvalidRequestError, PublishError } from "../utils/errors.js";

const log = logger.child({ module: "routes/parse-and-post" });

/**
 * Zod schema for the request body, after any second JSON decoding.
 */
export const ParseAndPostSchema = z.object({
  /** Page to clip -- must be an absolute URL */
  url: z.string().url(),

  /** Tana API token of the target workspace */
  api_token: z.string().min(1),

  /** Tana node to insert under; "INBOX" for the inbox */
  target_node_id: z.string().min(1),
});

/**
 * Decode and validate a raw request body.
 *
 * @throws {InvalidRequestError} When the body is not JSON, or is JSON that
 *   does not match {@link ParseAndPostSchema}.
 *
 * @example
 * ```typescript
 * parseClipRequest('{"url":"https://example.com","api_token":"t","target_node_id":"INBOX"}');
 * // => { url: "https://example.com", apiToken: "t", targetNodeId: "INBOX" }
 * ```
 */
export function parseClipRequest(raw: string): ClipRequest {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
    if (typeof payload === "string") {
      payload = JSON.parse(payload);
    }
  } catch (error) {
    throw new InvalidRequestError(`Request body is not valid JSON: ${formatError(error)}`);
  }

  const parsed = ParseAndPostSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`,
    );
    throw new InvalidRequestError("Request body failed validation", issues);
  }

  return {
    url: parsed.data.url,
    apiToken: parsed.data.api_token,
    targetNodeId: parsed.data.target_node_id,
  };
}

/**
 * Router holding the clip endpoint; mounted at `/` by {@link createApp}.
 */
export function createParseAndPostRoute(options: ClipOptions = {}): Hono {
  const route = new Hono();

  route.post("/parse_and_post", async (c) => {
    let request: ClipRequest;
    try {
      request = parseClipRequest(await c.req.text());
    } catch (error) {
      if (!(error instanceof InvalidRequestError)) {
        throw error;
      }
      log.warn({ issues: error.issues, err: error.message }, "Rejected clip request");
      return c.json({ detail: "Invalid request format", code: error.code }, error.httpStatus);
    }

    log.info({ url: request.url, targetNodeId: request.targetNodeId }, "Clip requested");

    const clip = await clipPage(request, options);
    if (!clip.ok) {
      log.error({ url: request.url, err: formatError(clip.error) }, "Clip failed");

      const detail =
        clip.error instanceof PublishError ? "Failed to post data to Tana." : "Failed to fetch the given URL.";
      return c.json({ detail, code: clip.error.code }, clip.error.httpStatus);
    }

    return c.json({ message: "Content extracted and sent to Tana successfully." }, 200);
  });

  return route;
}
