/**
 * @module index
 * @fileoverview tana-web-clipper HTTP server entry point.
 *
 * ## Startup Flow
 * 1. Load configuration from environment variables (via {@link config})
 * 2. Build the Hono application ({@link createApp})
 * 3. Listen on `config.host:config.port` with `@hono/node-server`
 *
 * ## Endpoints
 * | Method | Path              | Module                        |
 * |--------|-------------------|-------------------------------|
 * | POST   | `/parse_and_post` | `./routes/parse-and-post.js`  |
 * | GET    | `/health`         | `./app.js`                    |
 *
 * ## Architecture
 * ```
 * Bookmarklet / Shortcut
 *   |
 *   | POST /parse_and_post
 *   v
 * index.ts (this file) -- @hono/node-server
 *   |
 *   +-- routes/parse-and-post.ts --> extractor/pipeline.ts
 *                                      +--> services/fetch.ts  (page, cover image)
 *                                      +--> extractor/*        (sections, metadata, nodes)
 *                                      +--> services/tana.ts   (Input API)
 * ```
 *
 * ## Environment Variables
 * See {@link config}; the common ones are `PORT`, `HOST`, `FETCH_TIMEOUT`
 * and `LOG_LEVEL`.
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { outboundQueue } from "./services/queue.js";

const app = createApp();

const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info({ address: info.address, port: info.port }, "tana-web-clipper listening");
});

// ---------------------------------------------------------------------------
// Shutdown
// ---------------------------------------------------------------------------

/**
 * Stop accepting connections, let in-flight outbound requests settle, then
 * exit.
 */
function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, "Shutting down");
  server.close((error) => {
    if (error) {
      logger.error({ err: error.message }, "Server close failed");
      process.exit(1);
    }
    outboundQueue
      .drain()
      .then(() => process.exit(0))
      .catch((drainError: unknown) => {
        logger.error({ err: String(drainError) }, "Queue drain failed");
        process.exit(1);
      });
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
