/**
 * @module app
 * @fileoverview Hono application: CORS, request logging, error handler and
 * routes. Kept apart from `index.ts` so tests can drive it with
 * `app.request()` without opening a socket.
 */
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ClipOptions } from "./extractor/pipeline.js";
import { logger } from "./logger.js";
import { createParseAndPostRoute } from "./routes/parse-and-post.js";
import { formatError } from "./utils/errors.js";

const log = logger.child({ module: "app" });

/**
 * Build the application.
 *
 * @param options - Passed through to every clip; tests use it to swap the
 *   config, queue or DNS resolver.
 */
export function createApp(options: ClipOptions = {}): Hono {
  const app = new Hono();

  // Clips are triggered from bookmarklets on arbitrary origins.
  app.use("*", cors({ origin: "*", allowMethods: ["GET", "POST", "OPTIONS"], allowHeaders: ["*"] }));

  app.use("*", async (c, next) => {
    const started = performance.now();
    await next();
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - started),
      },
      "Request handled",
    );
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.route("/", createParseAndPostRoute(options));

  app.onError((error, c) => {
    log.error({ path: c.req.path, err: formatError(error), stack: error.stack }, "Unhandled error");
    return c.json({ detail: "Internal server error", code: "INTERNAL_ERROR" }, 500);
  });

  return app;
}
