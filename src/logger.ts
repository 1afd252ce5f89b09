/**
 * @module logger
 * @fileoverview Shared pino logger.
 *
 * Modules take a child logger tagged with their name:
 *
 * ```ts
 * const log = logger.child({ module: "services/fetch" });
 * log.info({ url }, "Fetched page");
 * ```
 *
 * The level comes from `LOG_LEVEL` (see {@link config}); the test run sets
 * it to `silent`.
 */

import { pino, type Logger } from "pino";
import { config } from "./config.js";

export const logger: Logger = pino({
  name: "tana-web-clipper",
  level: config.logLevel,
  // Bearer tokens travel in request options and headers; keep them out of logs.
  redact: {
    paths: ["apiToken", "api_token", "headers.authorization", "headers.Authorization"],
    censor: "[redacted]",
  },
});
