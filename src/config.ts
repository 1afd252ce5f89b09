/**
 * @module config
 * @fileoverview Centralized service configuration loaded from environment variables.
 *
 * Every setting has a default so the service starts with zero configuration.
 * This module imports nothing from the application, so any other module may
 * depend on it without creating a cycle.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |  routes   |   | extractor |   | services  |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |               |
 *          +-----v-----+  +-----v-----+
 *          |   config   |  |   utils   |
 *          +-----------+  +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`; an unparseable
 *   value falls back to the default.
 * - Boolean values are the strings `"true"` / `"false"` (also `1` / `0`).
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * config.fetchTimeout; // 10000
 *
 * // Tests build a fresh snapshot instead:
 * const testConfig = { ...loadConfig(), maxSections: 2 };
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Complete service configuration. Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * TCP port the HTTP server listens on.
   * @default 8000
   */
  port: number;

  /**
   * Interface the HTTP server binds to.
   * @default "0.0.0.0"
   */
  host: string;

  /**
   * Timeout in milliseconds for every outbound request (page, image, publish).
   * @default 10000
   */
  fetchTimeout: number;

  /**
   * Maximum response body size in bytes for page and image downloads.
   * @default 10485760
   */
  maxResponseSize: number;

  /**
   * Maximum number of outbound requests in flight across all clips.
   * @default 8
   */
  maxConcurrent: number;

  /**
   * Minimum interval in milliseconds between two requests to the same host.
   * `0` disables per-host spacing.
   * @default 0
   */
  perHostInterval: number;

  /**
   * User-Agent sent with page and image requests. Many sites answer
   * non-browser agents with a 403, so the default is a desktop Chrome UA.
   */
  userAgent: string;

  /**
   * Tana Input API endpoint the node tree is posted to.
   */
  tanaEndpoint: string;

  /**
   * Maximum number of section nodes attached to the root node. Further
   * sections are replaced by a single "content clipped" marker.
   * @default 100
   */
  maxSections: number;

  /**
   * Name given to the section made of content that precedes the first
   * heading. An empty string leaves that section unnamed.
   * @default "Intro"
   */
  introHeading: string;

  /**
   * Refuse page and image URLs whose hostname resolves to a loopback,
   * private or link-local address.
   * @default true
   */
  blockPrivateNetworks: boolean;

  /**
   * After a rejected publish, resubmit each child node on its own and log
   * which ones Tana accepts. Each resubmission creates nodes in Tana, so
   * this stays off unless someone is chasing a rejection.
   * @default false
   */
  diagnoseRejections: boolean;

  /**
   * pino log level (`fatal`, `error`, `warn`, `info`, `debug`, `trace`, `silent`).
   * @default "info"
   */
  logLevel: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) " +
  "AppleWebKit/537.36 (KHTML, like Gecko) " +
  "Chrome/119.0.0.0 Safari/537.36";

export const DEFAULT_TANA_ENDPOINT =
  "https://europe-west1-tagr-prod.cloudfunctions.net/addToNodeV2";

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      return fallback;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Reads `env` at call time and returns a plain object, so tests can pass
 * their own environment map.
 *
 * @param env - Variables to read; defaults to `process.env`.
 *
 * @example
 * ```ts
 * loadConfig({ FETCH_TIMEOUT: "5000" }).fetchTimeout; // 5000
 * loadConfig({}).maxSections; // 100
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readInt(env.PORT, 8000),
    host: env.HOST ?? "0.0.0.0",
    fetchTimeout: readInt(env.FETCH_TIMEOUT, 10000),
    maxResponseSize: readInt(env.MAX_RESPONSE_SIZE, 10485760),
    maxConcurrent: readInt(env.MAX_CONCURRENT, 8),
    perHostInterval: readInt(env.PER_HOST_INTERVAL, 0),
    userAgent: env.USER_AGENT ?? DEFAULT_USER_AGENT,
    tanaEndpoint: env.TANA_ENDPOINT ?? DEFAULT_TANA_ENDPOINT,
    maxSections: readInt(env.MAX_SECTIONS, 100),

    // ?? keeps an explicit INTRO_HEADING="" which turns the label off.
    introHeading: env.INTRO_HEADING ?? "Intro",

    blockPrivateNetworks: readBool(env.BLOCK_PRIVATE_NETWORKS, true),
    diagnoseRejections: readBool(env.DIAGNOSE_REJECTED_NODES, false),
    logLevel: env.LOG_LEVEL ?? "info",
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration snapshot taken once at module load. Modules import this
 * directly; functions that tests need to steer also accept an `AppConfig`.
 */
export const config: AppConfig = loadConfig();
