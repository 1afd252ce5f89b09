/**
 * @fileoverview Client for the Tana Input API.
 *
 * The clipper makes one `POST` per clip. The request carries the caller's
 * API token as a bearer token and the node tree built by
 * {@link assembleNodes} as its JSON body.
 *
 * When Tana rejects a tree it answers with a 400 and a terse message that
 * rarely names the offending node. {@link diagnoseRejectedNodes} narrows it
 * down by resubmitting each top-level child on its own. Every accepted
 * resubmission creates real nodes in the target, so it only runs when
 * `config.diagnoseRejections` is on.
 *
 * @module services/tana
 */

import { config as defaultConfig, type AppConfig } from "../config.js";
import type { TanaNode, TanaRequest } from "../extractor/nodes.js";
import { logger } from "../logger.js";
import { PublishError } from "../utils/errors.js";
import { err, ok, type Result } from "../utils/result.js";

const log = logger.child({ module: "services/tana" });

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface PublishReceipt {
  statusCode: number;

  /** Response body as text. */
  body: string;
}

/**
 * Outcome of resubmitting a single child node.
 */
export interface NodeDiagnosis {
  /** Position of the node among the root's children. */
  index: number;
  name: string;
  accepted: boolean;

  /** `undefined` when the request never got a response. */
  statusCode?: number;
  body: string;
}

export interface PublishOptions {
  config?: AppConfig;
}

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

function describe(error: unknown): string {
  if (error instanceof DOMException && error.name === "TimeoutError") {
    return "request timed out";
  }
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

async function post(
  request: TanaRequest,
  apiToken: string,
  cfg: AppConfig
): Promise<Result<PublishReceipt, PublishError>> {
  let response: Response;
  try {
    response = await fetch(cfg.tanaEndpoint, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiToken}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(request),
      signal: AbortSignal.timeout(cfg.fetchTimeout),
    });
  } catch (error) {
    return err(new PublishError(`Tana Input API could not be reached: ${describe(error)}`));
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    return err(
      new PublishError(
        `Reading the Tana Input API response failed: ${describe(error)}`,
        response.status,
      ),
    );
  }

  if (response.status !== 200) {
    return err(
      new PublishError(`Tana Input API returned ${response.status}`, response.status, body),
    );
  }

  return ok({ statusCode: response.status, body });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Post the node tree to Tana.
 *
 * Only a 200 counts as success. Any other status, and any network failure,
 * comes back as a {@link PublishError} carrying the status and body.
 *
 * @example
 * ```typescript
 * const published = await publishToTana(request, token);
 * if (!published.ok) {
 *   log.error({ status: published.error.statusCode }, published.error.responseBody);
 * }
 * ```
 */
export async function publishToTana(
  request: TanaRequest,
  apiToken: string,
  options: PublishOptions = {}
): Promise<Result<PublishReceipt, PublishError>> {
  const cfg = options.config ?? defaultConfig;
  const [root] = request.nodes;

  const published = await post(request, apiToken, cfg);
  if (!published.ok) {
    log.error(
      {
        targetNodeId: request.targetNodeId,
        status: published.error.statusCode,
        body: published.error.responseBody,
        children: root.children.length,
      },
      "Tana rejected the clip",
    );
    return published;
  }

  log.info(
    { targetNodeId: request.targetNodeId, status: published.value.statusCode, title: root.name },
    "Posted clip to Tana",
  );
  return published;
}

/**
 * Resubmit each child of the root node as its own request, under a root
 * with the same name, and report which ones Tana accepts. Requests run one
 * after another.
 */
export async function diagnoseRejectedNodes(
  request: TanaRequest,
  apiToken: string,
  options: PublishOptions = {}
): Promise<NodeDiagnosis[]> {
  const cfg = options.config ?? defaultConfig;
  const [root] = request.nodes;
  const diagnoses: NodeDiagnosis[] = [];

  for (const [index, child] of root.children.entries()) {
    const single: TanaNode = { name: root.name, children: [child] };
    const result = await post({ targetNodeId: request.targetNodeId, nodes: [single] }, apiToken, cfg);

    const diagnosis: NodeDiagnosis = result.ok
      ? { index, name: child.name, accepted: true, statusCode: result.value.statusCode, body: result.value.body }
      : {
          index,
          name: child.name,
          accepted: false,
          statusCode: result.error.statusCode,
          body: result.error.responseBody || result.error.message,
        };

    if (diagnosis.accepted) {
      log.debug({ index, name: child.name }, "Node accepted on resubmission");
    } else {
      log.warn(
        { index, name: child.name, status: diagnosis.statusCode, body: diagnosis.body },
        "Node rejected on resubmission",
      );
    }
    diagnoses.push(diagnosis);
  }

  return diagnoses;
}
