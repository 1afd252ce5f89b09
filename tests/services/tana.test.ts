/**
 * @fileoverview Tests for the Tana Input API client.
 */

import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import { DEFAULT_TANA_ENDPOINT, loadConfig } from "../../src/config.js";
import type { TanaRequest } from "../../src/extractor/nodes.js";
import { diagnoseRejectedNodes, publishToTana } from "../../src/services/tana.js";
import { PublishError } from "../../src/utils/errors.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

const config = loadConfig({});

const request: TanaRequest = {
  targetNodeId: "INBOX",
  nodes: [
    {
      name: "My Post",
      children: [
        { name: "Good", children: [{ name: "text", children: [] }] },
        { name: "Bad", description: "broken", children: [] },
      ],
    },
  ],
};

let fetchMock: Mock<(...args: FetchArgs) => Promise<Response>>;

beforeEach(() => {
  fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("publishToTana", () => {
  it("posts the envelope with a bearer token", async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"children":[]}', { status: 200 }));

    const published = await publishToTana(request, "test-secret", { config });

    expect(published).toEqual({ ok: true, value: { statusCode: 200, body: '{"children":[]}' } });
    expect(fetchMock).toHaveBeenCalledWith(
      DEFAULT_TANA_ENDPOINT,
      expect.objectContaining({
        method: "POST",
        headers: {
          Authorization: "Bearer test-secret",
          "Content-Type": "application/json",
        },
        body: JSON.stringify(request),
      }),
    );
  });

  it("posts to the configured endpoint", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 200 }));

    await publishToTana(request, "test-secret", {
      config: { ...config, tanaEndpoint: "https://tana.test/add" },
    });

    expect(fetchMock.mock.calls[0][0]).toBe("https://tana.test/add");
  });

  it("returns a PublishError with status and body on rejection", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Invalid node", { status: 400 }));

    const published = await publishToTana(request, "test-secret", { config });

    expect(published.ok).toBe(false);
    if (!published.ok) {
      expect(published.error).toBeInstanceOf(PublishError);
      expect(published.error.code).toBe("PUBLISH_FAILED");
      expect(published.error.httpStatus).toBe(502);
      expect(published.error.statusCode).toBe(400);
      expect(published.error.responseBody).toBe("Invalid node");
      expect(published.error.message).toBe("Tana Input API returned 400");
    }
  });

  it("treats any status other than 200 as a failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 201 }));

    const published = await publishToTana(request, "test-secret", { config });

    expect(!published.ok && published.error.statusCode).toBe(201);
  });

  it("returns a PublishError without status when Tana is unreachable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    const published = await publishToTana(request, "test-secret", { config });

    expect(!published.ok && published.error.statusCode).toBeUndefined();
    expect(!published.ok && published.error.message).toBe(
      "Tana Input API could not be reached: fetch failed",
    );
  });
});

describe("diagnoseRejectedNodes", () => {
  beforeEach(() => {
    fetchMock.mockImplementation(async (_input, init) => {
      const body = typeof init?.body === "string" ? init.body : "";
      return body.includes('"name":"Bad"')
        ? new Response("invalid", { status: 400 })
        : new Response("ok", { status: 200 });
    });
  });

  it("resubmits each child on its own under the same root name", async () => {
    await diagnoseRejectedNodes(request, "test-secret", { config });

    const bodies = fetchMock.mock.calls.map(([, init]) => init?.body);
    expect(bodies).toEqual([
      JSON.stringify({
        targetNodeId: "INBOX",
        nodes: [{ name: "My Post", children: [request.nodes[0].children[0]] }],
      }),
      JSON.stringify({
        targetNodeId: "INBOX",
        nodes: [{ name: "My Post", children: [request.nodes[0].children[1]] }],
      }),
    ]);
  });

  it("reports which children Tana accepts", async () => {
    const diagnoses = await diagnoseRejectedNodes(request, "test-secret", { config });

    expect(diagnoses).toEqual([
      { index: 0, name: "Good", accepted: true, statusCode: 200, body: "ok" },
      { index: 1, name: "Bad", accepted: false, statusCode: 400, body: "invalid" },
    ]);
  });
});
