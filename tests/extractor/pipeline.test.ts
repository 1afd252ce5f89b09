/**
 * @fileoverview End-to-end tests for clipPage against a stubbed web.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { clipPage } from "../../src/extractor/pipeline.js";
import {
  callsTo,
  defaultRoutes,
  IMAGE_URL,
  jsonBodyOf,
  PAGE_URL,
  stubWeb,
  TANA_ENDPOINT,
  testConfig,
  testQueue,
} from "../support/fake-web.js";

const clip = { url: PAGE_URL, apiToken: "test-secret", targetNodeId: "INBOX" };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("clipPage", () => {
  it("posts the assembled tree and returns a summary", async () => {
    const fetchMock = stubWeb();

    const result = await clipPage(clip, { config: testConfig(), queue: testQueue() });

    expect(result).toEqual({
      ok: true,
      value: { title: "Test Page", sectionCount: 2, metadataCount: 2, hasImage: true },
    });
    expect(jsonBodyOf(fetchMock, TANA_ENDPOINT)).toEqual({
      targetNodeId: "INBOX",
      nodes: [
        {
          name: "Test Page",
          children: [
            {
              name: "Image",
              file: { name: "cover.png", mimeType: "image/png", content: "iVBORw==" },
              children: [],
            },
            { name: "Intro", children: [{ name: "Lead text", children: [] }] },
            {
              name: "Heading",
              children: [{ name: "Body [link](https://example.org)", children: [] }],
            },
            { name: "author", description: "Sam", children: [] },
            { name: "og:type", description: "article", children: [] },
          ],
        },
      ],
    });
  });

  it("fetches the page, then the image, then publishes", async () => {
    const fetchMock = stubWeb();

    await clipPage(clip, { config: testConfig(), queue: testQueue() });

    expect(fetchMock.mock.calls.map(([input]) => input)).toEqual([PAGE_URL, IMAGE_URL, TANA_ENDPOINT]);
  });

  it("stops before publishing when the page cannot be fetched", async () => {
    const fetchMock = stubWeb({});

    const result = await clipPage(clip, { config: testConfig(), queue: testQueue() });

    expect(!result.ok && result.error.code).toBe("FETCH_FAILED");
    expect(callsTo(fetchMock, TANA_ENDPOINT)).toHaveLength(0);
  });

  it("clips without the image when the image download fails", async () => {
    const routes = defaultRoutes();
    delete routes[IMAGE_URL];
    stubWeb(routes);

    const result = await clipPage(clip, { config: testConfig(), queue: testQueue() });

    expect(result.ok).toBe(true);
    expect(result.ok && result.value.hasImage).toBe(false);
  });

  it("returns the publish failure", async () => {
    const fetchMock = stubWeb({
      ...defaultRoutes(),
      [TANA_ENDPOINT]: () => new Response("bad", { status: 400 }),
    });

    const result = await clipPage(clip, { config: testConfig(), queue: testQueue() });

    expect(!result.ok && result.error.code).toBe("PUBLISH_FAILED");
    expect(callsTo(fetchMock, TANA_ENDPOINT)).toHaveLength(1);
  });

  it("resubmits each child when rejection diagnosis is on", async () => {
    const fetchMock = stubWeb({
      ...defaultRoutes(),
      [TANA_ENDPOINT]: () => new Response("bad", { status: 400 }),
    });

    const result = await clipPage(clip, {
      config: testConfig({ diagnoseRejections: true }),
      queue: testQueue(),
    });

    expect(result.ok).toBe(false);
    // One full publish, then one per child: image, two sections, two tags.
    expect(callsTo(fetchMock, TANA_ENDPOINT)).toHaveLength(6);
  });

  it("applies the configured section cap and intro heading", async () => {
    const fetchMock = stubWeb();

    await clipPage(clip, {
      config: testConfig({ maxSections: 1, introHeading: "Lead" }),
      queue: testQueue(),
    });

    const posted = jsonBodyOf(fetchMock, TANA_ENDPOINT);
    expect(posted).toMatchObject({
      nodes: [
        {
          children: [
            { name: "Image" },
            { name: "Lead" },
            { name: "⚠️ Content clipped", description: "Only the first 1 sections were included." },
            { name: "author" },
            { name: "og:type" },
          ],
        },
      ],
    });
  });

  it("decodes a page in its declared charset", async () => {
    const latin1 = new Uint8Array(
      Buffer.from("<html><head><title>caf\u00e9</title></head><body><p>na\u00efve</p></body></html>", "latin1"),
    );
    const fetchMock = stubWeb({
      ...defaultRoutes(),
      [PAGE_URL]: () =>
        new Response(latin1, { headers: { "content-type": "text/html; charset=iso-8859-1" } }),
    });

    const result = await clipPage(clip, { config: testConfig(), queue: testQueue() });

    expect(result.ok && result.value.title).toBe("caf\u00e9");
    expect(jsonBodyOf(fetchMock, TANA_ENDPOINT)).toEqual({
      targetNodeId: "INBOX",
      nodes: [
        {
          name: "caf\u00e9",
          children: [{ name: "Intro", children: [{ name: "na\u00efve", children: [] }] }],
        },
      ],
    });
  });

  it("falls back to the meta charset when the header has none", async () => {
    const utf8 = new TextEncoder().encode(
      '<html><head><meta charset="utf-8"><title>caf\u00e9</title></head><body></body></html>',
    );
    stubWeb({
      ...defaultRoutes(),
      [PAGE_URL]: () => new Response(utf8, { headers: { "content-type": "text/html" } }),
    });

    const result = await clipPage(clip, { config: testConfig(), queue: testQueue() });

    expect(result.ok && result.value.title).toBe("caf\u00e9");
  });

  it("refuses a page that redirects to a private address", async () => {
    const fetchMock = stubWeb({
      ...defaultRoutes(),
      [PAGE_URL]: () =>
        new Response(null, {
          status: 302,
          headers: { location: "http://169.254.169.254/latest/meta-data/" },
        }),
    });

    const result = await clipPage(clip, {
      config: testConfig({ blockPrivateNetworks: true }),
      queue: testQueue(),
      resolver: async () => ["93.184.216.34"],
    });

    expect(!result.ok && result.error.code).toBe("SSRF_BLOCKED");
    expect(fetchMock.mock.calls.map(([input]) => input)).toEqual([PAGE_URL]);
  });

  it("refuses a private address before any request when blocking is on", async () => {
    const fetchMock = stubWeb();

    const result = await clipPage(
      { ...clip, url: "http://192.168.1.10/" },
      { config: testConfig({ blockPrivateNetworks: true }), queue: testQueue() },
    );

    expect(!result.ok && result.error.code).toBe("SSRF_BLOCKED");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
