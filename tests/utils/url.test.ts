/**
 * @fileoverview Tests for URL utility functions.
 *
 * Covers: resolveUrl, hostAndPath, fileNameFromUrl.
 */

import { describe, it, expect } from "vitest";
import { fileNameFromUrl, hostAndPath, resolveUrl } from "../../src/utils/url.js";

describe("resolveUrl", () => {
  it("resolves root-relative paths", () => {
    expect(resolveUrl("https://example.com/blog/post", "/img/a.png")).toBe(
      "https://example.com/img/a.png",
    );
  });

  it("resolves path-relative references", () => {
    expect(resolveUrl("https://example.com/blog/post", "../img/a.png")).toBe(
      "https://example.com/img/a.png",
    );
  });

  it("keeps absolute URLs", () => {
    expect(resolveUrl("https://example.com", "https://cdn.example.net/a.png")).toBe(
      "https://cdn.example.net/a.png",
    );
  });

  it("inherits the scheme for protocol-relative URLs", () => {
    expect(resolveUrl("https://example.com", "//cdn.example.net/a.png")).toBe(
      "https://cdn.example.net/a.png",
    );
  });

  it("returns undefined when the base does not parse", () => {
    expect(resolveUrl("not a url", "/a.png")).toBeUndefined();
  });
});

describe("hostAndPath", () => {
  it("drops scheme, query and fragment", () => {
    expect(hostAndPath("https://example.com/docs/start?tab=1#top")).toBe("example.com/docs/start");
  });

  it("keeps a non-default port", () => {
    expect(hostAndPath("http://example.com:8080/")).toBe("example.com:8080/");
  });

  it("returns the input when it does not parse", () => {
    expect(hostAndPath("not a url")).toBe("not a url");
  });
});

describe("fileNameFromUrl", () => {
  it("returns the decoded last path segment", () => {
    expect(fileNameFromUrl("https://cdn.example.com/img/cover%20art.png")).toBe("cover art.png");
  });

  it("ignores the query string", () => {
    expect(fileNameFromUrl("https://cdn.example.com/a.jpg?w=200")).toBe("a.jpg");
  });

  it("falls back when the path ends with a slash", () => {
    expect(fileNameFromUrl("https://cdn.example.com/")).toBe("image.jpg");
    expect(fileNameFromUrl("https://cdn.example.com/img/", "cover.bin")).toBe("cover.bin");
  });

  it("keeps a malformed escape as written", () => {
    expect(fileNameFromUrl("https://cdn.example.com/a%E0%A4%A.png")).toBe("a%E0%A4%A.png");
  });
});
