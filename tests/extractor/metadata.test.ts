import * as cheerio from "cheerio";
import { describe, it, expect } from "vitest";
import { extractMetadata } from "../../src/extractor/metadata.js";

const PAGE_URL = "https://example.com/blog/post?ref=feed";

describe("extractMetadata", () => {
  it("uses the normalized <title> text", () => {
    const $ = cheerio.load("<html><head><title>  My\n Post </title></head></html>");
    expect(extractMetadata($, PAGE_URL).title).toBe("My Post");
  });

  it("falls back to host and path when there is no title", () => {
    const $ = cheerio.load("<html><head></head><body></body></html>");
    expect(extractMetadata($, PAGE_URL).title).toBe("example.com/blog/post");
  });

  it("falls back to host and path when the title is blank", () => {
    const $ = cheerio.load("<title>   </title>");
    expect(extractMetadata($, PAGE_URL).title).toBe("example.com/blog/post");
  });

  it("splits og properties from named meta tags", () => {
    const $ = cheerio.load(`
      <head>
        <meta property="og:title" content="OG Title">
        <meta property="og:type" content="article">
        <meta name="author" content="Sam">
        <meta name="description" content="A post">
        <meta charset="utf-8">
      </head>`);
    const metadata = extractMetadata($, PAGE_URL);

    expect(Object.fromEntries(metadata.ogTags)).toEqual({
      "og:title": "OG Title",
      "og:type": "article",
    });
    expect(Object.fromEntries(metadata.metaTags)).toEqual({
      author: "Sam",
      description: "A post",
    });
  });

  it("stores a missing content attribute as an empty string", () => {
    const $ = cheerio.load('<meta name="keywords">');
    expect(extractMetadata($, PAGE_URL).metaTags.get("keywords")).toBe("");
  });

  it("files a non-og property with a name under metaTags", () => {
    const $ = cheerio.load('<meta property="article:tag" name="tag" content="news">');
    const metadata = extractMetadata($, PAGE_URL);
    expect(metadata.ogTags.size).toBe(0);
    expect(metadata.metaTags.get("tag")).toBe("news");
  });

  it("keeps the last value of a repeated tag", () => {
    const $ = cheerio.load('<meta name="author" content="A"><meta name="author" content="B">');
    expect(extractMetadata($, PAGE_URL).metaTags.get("author")).toBe("B");
  });

  it("moves og:image out of ogTags into coverImageUrl", () => {
    const $ = cheerio.load(
      '<meta property="og:image" content="https://cdn.example.com/cover.png"><meta property="og:title" content="T">',
    );
    const metadata = extractMetadata($, PAGE_URL);

    expect(metadata.coverImageUrl).toBe("https://cdn.example.com/cover.png");
    expect(metadata.ogTags.has("og:image")).toBe(false);
    expect(metadata.ogTags.get("og:title")).toBe("T");
  });

  it("resolves a relative og:image against the page URL", () => {
    const $ = cheerio.load('<meta property="og:image" content="/img/cover.jpg">');
    expect(extractMetadata($, PAGE_URL).coverImageUrl).toBe("https://example.com/img/cover.jpg");
  });

  it("has no cover image when og:image is blank", () => {
    const $ = cheerio.load('<meta property="og:image" content=" ">');
    const metadata = extractMetadata($, PAGE_URL);
    expect(metadata.coverImageUrl).toBeUndefined();
    expect(metadata.ogTags.has("og:image")).toBe(false);
  });
});
