import { describe, it, expect } from "vitest";
import { categorize, TAG_CATEGORIES } from "../../src/extractor/tags.js";

describe("categorize", () => {
  it.each([
    ["h1", "heading"],
    ["h2", "heading"],
    ["h3", "heading"],
    ["p", "paragraph"],
    ["li", "paragraph"],
    ["nav", "excluded"],
    ["summary", "excluded"],
    ["details", "excluded"],
    ["a", "anchor"],
  ] as const)("maps <%s> to %s", (tag, category) => {
    expect(categorize(tag)).toBe(category);
  });

  it("treats h4 to h6 as other", () => {
    expect(categorize("h4")).toBe("other");
    expect(categorize("h5")).toBe("other");
    expect(categorize("h6")).toBe("other");
  });

  it("maps unknown tags to other", () => {
    expect(categorize("div")).toBe("other");
    expect(categorize("section")).toBe("other");
  });

  it("ignores case", () => {
    expect(categorize("H2")).toBe("heading");
    expect(categorize("NAV")).toBe("excluded");
  });

  it("has exactly nine entries", () => {
    expect(TAG_CATEGORIES.size).toBe(9);
  });
});
