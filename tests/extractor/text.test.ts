/**
 * @fileoverview Tests for whitespace normalization.
 */

import { describe, it, expect } from "vitest";
import { normalizeText } from "../../src/extractor/text.js";

describe("normalizeText", () => {
  it("collapses newline, carriage return and tab runs into one space", () => {
    expect(normalizeText("Hello\r\n\t\tworld")).toBe("Hello world");
  });

  it("collapses runs of spaces", () => {
    expect(normalizeText("a    b  c")).toBe("a b c");
  });

  it("turns non-breaking spaces into plain spaces", () => {
    expect(normalizeText("Price:\u00a010\u00a0EUR")).toBe("Price: 10 EUR");
  });

  it("trims leading and trailing whitespace", () => {
    expect(normalizeText("  \n padded \t ")).toBe("padded");
  });

  it("returns undefined for null and undefined", () => {
    expect(normalizeText(null)).toBeUndefined();
    expect(normalizeText(undefined)).toBeUndefined();
  });

  it("returns undefined for blank input", () => {
    expect(normalizeText("")).toBeUndefined();
    expect(normalizeText(" \r\n\t  ")).toBeUndefined();
  });

  it("drops the literal word undefined in any case", () => {
    expect(normalizeText("undefined")).toBeUndefined();
    expect(normalizeText("  UNDEFINED ")).toBeUndefined();
    expect(normalizeText('"undefined"')).toBeUndefined();
  });

  it("keeps text that only contains the word undefined", () => {
    expect(normalizeText("undefined behaviour")).toBe("undefined behaviour");
  });

  it("is idempotent", () => {
    const inputs = ["  a\n\nb  ", "x y", "one\ttwo three"];
    for (const input of inputs) {
      const once = normalizeText(input);
      expect(normalizeText(once)).toBe(once);
    }
  });

  it("never returns a string with leading, trailing or doubled whitespace", () => {
    const result = normalizeText("\t lots \n\n of \r\n   space  ");
    expect(result).toBe("lots of space");
  });
});
