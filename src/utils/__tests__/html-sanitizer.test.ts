import { describe, it, expect } from "vitest";
import { normalizeWhitespace, stripHtml } from "../html-sanitizer";

describe("stripHtml", () => {
  it("should join text between tags with a single space", () => {
    expect(stripHtml("<p>Hello <b>World</b></p>")).toBe("Hello World");
    expect(stripHtml("<ul><li>a</li><li>b</li></ul>")).toBe("a b");
  });

  it("should return an empty string for empty input", () => {
    expect(stripHtml("")).toBe("");
    expect(stripHtml(null)).toBe("");
    expect(stripHtml(undefined)).toBe("");
  });

  it("should collapse newlines and whitespace runs", () => {
    expect(stripHtml("<div>line one\n\n   line two</div>")).toBe(
      "line one line two"
    );
    expect(stripHtml("  plain\ttext  ")).toBe("plain text");
  });

  it("should decode character references", () => {
    expect(stripHtml("Tom &amp; Jerry")).toBe("Tom & Jerry");
  });

  it("should ignore HTML comments", () => {
    expect(stripHtml("<p>x</p><!-- note -->")).toBe("x");
  });

  it("should recover text from malformed markup", () => {
    expect(stripHtml("<p>unclosed <b>tag")).toBe("unclosed tag");
  });

  it("should strip markup that only appears after decoding", () => {
    expect(stripHtml("a &lt;b&gt;bold&lt;/b&gt; c")).toBe("a bold c");
  });

  it("should be idempotent", () => {
    const inputs = [
      "<p>Hello <b>World</b></p>",
      "a &lt;b&gt;bold&lt;/b&gt; c",
      "Tom &amp; Jerry",
      "x < y and y > z",
      "<p>unclosed <b>tag",
      "  spaced\n\nout  ",
      "",
    ];

    for (const input of inputs) {
      const once = stripHtml(input);
      expect(stripHtml(once)).toBe(once);
    }
  });
});

describe("normalizeWhitespace", () => {
  it("should collapse runs and trim", () => {
    expect(normalizeWhitespace("  multi\n   line\tvalue ")).toBe(
      "multi line value"
    );
  });
});
