import { describe, expect, it } from "vitest";
import { padRight, rightAlign, truncateLine, visibleWidth, wrapText } from "./text.js";

describe("wrapText", () => {
  it("returns a single empty line for empty text", () => {
    expect(wrapText("", 10)).toEqual([""]);
  });

  it("wraps at word boundaries", () => {
    expect(wrapText("alpha beta gamma", 12)).toEqual(["alpha beta", "gamma"]);
  });

  it("keeps blank lines", () => {
    expect(wrapText("a\n\nb", 10)).toEqual(["a", "", "b"]);
  });

  it("repeats leading indentation on continuation rows", () => {
    expect(wrapText("    code line here", 12)).toEqual(["    code", "    line", "    here"]);
  });

  it("splits without wrapping when the width is not positive", () => {
    expect(wrapText("one two\nthree", 0)).toEqual(["one two", "three"]);
  });
});

describe("truncateLine", () => {
  it("leaves short lines alone", () => {
    expect(truncateLine("hello", 5)).toBe("hello");
  });

  it("cuts long lines and appends an ellipsis", () => {
    expect(truncateLine("hello world", 5)).toBe("hell…");
  });

  it("handles tiny widths", () => {
    expect(truncateLine("hello", 1)).toBe("…");
    expect(truncateLine("hello", 0)).toBe("");
  });
});

describe("width helpers", () => {
  it("measures wide characters as two columns", () => {
    expect(visibleWidth("日本")).toBe(4);
    expect(visibleWidth("")).toBe(0);
  });

  it("pads on the right", () => {
    expect(padRight("ab", 4)).toBe("ab  ");
    expect(padRight("abcdef", 4)).toBe("abcdef");
  });

  it("right-aligns each line", () => {
    expect(rightAlign(["ab", "abcd"], 4)).toEqual(["  ab", "abcd"]);
  });
});
