import { describe, expect, it } from "vitest";
import { StubItem } from "../testing/stub-item.js";
import { clampDimension, isExpandable, layoutWidth } from "./item.js";
import { ToolItem } from "./tool-item.js";

describe("item contract", () => {
  it("renders idempotently for a fixed width", () => {
    const item = new StubItem("a", ["one", "two"]);

    const first = item.render(40);
    const second = item.render(40);

    expect(second).toEqual(first);
    expect(item.layoutCount).toBe(1);
  });

  it("recomputes at a new width and after invalidation", () => {
    const item = new StubItem("a", 2);
    item.render(40);
    item.render(41);
    expect(item.layoutCount).toBe(2);

    item.invalidate();
    expect(item.height()).toBe(0);
    item.render(41);
    expect(item.layoutCount).toBe(3);
  });

  it("shares one cache entry for all non-positive widths", () => {
    const item = new StubItem("a", 1);
    item.render(-3);
    item.render(0);

    expect(item.layoutCount).toBe(1);
  });

  it("detects expandable items", () => {
    expect(isExpandable(new ToolItem("t", { name: "bash" }))).toBe(true);
    expect(isExpandable(new StubItem("a", 1))).toBe(false);
  });

  it("clamps dimensions", () => {
    expect(clampDimension(-4)).toBe(0);
    expect(clampDimension(7.9)).toBe(7);
    expect(clampDimension(Number.NaN)).toBe(0);
    expect(layoutWidth(0)).toBe(1);
    expect(layoutWidth(12.5)).toBe(12);
  });
});
