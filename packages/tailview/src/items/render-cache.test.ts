import { describe, expect, it, vi } from "vitest";
import { RenderCache } from "./render-cache.js";

describe("RenderCache", () => {
  it("starts empty and unknown", () => {
    const cache = new RenderCache();

    expect(cache.valid).toBe(false);
    expect(cache.height).toBe(0);
    expect(cache.width).toBe(-1);
  });

  it("runs layout once per width", () => {
    const cache = new RenderCache();
    const layout = vi.fn((width: number) => [`w${width}`, "second"]);

    expect(cache.resolve(10, layout)).toEqual(["w10", "second"]);
    expect(cache.resolve(10, layout)).toEqual(["w10", "second"]);
    expect(layout).toHaveBeenCalledTimes(1);
    expect(cache.height).toBe(2);
  });

  it("never serves lines cached for another width", () => {
    const cache = new RenderCache();
    const layout = vi.fn((width: number) => [`w${width}`]);

    cache.resolve(10, layout);
    expect(cache.resolve(20, layout)).toEqual(["w20"]);
    expect(cache.width).toBe(20);
    expect(layout).toHaveBeenCalledTimes(2);
  });

  it("hands out copies", () => {
    const cache = new RenderCache();
    const lines = cache.resolve(10, () => ["a"]);
    lines.push("mutated");

    expect(cache.resolve(10, () => ["b"])).toEqual(["a"]);
  });

  it("keeps the previous lines after invalidation but stops serving them", () => {
    const cache = new RenderCache();
    cache.resolve(10, () => ["old"]);
    cache.invalidate();

    expect(cache.valid).toBe(false);
    expect(cache.isValidFor(10)).toBe(false);
    expect(cache.height).toBe(0);
    expect(cache.lastLines).toEqual(["old"]);
    expect(cache.resolve(10, () => ["new"])).toEqual(["new"]);
  });
});
