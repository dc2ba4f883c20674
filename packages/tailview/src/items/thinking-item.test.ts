import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { isExpandable } from "./item.js";
import { ThinkingItem } from "./thinking-item.js";

beforeAll(() => {
  chalk.level = 0;
});

const twelveLines = Array.from({ length: 12 }, (_, index) => `l${index + 1}`).join("\n");

describe("ThinkingItem", () => {
  it("shows only the most recent lines while collapsed", () => {
    const lines = new ThinkingItem("th1", twelveLines).render(20);

    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe("  … (2 lines hidden)");
    expect(lines[1]).toBe("  l3");
    expect(lines[10]).toBe("  l12");
  });

  it("shows everything when expanded", () => {
    const item = new ThinkingItem("th1", twelveLines);
    item.render(20);
    item.toggleExpanded();

    expect(item.isExpanded()).toBe(true);
    expect(item.height()).toBe(0);

    const lines = item.render(20);
    expect(lines).toHaveLength(12);
    expect(lines[0]).toBe("  l1");
  });

  it("adds a footer once finished", () => {
    const item = new ThinkingItem("th1", "pondering");
    item.finish(1200);

    expect(item.isFinished()).toBe(true);
    expect(item.render(30)).toEqual(["  pondering", "  Thought for 1.2s"]);
  });

  it("honours a custom preview length", () => {
    const lines = new ThinkingItem("th1", "a\nb\nc", { previewLines: 1 }).render(20);

    expect(lines).toEqual(["  … (2 lines hidden)", "  c"]);
  });

  it("is expandable", () => {
    expect(isExpandable(new ThinkingItem("th1", ""))).toBe(true);
  });
});
