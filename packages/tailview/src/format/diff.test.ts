import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { renderColoredDiff, renderDiffBlock, unifiedDiffLines } from "./diff.js";

describe("unifiedDiffLines", () => {
  it("produces hunks with context and no file headers", () => {
    expect(unifiedDiffLines("a\nb\n", "a\nc\n")).toEqual(["@@ -1,2 +1,2 @@", " a", "-b", "+c"]);
  });

  it("treats a missing trailing newline the same as a present one", () => {
    expect(unifiedDiffLines("x", "y")).toEqual(["@@ -1,1 +1,1 @@", "-x", "+y"]);
  });

  it("is empty for equal texts", () => {
    expect(unifiedDiffLines("same\n", "same")).toEqual([]);
  });
});

describe("renderColoredDiff", () => {
  beforeAll(() => {
    chalk.level = 1;
  });

  it("colors additions green and removals red", () => {
    const lines = renderColoredDiff("+added\n-removed\n@@ -1 +1 @@").split("\n");

    expect(lines[0]).toBe(chalk.green("+added"));
    expect(lines[1]).toBe(chalk.red("-removed"));
    expect(lines[2]).toBe(chalk.cyan("@@ -1 +1 @@"));
  });

  it("bolds file headers rather than coloring them as changes", () => {
    expect(renderColoredDiff("--- a.ts")).toBe(chalk.bold("--- a.ts"));
    expect(renderColoredDiff("+++ b.ts")).toBe(chalk.bold("+++ b.ts"));
  });

  it("renders nothing for equal texts", () => {
    expect(renderDiffBlock("same", "same")).toEqual([]);
  });
});
