import { describe, expect, it } from "vitest";
import { formatToolParams } from "./params.js";

describe("formatToolParams", () => {
  it("puts the command first and the rest in parentheses", () => {
    expect(formatToolParams({ command: "ls -la", cwd: "/tmp" }, 40)).toBe("ls -la (cwd=/tmp)");
  });

  it("uses filePath as the primary parameter when there is no command", () => {
    expect(formatToolParams({ limit: 10, filePath: "a.ts" }, 40)).toBe("a.ts (limit=10)");
  });

  it("lists parameters without a primary one", () => {
    expect(formatToolParams({ pattern: "*.ts", recursive: true }, 40)).toBe(
      "(pattern=*.ts, recursive=true)",
    );
  });

  it("serializes nested values as JSON", () => {
    expect(formatToolParams({ opts: { a: 1 } }, 40)).toBe('(opts={"a":1})');
  });

  it("returns an empty string for no input", () => {
    expect(formatToolParams({}, 40)).toBe("");
  });

  it("truncates to the available width", () => {
    expect(formatToolParams({ command: "abcdefghijkl" }, 8)).toBe("abcde...");
    expect(formatToolParams({ command: "abcdefghijkl" }, 3)).toBe("abc");
  });
});
