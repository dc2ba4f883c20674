import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, getConfigPath, loadConfig, parseConfig, validateConfig } from "./config.js";

describe("parseConfig", () => {
  it("reads every section", () => {
    const config = parseConfig(
      [
        "[global]",
        'log-level = "DEBUG"',
        "[view]",
        "width = 100",
        "height = 30",
        "scrollbar = false",
        "item-gap = true",
        'selection-marker = "> "',
        "[tool]",
        "max-lines = 4",
        "[thinking]",
        "preview-lines = 2",
      ].join("\n"),
    );

    expect(config).toEqual({
      global: { "log-level": "debug" },
      view: { width: 100, height: 30, scrollbar: false, "item-gap": true, "selection-marker": "> " },
      tool: { "max-lines": 4 },
      thinking: { "preview-lines": 2 },
    });
  });

  it("returns an empty config for an empty file", () => {
    expect(parseConfig("")).toEqual({});
  });

  it("rejects unknown sections", () => {
    expect(() => parseConfig('[agent]\nmodel = "x"')).toThrow("[agent] is not a valid section");
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig("[view]\ncolour = 1")).toThrow("[view].colour is not a valid option");
  });

  it("checks value types and bounds", () => {
    expect(() => parseConfig('[view]\nwidth = "wide"')).toThrow("[view].width must be a number");
    expect(() => parseConfig("[view]\nwidth = 0")).toThrow("[view].width must be >= 1");
    expect(() => parseConfig("[view]\nheight = 1.5")).toThrow("[view].height must be an integer");
    expect(() => parseConfig('[view]\nscrollbar = "no"')).toThrow(
      "[view].scrollbar must be a boolean",
    );
    expect(() => parseConfig("[tool]\nmax-lines = -1")).toThrow("[tool].max-lines must be >= 0");
  });

  it("rejects unknown log levels", () => {
    expect(() => parseConfig('[global]\nlog-level = "loud"')).toThrow(
      "[global].log-level must be one of: silly, trace, debug, info, warn, error, fatal",
    );
  });

  it("reports syntax errors as ConfigError", () => {
    expect(() => parseConfig("[view")).toThrow(ConfigError);
    expect(() => parseConfig("[view")).toThrow(/^Invalid TOML syntax:/);
  });

  it("prefixes messages with the file path", () => {
    expect(() => validateConfig({ view: { width: "wide" } }, "/etc/tailview.toml")).toThrow(
      "/etc/tailview.toml: [view].width must be a number",
    );
  });

  it("rejects a non-table root", () => {
    expect(() => validateConfig(42)).toThrow("Config must be a TOML table");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tailview-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns an empty config when the file is missing", () => {
    expect(loadConfig(join(dir, "missing.toml"))).toEqual({});
  });

  it("loads and validates a file", () => {
    const path = join(dir, "cli.toml");
    writeFileSync(path, "[view]\nwidth = 72\n");

    expect(loadConfig(path)).toEqual({ view: { width: 72 } });
  });

  it("names the file in validation errors", () => {
    const path = join(dir, "cli.toml");
    writeFileSync(path, "[view]\nwidth = true\n");

    expect(() => loadConfig(path)).toThrow(`${path}: [view].width must be a number`);
  });
});

describe("getConfigPath", () => {
  const original = process.env.TAILVIEW_CONFIG;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.TAILVIEW_CONFIG;
    } else {
      process.env.TAILVIEW_CONFIG = original;
    }
  });

  it("honors TAILVIEW_CONFIG", () => {
    process.env.TAILVIEW_CONFIG = "/tmp/custom.toml";
    expect(getConfigPath()).toBe("/tmp/custom.toml");
  });

  it("defaults to ~/.tailview/cli.toml", () => {
    delete process.env.TAILVIEW_CONFIG;
    expect(getConfigPath()).toMatch(/[/\\]\.tailview[/\\]cli\.toml$/);
  });
});
