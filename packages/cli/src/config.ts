import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import { LOG_LEVELS, type LogLevelName } from "./constants.js";

/**
 * Global CLI options that apply to all commands.
 */
export interface GlobalConfig {
  "log-level"?: LogLevelName;
}

/**
 * Frame layout defaults.
 */
export interface ViewConfig {
  width?: number;
  height?: number;
  scrollbar?: boolean;
  "item-gap"?: boolean;
  "selection-marker"?: string;
}

export interface ToolConfig {
  "max-lines"?: number;
}

export interface ThinkingConfig {
  "preview-lines"?: number;
}

/**
 * Root configuration structure matching ~/.tailview/cli.toml.
 */
export interface CLIConfig {
  global?: GlobalConfig;
  view?: ViewConfig;
  tool?: ToolConfig;
  thinking?: ThinkingConfig;
}

const GLOBAL_CONFIG_KEYS = new Set(["log-level"]);
const VIEW_CONFIG_KEYS = new Set(["width", "height", "scrollbar", "item-gap", "selection-marker"]);
const TOOL_CONFIG_KEYS = new Set(["max-lines"]);
const THINKING_CONFIG_KEYS = new Set(["preview-lines"]);

/**
 * Returns the config file path: TAILVIEW_CONFIG when set, else ~/.tailview/cli.toml
 */
export function getConfigPath(): string {
  const override = process.env.TAILVIEW_CONFIG?.trim();
  return override ? override : join(homedir(), ".tailview", "cli.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validates that a value is a string.
 */
function validateString(value: unknown, key: string, section: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`[${section}].${key} must be a string`);
  }
  return value;
}

/**
 * Validates that a value is a number within optional bounds.
 */
function validateNumber(
  value: unknown,
  key: string,
  section: string,
  opts?: { min?: number; max?: number; integer?: boolean },
): number {
  if (typeof value !== "number") {
    throw new ConfigError(`[${section}].${key} must be a number`);
  }
  if (opts?.integer && !Number.isInteger(value)) {
    throw new ConfigError(`[${section}].${key} must be an integer`);
  }
  if (opts?.min !== undefined && value < opts.min) {
    throw new ConfigError(`[${section}].${key} must be >= ${opts.min}`);
  }
  if (opts?.max !== undefined && value > opts.max) {
    throw new ConfigError(`[${section}].${key} must be <= ${opts.max}`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 */
function validateBoolean(value: unknown, key: string, section: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigError(`[${section}].${key} must be a boolean`);
  }
  return value;
}

/**
 * Checks that `raw` is a table holding only `allowed` keys.
 */
function validateTable(raw: unknown, section: string, allowed: Set<string>): Record<string, unknown> {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  for (const key of Object.keys(raw)) {
    if (!allowed.has(key)) {
      throw new ConfigError(`[${section}].${key} is not a valid option`);
    }
  }
  return raw;
}

function validateGlobalConfig(raw: unknown, section: string): GlobalConfig {
  const table = validateTable(raw, section, GLOBAL_CONFIG_KEYS);
  const result: GlobalConfig = {};

  if ("log-level" in table) {
    const level = validateString(table["log-level"], "log-level", section).toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`[${section}].log-level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    result["log-level"] = level;
  }

  return result;
}

function validateViewConfig(raw: unknown, section: string): ViewConfig {
  const table = validateTable(raw, section, VIEW_CONFIG_KEYS);
  const result: ViewConfig = {};

  if ("width" in table) {
    result.width = validateNumber(table.width, "width", section, { integer: true, min: 1 });
  }
  if ("height" in table) {
    result.height = validateNumber(table.height, "height", section, { integer: true, min: 1 });
  }
  if ("scrollbar" in table) {
    result.scrollbar = validateBoolean(table.scrollbar, "scrollbar", section);
  }
  if ("item-gap" in table) {
    result["item-gap"] = validateBoolean(table["item-gap"], "item-gap", section);
  }
  if ("selection-marker" in table) {
    result["selection-marker"] = validateString(
      table["selection-marker"],
      "selection-marker",
      section,
    );
  }

  return result;
}

function validateToolConfig(raw: unknown, section: string): ToolConfig {
  const table = validateTable(raw, section, TOOL_CONFIG_KEYS);
  const result: ToolConfig = {};
  if ("max-lines" in table) {
    result["max-lines"] = validateNumber(table["max-lines"], "max-lines", section, {
      integer: true,
      min: 0,
    });
  }
  return result;
}

function validateThinkingConfig(raw: unknown, section: string): ThinkingConfig {
  const table = validateTable(raw, section, THINKING_CONFIG_KEYS);
  const result: ThinkingConfig = {};
  if ("preview-lines" in table) {
    result["preview-lines"] = validateNumber(table["preview-lines"], "preview-lines", section, {
      integer: true,
      min: 0,
    });
  }
  return result;
}

/**
 * Validates and normalizes raw TOML object to CLIConfig.
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (!isTable(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result: CLIConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    try {
      switch (key) {
        case "global":
          result.global = validateGlobalConfig(value, key);
          break;
        case "view":
          result.view = validateViewConfig(value, key);
          break;
        case "tool":
          result.tool = validateToolConfig(value, key);
          break;
        case "thinking":
          result.thinking = validateThinkingConfig(value, key);
          break;
        default:
          throw new ConfigError(`[${key}] is not a valid section`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  return result;
}

/**
 * Parses TOML text into a validated CLIConfig.
 *
 * @throws ConfigError on syntax errors or invalid fields
 */
export function parseConfig(content: string, configPath?: string): CLIConfig {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }
  return validateConfig(raw, configPath);
}

/**
 * Loads configuration from {@link getConfigPath}.
 * Returns empty config if the file doesn't exist.
 *
 * @throws ConfigError if the file exists but has invalid syntax or unknown fields
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return parseConfig(content, configPath);
}
