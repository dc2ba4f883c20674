import { LOG_LEVEL_NAMES } from "tailview";

/** CLI program name */
export const CLI_NAME = "tailview";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION =
  "Replay recorded agent event streams and log files through a virtualized terminal list.";

/** CLI version shown by --version */
export const CLI_VERSION = "0.1.0";

/** Available CLI commands */
export const COMMANDS = {
  replay: "replay",
  logs: "logs",
} as const;

/** Valid log level names */
export const LOG_LEVELS = LOG_LEVEL_NAMES;
export type LogLevelName = (typeof LOG_LEVELS)[number];

/** Frame size used when neither flags nor config give one */
export const DEFAULT_WIDTH = 80;
export const DEFAULT_HEIGHT = 24;

/** Command-line option flags */
export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  width: "-W, --width <columns>",
  height: "-H, --height <rows>",
  keys: "-k, --keys <list>",
  expandAll: "--expand-all",
  noScrollbar: "--no-scrollbar",
  noColor: "--no-color",
  itemGap: "--item-gap",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  width: "Frame width in columns.",
  height: "Frame height in rows, excluding the status line.",
  keys: "Comma-separated input to replay before printing: pgup, pgdown, home, end, or click:<row>.",
  expandAll: "Show tool output and thinking blocks expanded.",
  noScrollbar: "Do not draw the scrollbar column.",
  noColor: "Disable colored output.",
  itemGap: "Separate items with a blank line.",
} as const;

/** Prefix for status and error lines written to stderr */
export const SUMMARY_PREFIX = "[tailview]";
