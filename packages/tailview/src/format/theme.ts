/**
 * Styles used by the item variants.
 *
 * The active theme is read at layout time, so switching themes only shows
 * up after the affected items are invalidated (see `ScrollList.invalidateAll`).
 *
 * @module
 */

import chalk from "chalk";

export type Style = (text: string) => string;

export interface Theme {
  assistantBorder: Style;
  userBorder: Style;
  queuedBadge: Style;
  thinkingText: Style;
  thinkingHint: Style;
  thinkingFooter: Style;
  toolPending: Style;
  toolSuccess: Style;
  toolError: Style;
  toolName: Style;
  toolParams: Style;
  toolOutput: Style;
  toolHint: Style;
  subagentBorder: Style;
  subagentType: Style;
  subagentHint: Style;
  info: Style;
  divider: Style;
  errorText: Style;
  canceledText: Style;
  diffAdded: Style;
  diffRemoved: Style;
  diffHunk: Style;
  diffHeader: Style;
  diffContext: Style;
  logTime: Style;
  logLevels: Record<string, Style>;
}

/**
 * Chalk-backed default. Chalk's own color level (including `chalk.level = 0`)
 * decides whether escapes are emitted.
 */
export const defaultTheme: Theme = {
  assistantBorder: (text) => chalk.cyan(text),
  userBorder: (text) => chalk.magenta(text),
  queuedBadge: (text) => chalk.black.bgYellow(text),
  thinkingText: (text) => chalk.dim.italic(text),
  thinkingHint: (text) => chalk.dim(text),
  thinkingFooter: (text) => chalk.dim(text),
  toolPending: (text) => chalk.yellow(text),
  toolSuccess: (text) => chalk.green(text),
  toolError: (text) => chalk.red(text),
  toolName: (text) => chalk.bold(text),
  toolParams: (text) => chalk.dim(text),
  toolOutput: (text) => chalk.gray(text),
  toolHint: (text) => chalk.dim.italic(text),
  subagentBorder: (text) => chalk.blue(text),
  subagentType: (text) => chalk.blue.bold(text),
  subagentHint: (text) => chalk.dim.underline(text),
  info: (text) => chalk.dim(text),
  divider: (text) => chalk.gray(text),
  errorText: (text) => chalk.red(text),
  canceledText: (text) => chalk.yellow(text),
  diffAdded: (text) => chalk.green(text),
  diffRemoved: (text) => chalk.red(text),
  diffHunk: (text) => chalk.cyan(text),
  diffHeader: (text) => chalk.bold(text),
  diffContext: (text) => chalk.dim(text),
  logTime: (text) => chalk.gray(text),
  logLevels: {
    SILLY: (text) => chalk.gray(text),
    TRACE: (text) => chalk.gray(text),
    DEBUG: (text) => chalk.blue(text),
    INFO: (text) => chalk.green(text),
    WARN: (text) => chalk.yellow(text),
    ERROR: (text) => chalk.red(text),
    FATAL: (text) => chalk.bgRed.white(text),
  },
};

let activeTheme: Theme = defaultTheme;

export function getTheme(): Theme {
  return activeTheme;
}

/**
 * Replace the active theme. Pass a partial theme to override single styles.
 */
export function setTheme(theme: Partial<Theme>): void {
  activeTheme = { ...defaultTheme, ...theme };
}
