/**
 * Logs command: one list item per log line.
 *
 * @example
 * ```bash
 * tailview logs server.log --keys home
 * ```
 */

import type { Command } from "commander";
import { type LogEntry, LogItem } from "tailview";
import type { CLIConfig } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { renderFrame } from "./frame.js";
import {
  addViewOptions,
  type CLIViewOptions,
  createFrameList,
  replayInputs,
  resolveViewSettings,
} from "./option-helpers.js";
import { executeAction } from "./utils.js";

const LEVELS = new Set(["SILLY", "TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL"]);

// 2024-05-01T12:00:03Z, 2024-05-01T12:00:03.120+02:00, 2024-05-01T12:00:03 (read as UTC)
const ISO_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;

function parseTime(token: string): Date | undefined {
  const match = ISO_TIME.exec(token);
  if (!match) {
    return undefined;
  }
  const time = new Date(match[1] ? token : `${token}Z`);
  return Number.isNaN(time.getTime()) ? undefined : time;
}

/**
 * Splits `<ISO time> <LEVEL> <message>`. Lines in any other shape become a
 * bare message.
 */
export function parseLogLine(line: string): LogEntry {
  const match = /^(\S+)\s+(\S+)(?:\s+(.*))?$/.exec(line);
  if (match) {
    const time = parseTime(match[1]);
    const rawLevel = match[2].toUpperCase();
    const level = rawLevel === "WARNING" ? "WARN" : rawLevel;
    if (time && LEVELS.has(level)) {
      return { time, level, message: match[3] ?? "" };
    }
  }
  return { message: line };
}

/**
 * Render `filePath` as a log view and write the frame to stdout.
 * Blank lines are skipped.
 */
export async function executeLogs(
  filePath: string,
  options: CLIViewOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): Promise<void> {
  const logger = env.createLogger("logs");
  const settings = resolveViewSettings(options, config);
  const text = await env.readFile(filePath);

  const list = createFrameList<LogItem>(settings);
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() !== "") {
      list.appendItem(new LogItem(`log-${i + 1}`, parseLogLine(lines[i])));
    }
  }
  logger.debug(`Loaded ${list.length} log lines from ${filePath}`);

  replayInputs(list, settings.inputs, (row) => {
    const index = list.itemAtRow(row);
    list.setSelected(index);
  });

  env.stdout.write(`${renderFrame(list, { scrollbar: settings.scrollbar }).join("\n")}\n`);
}

/**
 * Register the logs command with the CLI program.
 */
export function registerLogsCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  const cmd = program
    .command(COMMANDS.logs)
    .description("Show a log file as a scrollable list and print the resulting frame.")
    .argument("<file>", "Path to a log file");

  addViewOptions(cmd, config).action((filePath: string, options: CLIViewOptions) =>
    executeAction(() => executeLogs(filePath, options, env, config), env),
  );
}
