/**
 * Replay command: feeds a recorded JSONL event stream through the list and
 * prints the resulting frame.
 *
 * @example
 * ```bash
 * tailview replay session.jsonl --height 30
 * tailview replay session.jsonl --keys pgup,pgup --expand-all
 * ```
 */

import type { Command } from "commander";
import {
  AgentFeed,
  type FeedEvent,
  FeedEventError,
  MessageQueue,
  type MessageItem,
  parseFeedEventLine,
} from "tailview";
import type { CLIConfig } from "./config.js";
import { COMMANDS, SUMMARY_PREFIX } from "./constants.js";
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

/**
 * Parses each non-blank line, handing invalid ones to `onInvalid` and
 * skipping them.
 */
export function* readFeedEvents(
  text: string,
  onInvalid: (error: FeedEventError) => void,
): Generator<FeedEvent> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === "") {
      continue;
    }
    try {
      yield parseFeedEventLine(line, i + 1);
    } catch (error) {
      if (!(error instanceof FeedEventError)) {
        throw error;
      }
      onInvalid(error);
    }
  }
}

/**
 * Replay `filePath` and write the frame to stdout. Invalid lines are
 * reported on stderr and set exit code 1, but the frame is still printed.
 */
export async function executeReplay(
  filePath: string,
  options: CLIViewOptions,
  env: CLIEnvironment,
  config?: CLIConfig,
): Promise<void> {
  const logger = env.createLogger("replay");
  const settings = resolveViewSettings(options, config);
  const text = await env.readFile(filePath);

  let invalid = 0;
  const queue = new MessageQueue<FeedEvent>({ name: "replay", logger: env.createLogger("queue") });
  const queued = await queue.pump(
    readFeedEvents(text, (error) => {
      invalid++;
      env.stderr.write(`${SUMMARY_PREFIX} ${error.message}\n`);
    }),
  );
  queue.close();
  logger.debug(`Read ${queued} events from ${filePath} (${invalid} invalid)`);

  const list = createFrameList<MessageItem>(settings);
  const feed = new AgentFeed(list, {
    logger: env.createLogger("feed"),
    expandAll: settings.expandAll,
    toolMaxLines: settings.toolMaxLines,
    thinkingPreviewLines: settings.thinkingPreviewLines,
  });
  queue.drain((event) => feed.apply(event));

  replayInputs(list, settings.inputs, (row) => {
    const action = feed.activateRow(row);
    if (action?.type === "open_subagent") {
      env.stderr.write(
        `${SUMMARY_PREFIX} subagent ${action.subagentType} session: ${action.sessionId}\n`,
      );
    } else if (action === undefined) {
      logger.debug(`Click on row ${row} hit nothing`);
    }
  });

  env.stdout.write(`${renderFrame(list, { scrollbar: settings.scrollbar }).join("\n")}\n`);

  if (invalid > 0) {
    env.setExitCode(1);
  }
}

/**
 * Register the replay command with the CLI program.
 */
export function registerReplayCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  const cmd = program
    .command(COMMANDS.replay)
    .description("Replay a JSONL file of feed events and print the resulting frame.")
    .argument("<file>", "Path to a JSONL file, one feed event per line");

  addViewOptions(cmd, config).action((filePath: string, options: CLIViewOptions) =>
    executeAction(() => executeReplay(filePath, options, env, config), env),
  );
}
