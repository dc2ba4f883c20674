import { type Command, InvalidArgumentError } from "commander";
import { type ListItem, type NavigationKey, navigationKey, ScrollList, SELECTION_MARKER } from "tailview";
import type { CLIConfig } from "./config.js";
import { DEFAULT_HEIGHT, DEFAULT_WIDTH, OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import { createNumericParser } from "./utils.js";

/**
 * One replayed input: a navigation key or a click on a viewport row.
 */
export type ListInput = { type: "key"; key: NavigationKey } | { type: "click"; row: number };

/**
 * Frame options shared by every command (camelCase, matching Commander output).
 */
export interface CLIViewOptions {
  width: number;
  height: number;
  keys?: ListInput[];
  expandAll?: boolean;
  /** false when --no-scrollbar is given */
  scrollbar: boolean;
  /** true when --item-gap is given */
  itemGap?: boolean;
}

/**
 * Flags merged with config: everything a command needs to build its list.
 */
export interface ViewSettings {
  width: number;
  height: number;
  scrollbar: boolean;
  itemGap: boolean;
  selectionMarker: string;
  expandAll: boolean;
  inputs: ListInput[];
  toolMaxLines?: number;
  thinkingPreviewLines?: number;
}

const CLICK_PATTERN = /^click:(\d+)$/;

/**
 * Parses a comma-separated input list such as `pgup,home,click:3`.
 */
export function parseInputList(value: string): ListInput[] {
  const inputs: ListInput[] = [];
  for (const raw of value.split(",")) {
    const token = raw.trim().toLowerCase();
    if (token === "") {
      continue;
    }
    const click = CLICK_PATTERN.exec(token);
    if (click) {
      inputs.push({ type: "click", row: Number(click[1]) });
      continue;
    }
    const key = navigationKey(token);
    if (!key) {
      throw new InvalidArgumentError(
        `Unknown key "${raw.trim()}". Expected pgup, pgdown, home, end or click:<row>.`,
      );
    }
    inputs.push({ type: "key", key });
  }
  return inputs;
}

/**
 * Adds the shared frame options to a Commander command.
 *
 * @param cmd - Command to add options to
 * @param config - Optional config file, whose [view] values become the defaults
 */
export function addViewOptions(cmd: Command, config?: CLIConfig): Command {
  return cmd
    .option(
      OPTION_FLAGS.width,
      OPTION_DESCRIPTIONS.width,
      createNumericParser({ label: "Width", integer: true, min: 1 }),
      config?.view?.width ?? DEFAULT_WIDTH,
    )
    .option(
      OPTION_FLAGS.height,
      OPTION_DESCRIPTIONS.height,
      createNumericParser({ label: "Height", integer: true, min: 1 }),
      config?.view?.height ?? DEFAULT_HEIGHT,
    )
    .option(OPTION_FLAGS.keys, OPTION_DESCRIPTIONS.keys, parseInputList)
    .option(OPTION_FLAGS.expandAll, OPTION_DESCRIPTIONS.expandAll)
    .option(OPTION_FLAGS.noScrollbar, OPTION_DESCRIPTIONS.noScrollbar)
    .option(OPTION_FLAGS.itemGap, OPTION_DESCRIPTIONS.itemGap);
}

/**
 * Merges parsed flags with the config file. Flags win; negated flags can
 * only switch a feature off.
 */
export function resolveViewSettings(options: CLIViewOptions, config?: CLIConfig): ViewSettings {
  const view = config?.view;
  return {
    width: options.width,
    height: options.height,
    scrollbar: options.scrollbar && (view?.scrollbar ?? true),
    itemGap: options.itemGap ?? view?.["item-gap"] ?? false,
    selectionMarker: view?.["selection-marker"] ?? SELECTION_MARKER,
    expandAll: options.expandAll ?? false,
    inputs: options.keys ?? [],
    toolMaxLines: config?.tool?.["max-lines"],
    thinkingPreviewLines: config?.thinking?.["preview-lines"],
  };
}

/**
 * A list sized for the frame. The scrollbar, when drawn, takes the last column.
 */
export function createFrameList<T extends ListItem>(settings: ViewSettings): ScrollList<T> {
  const listWidth = Math.max(1, settings.width - (settings.scrollbar ? 1 : 0));
  return new ScrollList<T>(listWidth, settings.height, {
    itemGap: settings.itemGap,
    selectionMarker: settings.selectionMarker,
  });
}

/**
 * Replays inputs against a focused list. Clicks go to `onClick`.
 */
export function replayInputs<T extends ListItem>(
  list: ScrollList<T>,
  inputs: readonly ListInput[],
  onClick: (row: number) => void,
): void {
  if (inputs.length === 0) {
    return;
  }
  list.setFocused(true);
  for (const input of inputs) {
    if (input.type === "key") {
      list.update(input.key);
    } else {
      onClick(input.row);
    }
  }
}
