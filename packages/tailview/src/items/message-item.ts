import type { DividerItem } from "./divider-item.js";
import type { InfoItem } from "./info-item.js";
import type { LogItem } from "./log-item.js";
import type { SubagentItem } from "./subagent-item.js";
import type { TextItem } from "./text-item.js";
import type { ThinkingItem } from "./thinking-item.js";
import type { ToolItem } from "./tool-item.js";
import type { UserItem } from "./user-item.js";

/**
 * Every item variant, discriminated by `kind`.
 */
export type MessageItem =
  | TextItem
  | UserItem
  | ThinkingItem
  | ToolItem
  | SubagentItem
  | InfoItem
  | DividerItem
  | LogItem;

export type MessageKind = MessageItem["kind"];
