export { BaseItem } from "./base-item.js";
export { DividerItem } from "./divider-item.js";
export { type InfoData, InfoItem } from "./info-item.js";
export {
  clampDimension,
  type Expandable,
  isExpandable,
  type ListItem,
  layoutWidth,
} from "./item.js";
export { formatClock, type LogEntry, LogItem } from "./log-item.js";
export type { MessageItem, MessageKind } from "./message-item.js";
export { RenderCache } from "./render-cache.js";
export { type SubagentData, SubagentItem } from "./subagent-item.js";
export { TextItem, type TextItemOptions, type TextTone } from "./text-item.js";
export { ThinkingItem, type ThinkingItemOptions } from "./thinking-item.js";
export {
  type FileDiff,
  type ToolCallData,
  type ToolCallPatch,
  ToolItem,
  type ToolItemOptions,
  type ToolStatus,
} from "./tool-item.js";
export { UserItem, type UserItemOptions } from "./user-item.js";
