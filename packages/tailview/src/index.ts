// Items
export {
  BaseItem,
  clampDimension,
  DividerItem,
  type Expandable,
  type FileDiff,
  formatClock,
  type InfoData,
  InfoItem,
  isExpandable,
  type ListItem,
  type LogEntry,
  LogItem,
  layoutWidth,
  type MessageItem,
  type MessageKind,
  RenderCache,
  type SubagentData,
  SubagentItem,
  TextItem,
  type TextItemOptions,
  type TextTone,
  ThinkingItem,
  type ThinkingItemOptions,
  type ToolCallData,
  type ToolCallPatch,
  ToolItem,
  type ToolItemOptions,
  type ToolStatus,
  UserItem,
  type UserItemOptions,
} from "./items/index.js";

// List
export {
  bottomCursor,
  type Cursor,
  clampCursor,
  cursorEquals,
  cursorToLine,
  type KeyEvent,
  type LineSpace,
  lineToCursor,
  type NavigationKey,
  navigationKey,
  ORIGIN,
  ScrollList,
  type ScrollListOptions,
  scrollCursor,
  totalLines,
} from "./list/index.js";

// Producer side
export {
  AgentFeed,
  type AgentFeedOptions,
  type FeedEvent,
  type FeedEventType,
  type FinishEvent,
  feedEventSchema,
  MessageQueue,
  type MessageQueueOptions,
  mapToolStatus,
  parseFeedEvent,
  parseFeedEventLine,
  type RowAction,
  type ToolCallEvent,
} from "./feed/index.js";

// Formatting
export {
  defaultTheme,
  formatDuration,
  formatParamValue,
  formatToolParams,
  getTheme,
  indentLines,
  padRight,
  renderColoredDiff,
  renderDiffBlock,
  renderMarkdown,
  resetMarkdownRenderer,
  rightAlign,
  type Style,
  setTheme,
  type Theme,
  truncateLine,
  unifiedDiffLines,
  visibleWidth,
  wrapText,
} from "./format/index.js";

// Core
export {
  MAX_CONTENT_WIDTH,
  MIN_DIVIDER_RULE,
  SELECTION_MARKER,
  SUBAGENT_MIN_BOX_WIDTH,
  THINKING_PREVIEW_LINES,
  TOOL_MAX_LINES,
} from "./core/constants.js";
export { FeedEventError, type FeedEventIssue, QueueClosedError } from "./core/errors.js";

// Logging
export {
  closeLogFiles,
  createLogger,
  defaultLogger,
  LOG_LEVEL_NAMES,
  type LoggerOptions,
  parseLogLevel,
} from "./logging/logger.js";
