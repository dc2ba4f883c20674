export { AgentFeed, type AgentFeedOptions, mapToolStatus, type RowAction } from "./agent-feed.js";
export type {
  ClearEvent,
  DividerEvent,
  FeedEvent,
  FeedEventType,
  FinishEvent,
  TextEvent,
  ThinkingDoneEvent,
  ThinkingEvent,
  ToolCallEvent,
  ToolCanceledEvent,
  ToolErrorEvent,
  UserDequeuedEvent,
  UserEvent,
  UserQueuedEvent,
} from "./events.js";
export { MessageQueue, type MessageQueueOptions } from "./message-queue.js";
export { feedEventSchema, parseFeedEvent, parseFeedEventLine } from "./schema.js";
