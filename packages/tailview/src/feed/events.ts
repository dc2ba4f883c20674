/**
 * Events a producer (an agent session, a replayed recording) emits to build
 * up the message feed. Every event is plain data, so it can cross a queue or
 * be read back from a JSONL file.
 *
 * @module
 */

import type { FileDiff } from "../items/tool-item.js";

/** A streamed chunk of assistant text */
export interface TextEvent {
  type: "text";
  delta: string;
}

/** A streamed chunk of reasoning */
export interface ThinkingEvent {
  type: "thinking";
  delta: string;
}

/** The current reasoning block is complete */
export interface ThinkingDoneEvent {
  type: "thinking_done";
  durationMs: number;
}

/**
 * Creation of, or an update to, a tool call. Later events for the same
 * `toolCallId` update the existing item.
 */
export interface ToolCallEvent {
  type: "tool_call";
  toolCallId: string;
  title?: string;
  kind?: string;
  /** `pending`, `in_progress`, `completed`, `error`, `canceled` or `cancelled` */
  status?: string;
  input?: Record<string, unknown>;
  output?: string;
  fileDiff?: FileDiff;
  /** Subagent session, once created */
  sessionId?: string;
}

export interface ToolErrorEvent {
  type: "tool_error";
  toolCallId: string;
  error: string;
}

export interface ToolCanceledEvent {
  type: "tool_canceled";
  toolCallId: string;
}

export interface DividerEvent {
  type: "divider";
  iteration: number;
}

/** A user message the producer has started working on */
export interface UserEvent {
  type: "user";
  text: string;
}

/** A user message sent while the producer was busy */
export interface UserQueuedEvent {
  type: "user_queued";
  text: string;
}

/** The oldest queued user message has been picked up */
export interface UserDequeuedEvent {
  type: "user_dequeued";
  text?: string;
}

export interface FinishEvent {
  type: "finish";
  /** "cancelled" marks outstanding tools as canceled */
  reason?: string;
  error?: string;
  model?: string;
  provider?: string;
  durationMs: number;
}

export interface ClearEvent {
  type: "clear";
}

export type FeedEvent =
  | TextEvent
  | ThinkingEvent
  | ThinkingDoneEvent
  | ToolCallEvent
  | ToolErrorEvent
  | ToolCanceledEvent
  | DividerEvent
  | UserEvent
  | UserQueuedEvent
  | UserDequeuedEvent
  | FinishEvent
  | ClearEvent;

export type FeedEventType = FeedEvent["type"];
