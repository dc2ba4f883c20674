/**
 * Turns producer events into list items: streamed chunks merge into the
 * item they extend, tool updates find their item by id, and everything else
 * is appended.
 *
 * @module
 */

import type { ILogObj, Logger } from "tslog";
import { THINKING_PREVIEW_LINES, TOOL_MAX_LINES } from "../core/constants.js";
import { DividerItem } from "../items/divider-item.js";
import { InfoItem } from "../items/info-item.js";
import { isExpandable } from "../items/item.js";
import type { MessageItem } from "../items/message-item.js";
import { SubagentItem } from "../items/subagent-item.js";
import { TextItem } from "../items/text-item.js";
import { ThinkingItem } from "../items/thinking-item.js";
import { ToolItem, type ToolStatus } from "../items/tool-item.js";
import { UserItem } from "../items/user-item.js";
import type { ScrollList } from "../list/scroll-list.js";
import { defaultLogger } from "../logging/logger.js";
import type { FeedEvent, FinishEvent, ToolCallEvent } from "./events.js";

export interface AgentFeedOptions {
  logger?: Logger<ILogObj>;
  /** Collapsed tool body length (default 10) */
  toolMaxLines?: number;
  /** Collapsed thinking preview length (default 10) */
  thinkingPreviewLines?: number;
  /** Render assistant text as markdown (default true) */
  markdown?: boolean;
  /** Create expandable items expanded */
  expandAll?: boolean;
}

/** What activating a row did */
export type RowAction =
  | { type: "toggled"; id: string; expanded: boolean }
  | { type: "open_subagent"; id: string; sessionId: string; subagentType: string };

/**
 * Map a producer's status string. Unknown values count as pending.
 */
export function mapToolStatus(status: string | undefined): ToolStatus {
  switch (status) {
    case "in_progress":
      return "running";
    case "completed":
      return "success";
    case "error":
      return "error";
    case "canceled":
    case "cancelled":
      return "canceled";
    default:
      return "pending";
  }
}

function subagentTypeOf(input: Record<string, unknown> | undefined): string | undefined {
  const value = input?.subagent_type;
  return typeof value === "string" ? value : undefined;
}

function promptOf(input: Record<string, unknown> | undefined): string | undefined {
  const value = input?.prompt;
  return typeof value === "string" ? value : undefined;
}

function isQueuedUser(item: MessageItem): boolean {
  return item.kind === "user" && item.isQueued();
}

/**
 * Owns the message sequence shown in a {@link ScrollList} and applies
 * producer events to it.
 *
 * Queued user messages stay pinned to the end of the list: anything new is
 * inserted before them until they are picked up.
 *
 * @example
 * ```typescript
 * const list = new ScrollList<MessageItem>(80, 24);
 * const feed = new AgentFeed(list);
 * feed.apply({ type: "text", delta: "Hello " });
 * feed.apply({ type: "text", delta: "world" });
 * // one TextItem containing "Hello world"
 * ```
 */
export class AgentFeed {
  private readonly logger: Logger<ILogObj>;
  private readonly toolMaxLines: number;
  private readonly thinkingPreviewLines: number;
  private readonly markdown: boolean;
  private readonly expandAll: boolean;
  private queuedIds: string[] = [];
  private sequence = 0;

  constructor(
    readonly list: ScrollList<MessageItem>,
    options: AgentFeedOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "feed" });
    this.toolMaxLines = options.toolMaxLines ?? TOOL_MAX_LINES;
    this.thinkingPreviewLines = options.thinkingPreviewLines ?? THINKING_PREVIEW_LINES;
    this.markdown = options.markdown ?? true;
    this.expandAll = options.expandAll ?? false;
  }

  items(): readonly MessageItem[] {
    return this.list.getItems();
  }

  /** Ids of queued user messages, oldest first */
  queuedMessageIds(): readonly string[] {
    return this.queuedIds;
  }

  /**
   * Apply any producer event.
   */
  apply(event: FeedEvent): void {
    switch (event.type) {
      case "text":
        this.appendText(event.delta);
        break;
      case "thinking":
        this.appendThinking(event.delta);
        break;
      case "thinking_done":
        this.finishThinking(event.durationMs);
        break;
      case "tool_call":
        this.upsertToolCall(event);
        break;
      case "tool_error":
        this.markToolError(event.toolCallId, event.error);
        break;
      case "tool_canceled":
        this.markToolCanceled(event.toolCallId);
        break;
      case "divider":
        this.addDivider(event.iteration);
        break;
      case "user":
        this.appendUserMessage(event.text);
        break;
      case "user_queued":
        this.appendQueuedUserMessage(event.text);
        break;
      case "user_dequeued":
        this.finalizeQueuedMessage(event.text);
        break;
      case "finish":
        this.appendFinish(event);
        break;
      case "clear":
        this.clear();
        break;
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Streaming
  // ──────────────────────────────────────────────────────────────────────────

  appendText(delta: string): void {
    const last = this.lastNonQueued();
    if (last?.kind === "text") {
      last.append(delta);
      this.list.contentChanged();
      return;
    }
    this.insertBeforeQueued(new TextItem(this.nextId("text"), delta, { markdown: this.markdown }));
  }

  appendThinking(delta: string): void {
    const last = this.lastNonQueued();
    if (last?.kind === "thinking") {
      last.append(delta);
      this.list.contentChanged();
      return;
    }
    this.insertBeforeQueued(
      new ThinkingItem(this.nextId("thinking"), delta, {
        previewLines: this.thinkingPreviewLines,
        expanded: this.expandAll,
      }),
    );
  }

  /** Close the reasoning block at the end of the list, if there is one */
  finishThinking(durationMs: number): void {
    const last = this.lastNonQueued();
    if (last?.kind === "thinking") {
      last.finish(durationMs);
      this.list.contentChanged();
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Tool calls
  // ──────────────────────────────────────────────────────────────────────────

  upsertToolCall(event: ToolCallEvent): void {
    const status = mapToolStatus(event.status);
    const subagentType = subagentTypeOf(event.input);
    const existing = this.findToolItem(event.toolCallId);

    if (existing === undefined) {
      this.insertBeforeQueued(
        subagentType !== undefined
          ? this.createSubagent(event, subagentType, status)
          : new ToolItem(
              event.toolCallId,
              {
                name: event.title ?? "",
                kind: event.kind,
                status,
                input: event.input,
                output: event.output,
                fileDiff: event.fileDiff,
              },
              { maxLines: this.toolMaxLines, expanded: this.expandAll },
            ),
      );
      return;
    }

    // Updates without a status keep the current one
    const statusUpdate = event.status !== undefined ? status : undefined;

    if (existing.kind === "subagent") {
      existing.update({ status: statusUpdate, sessionId: event.sessionId });
      this.list.contentChanged();
      return;
    }

    // Input often arrives only with the in_progress update
    if (subagentType !== undefined) {
      const replaced = [...this.list.getItems()];
      replaced[replaced.indexOf(existing)] = this.createSubagent(
        event,
        subagentType,
        statusUpdate ?? existing.status(),
      );
      this.list.setItems(replaced);
      this.list.contentChanged();
      return;
    }

    existing.update({
      name: event.title,
      kind: event.kind,
      status: statusUpdate,
      input: event.input,
      output: event.output === "" ? undefined : event.output,
      fileDiff: event.fileDiff,
    });
    this.list.contentChanged();
  }

  markToolError(toolCallId: string, error: string): void {
    const item = this.findToolItem(toolCallId);
    if (item?.kind !== "tool") {
      this.logger.debug(`Ignoring error for unknown tool call ${toolCallId}`);
      return;
    }
    item.update({ status: "error", output: error });
    this.list.contentChanged();
  }

  markToolCanceled(toolCallId: string): void {
    const item = this.findToolItem(toolCallId);
    if (item?.kind !== "tool") {
      this.logger.debug(`Ignoring cancellation for unknown tool call ${toolCallId}`);
      return;
    }
    item.update({ status: "canceled" });
    this.list.contentChanged();
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Structure
  // ──────────────────────────────────────────────────────────────────────────

  addDivider(iteration: number): void {
    this.insertBeforeQueued(new DividerItem(`divider-${iteration}`, iteration));
  }

  appendUserMessage(text: string): void {
    this.insertBeforeQueued(new UserItem(this.nextId("user"), text));
  }

  /**
   * Show a message the producer has not picked up yet. It stays at the end
   * of the list until {@link finalizeQueuedMessage}.
   */
  appendQueuedUserMessage(text: string): string {
    const id = this.nextId("queued");
    this.list.appendItem(new UserItem(id, text, { queued: true }));
    this.queuedIds.push(id);
    return id;
  }

  /**
   * Mark the oldest queued message as delivered. Without one, the text is
   * appended as a plain user message.
   */
  finalizeQueuedMessage(text?: string): void {
    while (this.queuedIds.length > 0) {
      const id = this.queuedIds.shift();
      const item = this.list
        .getItems()
        .find((candidate): candidate is UserItem => candidate.kind === "user" && candidate.id() === id);
      if (item !== undefined) {
        item.finalize(text);
        this.list.contentChanged();
        return;
      }
      this.logger.debug(`Queued message ${id} is no longer in the list`);
    }

    if (text !== undefined) {
      this.appendUserMessage(text);
    }
  }

  appendFinish(event: FinishEvent): void {
    const last = this.lastNonQueued();
    if (last?.kind === "thinking") {
      last.finish(event.durationMs);
    }

    if (event.reason === "cancelled") {
      for (const item of this.list.getItems()) {
        if (item.kind === "tool" && (item.status() === "pending" || item.status() === "running")) {
          item.update({ status: "canceled" });
        }
      }
    }

    this.insertBeforeQueued(
      new InfoItem(this.nextId("info"), {
        model: event.model,
        provider: event.provider,
        durationMs: event.durationMs,
      }),
    );

    if (event.error) {
      this.insertBeforeQueued(
        new TextItem(this.nextId("finish-error"), `Error: ${event.error}`, {
          markdown: false,
          tone: "error",
        }),
      );
    } else if (event.reason === "cancelled") {
      this.insertBeforeQueued(
        new TextItem(this.nextId("finish-cancel"), "Iteration canceled", {
          markdown: false,
          tone: "canceled",
        }),
      );
    }

    this.list.contentChanged();
  }

  /** Empty the feed and start following again */
  clear(): void {
    this.queuedIds = [];
    this.list.setItems([]);
    this.list.gotoTop();
    this.list.setAutoScroll(true);
  }

  /**
   * Act on a click at viewport row `row`: toggle an expandable item, or
   * report a subagent whose session can be opened.
   */
  activateRow(row: number): RowAction | undefined {
    const index = this.list.itemAtRow(row);
    if (index < 0) {
      return undefined;
    }
    const item = this.list.getItems()[index];

    if (item.kind === "subagent") {
      const sessionId = item.sessionId();
      return sessionId
        ? { type: "open_subagent", id: item.id(), sessionId, subagentType: item.subagentType() }
        : undefined;
    }

    if (isExpandable(item)) {
      item.toggleExpanded();
      this.list.contentChanged();
      return { type: "toggled", id: item.id(), expanded: item.isExpanded() };
    }
    return undefined;
  }

  // ──────────────────────────────────────────────────────────────────────────

  // Producer tool ids and generated ids share the list, so lookups match on kind too
  private findToolItem(toolCallId: string): ToolItem | SubagentItem | undefined {
    return this.list
      .getItems()
      .find(
        (item): item is ToolItem | SubagentItem =>
          (item.kind === "tool" || item.kind === "subagent") && item.id() === toolCallId,
      );
  }

  private nextId(prefix: string): string {
    return `${prefix}-${this.sequence++}`;
  }

  private createSubagent(event: ToolCallEvent, subagentType: string, status: ToolStatus): SubagentItem {
    return new SubagentItem(event.toolCallId, {
      subagentType,
      description: promptOf(event.input),
      status,
      sessionId: event.sessionId,
    });
  }

  private lastNonQueued(): MessageItem | undefined {
    const items = this.list.getItems();
    for (let i = items.length - 1; i >= 0; i--) {
      if (!isQueuedUser(items[i])) {
        return items[i];
      }
    }
    return undefined;
  }

  private insertBeforeQueued(item: MessageItem): void {
    const items = this.list.getItems();
    let insertAt = items.length;
    while (insertAt > 0 && isQueuedUser(items[insertAt - 1])) {
      insertAt--;
    }
    this.list.insertItem(insertAt, item);
  }
}
