import { THINKING_PREVIEW_LINES } from "../core/constants.js";
import { formatDuration } from "../format/duration.js";
import { wrapText } from "../format/text.js";
import { getTheme } from "../format/theme.js";
import { BaseItem } from "./base-item.js";
import type { Expandable } from "./item.js";

export interface ThinkingItemOptions {
  /** Lines kept visible while collapsed (default 10) */
  previewLines?: number;
  expanded?: boolean;
}

/**
 * Model reasoning. Collapsed by default, showing only the most recent lines.
 */
export class ThinkingItem extends BaseItem implements Expandable {
  readonly kind = "thinking";
  private content: string;
  private expanded: boolean;
  private readonly previewLines: number;
  private durationMs: number | undefined;

  constructor(id: string, content: string, options: ThinkingItemOptions = {}) {
    super(id);
    this.content = content;
    this.expanded = options.expanded ?? false;
    this.previewLines = Math.max(1, options.previewLines ?? THINKING_PREVIEW_LINES);
  }

  text(): string {
    return this.content;
  }

  append(delta: string): void {
    this.content += delta;
    this.invalidate();
  }

  /** Close the block and show how long it took */
  finish(durationMs: number): void {
    this.durationMs = Math.max(0, durationMs);
    this.invalidate();
  }

  isFinished(): boolean {
    return this.durationMs !== undefined;
  }

  isExpanded(): boolean {
    return this.expanded;
  }

  toggleExpanded(): void {
    this.expanded = !this.expanded;
    this.invalidate();
  }

  protected layout(width: number): string[] {
    const theme = getTheme();
    const indent = width > 2 ? "  " : "";
    const innerWidth = Math.max(1, width - indent.length);
    const out: string[] = [];

    let lines = this.content.split("\n");
    if (!this.expanded && lines.length > this.previewLines) {
      const hidden = lines.length - this.previewLines;
      out.push(indent + theme.thinkingHint(`… (${hidden} lines hidden)`));
      lines = lines.slice(-this.previewLines);
    }

    for (const line of lines) {
      for (const row of wrapText(line, innerWidth)) {
        out.push(indent + theme.thinkingText(row));
      }
    }

    if (this.durationMs !== undefined) {
      out.push(indent + theme.thinkingFooter(`Thought for ${formatDuration(this.durationMs)}`));
    }
    return out;
  }
}
