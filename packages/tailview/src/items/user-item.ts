import { MAX_CONTENT_WIDTH } from "../core/constants.js";
import { padRight, rightAlign, visibleWidth, wrapText } from "../format/text.js";
import { getTheme } from "../format/theme.js";
import { BaseItem } from "./base-item.js";

export interface UserItemOptions {
  /** Sent while the producer was busy and not yet picked up */
  queued?: boolean;
}

/**
 * A user message, right-aligned with a border on its right edge.
 */
export class UserItem extends BaseItem {
  readonly kind = "user";
  private content: string;
  private queued: boolean;

  constructor(id: string, content: string, options: UserItemOptions = {}) {
    super(id);
    this.content = content;
    this.queued = options.queued ?? false;
  }

  text(): string {
    return this.content;
  }

  isQueued(): boolean {
    return this.queued;
  }

  /**
   * Mark a queued message as delivered, optionally replacing its text.
   */
  finalize(content?: string): void {
    if (content !== undefined) {
      this.content = content;
    }
    this.queued = false;
    this.invalidate();
  }

  protected layout(width: number): string[] {
    const theme = getTheme();
    const contentWidth = Math.max(1, Math.min(width - 2, MAX_CONTENT_WIDTH));
    const lines = wrapText(this.content, contentWidth);
    const blockWidth = Math.max(...lines.map(visibleWidth));
    const border = theme.userBorder("│");

    const block = lines.map((line) => `${padRight(line, blockWidth)} ${border}`);
    if (this.queued) {
      block.unshift(theme.queuedBadge(" QUEUED "));
    }
    return rightAlign(block, width);
  }
}
