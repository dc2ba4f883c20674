import { MAX_CONTENT_WIDTH } from "../core/constants.js";
import { renderMarkdown } from "../format/markdown.js";
import { wrapText } from "../format/text.js";
import { getTheme } from "../format/theme.js";
import { BaseItem } from "./base-item.js";

export type TextTone = "normal" | "error" | "canceled";

export interface TextItemOptions {
  /** Render the content as markdown (default true) */
  markdown?: boolean;
  /** Colors the body for error and cancellation notices */
  tone?: TextTone;
}

/**
 * Assistant text, drawn behind a left border.
 */
export class TextItem extends BaseItem {
  readonly kind = "text";
  private content: string;
  private readonly markdown: boolean;
  private readonly tone: TextTone;

  constructor(id: string, content: string, options: TextItemOptions = {}) {
    super(id);
    this.content = content;
    this.markdown = options.markdown ?? true;
    this.tone = options.tone ?? "normal";
  }

  text(): string {
    return this.content;
  }

  /** Extend the content with a streamed chunk */
  append(delta: string): void {
    this.content += delta;
    this.invalidate();
  }

  setText(content: string): void {
    this.content = content;
    this.invalidate();
  }

  protected layout(width: number): string[] {
    const theme = getTheme();
    const contentWidth = Math.max(1, Math.min(width - 2, MAX_CONTENT_WIDTH));
    const body = this.markdown ? renderMarkdown(this.content) : this.content;
    const border = theme.assistantBorder("│");

    return wrapText(body, contentWidth).map((line) => {
      const styled =
        this.tone === "error"
          ? theme.errorText(line)
          : this.tone === "canceled"
            ? theme.canceledText(line)
            : line;
      return `${border} ${styled}`;
    });
  }
}
