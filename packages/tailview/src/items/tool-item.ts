import { TOOL_MAX_LINES } from "../core/constants.js";
import { renderDiffBlock } from "../format/diff.js";
import { formatParamValue, formatToolParams } from "../format/params.js";
import { indentLines, truncateLine, wrapText } from "../format/text.js";
import { getTheme, type Style } from "../format/theme.js";
import { BaseItem } from "./base-item.js";
import type { Expandable } from "./item.js";

export type ToolStatus = "pending" | "running" | "success" | "error" | "canceled";

/** Whole-file contents before and after an edit */
export interface FileDiff {
  file?: string;
  before: string;
  after: string;
}

export interface ToolCallData {
  name: string;
  /** Tool category as reported by the producer ("edit", "read", "execute", ...) */
  kind?: string;
  status?: ToolStatus;
  input?: Record<string, unknown>;
  output?: string;
  fileDiff?: FileDiff;
}

export type ToolCallPatch = Partial<ToolCallData>;

interface ToolState extends ToolCallData {
  status: ToolStatus;
  input: Record<string, unknown>;
}

export interface ToolItemOptions {
  /** Body lines shown while collapsed (default 10) */
  maxLines?: number;
  expanded?: boolean;
}

const BODY_INDENT = "  ";

function capitalize(name: string): string {
  return name ? name.charAt(0).toUpperCase() + name.slice(1) : name;
}

/**
 * A tool call: status icon, name and parameters, then its output.
 *
 * Successful edits show a diff, successful writes show the written file,
 * everything else shows the raw output. Long bodies are cut to
 * `maxLines` until expanded.
 */
export class ToolItem extends BaseItem implements Expandable {
  readonly kind = "tool";
  private state: ToolState;
  private expanded: boolean;
  private readonly maxLines: number;

  constructor(id: string, data: ToolCallData, options: ToolItemOptions = {}) {
    super(id);
    this.state = {
      ...data,
      status: data.status ?? "pending",
      input: { ...(data.input ?? {}) },
    };
    this.expanded = options.expanded ?? false;
    this.maxLines = Math.max(1, options.maxLines ?? TOOL_MAX_LINES);
  }

  name(): string {
    return this.state.name;
  }

  status(): ToolStatus {
    return this.state.status;
  }

  input(): Readonly<Record<string, unknown>> {
    return this.state.input;
  }

  output(): string | undefined {
    return this.state.output;
  }

  /**
   * Merge a producer update. Absent fields keep their value; input keys are
   * merged one by one.
   */
  update(patch: ToolCallPatch): void {
    this.state = {
      ...this.state,
      ...(patch.name !== undefined && patch.name !== "" ? { name: patch.name } : {}),
      ...(patch.kind !== undefined ? { kind: patch.kind } : {}),
      ...(patch.status !== undefined ? { status: patch.status } : {}),
      ...(patch.output !== undefined ? { output: patch.output } : {}),
      ...(patch.fileDiff !== undefined ? { fileDiff: patch.fileDiff } : {}),
      input: { ...this.state.input, ...(patch.input ?? {}) },
    };
    this.invalidate();
  }

  isExpanded(): boolean {
    return this.expanded;
  }

  toggleExpanded(): void {
    this.expanded = !this.expanded;
    this.invalidate();
  }

  protected layout(width: number): string[] {
    const lines = [this.header(width)];
    const body = this.body(Math.max(1, width - BODY_INDENT.length));
    if (body.length > 0) {
      lines.push("", ...indentLines(body, BODY_INDENT));
    }
    return lines;
  }

  private header(width: number): string {
    const theme = getTheme();
    const { status, input, kind } = this.state;

    let icon: string;
    let iconStyle: Style;
    switch (status) {
      case "success":
        icon = "✓";
        iconStyle = theme.toolSuccess;
        break;
      case "error":
      case "canceled":
        icon = "×";
        iconStyle = theme.toolError;
        break;
      default:
        icon = "●";
        iconStyle = theme.toolPending;
    }

    const displayName = capitalize(this.state.name);
    let header = `  ${iconStyle(icon)} ${theme.toolName(displayName)}`;

    // Edit and write bodies show the rest of the input, so the header keeps only the path
    let paramInput: Record<string, unknown> = input;
    if (kind === "edit" || this.isWriteInput()) {
      paramInput = input.filePath !== undefined ? { filePath: input.filePath } : {};
    }

    const paramWidth = Math.max(10, width - (2 + displayName.length + 1));
    const params = formatToolParams(paramInput, paramWidth);
    if (params !== "") {
      header += ` ${theme.toolParams(params)}`;
    }
    return header;
  }

  private isWriteInput(): boolean {
    return this.state.input.content !== undefined && this.state.input.filePath !== undefined;
  }

  private body(width: number): string[] {
    const theme = getTheme();
    const { status, input, output, fileDiff, kind } = this.state;

    if (kind === "edit" && status === "success") {
      let diff: string[] = [];
      if (fileDiff && fileDiff.before !== "" && fileDiff.after !== "") {
        diff = renderDiffBlock(fileDiff.before, fileDiff.after);
      } else if (input.oldString !== undefined && input.newString !== undefined) {
        diff = renderDiffBlock(formatParamValue(input.oldString), formatParamValue(input.newString));
      }
      if (diff.length > 0) {
        return diff.map((line) => truncateLine(line, width));
      }
    }

    if (status === "success" && this.isWriteInput()) {
      const contentLines = formatParamValue(input.content).split("\n");
      const total = contentLines.length;
      const hidden = !this.expanded && total > this.maxLines ? total - this.maxLines : 0;
      const visible = hidden > 0 ? contentLines.slice(0, this.maxLines) : contentLines;
      const footer =
        hidden > 0
          ? `…(${hidden} more lines, click to expand)`
          : `(End of file - total ${total} lines)`;

      return [
        theme.toolParams(truncateLine(formatParamValue(input.filePath), width)),
        ...visible.map((line) => theme.toolOutput(truncateLine(line, width))),
        theme.toolHint(footer),
      ];
    }

    if (output === undefined || output === "") {
      return [];
    }

    const outputLines = output.split("\n");

    if (status === "error") {
      return outputLines.flatMap((line) => wrapText(line, width).map((row) => theme.errorText(row)));
    }

    const hidden =
      !this.expanded && outputLines.length > this.maxLines ? outputLines.length - this.maxLines : 0;
    const visible = hidden > 0 ? outputLines.slice(0, this.maxLines) : outputLines;
    const rows = visible.flatMap((line) => wrapText(line, width).map((row) => theme.toolOutput(row)));
    if (hidden > 0) {
      rows.push(theme.toolHint(`…(${hidden} more lines, click to expand)`));
    }
    return rows;
  }
}
