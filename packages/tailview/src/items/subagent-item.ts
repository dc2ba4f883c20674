import { SUBAGENT_MIN_BOX_WIDTH } from "../core/constants.js";
import { indentLines, padRight, truncateLine, wrapText } from "../format/text.js";
import { getTheme } from "../format/theme.js";
import { BaseItem } from "./base-item.js";
import type { ToolStatus } from "./tool-item.js";

export interface SubagentData {
  subagentType: string;
  description?: string;
  status?: ToolStatus;
  /** Known once the subagent's session has been created */
  sessionId?: string;
}

const STATUS_TEXT: Record<ToolStatus, string> = {
  pending: "Pending",
  running: "Running...",
  success: "Completed",
  error: "Error",
  canceled: "Canceled",
};

/**
 * A delegated task, drawn as a box with its type, status and description.
 */
export class SubagentItem extends BaseItem {
  readonly kind = "subagent";
  private data: Required<Pick<SubagentData, "subagentType" | "status">> & SubagentData;

  constructor(id: string, data: SubagentData) {
    super(id);
    this.data = { ...data, status: data.status ?? "pending" };
  }

  subagentType(): string {
    return this.data.subagentType;
  }

  status(): ToolStatus {
    return this.data.status;
  }

  sessionId(): string | undefined {
    return this.data.sessionId;
  }

  update(patch: Partial<SubagentData>): void {
    this.data = {
      ...this.data,
      ...(patch.subagentType ? { subagentType: patch.subagentType } : {}),
      ...(patch.description !== undefined ? { description: patch.description } : {}),
      ...(patch.status !== undefined ? { status: patch.status } : {}),
      ...(patch.sessionId ? { sessionId: patch.sessionId } : {}),
    };
    this.invalidate();
  }

  protected layout(width: number): string[] {
    const theme = getTheme();
    const { status, subagentType, description, sessionId } = this.data;

    const boxWidth = Math.max(SUBAGENT_MIN_BOX_WIDTH, width - 4);
    const innerWidth = boxWidth - 4;

    const icon =
      status === "error" || status === "canceled"
        ? theme.toolError("×")
        : status === "success"
          ? theme.toolSuccess("●")
          : theme.toolPending("●");

    const content = [
      truncateLine(
        `${icon} ${theme.subagentType(`[${subagentType}]`)} ${theme.toolParams(STATUS_TEXT[status])}`,
        innerWidth,
      ),
      ...indentLines(wrapText(description ?? "", innerWidth - 2), "  "),
    ];
    if (sessionId) {
      content.push("", theme.subagentHint("[Click to view]"));
    }

    const edge = "─".repeat(boxWidth - 2);
    const side = theme.subagentBorder("│");
    return [
      theme.subagentBorder(`╭${edge}╮`),
      ...content.map((line) => `${side} ${padRight(line, innerWidth)} ${side}`),
      theme.subagentBorder(`╰${edge}╯`),
    ].map((line) => `  ${line}`);
  }
}
