import { visibleWidth, wrapText } from "../format/text.js";
import { getTheme } from "../format/theme.js";
import { BaseItem } from "./base-item.js";

export interface LogEntry {
  time?: Date;
  /** Level name, shown upper-cased ("info" -> "INFO") */
  level?: string;
  message: string;
}

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * `HH:MM:SS` in UTC, so a replayed log renders the same everywhere.
 */
export function formatClock(time: Date): string {
  return `${pad2(time.getUTCHours())}:${pad2(time.getUTCMinutes())}:${pad2(time.getUTCSeconds())}`;
}

/**
 * One log line: `HH:MM:SS LEVEL message`, continuation rows indented under
 * the message.
 */
export class LogItem extends BaseItem {
  readonly kind = "log";

  constructor(
    id: string,
    private readonly entry: LogEntry,
  ) {
    super(id);
  }

  protected layout(width: number): string[] {
    const theme = getTheme();
    const prefixParts: string[] = [];
    const plainParts: string[] = [];

    if (this.entry.time) {
      const clock = formatClock(this.entry.time);
      prefixParts.push(theme.logTime(clock));
      plainParts.push(clock);
    }
    if (this.entry.level) {
      const level = this.entry.level.toUpperCase();
      const style = theme.logLevels[level] ?? ((text: string) => text);
      prefixParts.push(style(level.padEnd(5)));
      plainParts.push(level.padEnd(5));
    }

    const prefix = prefixParts.length > 0 ? `${prefixParts.join(" ")} ` : "";
    const indentWidth = prefix ? visibleWidth(`${plainParts.join(" ")} `) : 0;

    // Too narrow for a hanging indent: wrap the whole line instead
    if (indentWidth >= width) {
      return wrapText(`${prefix}${this.entry.message}`, width);
    }

    const rows = wrapText(this.entry.message, width - indentWidth);
    const hanging = " ".repeat(indentWidth);
    return rows.map((row, index) => (index === 0 ? prefix : hanging) + row);
  }
}
