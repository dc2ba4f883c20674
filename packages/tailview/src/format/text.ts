/**
 * Width-aware line helpers. Wrapping and measuring come from wrap-ansi and
 * string-width so ANSI styling and wide characters are measured correctly.
 *
 * @module
 */

import stringWidth from "string-width";
import wrapAnsi from "wrap-ansi";

/**
 * Terminal columns a string occupies, ignoring ANSI escapes.
 */
export function visibleWidth(text: string): number {
  return text ? stringWidth(text) : 0;
}

/**
 * Word-wrap text to `width` columns, breaking words longer than a row.
 * A line's leading indentation is repeated on its continuation rows.
 * Always returns at least one line (`[""]` for empty text).
 */
export function wrapText(text: string, width: number): string[] {
  const source = text.replaceAll("\t", "    ").split("\n");
  if (width <= 0) {
    return source;
  }

  const rows: string[] = [];
  for (const line of source) {
    if (line.trim() === "") {
      rows.push("");
      continue;
    }
    let indent = /^ */.exec(line)?.[0] ?? "";
    if (indent.length >= width) {
      indent = "";
    }
    const body = wrapAnsi(line.slice(indent.length), width - indent.length, { hard: true });
    for (const row of body.split("\n")) {
      rows.push(indent + row);
    }
  }
  return rows;
}

/**
 * Cut a line to `maxWidth` columns, ending it with "…" when it was cut.
 */
export function truncateLine(line: string, maxWidth: number): string {
  if (maxWidth <= 0) {
    return "";
  }
  if (visibleWidth(line) <= maxWidth) {
    return line;
  }
  if (maxWidth === 1) {
    return "…";
  }
  const [head = ""] = wrapAnsi(line, maxWidth - 1, { hard: true, trim: false, wordWrap: false }).split(
    "\n",
  );
  return `${head}…`;
}

/**
 * Pad a line with spaces on the right up to `width` columns.
 */
export function padRight(line: string, width: number): string {
  const gap = width - visibleWidth(line);
  return gap > 0 ? line + " ".repeat(gap) : line;
}

/**
 * Pad each line on the left so it ends at column `width`.
 */
export function rightAlign(lines: string[], width: number): string[] {
  return lines.map((line) => {
    const gap = width - visibleWidth(line);
    return gap > 0 ? " ".repeat(gap) + line : line;
  });
}

/**
 * Indent every line by `indent`.
 */
export function indentLines(lines: string[], indent: string): string[] {
  return lines.map((line) => indent + line);
}
