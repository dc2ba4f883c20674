/**
 * Unified diff rendering for edit tool output.
 *
 * @module
 */

import { structuredPatch } from "diff";
import { getTheme } from "./theme.js";

/** Lines of unchanged context around each change */
const DIFF_CONTEXT = 3;

/**
 * Renders a unified diff with ANSI colors.
 *
 * Color scheme:
 * - Added lines (+): green
 * - Removed lines (-): red
 * - Hunk headers (@@): cyan
 * - File headers (---/+++): bold
 * - Context lines: dim
 */
export function renderColoredDiff(diff: string): string {
  const theme = getTheme();
  return diff
    .split("\n")
    .map((line) => {
      // File headers
      if (line.startsWith("---") || line.startsWith("+++")) {
        return theme.diffHeader(line);
      }
      if (line.startsWith("+")) {
        return theme.diffAdded(line);
      }
      if (line.startsWith("-")) {
        return theme.diffRemoved(line);
      }
      if (line.startsWith("@@")) {
        return theme.diffHunk(line);
      }
      return theme.diffContext(line);
    })
    .join("\n");
}

function normalize(text: string): string {
  const expanded = text.replaceAll("\t", "    ");
  return expanded.endsWith("\n") ? expanded : `${expanded}\n`;
}

/**
 * Hunks of a unified diff between two texts, without file headers.
 * Returns an empty array when the texts are equal.
 *
 * @example
 * ```typescript
 * unifiedDiffLines("a\nb\n", "a\nc\n");
 * // ["@@ -1,2 +1,2 @@", " a", "-b", "+c"]
 * ```
 */
export function unifiedDiffLines(oldText: string, newText: string): string[] {
  const patch = structuredPatch("a", "b", normalize(oldText), normalize(newText), "", "", {
    context: DIFF_CONTEXT,
  });

  const lines: string[] = [];
  for (const hunk of patch.hunks) {
    lines.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`);
    for (const line of hunk.lines) {
      if (!line.startsWith("\\")) {
        lines.push(line);
      }
    }
  }
  return lines;
}

/**
 * Colored unified diff lines ready to place in an item body.
 */
export function renderDiffBlock(oldText: string, newText: string): string[] {
  const lines = unifiedDiffLines(oldText, newText);
  if (lines.length === 0) {
    return [];
  }
  return renderColoredDiff(lines.join("\n")).split("\n");
}
