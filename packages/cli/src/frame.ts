/**
 * Turns a list's viewport into the fixed-size block of text a panel would
 * paint: view rows, an optional scrollbar column and a status line.
 *
 * @module
 */

import chalk from "chalk";
import { type ListItem, padRight, type ScrollList, truncateLine } from "tailview";

const THUMB = "█";
const TRACK = "░";

export interface FrameOptions {
  /** Draw a one-column scrollbar on the right (default true) */
  scrollbar?: boolean;
}

/**
 * One scrollbar cell per row. The thumb covers `visibleRatio` of the track
 * (at least one cell) and slides from top to bottom as `percent` goes 0..1.
 * With everything visible the whole track is thumb.
 */
export function renderScrollbar(percent: number, height: number, visibleRatio: number): string[] {
  if (height <= 0) {
    return [];
  }
  const ratio = Number.isFinite(visibleRatio) ? Math.min(1, Math.max(0, visibleRatio)) : 1;
  const position = Number.isFinite(percent) ? Math.min(1, Math.max(0, percent)) : 0;

  const thumbSize = Math.min(height, Math.max(1, Math.round(height * ratio)));
  const thumbTop = Math.round((height - thumbSize) * position);

  const cells: string[] = [];
  for (let row = 0; row < height; row++) {
    const inThumb = row >= thumbTop && row < thumbTop + thumbSize;
    cells.push(inThumb ? THUMB : chalk.dim(TRACK));
  }
  return cells;
}

/**
 * `<line>/<total> <percent>%`, plus `[follow]` while auto-scroll is on.
 * `line` is the 1-based first visible line, 0 for an empty list.
 */
export function formatStatus<T extends ListItem>(list: ScrollList<T>): string {
  const total = list.totalLineCount();
  const line = total === 0 ? 0 : list.currentLine() + 1;
  const percent = Math.round(list.scrollPercent() * 100);
  const follow = list.isAutoScroll() ? " [follow]" : "";
  return `${line}/${total} ${percent}%${follow}`;
}

/**
 * The list's view padded to its full height, with the scrollbar beside it
 * and the status line underneath.
 */
export function renderFrame<T extends ListItem>(list: ScrollList<T>, options: FrameOptions = {}): string[] {
  const scrollbar = options.scrollbar ?? true;
  const height = list.height;
  const width = list.width;

  const rows = list.viewLines().map((line) => truncateLine(line, width));
  while (rows.length < height) {
    rows.push("");
  }

  let body = rows;
  if (scrollbar) {
    const total = list.totalLineCount();
    const visibleRatio = total > 0 ? height / total : 1;
    const bar = renderScrollbar(list.scrollPercent(), height, visibleRatio);
    body = rows.map((row, index) => padRight(row, width) + bar[index]);
  }

  return [...body, chalk.dim(formatStatus(list))];
}
