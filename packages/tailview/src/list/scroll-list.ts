/**
 * The virtualized list: a cursor over variable-height items that renders
 * only what falls inside its viewport.
 *
 * @module
 */

import { SELECTION_MARKER } from "../core/constants.js";
import { clampDimension, type ListItem } from "../items/item.js";
import {
  bottomCursor,
  type Cursor,
  clampCursor,
  cursorToLine,
  type LineSpace,
  ORIGIN,
  scrollCursor,
  totalLines,
} from "./cursor.js";
import { type KeyEvent, navigationKey } from "./keys.js";

export interface ScrollListOptions {
  /** Follow new content as it is appended (default true) */
  autoScroll?: boolean;
  /** Whether key events are acted on (default false) */
  focused?: boolean;
  /** Prefix for the first visible line of the selected item (default "▸ ") */
  selectionMarker?: string;
  /** Blank line between consecutive items when room remains (default true) */
  itemGap?: boolean;
}

/**
 * Height of an item, laying it out at `width` when it is not known yet.
 */
function measure(item: ListItem, width: number): number {
  const height = item.height();
  return height > 0 ? height : item.render(width).length;
}

/**
 * A scrollable, lazily rendered sequence of items.
 *
 * The scroll position is a {@link Cursor}: an item index plus a line offset
 * inside that item. Heights are only computed when a scroll, bottom check or
 * view actually needs them, and every structural change re-clamps the cursor.
 *
 * @example
 * ```typescript
 * const list = new ScrollList<MessageItem>(80, 24);
 * list.appendItem(new TextItem("t1", "Hello"));
 * process.stdout.write(list.view());
 * ```
 */
export class ScrollList<T extends ListItem = ListItem> {
  private items: T[] = [];
  private cursor: Cursor = ORIGIN;
  private viewWidth: number;
  private viewHeight: number;
  private autoScroll: boolean;
  private focused: boolean;
  private selectedIndex = -1;
  private readonly selectionMarker: string;
  private readonly itemGap: boolean;

  constructor(width: number, height: number, options: ScrollListOptions = {}) {
    this.viewWidth = clampDimension(width);
    this.viewHeight = clampDimension(height);
    this.autoScroll = options.autoScroll ?? true;
    this.focused = options.focused ?? false;
    this.selectionMarker = options.selectionMarker ?? SELECTION_MARKER;
    this.itemGap = options.itemGap ?? true;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Items
  // ──────────────────────────────────────────────────────────────────────────

  getItems(): readonly T[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  /** Replace every item. The cursor is kept where it still fits */
  setItems(items: readonly T[]): void {
    this.items = [...items];
    if (this.selectedIndex >= this.items.length) {
      this.selectedIndex = -1;
    }
    this.clampOffset();
  }

  appendItem(item: T): void {
    this.items.push(item);
    if (this.autoScroll) {
      this.gotoBottom();
    }
  }

  /**
   * Insert at `index` (clamped to the ends). Without auto-scroll the cursor
   * moves with the content it was showing.
   */
  insertItem(index: number, item: T): void {
    const at = Math.min(Math.max(0, Math.floor(index)), this.items.length);
    const wasEmpty = this.items.length === 0;
    this.items.splice(at, 0, item);

    if (this.selectedIndex >= at) {
      this.selectedIndex++;
    }
    if (this.autoScroll) {
      this.gotoBottom();
      return;
    }
    if (!wasEmpty && at <= this.cursor.itemIndex) {
      this.cursor = { itemIndex: this.cursor.itemIndex + 1, lineOffset: this.cursor.lineOffset };
    }
    this.clampOffset();
  }

  /**
   * Call after mutating and invalidating an item in place (a streamed delta,
   * an expand toggle).
   */
  contentChanged(): void {
    if (this.autoScroll) {
      this.gotoBottom();
    } else {
      this.clampOffset();
    }
  }

  indexOf(id: string): number {
    return this.items.findIndex((item) => item.id() === id);
  }

  itemById(id: string): T | undefined {
    return this.items.find((item) => item.id() === id);
  }

  /** Invalidate every item, e.g. after a theme change */
  invalidateAll(): void {
    for (const item of this.items) {
      item.invalidate();
    }
    this.clampOffset();
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Viewport and state
  // ──────────────────────────────────────────────────────────────────────────

  get width(): number {
    return this.viewWidth;
  }

  get height(): number {
    return this.viewHeight;
  }

  /**
   * Item caches are left alone: items re-layout at the new width the next
   * time they are drawn or measured.
   */
  setSize(width: number, height: number): void {
    this.viewWidth = clampDimension(width);
    this.setHeight(height);
  }

  setWidth(width: number): void {
    this.viewWidth = clampDimension(width);
  }

  setHeight(height: number): void {
    this.viewHeight = clampDimension(height);
    this.clampOffset();
  }

  isAutoScroll(): boolean {
    return this.autoScroll;
  }

  setAutoScroll(enabled: boolean): void {
    this.autoScroll = enabled;
  }

  isFocused(): boolean {
    return this.focused;
  }

  setFocused(focused: boolean): void {
    this.focused = focused;
  }

  getSelected(): number {
    return this.selectedIndex;
  }

  /** Select an item by index; anything out of range clears the selection */
  setSelected(index: number): void {
    this.selectedIndex = Number.isInteger(index) && index >= 0 && index < this.items.length ? index : -1;
  }

  selectedItem(): T | undefined {
    return this.selectedIndex >= 0 ? this.items[this.selectedIndex] : undefined;
  }

  getCursor(): Cursor {
    return this.cursor;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Scrolling
  // ──────────────────────────────────────────────────────────────────────────

  scrollBy(lines: number): void {
    if (lines === 0) {
      return;
    }
    this.cursor = scrollCursor(this.cursor, lines, this.lineSpace());
  }

  /**
   * Scroll down one viewport, stopping at the bottom cursor. A cursor
   * already past it (after a resize) stays where it is.
   */
  private pageDown(): void {
    const space = this.lineSpace();
    const current = cursorToLine(this.cursor, space);
    const bottom = bottomCursor(space, this.viewHeight);
    const bottomLine = cursorToLine(bottom, space);
    if (current >= bottomLine) {
      return;
    }
    const next = scrollCursor(this.cursor, this.viewHeight, space);
    this.cursor = cursorToLine(next, space) > bottomLine ? bottom : next;
  }

  gotoTop(): void {
    this.cursor = ORIGIN;
  }

  gotoBottom(): void {
    this.cursor = bottomCursor(this.lineSpace(), this.viewHeight);
  }

  atBottom(): boolean {
    if (this.items.length === 0) {
      return true;
    }
    const space = this.lineSpace();
    return cursorToLine(this.cursor, space) + this.viewHeight >= totalLines(space);
  }

  totalLineCount(): number {
    return totalLines(this.lineSpace());
  }

  /** Line number of the first visible line */
  currentLine(): number {
    return cursorToLine(this.cursor, this.lineSpace());
  }

  /**
   * Position between 0 (top) and 1 (bottom). 1 when everything fits, 0 for
   * an empty list.
   */
  scrollPercent(): number {
    if (this.items.length === 0) {
      return 0;
    }
    const space = this.lineSpace();
    const maxOffset = totalLines(space) - this.viewHeight;
    if (maxOffset <= 0) {
      return 1;
    }
    const ratio = cursorToLine(this.cursor, space) / maxOffset;
    return Math.min(1, Math.max(0, ratio));
  }

  /**
   * Apply a navigation key. Returns false (and does nothing) when unfocused
   * or when the key is not a navigation key.
   */
  update(key: KeyEvent | string): boolean {
    if (!this.focused) {
      return false;
    }

    switch (navigationKey(key)) {
      case "pageup":
        this.scrollBy(-this.viewHeight);
        this.autoScroll = false;
        return true;
      case "pagedown":
        this.pageDown();
        this.autoScroll = this.atBottom();
        return true;
      case "home":
        this.gotoTop();
        this.autoScroll = false;
        return true;
      case "end":
        this.gotoBottom();
        this.autoScroll = true;
        return true;
      default:
        return false;
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Rendering
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * The visible lines, at most `height` of them.
   */
  viewLines(): string[] {
    const out: string[] = [];
    if (this.items.length === 0 || this.viewHeight === 0) {
      return out;
    }

    const { itemIndex, lineOffset } = this.cursor;
    for (let i = itemIndex; i < this.items.length && out.length < this.viewHeight; i++) {
      let lines = this.items[i].render(this.viewWidth);

      if (i === itemIndex && lineOffset > 0) {
        if (lineOffset >= lines.length) {
          continue;
        }
        lines = lines.slice(lineOffset);
      }

      if (out.length > 0 && this.itemGap) {
        out.push("");
        if (out.length >= this.viewHeight) {
          break;
        }
      }

      if (i === this.selectedIndex && lines.length > 0) {
        lines = [this.selectionMarker + lines[0], ...lines.slice(1)];
      }

      out.push(...lines.slice(0, this.viewHeight - out.length));
    }
    return out;
  }

  view(): string {
    return this.viewLines().join("\n");
  }

  /**
   * Index of the item drawn on viewport row `row` (0-based), or -1 for a
   * separator, an empty row or a row outside the viewport.
   */
  itemAtRow(row: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this.viewHeight) {
      return -1;
    }

    let drawn = 0;
    const { itemIndex, lineOffset } = this.cursor;
    for (let i = itemIndex; i < this.items.length && drawn < this.viewHeight; i++) {
      let count = this.items[i].render(this.viewWidth).length;
      if (i === itemIndex && lineOffset > 0) {
        if (lineOffset >= count) {
          continue;
        }
        count -= lineOffset;
      }
      if (drawn > 0 && this.itemGap) {
        if (row === drawn) {
          return -1;
        }
        drawn++;
      }
      if (row < drawn + count) {
        return i;
      }
      drawn += count;
    }
    return -1;
  }

  // ──────────────────────────────────────────────────────────────────────────

  private lineSpace(): LineSpace {
    const items = this.items;
    const width = this.viewWidth;
    return {
      count: items.length,
      heightOf: (index) => measure(items[index], width),
    };
  }

  /** Re-validate the cursor against the current items */
  private clampOffset(): void {
    this.cursor = clampCursor(this.cursor, this.lineSpace());
  }
}
