/**
 * The two-part scroll position and the pure arithmetic over it.
 *
 * A cursor names the first visible line as (item, line within that item),
 * so it keeps pointing at the same content when items above it grow or when
 * nothing has measured them yet.
 *
 * @module
 */

export interface Cursor {
  readonly itemIndex: number;
  readonly lineOffset: number;
}

/**
 * The sequence a cursor moves through. `heightOf` may lay items out on
 * demand; it must return the item's current line count.
 */
export interface LineSpace {
  readonly count: number;
  heightOf(index: number): number;
}

export const ORIGIN: Cursor = { itemIndex: 0, lineOffset: 0 };

export function cursorEquals(a: Cursor, b: Cursor): boolean {
  return a.itemIndex === b.itemIndex && a.lineOffset === b.lineOffset;
}

/**
 * Pull a cursor back inside the space: the index into `[0, count)`, the
 * offset into the item's lines (0 for empty items).
 */
export function clampCursor(cursor: Cursor, space: LineSpace): Cursor {
  if (space.count <= 0) {
    return ORIGIN;
  }
  const itemIndex = Math.min(Math.max(0, Math.floor(cursor.itemIndex)), space.count - 1);
  const height = space.heightOf(itemIndex);
  const maxOffset = Math.max(0, height - 1);
  const lineOffset = Math.min(Math.max(0, Math.floor(cursor.lineOffset)), maxOffset);
  if (itemIndex === cursor.itemIndex && lineOffset === cursor.lineOffset) {
    return cursor;
  }
  return { itemIndex, lineOffset };
}

/**
 * Move a cursor by `delta` lines (negative moves up).
 *
 * Moving down consumes the rest of the current item before stepping to the
 * next one, and running off the end lands on the last item's last line.
 * Moving up steps into the previous item at its last line, which
 * itself consumes one line; entering an empty item consumes nothing.
 */
export function scrollCursor(cursor: Cursor, delta: number, space: LineSpace): Cursor {
  if (space.count <= 0) {
    return ORIGIN;
  }

  let { itemIndex, lineOffset } = clampCursor(cursor, space);
  let remaining = Math.trunc(delta);

  if (remaining > 0) {
    while (remaining > 0 && itemIndex < space.count) {
      const left = space.heightOf(itemIndex) - lineOffset;
      if (remaining >= left) {
        remaining -= Math.max(0, left);
        itemIndex++;
        lineOffset = 0;
      } else {
        lineOffset += remaining;
        remaining = 0;
      }
    }
    if (itemIndex >= space.count) {
      itemIndex = space.count - 1;
      lineOffset = Math.max(0, space.heightOf(itemIndex) - 1);
    }
  } else if (remaining < 0) {
    let back = -remaining;
    while (back > 0) {
      if (back <= lineOffset) {
        lineOffset -= back;
        back = 0;
      } else if (itemIndex === 0) {
        lineOffset = 0;
        back = 0;
      } else {
        back -= lineOffset;
        itemIndex--;
        const height = space.heightOf(itemIndex);
        if (height > 0) {
          lineOffset = height - 1;
          back--;
        } else {
          lineOffset = 0;
        }
      }
    }
  }

  return clampCursor({ itemIndex, lineOffset }, space);
}

/**
 * Total line count, laying out whatever `heightOf` needs to.
 */
export function totalLines(space: LineSpace): number {
  let total = 0;
  for (let i = 0; i < space.count; i++) {
    total += space.heightOf(i);
  }
  return total;
}

/**
 * Absolute line number of the cursor's first visible line.
 */
export function cursorToLine(cursor: Cursor, space: LineSpace): number {
  const limit = Math.min(cursor.itemIndex, space.count);
  let line = 0;
  for (let i = 0; i < limit; i++) {
    line += space.heightOf(i);
  }
  return line + cursor.lineOffset;
}

/**
 * Cursor at absolute line `line`, or past-the-end clamped to the last line.
 */
export function lineToCursor(line: number, space: LineSpace): Cursor {
  if (space.count <= 0) {
    return ORIGIN;
  }
  let accumulated = 0;
  for (let i = 0; i < space.count; i++) {
    const height = space.heightOf(i);
    if (accumulated + height > line) {
      return { itemIndex: i, lineOffset: Math.max(0, line - accumulated) };
    }
    accumulated += height;
  }
  return clampCursor({ itemIndex: space.count - 1, lineOffset: Number.MAX_SAFE_INTEGER }, space);
}

/**
 * The cursor that shows the last `viewportHeight` lines, or the origin when
 * everything fits.
 */
export function bottomCursor(space: LineSpace, viewportHeight: number): Cursor {
  const total = totalLines(space);
  if (total <= viewportHeight) {
    return ORIGIN;
  }
  return lineToCursor(total - Math.max(0, viewportHeight), space);
}
