/**
 * The unit-of-content contract every list item implements.
 *
 * @module
 */

/**
 * A piece of content in a {@link ScrollList}: a text block, a tool call,
 * a divider, a log line.
 *
 * Items never reference the list that holds them.
 */
export interface ListItem {
  /** Stable identity, used to find and mutate an item instead of appending a duplicate */
  id(): string;

  /**
   * Lay the item out for `width` columns.
   *
   * Calling twice with the same width returns the same lines without
   * re-running layout. A different width recomputes.
   */
  render(width: number): string[];

  /**
   * Cached line count, or 0 when the item has not been rendered since its
   * last invalidation. Callers that need an authoritative height call
   * {@link render} first.
   */
  height(): number;

  /**
   * Mark the cached layout stale after a state change. Prior lines are kept
   * but no longer served.
   */
  invalidate(): void;
}

/**
 * Items with a collapsed and an expanded form.
 */
export interface Expandable {
  isExpanded(): boolean;
  /** Flip the state; implementations invalidate their cache */
  toggleExpanded(): void;
}

export function isExpandable(item: ListItem): item is ListItem & Expandable {
  return (
    "isExpanded" in item &&
    typeof item.isExpanded === "function" &&
    "toggleExpanded" in item &&
    typeof item.toggleExpanded === "function"
  );
}

/**
 * Width an item actually lays out at. Negative or fractional widths
 * collapse to a usable integer.
 */
export function layoutWidth(width: number): number {
  return Math.max(1, Math.floor(Number.isFinite(width) ? width : 0));
}

/**
 * Width a render request is cached under: negative widths count as 0.
 */
export function clampDimension(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
}
