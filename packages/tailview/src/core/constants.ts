// Layout defaults shared by the item variants

/** Widest column count any prose item wraps to, regardless of viewport width */
export const MAX_CONTENT_WIDTH = 120;

/** Lines a collapsed thinking block keeps visible (the most recent ones) */
export const THINKING_PREVIEW_LINES = 10;

/** Output lines a collapsed tool call shows before the "more lines" hint */
export const TOOL_MAX_LINES = 10;

/** Prefix drawn on the first visible line of the selected item */
export const SELECTION_MARKER = "▸ ";

/** Minimum width of each horizontal rule beside a divider label */
export const MIN_DIVIDER_RULE = 3;

/** Narrowest box a subagent item is drawn in */
export const SUBAGENT_MIN_BOX_WIDTH = 20;
