export { formatDuration } from "./duration.js";
export { renderColoredDiff, renderDiffBlock, unifiedDiffLines } from "./diff.js";
export { renderMarkdown, resetMarkdownRenderer } from "./markdown.js";
export { formatParamValue, formatToolParams } from "./params.js";
export { indentLines, padRight, rightAlign, truncateLine, visibleWidth, wrapText } from "./text.js";
export { defaultTheme, getTheme, setTheme, type Style, type Theme } from "./theme.js";
