/**
 * Single-line rendering of tool input parameters for item headers.
 */

const PRIMARY_KEYS = ["command", "filePath"] as const;

/**
 * String form of a single tool input value.
 */
export function formatParamValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Formats tool input as `<primary> (key=value, ...)`.
 *
 * The primary parameter (`command`, else `filePath`) is shown bare, the
 * rest in parentheses in insertion order. The result is cut to `maxWidth`
 * with a trailing "...".
 *
 * @example
 * ```typescript
 * formatToolParams({ command: "ls -la", cwd: "/tmp" }, 40);
 * // "ls -la (cwd=/tmp)"
 * ```
 */
export function formatToolParams(input: Record<string, unknown>, maxWidth: number): string {
  const entries = Object.entries(input);
  if (entries.length === 0) {
    return "";
  }

  const primaryKey = PRIMARY_KEYS.find((key) => key in input);
  const parts: string[] = [];

  if (primaryKey) {
    parts.push(formatParamValue(input[primaryKey]));
  }

  const remaining = entries
    .filter(([key]) => key !== primaryKey)
    .map(([key, value]) => `${key}=${formatParamValue(value)}`);

  if (remaining.length > 0) {
    parts.push(`(${remaining.join(", ")})`);
  }

  const str = parts.join(" ");
  if (str.length > maxWidth) {
    return maxWidth > 3 ? `${str.slice(0, maxWidth - 3)}...` : str.slice(0, Math.max(0, maxWidth));
  }
  return str;
}
