/**
 * Formats a duration in milliseconds the way status lines show it.
 *
 * - Under a second: whole milliseconds ("345ms")
 * - Under a minute: seconds rounded to a tenth, trailing ".0" dropped ("1.2s", "3s")
 * - Otherwise: hours, minutes and whole seconds ("2m30s", "1h0m5s")
 */
export function formatDuration(ms: number): string {
  const value = Math.max(0, ms);

  if (value < 1000) {
    return `${Math.round(value)}ms`;
  }

  if (value < 60_000) {
    const tenths = Math.round(value / 100);
    if (tenths < 600) {
      const seconds = tenths / 10;
      return `${Number.isInteger(seconds) ? seconds.toFixed(0) : seconds.toFixed(1)}s`;
    }
  }

  const totalSeconds = Math.round(value / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return hours > 0 ? `${hours}h${minutes}m${seconds}s` : `${minutes}m${seconds}s`;
}
