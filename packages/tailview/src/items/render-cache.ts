/**
 * Width-keyed memo for an item's rendered lines.
 *
 * The cache is an explicit `{ width, lines, valid }` record. It is never
 * built implicitly and never reacts to a viewport resize on its own: a
 * render request at a different width is what recomputes it, and an
 * explicit {@link RenderCache.invalidate} at each mutation site is what
 * marks it stale.
 *
 * Invariant: `valid` implies `height === lines.length` and both were
 * computed for `width`.
 *
 * @module
 */

export class RenderCache {
  private cachedWidth = -1;
  private cachedLines: readonly string[] = [];
  private isValid = false;

  /** Width the current (or last) lines were computed for, -1 before the first render */
  get width(): number {
    return this.cachedWidth;
  }

  get valid(): boolean {
    return this.isValid;
  }

  /** Line count while valid for some width, 0 (unknown) otherwise */
  get height(): number {
    return this.isValid ? this.cachedLines.length : 0;
  }

  /**
   * Lines from the most recent layout, kept across {@link invalidate}.
   */
  get lastLines(): readonly string[] {
    return this.cachedLines;
  }

  isValidFor(width: number): boolean {
    return this.isValid && this.cachedWidth === width;
  }

  store(width: number, lines: readonly string[]): readonly string[] {
    this.cachedWidth = width;
    this.cachedLines = lines;
    this.isValid = true;
    return lines;
  }

  /**
   * Serve the cached lines for `width`, or run `layout` and cache its result.
   */
  resolve(width: number, layout: (width: number) => string[]): string[] {
    if (this.isValidFor(width)) {
      return [...this.cachedLines];
    }
    const lines = layout(width);
    this.store(width, lines);
    return [...lines];
  }

  invalidate(): void {
    this.isValid = false;
  }
}
