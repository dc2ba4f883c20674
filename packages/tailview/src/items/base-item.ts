import { RenderCache } from "./render-cache.js";
import { clampDimension, type ListItem, layoutWidth } from "./item.js";

/**
 * Shared plumbing for the item variants: identity plus a width-keyed
 * {@link RenderCache}. Subclasses implement {@link layout} and call
 * {@link invalidate} from every mutator.
 */
export abstract class BaseItem implements ListItem {
  protected readonly cache = new RenderCache();

  constructor(private readonly itemId: string) {}

  id(): string {
    return this.itemId;
  }

  render(width: number): string[] {
    return this.cache.resolve(clampDimension(width), (w) => this.layout(layoutWidth(w)));
  }

  height(): number {
    return this.cache.height;
  }

  invalidate(): void {
    this.cache.invalidate();
  }

  /** Lay the item out for `width` columns (always at least 1) */
  protected abstract layout(width: number): string[];
}
