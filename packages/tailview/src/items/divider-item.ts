import { MIN_DIVIDER_RULE } from "../core/constants.js";
import { visibleWidth } from "../format/text.js";
import { getTheme } from "../format/theme.js";
import { BaseItem } from "./base-item.js";

/**
 * Centered `─── Iteration #N ───` rule between agent iterations.
 */
export class DividerItem extends BaseItem {
  readonly kind = "divider";

  constructor(
    id: string,
    private readonly iteration: number,
  ) {
    super(id);
  }

  iterationNumber(): number {
    return this.iteration;
  }

  protected layout(width: number): string[] {
    const label = ` Iteration #${this.iteration} `;
    const ruleWidth = Math.max(MIN_DIVIDER_RULE, Math.floor((width - visibleWidth(label)) / 2));
    const rule = "─".repeat(ruleWidth);
    return [getTheme().divider(rule + label + rule)];
  }
}
