import { formatDuration } from "../format/duration.js";
import { getTheme } from "../format/theme.js";
import { BaseItem } from "./base-item.js";

export interface InfoData {
  model?: string;
  provider?: string;
  durationMs: number;
}

/**
 * Run metadata: `◇ <model> via <provider> ⏱ <duration>`.
 */
export class InfoItem extends BaseItem {
  readonly kind = "info";

  constructor(
    id: string,
    private readonly data: InfoData,
  ) {
    super(id);
  }

  protected layout(): string[] {
    const { model, provider, durationMs } = this.data;
    const parts = ["◇"];
    if (model) {
      parts.push(model);
      if (provider) {
        parts.push("via", provider);
      }
    }
    parts.push("⏱", formatDuration(durationMs));
    return [getTheme().info(parts.join(" "))];
  }
}
