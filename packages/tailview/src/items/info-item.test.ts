import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { InfoItem } from "./info-item.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("InfoItem", () => {
  it("shows model, provider and duration", () => {
    const item = new InfoItem("i1", { model: "model-a", provider: "acme", durationMs: 1500 });

    expect(item.render(80)).toEqual(["◇ model-a via acme ⏱ 1.5s"]);
  });

  it("omits absent parts", () => {
    expect(new InfoItem("i1", { model: "model-a", durationMs: 1500 }).render(80)).toEqual([
      "◇ model-a ⏱ 1.5s",
    ]);
    expect(new InfoItem("i2", { provider: "acme", durationMs: 345 }).render(80)).toEqual([
      "◇ ⏱ 345ms",
    ]);
  });
});
