import chalk from "chalk";
import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { DividerItem } from "../items/divider-item.js";
import { ScrollList } from "../list/scroll-list.js";
import { defaultTheme, getTheme, setTheme } from "./theme.js";

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  setTheme({});
});

describe("setTheme", () => {
  it("overrides single styles and keeps the rest", () => {
    setTheme({ divider: (text) => `<${text}>` });

    expect(getTheme().divider("x")).toBe("<x>");
    expect(getTheme().info).toBe(defaultTheme.info);
  });

  it("shows up in cached items only after invalidation", () => {
    const list = new ScrollList<DividerItem>(20, 5);
    list.appendItem(new DividerItem("d1", 1));
    const before = list.viewLines();

    setTheme({ divider: (text) => `<${text}>` });
    expect(list.viewLines()).toEqual(before);

    list.invalidateAll();
    expect(list.viewLines()).toEqual([`<${before[0]}>`]);
  });
});
