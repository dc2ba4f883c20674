import chalk from "chalk";
import { ScrollList } from "tailview";
import { StubItem, stubItems } from "tailview/testing";
import { beforeAll, describe, expect, it } from "vitest";
import { formatStatus, renderFrame, renderScrollbar } from "./frame.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("renderScrollbar", () => {
  it("sizes the thumb by the visible ratio", () => {
    expect(renderScrollbar(0, 4, 0.5)).toEqual(["█", "█", "░", "░"]);
    expect(renderScrollbar(1, 4, 0.5)).toEqual(["░", "░", "█", "█"]);
  });

  it("keeps at least one thumb cell", () => {
    expect(renderScrollbar(0.5, 5, 0.01)).toEqual(["░", "░", "█", "░", "░"]);
  });

  it("fills the track when everything is visible", () => {
    expect(renderScrollbar(0, 3, 1)).toEqual(["█", "█", "█"]);
  });

  it("returns nothing for a zero height", () => {
    expect(renderScrollbar(0.5, 0, 0.5)).toEqual([]);
  });
});

describe("renderFrame", () => {
  function followingList(): ScrollList<StubItem> {
    const list = new ScrollList<StubItem>(10, 4, { itemGap: false });
    for (const item of stubItems([3, 3])) {
      list.appendItem(item);
    }
    return list;
  }

  it("draws the bottom of a following list with a scrollbar", () => {
    expect(renderFrame(followingList())).toEqual([
      "item-0:2  ░",
      "item-1:0  █",
      "item-1:1  █",
      "item-1:2  █",
      "3/6 100% [follow]",
    ]);
  });

  it("draws the top without a scrollbar", () => {
    const list = followingList();
    list.setAutoScroll(false);
    list.gotoTop();

    expect(renderFrame(list, { scrollbar: false })).toEqual([
      "item-0:0",
      "item-0:1",
      "item-0:2",
      "item-1:0",
      "1/6 0%",
    ]);
  });

  it("pads an empty list to its height", () => {
    const list = new ScrollList<StubItem>(4, 2);

    expect(renderFrame(list)).toEqual(["    █", "    █", "0/0 0% [follow]"]);
  });

  it("truncates lines wider than the list", () => {
    const list = new ScrollList<StubItem>(6, 1);
    list.appendItem(new StubItem("a", ["abcdefghij"]));

    expect(renderFrame(list, { scrollbar: false })).toEqual(["abcde…", "1/1 100% [follow]"]);
  });
});

describe("formatStatus", () => {
  it("omits follow once auto-scroll is off", () => {
    const list = new ScrollList<StubItem>(10, 2, { itemGap: false, autoScroll: false });
    list.setItems(stubItems([2, 2]));
    list.scrollBy(1);

    expect(formatStatus(list)).toBe("2/4 50%");
  });
});
