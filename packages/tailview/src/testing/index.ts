/**
 * Test doubles for code built on the list.
 *
 * @module
 */

import type { ListItem } from "../items/item.js";
import type { ScrollList } from "../list/scroll-list.js";

export { StubItem, stubItems } from "./stub-item.js";

/**
 * Every line of every item, laid out at the list's width, ignoring the
 * viewport. Useful for asserting on content without scrolling.
 */
export function collectLines<T extends ListItem>(list: ScrollList<T>): string[] {
  return list.getItems().flatMap((item) => item.render(list.width));
}
