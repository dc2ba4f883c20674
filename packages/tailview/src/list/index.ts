export {
  bottomCursor,
  type Cursor,
  clampCursor,
  cursorEquals,
  cursorToLine,
  type LineSpace,
  lineToCursor,
  ORIGIN,
  scrollCursor,
  totalLines,
} from "./cursor.js";
export { type KeyEvent, type NavigationKey, navigationKey } from "./keys.js";
export { ScrollList, type ScrollListOptions } from "./scroll-list.js";
