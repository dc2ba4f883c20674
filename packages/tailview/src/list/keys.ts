/**
 * A key press as terminal key parsers report it.
 */
export interface KeyEvent {
  /** Key name: "pageup", "home", "a", ... */
  name: string;
  /** Full descriptor such as "C-a" or "S-pagedown", when the parser gives one */
  full?: string;
  ctrl?: boolean;
  shift?: boolean;
  meta?: boolean;
}

export type NavigationKey = "pageup" | "pagedown" | "home" | "end";

const NAVIGATION_KEYS: Record<string, NavigationKey> = {
  pageup: "pageup",
  pgup: "pageup",
  pagedown: "pagedown",
  pgdown: "pagedown",
  pgdn: "pagedown",
  home: "home",
  end: "end",
};

/**
 * The list navigation a key stands for, if any. Ctrl and meta chords are
 * left to the owning panel.
 */
export function navigationKey(key: KeyEvent | string): NavigationKey | undefined {
  const event = typeof key === "string" ? { name: key } : key;
  if (event.ctrl || event.meta) {
    return undefined;
  }
  return NAVIGATION_KEYS[event.name.trim().toLowerCase()];
}
