import { describe, expect, it } from "vitest";
import { navigationKey } from "./keys.js";

describe("navigationKey", () => {
  it("maps names and aliases", () => {
    expect(navigationKey("pageup")).toBe("pageup");
    expect(navigationKey("pgup")).toBe("pageup");
    expect(navigationKey("PageDown")).toBe("pagedown");
    expect(navigationKey({ name: "end" })).toBe("end");
    expect(navigationKey({ name: "home", shift: true })).toBe("home");
  });

  it("ignores other keys and modified chords", () => {
    expect(navigationKey("a")).toBeUndefined();
    expect(navigationKey({ name: "pageup", ctrl: true })).toBeUndefined();
    expect(navigationKey({ name: "end", meta: true })).toBeUndefined();
  });
});
