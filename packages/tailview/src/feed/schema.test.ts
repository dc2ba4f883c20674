import { describe, expect, it } from "vitest";
import { FeedEventError } from "../core/errors.js";
import { parseFeedEvent, parseFeedEventLine } from "./schema.js";

describe("parseFeedEvent", () => {
  it("accepts valid events", () => {
    expect(parseFeedEvent({ type: "text", delta: "hi" })).toEqual({ type: "text", delta: "hi" });
    expect(
      parseFeedEvent({
        type: "tool_call",
        toolCallId: "t1",
        status: "completed",
        input: { command: "ls", depth: 2 },
      }),
    ).toEqual({
      type: "tool_call",
      toolCallId: "t1",
      status: "completed",
      input: { command: "ls", depth: 2 },
    });
  });

  it("reports missing fields with their path", () => {
    try {
      parseFeedEvent({ type: "text" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FeedEventError);
      if (error instanceof FeedEventError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].path).toBe("delta");
      }
    }
  });

  it("rejects unknown event types", () => {
    expect(() => parseFeedEvent({ type: "telemetry" })).toThrow(FeedEventError);
  });

  it("rejects negative durations", () => {
    expect(() => parseFeedEvent({ type: "finish", durationMs: -1 })).toThrow(FeedEventError);
  });
});

describe("parseFeedEventLine", () => {
  it("parses a JSON line", () => {
    expect(parseFeedEventLine('{"type":"divider","iteration":3}')).toEqual({
      type: "divider",
      iteration: 3,
    });
  });

  it("tags invalid JSON with the line number", () => {
    try {
      parseFeedEventLine("not json", 3);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FeedEventError);
      if (error instanceof FeedEventError) {
        expect(error.line).toBe(3);
        expect(error.message.startsWith("line 3: Invalid JSON")).toBe(true);
      }
    }
  });

  it("tags schema problems with the line number", () => {
    try {
      parseFeedEventLine('{"type":"divider","iteration":-1}', 7);
      expect.unreachable();
    } catch (error) {
      expect(error instanceof FeedEventError && error.line).toBe(7);
      expect(error instanceof FeedEventError && error.issues[0].path).toBe("iteration");
    }
  });
});
