import { describe, expect, it } from "vitest";
import { FeedEventError, QueueClosedError } from "./errors.js";

describe("FeedEventError", () => {
  it("prefixes the message with the line number", () => {
    const error = new FeedEventError("bad event", [], 4);

    expect(error.name).toBe("FeedEventError");
    expect(error.message).toBe("line 4: bad event");
  });

  it("retags a copy with another line", () => {
    const issues = [{ path: "delta", message: "Required" }];
    const tagged = new FeedEventError("bad event", issues, 2).atLine(9);

    expect(tagged.message).toBe("line 9: bad event");
    expect(tagged.line).toBe(9);
    expect(tagged.issues).toEqual(issues);
  });
});

describe("QueueClosedError", () => {
  it("names the queue", () => {
    const error = new QueueClosedError("events");

    expect(error.name).toBe("QueueClosedError");
    expect(error.message).toBe('Queue "events" is closed');
  });
});
