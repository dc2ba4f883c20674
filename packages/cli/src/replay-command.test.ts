import chalk from "chalk";
import { FeedEventError } from "tailview";
import { beforeAll, describe, expect, it } from "vitest";
import type { CLIViewOptions } from "./option-helpers.js";
import { executeReplay, readFeedEvents } from "./replay-command.js";
import { createTestEnv } from "./test-env.js";

beforeAll(() => {
  chalk.level = 0;
});

const divider = (n: number) => JSON.stringify({ type: "divider", iteration: n });

// Width 31: 8-column rules either side of the 14-column label
const rule = "─".repeat(8);
const dividerLine = (n: number) => `${rule} Iteration #${n} ${rule}`;

const options = (overrides: Partial<CLIViewOptions> = {}): CLIViewOptions => ({
  width: 31,
  height: 2,
  scrollbar: false,
  ...overrides,
});

describe("readFeedEvents", () => {
  it("skips blank lines and reports invalid ones with their line number", () => {
    const invalid: FeedEventError[] = [];
    const events = [
      ...readFeedEvents(`${divider(1)}\n\nnot json\r\n${divider(2)}\n`, (error) => invalid.push(error)),
    ];

    expect(events).toEqual([
      { type: "divider", iteration: 1 },
      { type: "divider", iteration: 2 },
    ]);
    expect(invalid).toHaveLength(1);
    expect(invalid[0].line).toBe(3);
    expect(invalid[0].message).toMatch(/^line 3: Invalid JSON: /);
  });
});

describe("executeReplay", () => {
  it("prints the followed bottom of the stream", async () => {
    const test = createTestEnv({
      "run.jsonl": [divider(1), divider(2), divider(3)].join("\n"),
    });

    await executeReplay("run.jsonl", options(), test.env);

    expect(test.stdout()).toBe(`${dividerLine(2)}\n${dividerLine(3)}\n2/3 100% [follow]\n`);
    expect(test.stderr()).toBe("");
    expect(test.exitCode()).toBeUndefined();
  });

  it("replays navigation keys", async () => {
    const test = createTestEnv({
      "run.jsonl": [divider(1), divider(2), divider(3)].join("\n"),
    });

    await executeReplay("run.jsonl", options({ keys: [{ type: "key", key: "home" }] }), test.env);

    expect(test.stdout()).toBe(`${dividerLine(1)}\n${dividerLine(2)}\n1/3 0%\n`);
  });

  it("still prints the frame when lines are invalid", async () => {
    const test = createTestEnv({
      "run.jsonl": [divider(1), "not json", '{"type":"bogus"}', divider(2)].join("\n"),
    });

    await executeReplay("run.jsonl", options(), test.env);

    const errors = test.stderr().trimEnd().split("\n");
    expect(errors).toHaveLength(2);
    expect(errors[0]).toMatch(/^\[tailview\] line 2: Invalid JSON: /);
    expect(errors[1]).toMatch(/^\[tailview\] line 3: Invalid feed event/);
    expect(test.stdout()).toBe(`${dividerLine(1)}\n${dividerLine(2)}\n1/2 100% [follow]\n`);
    expect(test.exitCode()).toBe(1);
  });

  it("reports the session of a clicked subagent", async () => {
    const test = createTestEnv({
      "run.jsonl": JSON.stringify({
        type: "tool_call",
        toolCallId: "task-1",
        title: "Task",
        status: "in_progress",
        input: { subagent_type: "explore", prompt: "Find the config loader" },
        sessionId: "session-1",
      }),
    });

    await executeReplay(
      "run.jsonl",
      options({ height: 10, keys: [{ type: "click", row: 0 }] }),
      test.env,
    );

    expect(test.stderr()).toBe("[tailview] subagent explore session: session-1\n");
  });

  it("applies the tool line limit from config", async () => {
    const output = Array.from({ length: 6 }, (_, i) => `row ${i}`).join("\n");
    const test = createTestEnv({
      "run.jsonl": JSON.stringify({
        type: "tool_call",
        toolCallId: "t1",
        title: "bash",
        status: "completed",
        input: { command: "seq" },
        output,
      }),
    });

    await executeReplay("run.jsonl", options({ height: 20, width: 60 }), test.env, {
      tool: { "max-lines": 2 },
    });

    const frame = test.stdout();
    expect(frame).toContain("  row 1\n");
    expect(frame).toContain("  …(4 more lines, click to expand)\n");
    expect(frame).not.toContain("row 2\n");
  });

  it("fails when the file cannot be read", async () => {
    const test = createTestEnv();

    await expect(executeReplay("missing.jsonl", options(), test.env)).rejects.toThrow("ENOENT");
  });
});
