import chalk from "chalk";
import { beforeAll, describe, expect, it } from "vitest";
import { CLI_VERSION } from "./constants.js";
import { createProgram, runCLI } from "./program.js";
import { createTestEnv } from "./test-env.js";

beforeAll(() => {
  chalk.level = 0;
});

const LOG = "2024-05-01T12:00:03Z INFO started\nplain line\n";

describe("createProgram", () => {
  it("registers the replay and logs commands", () => {
    const program = createProgram(createTestEnv().env);

    expect(program.commands.map((command) => command.name())).toEqual(["replay", "logs"]);
  });

  it("prints the version", async () => {
    const test = createTestEnv();
    const program = createProgram(test.env).exitOverride();

    await expect(program.parseAsync(["node", "tailview", "--version"])).rejects.toThrow();
    expect(test.stdout()).toBe(`${CLI_VERSION}\n`);
  });
});

describe("runCLI", () => {
  it("runs a command with flags", async () => {
    const test = createTestEnv({ "app.log": LOG }, [
      "logs",
      "app.log",
      "--width",
      "40",
      "--height",
      "2",
      "--no-scrollbar",
    ]);

    await runCLI({ env: test.env, config: {} });

    expect(test.stdout()).toBe("12:00:03 INFO  started\nplain line\n1/2 100% [follow]\n");
  });

  it("takes frame defaults from config and lets flags override them", async () => {
    const test = createTestEnv({ "app.log": LOG }, ["logs", "app.log", "-H", "1"]);

    await runCLI({
      env: test.env,
      config: { view: { width: 40, height: 5, scrollbar: false } },
    });

    expect(test.stdout()).toBe("plain line\n2/2 100% [follow]\n");
  });

  it("reports a missing file on stderr", async () => {
    const test = createTestEnv({}, ["replay", "missing.jsonl"]);

    await runCLI({ env: test.env, config: {} });

    expect(test.stderr()).toBe("Error: ENOENT: no such file or directory, open 'missing.jsonl'\n");
    expect(test.exitCode()).toBe(1);
  });

  it("turns color off with --no-color", async () => {
    chalk.level = 1;
    const test = createTestEnv({ "app.log": LOG }, ["--no-color", "logs", "app.log", "-H", "2"]);

    await runCLI({ env: test.env, config: {} });

    expect(chalk.level).toBe(0);
    expect(test.stdout()).not.toContain("\u001b[");
  });
});
