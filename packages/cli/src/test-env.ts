import { Writable } from "node:stream";
import { createLogger } from "tailview";
import type { CLIEnvironment } from "./environment.js";

/**
 * A writable stream that captures everything written to it.
 */
export function createWritable(): { stream: Writable; read: () => string } {
  let data = "";
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      data += chunk.toString();
      callback();
    },
  });
  return { stream, read: () => data };
}

export interface TestEnvironment {
  env: CLIEnvironment;
  stdout: () => string;
  stderr: () => string;
  exitCode: () => number | undefined;
}

/**
 * A CLI environment backed by in-memory files and captured output.
 */
export function createTestEnv(files: Record<string, string> = {}, argv: string[] = []): TestEnvironment {
  const stdout = createWritable();
  const stderr = createWritable();
  let exitCode: number | undefined;

  const env: CLIEnvironment = {
    argv: ["node", "tailview", ...argv],
    stdout: stdout.stream,
    stderr: stderr.stream,
    readFile: async (path: string) => {
      const content = files[path];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    },
    setExitCode: (code: number) => {
      exitCode = code;
    },
    createLogger: (name: string) => createLogger({ type: "hidden", name }),
  };

  return { env, stdout: stdout.read, stderr: stderr.read, exitCode: () => exitCode };
}
