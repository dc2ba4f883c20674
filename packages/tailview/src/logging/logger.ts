/**
 * tslog loggers that stay off stdout, where the frame is painted.
 *
 * Lines go to a log file when one is configured (`file`, or
 * `TAILVIEW_LOG_FILE`), otherwise to stderr. The feed and queue log through
 * sub-loggers named `feed` and `queue`.
 *
 * @module
 */

import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

export const LOG_LEVEL_NAMES = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

const DEFAULT_MIN_LEVEL = 4;

const LINE_TEMPLATE = "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}.{{ms}} {{logLevelName}} [{{name}}] ";

/**
 * Level id for a name ("debug") or a digit 0-6 ("2"); undefined otherwise.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase() ?? "";
  if (/^[0-6]$/.test(normalized)) {
    return Number(normalized);
  }
  const index = LOG_LEVEL_NAMES.findIndex((name) => name === normalized);
  return index >= 0 ? index : undefined;
}

export interface LoggerOptions {
  /** Shown in brackets on each line (default "tailview") */
  name?: string;
  /** 0 silly ... 6 fatal; defaults to TAILVIEW_LOG_LEVEL, then 4 (warn) */
  minLevel?: number;
  /** "hidden" drops everything */
  type?: "pretty" | "hidden";
  /** Append here instead of stderr; defaults to TAILVIEW_LOG_FILE */
  file?: string;
}

// One append stream per path, shared by every logger writing there
const sinks = new Map<string, WriteStream>();

function openSink(path: string): WriteStream | undefined {
  const open = sinks.get(path);
  if (open) {
    return open;
  }
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[tailview] Cannot open log file ${path}: ${message}\n`);
    return undefined;
  }
  const stream = createWriteStream(path, { flags: "a" });
  stream.on("error", (error) => {
    process.stderr.write(`[tailview] Log file ${path} failed, dropping its output: ${error.message}\n`);
    sinks.delete(path);
  });
  sinks.set(path, stream);
  return stream;
}

function formatArgs(args: unknown[]): string {
  return args.map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg))).join(" ");
}

/**
 * Flush and close every log file. Loggers pointing at a closed file drop
 * their output until a new logger reopens it.
 */
export async function closeLogFiles(): Promise<void> {
  const streams = [...sinks.values()];
  sinks.clear();
  await Promise.all(
    streams.map((stream) => new Promise<void>((resolve) => stream.end(() => resolve()))),
  );
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({ name: "replay", minLevel: 2 });
 * const feedLogger = logger.getSubLogger({ name: "feed" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel = options.minLevel ?? parseLogLevel(process.env.TAILVIEW_LOG_LEVEL) ?? DEFAULT_MIN_LEVEL;
  const file = options.file ?? (process.env.TAILVIEW_LOG_FILE?.trim() || undefined);
  const name = options.name ?? "tailview";

  if (options.type === "hidden") {
    return new Logger<ILogObj>({ name, minLevel, type: "hidden" });
  }

  const sinkPath = file !== undefined && openSink(file) !== undefined ? file : undefined;

  return new Logger<ILogObj>({
    name,
    minLevel,
    type: "pretty",
    hideLogPositionForProduction: true,
    prettyLogTemplate: LINE_TEMPLATE,
    stylePrettyLogs: sinkPath === undefined,
    overwrite: {
      // tslog passes errors apart from the other arguments, already formatted
      transportFormatted: (meta: string, args: unknown[], errors: string[]) => {
        const line = `${meta}${[formatArgs(args), ...errors].join("\n")}\n`;
        if (sinkPath === undefined) {
          process.stderr.write(line);
        } else {
          sinks.get(sinkPath)?.write(line);
        }
      },
    },
  });
}

export const defaultLogger = createLogger();
