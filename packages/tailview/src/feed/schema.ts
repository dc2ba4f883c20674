import { type ZodError, z } from "zod";
import { FeedEventError, type FeedEventIssue } from "../core/errors.js";
import type { FeedEvent } from "./events.js";

const durationSchema = z.number().finite().nonnegative();

const fileDiffSchema = z.object({
  file: z.string().optional(),
  before: z.string(),
  after: z.string(),
});

/**
 * Runtime shape of every {@link FeedEvent}.
 */
export const feedEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), delta: z.string() }),
  z.object({ type: z.literal("thinking"), delta: z.string() }),
  z.object({ type: z.literal("thinking_done"), durationMs: durationSchema }),
  z.object({
    type: z.literal("tool_call"),
    toolCallId: z.string().min(1),
    title: z.string().optional(),
    kind: z.string().optional(),
    status: z.string().optional(),
    input: z.record(z.string(), z.unknown()).optional(),
    output: z.string().optional(),
    fileDiff: fileDiffSchema.optional(),
    sessionId: z.string().optional(),
  }),
  z.object({ type: z.literal("tool_error"), toolCallId: z.string().min(1), error: z.string() }),
  z.object({ type: z.literal("tool_canceled"), toolCallId: z.string().min(1) }),
  z.object({ type: z.literal("divider"), iteration: z.number().int().nonnegative() }),
  z.object({ type: z.literal("user"), text: z.string() }),
  z.object({ type: z.literal("user_queued"), text: z.string() }),
  z.object({ type: z.literal("user_dequeued"), text: z.string().optional() }),
  z.object({
    type: z.literal("finish"),
    reason: z.string().optional(),
    error: z.string().optional(),
    model: z.string().optional(),
    provider: z.string().optional(),
    durationMs: durationSchema,
  }),
  z.object({ type: z.literal("clear") }),
]);

function toIssues(error: ZodError): FeedEventIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate an unknown value as a {@link FeedEvent}.
 *
 * @throws FeedEventError listing every problem found
 */
export function parseFeedEvent(value: unknown): FeedEvent {
  const result = feedEventSchema.safeParse(value);
  if (!result.success) {
    const issues = toIssues(result.error);
    const summary = issues.map((issue) => `${issue.path || "root"}: ${issue.message}`).join("; ");
    throw new FeedEventError(`Invalid feed event (${summary})`, issues);
  }
  return result.data;
}

/**
 * Parse one JSON line into a {@link FeedEvent}. `line` is the 1-based line
 * number reported in errors.
 */
export function parseFeedEventLine(text: string, line?: number): FeedEvent {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FeedEventError(`Invalid JSON: ${message}`, [], line);
  }

  try {
    return parseFeedEvent(value);
  } catch (error) {
    if (error instanceof FeedEventError && line !== undefined) {
      throw error.atLine(line);
    }
    throw error;
  }
}
