/**
 * Error types for the fallible edges around the list.
 *
 * The list itself never throws: sizes and scroll requests are clamped.
 * Errors only come from input that arrives from outside the process
 * (producer events) and from misuse of a closed queue.
 *
 * @module
 */

/**
 * A single validation problem found in a producer event.
 */
export interface FeedEventIssue {
  /** Dotted path to the offending field ("" for the event itself) */
  path: string;
  message: string;
}

/**
 * Thrown when a producer event does not match any known event shape.
 */
export class FeedEventError extends Error {
  public readonly issues: FeedEventIssue[];
  /** 1-based line number when the event was read from a line-oriented source */
  public readonly line?: number;

  constructor(message: string, issues: FeedEventIssue[] = [], line?: number) {
    super(line !== undefined ? `line ${line}: ${message}` : message);
    this.name = "FeedEventError";
    this.issues = issues;
    this.line = line;
  }

  /**
   * Returns a copy of this error tagged with the line it was read from.
   */
  atLine(line: number): FeedEventError {
    const base = this.line !== undefined ? this.message.replace(/^line \d+: /, "") : this.message;
    return new FeedEventError(base, this.issues, line);
  }
}

/**
 * Thrown by {@link MessageQueue.enqueueOrThrow} after the queue has been closed.
 */
export class QueueClosedError extends Error {
  constructor(queueName: string) {
    super(`Queue "${queueName}" is closed`);
    this.name = "QueueClosedError";
  }
}
