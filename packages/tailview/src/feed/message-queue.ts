/**
 * Hand-off point between producers and the UI side.
 *
 * Producers (a stream reader, a replayed file) enqueue immutable messages;
 * only the UI side drains them and touches the list. Closing the queue is
 * how a producer is canceled: nothing new gets in, but messages already
 * queued can still be drained.
 *
 * @module
 */

import type { ILogObj, Logger } from "tslog";
import { QueueClosedError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";

export interface MessageQueueOptions {
  /** Used in log lines and errors (default "messages") */
  name?: string;
  logger?: Logger<ILogObj>;
}

export class MessageQueue<T> {
  readonly name: string;
  private readonly logger: Logger<ILogObj>;
  private pending: Readonly<T>[] = [];
  private closed = false;
  private dropped = 0;

  constructor(options: MessageQueueOptions = {}) {
    this.name = options.name ?? "messages";
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "queue" });
  }

  /** Messages waiting to be drained */
  get size(): number {
    return this.pending.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Messages refused because the queue was closed */
  droppedCount(): number {
    return this.dropped;
  }

  /**
   * Queue a message. Returns false, dropping the message, once the queue is closed.
   */
  enqueue(message: T): boolean {
    if (this.closed) {
      this.dropped++;
      this.logger.debug(`Dropping message for closed queue "${this.name}"`);
      return false;
    }
    this.pending.push(Object.freeze(message));
    return true;
  }

  /**
   * @throws QueueClosedError when the queue has been closed
   */
  enqueueOrThrow(message: T): void {
    if (!this.enqueue(message)) {
      throw new QueueClosedError(this.name);
    }
  }

  /**
   * Hand every queued message to `handler`, oldest first, including
   * messages the handler itself enqueues. Returns how many were handled.
   *
   * A handler error stops the drain; the failing message is consumed and
   * the rest stay queued.
   */
  drain(handler: (message: Readonly<T>) => void): number {
    let handled = 0;
    while (this.pending.length > 0) {
      const batch = this.pending;
      this.pending = [];
      for (let i = 0; i < batch.length; i++) {
        try {
          handler(batch[i]);
        } catch (error) {
          this.pending = [...batch.slice(i + 1), ...this.pending];
          throw error;
        }
        handled++;
      }
    }
    return handled;
  }

  /**
   * Copy messages from `source` into the queue until it is exhausted, the
   * queue is closed or `signal` aborts. Returns how many were queued.
   */
  async pump(source: AsyncIterable<T> | Iterable<T>, signal?: AbortSignal): Promise<number> {
    let queued = 0;
    for await (const message of source) {
      if (signal?.aborted) {
        this.logger.debug(`Pump into "${this.name}" aborted after ${queued} messages`);
        break;
      }
      if (!this.enqueue(message)) {
        break;
      }
      queued++;
    }
    return queued;
  }

  /** Stop accepting messages. Idempotent */
  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.logger.debug(`Queue "${this.name}" closed with ${this.pending.length} pending`);
    }
  }
}
