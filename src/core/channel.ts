import type { Logger } from "../utils/logger.js";

/**
 * Single-consumer FIFO mailbox.
 *
 * Producers (the poll worker, background deletes) only ever post; the
 * consumer runs on its own microtask, never inline inside post(), so a
 * producer cannot observe or mutate consumer state mid-message.
 */
export class MessageChannel<T> {
  private queue: T[] = [];
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private consumer: (message: T) => void;
  private logger: Logger;

  constructor(consumer: (message: T) => void, logger: Logger) {
    this.consumer = consumer;
    this.logger = logger;
  }

  post(message: T): boolean {
    if (this.closed) {
      this.logger.debug("Channel closed, message dropped");
      return false;
    }
    this.queue.push(message);
    if (!this.draining) {
      this.draining = true;
      queueMicrotask(() => this.drainQueue());
    }
    return true;
  }

  /** Resolves once every message posted so far has been consumed. */
  drain(): Promise<void> {
    if (!this.draining && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  close(): void {
    this.closed = true;
  }

  get pending(): number {
    return this.queue.length;
  }

  private drainQueue(): void {
    let message = this.queue.shift();
    while (message !== undefined) {
      try {
        this.consumer(message);
      } catch (err) {
        this.logger.error({ error: err }, "Channel consumer failed");
      }
      message = this.queue.shift();
    }
    this.draining = false;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
