import type { ChannelMessage } from "../models/upload.model";

export type MessagePredicate = (message: ChannelMessage) => boolean;

interface Waiter {
  predicate: MessagePredicate;
  resolve: (message: ChannelMessage | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const MAX_BUFFERED_MESSAGES = 100;
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

// Single consumer; a message failing its predicate is dropped
export class MessageInbox {
  private queue: ChannelMessage[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;

  push(message: ChannelMessage): void {
    if (this.failure) return;

    if (this.waiter) {
      if (this.waiter.predicate(message)) {
        this.settle().resolve(message);
      }
      return;
    }

    this.queue.push(message);
    if (this.queue.length > MAX_BUFFERED_MESSAGES) {
      this.queue.shift();
    }
  }

  await(
    predicate: MessagePredicate,
    timeoutMs: number,
  ): Promise<ChannelMessage | null> {
    if (this.waiter) {
      return Promise.reject(new Error("A message wait is already pending"));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (!(timeoutMs >= 0 && timeoutMs <= MAX_TIMER_DELAY_MS)) {
      return Promise.reject(new RangeError(`Invalid message wait timeout: ${timeoutMs}ms`));
    }

    const buffered = this.queue;
    this.queue = [];
    const match = buffered.find(predicate);
    if (match) {
      return Promise.resolve(match);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle().resolve(null);
      }, timeoutMs);
      this.waiter = { predicate, resolve, reject, timer };
    });
  }

  /**
   * Rejects the pending wait, and every later one, with `error`.
   */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.queue = [];
    if (this.waiter) {
      this.settle().reject(error);
    }
  }

  get pending(): boolean {
    return this.waiter !== null;
  }

  private settle(): Waiter {
    const waiter = this.waiter;
    if (!waiter) {
      throw new Error("No message wait is pending");
    }
    clearTimeout(waiter.timer);
    this.waiter = null;
    return waiter;
  }
}
