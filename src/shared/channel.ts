/**
 * Unbounded in-memory queue for handing events from a running download to
 * a consumer that reads at its own pace (a UI refresh loop, a log writer).
 */
import type { DownloadProgress, ProgressCallback } from "../downloader/shared/types.js";

export class ProgressChannel<T> implements AsyncIterable<T> {
  private readonly buffer: { value: T }[] = [];
  private readonly waiters: ((result: IteratorResult<T>) => void)[] = [];
  private closed = false;

  /**
   * Queues a value. Values pushed after close() are dropped.
   */
  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
  }

  /**
   * Takes everything queued so far without waiting.
   */
  drain(): T[] {
    return this.buffer.splice(0, this.buffer.length).map((entry) => entry.value);
  }

  /**
   * Ends iteration once the buffer is empty.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const entry = this.buffer.shift();
        if (entry) {
          return Promise.resolve({ value: entry.value, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => this.waiters.push(resolve));
      },
    };
  }
}

/**
 * Creates a channel of progress events and a callback that feeds it.
 */
export function createProgressChannel(): {
  channel: ProgressChannel<DownloadProgress>;
  onProgress: ProgressCallback;
} {
  const channel = new ProgressChannel<DownloadProgress>();
  return {
    channel,
    onProgress: (completed, total, stage) => channel.push({ completed, total, stage }),
  };
}
