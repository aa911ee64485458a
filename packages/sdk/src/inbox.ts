/**
 * Pull queue between a socket's 'data'/'message' events and the receive loop.
 * Only one receive may wait at a time; the channels are half duplex.
 *
 * With a `maxQueued` limit the oldest chunks are dropped once it is reached,
 * for sockets that keep receiving while nobody reads them.
 */

export class ChunkInbox {
  private queue: Buffer[] = [];
  private waiter?: (chunk: Buffer | null) => void;
  private _closed = false;
  private _dropped = 0;
  private readonly maxQueued: number;

  constructor(maxQueued: number = Number.POSITIVE_INFINITY) {
    this.maxQueued = maxQueued;
  }

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this.queue.length;
  }

  /** Chunks discarded because the queue was full */
  get dropped(): number {
    return this._dropped;
  }

  push(chunk: Buffer): void {
    if (this._closed) return;
    if (this.waiter) {
      this.waiter(chunk);
      return;
    }
    this.queue.push(chunk);
    if (this.queue.length > this.maxQueued) {
      this.queue.shift();
      this._dropped += 1;
    }
  }

  /**
   * Next chunk, or null when nothing arrives within the budget or the inbox
   * is closed. Chunks queued before close are still handed out.
   */
  receive(timeoutMs: number): Promise<Buffer | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this._closed || timeoutMs <= 0) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('A receive is already waiting on this inbox'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve(null);
      }, timeoutMs);

      this.waiter = (chunk) => {
        clearTimeout(timer);
        this.waiter = undefined;
        resolve(chunk);
      };
    });
  }

  /** Drop anything queued, e.g. late output from a timed-out command. */
  drain(): number {
    const dropped = this.queue.length;
    this.queue = [];
    return dropped;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.waiter?.(null);
  }
}
