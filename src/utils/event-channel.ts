// Bounded single-consumer channel between a producer task and an async iterator
// close() delivers the final value and ends the channel in one step

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
}

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

export class EventChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private pullWaiter: Waiter<T> | null = null;
  private pushWaiters: Array<() => void> = [];
  private closed = false;
  private abandoned = false;
  private controller = new AbortController();

  constructor(private capacity: number = 1) {
    if (capacity < 1) {
      throw new Error('Channel capacity must be at least 1');
    }
  }

  /** Aborted when the consumer stops pulling before the channel closed. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue a value, waiting while the buffer is full.
   * Rejects with ChannelClosedError once the channel is closed or abandoned.
   */
  async push(value: T): Promise<void> {
    while (!this.closed && this.buffer.length >= this.capacity && !this.pullWaiter) {
      await new Promise<void>((resolve) => this.pushWaiters.push(resolve));
    }
    if (this.closed) {
      throw new ChannelClosedError();
    }
    this.deliver(value);
  }

  /**
   * Queue the terminal value and close. No value can follow it.
   * Returns false if the channel was already closed.
   */
  close(finalValue?: T): boolean {
    if (this.closed) {
      return false;
    }
    if (finalValue !== undefined) {
      this.deliver(finalValue);
    }
    this.closed = true;
    this.releasePushers();
    this.flushPullWaiter();
    return true;
  }

  private deliver(value: T): void {
    if (this.pullWaiter) {
      const waiter = this.pullWaiter;
      this.pullWaiter = null;
      waiter.resolve({ value, done: false });
      return;
    }
    // close() may exceed capacity by the one terminal value
    this.buffer.push(value);
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      this.releaseOnePusher();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.pullWaiter = { resolve };
      this.releaseOnePusher();
    });
  }

  private abandon(): void {
    if (!this.closed) {
      this.abandoned = true;
      this.controller.abort();
    }
    this.buffer = [];
    this.closed = true;
    this.releasePushers();
    this.flushPullWaiter();
  }

  get wasAbandoned(): boolean {
    return this.abandoned;
  }

  private flushPullWaiter(): void {
    if (this.pullWaiter && this.buffer.length === 0) {
      const waiter = this.pullWaiter;
      this.pullWaiter = null;
      waiter.resolve({ value: undefined, done: true });
    }
  }

  private releaseOnePusher(): void {
    this.pushWaiters.shift()?.();
  }

  private releasePushers(): void {
    const waiters = this.pushWaiters;
    this.pushWaiters = [];
    for (const resolve of waiters) resolve();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    let iterating = false;
    return {
      next: () => {
        if (iterating) {
          return Promise.reject(new Error('EventChannel supports a single consumer'));
        }
        iterating = true;
        return this.next().finally(() => {
          iterating = false;
        });
      },
      return: async () => {
        this.abandon();
        return { value: undefined, done: true };
      },
    };
  }
}
