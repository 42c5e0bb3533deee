type Waiter<T> = {
  resolve: (value: T) => void;
  detach: () => void;
};

/**
 * FIFO queue with a fixed capacity and task accounting.
 *
 * `push` waits while the queue is full, `pop` waits while it is empty, and
 * every popped item must be acknowledged with `taskDone` exactly once.
 * `join` resolves when every pushed item has been acknowledged.
 */
export class BoundedWorkQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<Waiter<T | undefined>> = [];
  private readonly putters: Array<Waiter<boolean>> = [];
  private joiners: Array<() => void> = [];
  private unfinished = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("capacity must be an integer >= 1");
    }
  }

  /** Items waiting in the queue. */
  get size(): number {
    return this.items.length;
  }

  /** Items pushed but not yet acknowledged, including those being worked on. */
  get pending(): number {
    return this.unfinished;
  }

  /**
   * Resolves `true` once the item is enqueued, or `false` if `signal` aborted first.
   */
  async push(item: T, signal?: AbortSignal): Promise<boolean> {
    while (this.items.length >= this.capacity) {
      if (signal?.aborted) return false;
      const admitted = await this.wait(this.putters, false, signal);
      if (!admitted) return false;
    }

    this.items.push(item);
    this.unfinished += 1;
    this.handOff();
    return true;
  }

  /**
   * Resolves with the next item, or `undefined` if `signal` aborted while waiting.
   */
  async pop(signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length === 0) {
      if (signal?.aborted) return undefined;
      return this.wait(this.takers, undefined, signal);
    }

    const item = this.items.shift();
    this.wakeOne(this.putters, true);
    return item;
  }

  taskDone(): void {
    if (this.unfinished <= 0) {
      throw new Error("taskDone() called more times than there were items");
    }
    this.unfinished -= 1;
    if (this.unfinished === 0) {
      const joiners = this.joiners;
      this.joiners = [];
      for (const resolve of joiners) resolve();
    }
  }

  /** Resolves once every pushed item is acknowledged, or as soon as `signal` aborts. */
  join(signal?: AbortSignal): Promise<void> {
    if (this.unfinished === 0 || signal?.aborted) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const onAbort = () => {
        this.joiners = this.joiners.filter((joiner) => joiner !== done);
        resolve();
      };
      const done = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.joiners.push(done);
    });
  }

  private handOff(): void {
    while (this.items.length > 0 && this.takers.length > 0) {
      const taker = this.takers.shift();
      const item = this.items.shift();
      if (taker === undefined || item === undefined) return;
      taker.detach();
      taker.resolve(item);
      this.wakeOne(this.putters, true);
    }
  }

  private wakeOne(waiters: Array<Waiter<boolean>>, value: boolean): void {
    const waiter = waiters.shift();
    if (!waiter) return;
    waiter.detach();
    waiter.resolve(value);
  }

  private wait<V>(waiters: Array<Waiter<V>>, abortedValue: V, signal?: AbortSignal): Promise<V> {
    return new Promise<V>((resolve) => {
      const onAbort = () => {
        const index = waiters.indexOf(waiter);
        if (index >= 0) waiters.splice(index, 1);
        resolve(abortedValue);
      };
      const waiter: Waiter<V> = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort)
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      waiters.push(waiter);
    });
  }
}
