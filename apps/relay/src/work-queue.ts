type PendingTake<T extends object> = {
  resolve: (item: T) => void;
  signal: AbortSignal | undefined;
  onAbort: () => void;
};

export class WorkQueueAbortedError extends Error {
  constructor() {
    super("work queue take aborted");
    this.name = "WorkQueueAbortedError";
  }
}

/**
 * Unbounded FIFO channel with a single consumer in mind. `take` suspends until
 * an item arrives or the signal aborts.
 */
export class WorkQueue<T extends object> {
  private readonly items: Array<T> = [];
  private readonly takers: Array<PendingTake<T>> = [];

  public get size(): number {
    return this.items.length;
  }

  public push(item: T): void {
    const taker = this.takers.shift();
    if (taker) {
      taker.signal?.removeEventListener("abort", taker.onAbort);
      taker.resolve(item);
      return;
    }

    this.items.push(item);
  }

  public take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new WorkQueueAbortedError());
    }

    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    return new Promise<T>((resolve, reject) => {
      const taker: PendingTake<T> = {
        resolve,
        signal,
        onAbort: () => {
          const index = this.takers.indexOf(taker);
          if (index !== -1) {
            this.takers.splice(index, 1);
          }
          reject(new WorkQueueAbortedError());
        }
      };

      this.takers.push(taker);
      signal?.addEventListener("abort", taker.onAbort, { once: true });
    });
  }

  /** Removes every queued item and returns them in queue order. */
  public drain(): Array<T> {
    return this.items.splice(0, this.items.length);
  }
}
