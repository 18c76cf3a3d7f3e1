type GateWaiter = {
  grant: () => void;
};

export type ConcurrencyGateSnapshot = {
  limit: number;
  active: number;
  waiting: number;
};

export class ConcurrencyGateError extends Error {
  public readonly code: "invalid_release" | "aborted";

  constructor(code: "invalid_release" | "aborted", message: string) {
    super(message);
    this.name = "ConcurrencyGateError";
    this.code = code;
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new ConcurrencyGateError("aborted", "gate acquire aborted");
}

/**
 * Process-wide counting gate for outbound deliveries. Waiters are granted
 * permits in arrival order; a released permit passes straight to the oldest
 * waiter so the active count never exceeds the limit.
 */
export class ConcurrencyGate {
  public readonly limit: number;
  private active = 0;
  private readonly waiters: Array<GateWaiter> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`concurrency limit must be a positive integer (received ${limit})`);
    }

    this.limit = limit;
  }

  public async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    if (this.active < this.limit && this.waiters.length === 0) {
      this.active += 1;
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal ? abortReason(signal) : new ConcurrencyGateError("aborted", "gate acquire aborted"));
      };

      const waiter: GateWaiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        }
      };

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  public release(): void {
    if (this.active === 0) {
      throw new ConcurrencyGateError("invalid_release", "gate released without a held permit");
    }

    const next = this.waiters.shift();
    if (next) {
      // Permit moves to the waiter; active count is unchanged.
      next.grant();
      return;
    }

    this.active -= 1;
  }

  public async use<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  public snapshot(): ConcurrencyGateSnapshot {
    return {
      limit: this.limit,
      active: this.active,
      waiting: this.waiters.length
    };
  }
}
