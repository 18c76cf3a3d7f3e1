import type { DeliveryWorker } from "./delivery-worker.js";
import type { PushMessage } from "./relay-types.js";

export class DispatchError extends Error {
  public readonly code: "not_running";
  public readonly statusCode: number;

  constructor(code: "not_running", message: string, statusCode: number) {
    super(message);
    this.name = "DispatchError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Round-robin assignment of pushes onto a fixed worker pool. Push k after
 * `attach` lands on worker `k mod workers.length` regardless of queue depth.
 * Calls are expected from the single request-handling event loop.
 */
export class Dispatcher {
  private workers: ReadonlyArray<DeliveryWorker> = [];
  private nextWorkerIndex = 0;

  public get cursor(): number {
    return this.nextWorkerIndex;
  }

  public get workerCount(): number {
    return this.workers.length;
  }

  public attach(workers: ReadonlyArray<DeliveryWorker>): void {
    this.workers = [...workers];
    this.nextWorkerIndex = 0;
  }

  public detach(): ReadonlyArray<DeliveryWorker> {
    const detached = this.workers;
    this.workers = [];
    this.nextWorkerIndex = 0;
    return detached;
  }

  public push(inbox: string, message: PushMessage): number {
    const index = this.nextWorkerIndex;
    const worker = this.workers.at(index);
    if (!worker) {
      throw new DispatchError("not_running", "relay has no delivery workers running", 503);
    }

    worker.enqueue(inbox, message);
    this.nextWorkerIndex = (index + 1) % this.workers.length;
    return index;
  }
}
