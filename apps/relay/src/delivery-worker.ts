import type { ConcurrencyGate } from "./concurrency-gate.js";
import type { DeliverFn, DeliveryWorkerStats, PushItem, PushMessage, RelayLogger } from "./relay-types.js";
import { WorkQueue, WorkQueueAbortedError } from "./work-queue.js";

export type DeliveryWorkerOptions = {
  id: number;
  gate: ConcurrencyGate;
  deliver: DeliverFn;
  logger: RelayLogger;
};

function serializeError(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }

  if (typeof error === "string" && error.trim().length > 0) {
    return error.trim();
  }

  return "unknown delivery error";
}

export class DeliveryWorker {
  public readonly id: number;
  private readonly queue = new WorkQueue<PushItem>();
  private readonly gate: ConcurrencyGate;
  private readonly deliver: DeliverFn;
  private readonly logger: RelayLogger;

  private delivered = 0;
  private failed = 0;
  private active = false;
  private running: Promise<void> | null = null;

  constructor(options: DeliveryWorkerOptions) {
    this.id = options.id;
    this.gate = options.gate;
    this.deliver = options.deliver;
    this.logger = options.logger;
  }

  public enqueue(inbox: string, message: PushMessage): void {
    this.queue.push({ inbox, message });
  }

  /**
   * Starts the delivery loop. The returned promise settles once the signal
   * aborts and any in-flight delivery has finished.
   */
  public start(signal: AbortSignal): Promise<void> {
    if (!this.running) {
      this.running = this.loop(signal).finally(() => {
        this.running = null;
      });
    }

    return this.running;
  }

  /** Drops every item still waiting in the queue and returns how many were dropped. */
  public discard(): number {
    return this.queue.drain().length;
  }

  public stats(): DeliveryWorkerStats {
    return {
      id: this.id,
      queued: this.queue.size,
      delivered: this.delivered,
      failed: this.failed,
      active: this.active
    };
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let item: PushItem;
      try {
        item = await this.queue.take(signal);
      } catch (error) {
        if (error instanceof WorkQueueAbortedError) {
          return;
        }
        throw error;
      }

      try {
        await this.gate.acquire(signal);
      } catch {
        // Shutdown while waiting for a permit; the item is dropped with the rest of the queue.
        this.logger.debug({ workerId: this.id, inbox: item.inbox }, "push dropped while waiting for gate");
        return;
      }

      this.active = true;
      try {
        await this.deliver(item.inbox, item.message);
        this.delivered += 1;
        this.logger.trace({ workerId: this.id, inbox: item.inbox }, "push delivered");
      } catch (error) {
        this.failed += 1;
        this.logger.warn(
          {
            workerId: this.id,
            inbox: item.inbox,
            error: serializeError(error)
          },
          "push delivery failed"
        );
      } finally {
        this.active = false;
        this.gate.release();
      }
    }
  }
}
