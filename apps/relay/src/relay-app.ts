import Fastify, { type FastifyInstance } from "fastify";
import type { ActorResolver } from "./actor-resolver.js";
import { createCacheRegistry, type CacheRegistry } from "./bounded-cache.js";
import { ConcurrencyGate } from "./concurrency-gate.js";
import { DeliveryWorker } from "./delivery-worker.js";
import { Dispatcher } from "./dispatcher.js";
import type { RelayConfig } from "./env.js";
import { isAddressInUseError, isPortAvailable } from "./port-check.js";
import type { RelayDatabase } from "./relay-database.js";
import { registerRelayRoutes, type SignatureVerifier } from "./relay-server.js";
import type { DeliverFn, PushMessage, RelayLogger, RelayState, RelayStatus } from "./relay-types.js";
import type { RelayServices } from "./request-context.js";

export const STOP_SIGNALS: ReadonlyArray<NodeJS.Signals> = ["SIGHUP", "SIGINT", "SIGQUIT", "SIGTERM"];

export class SupervisorError extends Error {
  public readonly code: "port_in_use" | "invalid_state";

  constructor(code: "port_in_use" | "invalid_state", message: string) {
    super(message);
    this.name = "SupervisorError";
    this.code = code;
  }
}

/** Collaborators the relay depends on but does not own. */
export type RelayWiring = {
  database: RelayDatabase;
  deliver: DeliverFn;
  resolveActor: ActorResolver;
  verifySignature?: SignatureVerifier;
};

export type RelayWiringContext = {
  config: RelayConfig;
  cache: CacheRegistry;
  logger: RelayLogger;
};

export type RelayApplicationOptions = {
  config: RelayConfig;
  /** Builds the collaborators once the caches and logger exist. */
  wire: (context: RelayWiringContext) => RelayWiring;
  /** Fastify logger setting; defaults to pino at the configured level. */
  logger?: boolean | { level: string };
  now?: () => number;
};

type SignalTarget = {
  on: (signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
  off: (signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void) => unknown;
};

/**
 * Owns the relay's lifecycle: the HTTP listener, the delivery worker pool and
 * the shared services handed to every request.
 *
 * stopped -> starting -> running -> stopping -> stopped
 */
export class RelayApplication {
  public readonly config: RelayConfig;
  public readonly cache: CacheRegistry;
  public readonly gate: ConcurrencyGate;
  public readonly database: RelayDatabase;
  public readonly dispatcher = new Dispatcher();
  public readonly server: FastifyInstance;

  private readonly deliver: DeliverFn;
  private readonly now: () => number;
  private state: RelayState = "stopped";
  private startedAt: number | null = null;
  private workers: Array<DeliveryWorker> = [];
  private controller: AbortController | null = null;
  private teardown: Promise<void> = Promise.resolve();
  private closedOnce = false;

  constructor(options: RelayApplicationOptions) {
    this.config = options.config;
    this.now = options.now ?? Date.now;
    this.cache = createCacheRegistry(options.config.cacheCapacities);
    this.gate = new ConcurrencyGate(options.config.pushLimit);
    this.server = Fastify({
      logger: options.logger ?? { level: options.config.logLevel }
    });

    const wiring = options.wire({
      config: this.config,
      cache: this.cache,
      logger: this.server.log
    });
    this.database = wiring.database;
    this.deliver = wiring.deliver;

    const services: RelayServices = {
      cache: this.cache,
      config: this.config,
      database: this.database,
      gate: this.gate
    };

    registerRelayRoutes(this.server, {
      services,
      push: (inbox, message) => this.push(inbox, message),
      status: () => this.status(),
      resolveActor: wiring.resolveActor,
      verifySignature: wiring.verifySignature
    });
  }

  public get running(): boolean {
    return this.state === "running";
  }

  public push(inbox: string, message: PushMessage): number {
    return this.dispatcher.push(inbox, message);
  }

  public async start(): Promise<void> {
    if (this.state !== "stopped") {
      throw new SupervisorError("invalid_state", `relay cannot start while ${this.state}`);
    }
    if (this.closedOnce) {
      // The HTTP listener cannot be reopened once closed.
      throw new SupervisorError("invalid_state", "relay has already been stopped");
    }

    this.state = "starting";
    const { listen, port } = this.config;
    // Set before the port check so a stop() issued while starting is observed.
    const controller = new AbortController();
    this.controller = controller;

    let portFree: boolean;
    try {
      portFree = await isPortAvailable(listen, port);
    } catch (error) {
      this.controller = null;
      this.state = "stopped";
      throw error;
    }

    if (controller.signal.aborted) {
      this.controller = null;
      this.state = "stopped";
      this.server.log.info({ reason: controller.signal.reason }, "relay start cancelled");
      return;
    }

    if (!portFree) {
      this.controller = null;
      this.state = "stopped";
      this.server.log.error({ listen, port }, "a server is already running on the relay port");
      throw new SupervisorError("port_in_use", `a server is already running on port ${port}`);
    }

    const workers = Array.from(
      { length: this.config.workerCount },
      (_, index) =>
        new DeliveryWorker({
          id: index,
          gate: this.gate,
          deliver: this.deliver,
          logger: this.server.log
        })
    );
    const loops = workers.map((worker) => worker.start(controller.signal));
    this.workers = workers;
    this.dispatcher.attach(workers);

    try {
      await this.server.listen({ host: listen, port });
    } catch (error) {
      controller.abort();
      this.dispatcher.detach();
      this.workers = [];
      this.controller = null;
      await Promise.allSettled(loops);
      this.state = "stopped";

      if (isAddressInUseError(error)) {
        this.server.log.error({ listen, port }, "a server is already running on the relay port");
        throw new SupervisorError("port_in_use", `a server is already running on port ${port}`);
      }
      throw error;
    }

    this.startedAt = this.now();
    this.state = "running";
    this.teardown = this.waitForStop(controller.signal, loops);
    this.server.log.info(
      { host: this.config.host, listen, port: this.boundPort(), workers: workers.length, pushLimit: this.gate.limit },
      "relay started"
    );
  }

  /** Requests shutdown and returns immediately; `closed()` resolves once teardown finishes. */
  public stop(reason = "requested"): void {
    const controller = this.controller;
    if (!controller || controller.signal.aborted) {
      return;
    }

    this.server.log.info({ reason }, "relay stopping");
    controller.abort(reason);
  }

  public closed(): Promise<void> {
    return this.teardown;
  }

  public uptime(): number {
    if (this.startedAt === null) {
      return 0;
    }
    return Math.max(0, Math.floor((this.now() - this.startedAt) / 1000));
  }

  /** Port actually bound; differs from the configured one when that is 0. */
  public boundPort(): number | null {
    const address = this.server.server.address();
    return address && typeof address === "object" ? address.port : null;
  }

  public status(): RelayStatus {
    return {
      state: this.state,
      running: this.running,
      startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
      uptimeSeconds: this.uptime(),
      workers: this.workers.map((worker) => worker.stats()),
      gate: this.gate.snapshot()
    };
  }

  /**
   * Routes termination signals to `stop`. Signals the host cannot listen for
   * are skipped. Returns a function that removes the handlers again.
   */
  public installSignalHandlers(target: SignalTarget = process): () => void {
    const handler = (signal: NodeJS.Signals): void => {
      this.stop(signal);
    };
    const installed: Array<NodeJS.Signals> = [];

    for (const signal of STOP_SIGNALS) {
      try {
        target.on(signal, handler);
        installed.push(signal);
      } catch (error) {
        this.server.log.debug({ signal, error }, "signal not supported on this platform");
      }
    }

    return () => {
      for (const signal of installed) {
        target.off(signal, handler);
      }
    };
  }

  private async waitForStop(signal: AbortSignal, loops: Array<Promise<void>>): Promise<void> {
    if (!signal.aborted) {
      await new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => resolve(), { once: true });
      });
    }

    this.state = "stopping";
    this.closedOnce = true;

    const detached = this.dispatcher.detach();
    let dropped = 0;
    for (const worker of detached) {
      dropped += worker.discard();
    }

    try {
      await this.server.close();
    } catch (error) {
      this.server.log.error({ error }, "relay listener close failed");
    }

    await Promise.allSettled(loops);

    this.startedAt = null;
    this.workers = [];
    this.controller = null;
    this.state = "stopped";
    this.server.log.info({ dropped }, "relay stopped");
  }
}
