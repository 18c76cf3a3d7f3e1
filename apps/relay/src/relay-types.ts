export type RelayLogger = {
  trace: (input: Record<string, unknown>, message?: string) => void;
  debug: (input: Record<string, unknown>, message?: string) => void;
  info: (input: Record<string, unknown>, message?: string) => void;
  warn: (input: Record<string, unknown>, message?: string) => void;
  error: (input: Record<string, unknown>, message?: string) => void;
};

export type PushMessage = Record<string, unknown>;

export type PushItem = {
  inbox: string;
  message: PushMessage;
};

/** Outbound delivery capability. Signing and transport live behind it. */
export type DeliverFn = (inbox: string, message: PushMessage) => Promise<void>;

export type DeliveryWorkerStats = {
  id: number;
  queued: number;
  delivered: number;
  failed: number;
  active: boolean;
};

export type RelayState = "stopped" | "starting" | "running" | "stopping";

export type RelayStatus = {
  state: RelayState;
  running: boolean;
  startedAt: string | null;
  uptimeSeconds: number;
  workers: Array<DeliveryWorkerStats>;
  gate: {
    limit: number;
    active: number;
    waiting: number;
  };
};
