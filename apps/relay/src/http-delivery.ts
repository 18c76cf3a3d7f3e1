import type { DeliverFn, PushMessage } from "./relay-types.js";

export class DeliveryError extends Error {
  public readonly inbox: string;
  public readonly status: number | null;

  constructor(inbox: string, message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeliveryError";
    this.inbox = inbox;
    this.status = status;
  }
}

export type SignableRequest = {
  method: "POST";
  url: URL;
  headers: Record<string, string>;
  body: string;
};

/**
 * Produces the signature-related headers for an outbound request. The relay
 * treats signing as opaque; whatever this returns is merged into the request.
 */
export type RequestSigner = (request: SignableRequest) => Promise<Record<string, string>>;

export type HttpDeliveryOptions = {
  userAgent: string;
  timeoutMs: number;
  signer?: RequestSigner;
  fetchImpl?: typeof fetch;
};

export function createHttpDelivery(options: HttpDeliveryOptions): DeliverFn {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (inbox: string, message: PushMessage): Promise<void> => {
    let url: URL;
    try {
      url = new URL(inbox);
    } catch (error) {
      throw new DeliveryError(inbox, `invalid inbox url: ${inbox}`, null, { cause: error });
    }

    const body = JSON.stringify(message);
    const headers: Record<string, string> = {
      "content-type": "application/activity+json",
      accept: "application/activity+json",
      "user-agent": options.userAgent,
      date: new Date().toUTCString()
    };

    if (options.signer) {
      Object.assign(headers, await options.signer({ method: "POST", url, headers: { ...headers }, body }));
    }

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(Math.max(1, options.timeoutMs))
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DeliveryError(inbox, `delivery to ${inbox} failed: ${reason}`, null, { cause: error });
    }

    // Drain the body so the connection can be reused.
    await response.arrayBuffer().catch(() => undefined);

    if (!response.ok) {
      throw new DeliveryError(inbox, `delivery to ${inbox} returned HTTP ${response.status}`, response.status);
    }
  };
}
