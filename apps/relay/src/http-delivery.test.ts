import assert from "node:assert/strict";
import test from "node:test";
import { DeliveryError, createHttpDelivery, type SignableRequest } from "./http-delivery.js";

type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];

type RecordedRequest = {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: unknown;
};

function recordingFetch(requests: Array<RecordedRequest>, response: () => Response) {
  return async (input: FetchInput, init?: FetchInit): Promise<Response> => {
    requests.push({
      url: String(input),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: init?.body
    });
    return response();
  };
}

test("delivery posts the activity as activity+json with signer headers merged", async () => {
  const requests: Array<RecordedRequest> = [];
  const signed: Array<SignableRequest> = [];
  const deliver = createHttpDelivery({
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    signer: async (request) => {
      signed.push(request);
      return { signature: "test-signature" };
    },
    fetchImpl: recordingFetch(requests, () => new Response(null, { status: 202 }))
  });

  await deliver("https://b.example/inbox", { id: "https://a.example/activities/1", type: "Announce" });

  assert.equal(requests.length, 1);
  const [request] = requests;
  assert.equal(request.url, "https://b.example/inbox");
  assert.equal(request.method, "POST");
  assert.equal(request.body, '{"id":"https://a.example/activities/1","type":"Announce"}');
  assert.equal(request.headers.get("content-type"), "application/activity+json");
  assert.equal(request.headers.get("user-agent"), "inbox-relay/test");
  assert.equal(request.headers.get("signature"), "test-signature");

  assert.equal(signed.length, 1);
  assert.equal(signed[0].url.href, "https://b.example/inbox");
  assert.equal(signed[0].headers.signature, undefined);
});

test("a non-success response fails the delivery with its status", async () => {
  const deliver = createHttpDelivery({
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    fetchImpl: recordingFetch([], () => new Response("gone", { status: 410 }))
  });

  await assert.rejects(
    () => deliver("https://b.example/inbox", {}),
    (error: unknown) =>
      error instanceof DeliveryError &&
      error.status === 410 &&
      error.inbox === "https://b.example/inbox" &&
      error.message === "delivery to https://b.example/inbox returned HTTP 410"
  );
});

test("transport failures are wrapped with the inbox", async () => {
  const deliver = createHttpDelivery({
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    fetchImpl: async () => {
      throw new TypeError("fetch failed");
    }
  });

  await assert.rejects(
    () => deliver("https://b.example/inbox", {}),
    (error: unknown) =>
      error instanceof DeliveryError &&
      error.status === null &&
      error.message === "delivery to https://b.example/inbox failed: fetch failed"
  );
});

test("an invalid inbox url never reaches the network", async () => {
  const requests: Array<RecordedRequest> = [];
  const deliver = createHttpDelivery({
    userAgent: "inbox-relay/test",
    timeoutMs: 1_000,
    fetchImpl: recordingFetch(requests, () => new Response(null, { status: 202 }))
  });

  await assert.rejects(() => deliver("not a url", {}), /invalid inbox url: not a url/);
  assert.equal(requests.length, 0);
});
