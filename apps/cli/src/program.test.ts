import assert from "node:assert/strict";
import test from "node:test";
import type { FetchLike } from "./lib/http.js";
import { buildProgram } from "./program.js";

type RecordedCall = {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: unknown;
};

function createHarness(reply: { status: number; body: unknown }, env: Record<string, string | undefined> = {}) {
  const calls: Array<RecordedCall> = [];
  const stdout: Array<string> = [];
  const stderr: Array<string> = [];
  let failures = 0;

  const fetchImpl: FetchLike = async (input, init) => {
    calls.push({ url: input, method: init.method, headers: new Headers(init.headers), body: init.body });
    return new Response(JSON.stringify(reply.body), {
      status: reply.status,
      headers: { "content-type": "application/json" }
    });
  };

  const program = buildProgram({
    io: {
      stdout: { write: (chunk) => stdout.push(chunk) },
      stderr: { write: (chunk) => stderr.push(chunk) }
    },
    env,
    fetchImpl,
    onFailure: () => {
      failures += 1;
    }
  });

  return {
    calls,
    stdout,
    stderr,
    failures: () => failures,
    run: (...args: Array<string>) => program.parseAsync(["node", "relay-cli", ...args])
  };
}

test("health prints a one-line summary", async () => {
  const harness = createHarness({ status: 200, body: { status: "ok", state: "running", uptimeSeconds: 42 } });

  await harness.run("health");

  assert.equal(harness.calls[0].url, "http://127.0.0.1:8080/health");
  assert.deepEqual(harness.stdout, ["relay running (up 42s)\n"]);
});

test("instances list sends the admin token and prints one line per instance", async () => {
  const harness = createHarness(
    {
      status: 200,
      body: {
        data: [{ domain: "a.example", inbox: "https://a.example/inbox", actor: null, joinedAt: "2024-01-01T00:00:00.000Z" }]
      }
    },
    { RELAY_BASE_URL: "http://relay.test:8080/" }
  );

  await harness.run("--admin-token", "test-secret", "instances", "list");

  assert.equal(harness.calls[0].url, "http://relay.test:8080/api/instances");
  assert.equal(harness.calls[0].method, "GET");
  assert.equal(harness.calls[0].headers.get("x-relay-admin-token"), "test-secret");
  assert.deepEqual(harness.stdout, ["a.example\thttps://a.example/inbox\t2024-01-01T00:00:00.000Z\n"]);
});

test("instances add posts the inbox and emits a JSON envelope with --json", async () => {
  const harness = createHarness({
    status: 201,
    body: {
      status: "added",
      instance: { domain: "b.example", inbox: "https://b.example/inbox", actor: "https://b.example/actor", joinedAt: "2024-01-01T00:00:00.000Z" }
    }
  });

  await harness.run("--json", "instances", "add", "https://b.example/inbox", "--actor", "https://b.example/actor");

  assert.equal(harness.calls[0].method, "POST");
  assert.equal(harness.calls[0].body, '{"inbox":"https://b.example/inbox","actor":"https://b.example/actor"}');
  assert.equal(harness.calls[0].headers.get("content-type"), "application/json");

  const envelope: unknown = JSON.parse(harness.stdout.join(""));
  assert.deepEqual(envelope, {
    ok: true,
    command: "instances add",
    request: { method: "POST", path: "/api/instances", url: "http://127.0.0.1:8080/api/instances" },
    response: {
      statusCode: 201,
      body: {
        status: "added",
        instance: {
          domain: "b.example",
          inbox: "https://b.example/inbox",
          actor: "https://b.example/actor",
          joinedAt: "2024-01-01T00:00:00.000Z"
        }
      }
    }
  });
});

test("a rejected request prints the error and reports failure", async () => {
  const harness = createHarness({ status: 404, body: { status: "not_found", code: "instance_not_found" } });

  await harness.run("instances", "remove", "c.example");

  assert.equal(harness.calls[0].url, "http://127.0.0.1:8080/api/instances/c.example");
  assert.equal(harness.calls[0].method, "DELETE");
  assert.deepEqual(harness.stdout, []);
  assert.deepEqual(harness.stderr, [
    'Error: HTTP 404 for DELETE /api/instances/c.example: {"status":"not_found","code":"instance_not_found"}\n'
  ]);
  assert.equal(harness.failures(), 1);
});
