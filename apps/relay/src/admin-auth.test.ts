import assert from "node:assert/strict";
import test from "node:test";
import { ADMIN_TOKEN_HEADER, normalizeHeaderValue, resolveAdminAccess } from "./admin-auth.js";

test("loopback callers reach the admin api when no token is configured", () => {
  for (const requestIp of ["127.0.0.1", "::1", "::ffff:127.0.0.1", "localhost"]) {
    assert.deepEqual(resolveAdminAccess({ token: null, headers: {}, requestIp }), { ok: true, via: "loopback" });
  }
});

test("remote callers are forbidden when no token is configured", () => {
  assert.deepEqual(resolveAdminAccess({ token: null, headers: {}, requestIp: "198.51.100.20" }), {
    ok: false,
    statusCode: 403,
    payload: { status: "forbidden", code: "admin_remote_forbidden" }
  });
  assert.equal(resolveAdminAccess({ token: "  ", headers: {}, requestIp: null }).ok, false);
});

test("a configured token is required from every caller", () => {
  assert.deepEqual(resolveAdminAccess({ token: "test-secret", headers: {}, requestIp: "127.0.0.1" }), {
    ok: false,
    statusCode: 401,
    payload: { status: "unauthorized", code: "missing_admin_token" }
  });

  assert.deepEqual(
    resolveAdminAccess({ token: "test-secret", headers: { [ADMIN_TOKEN_HEADER]: "test-secreT" }, requestIp: "127.0.0.1" }),
    {
      ok: false,
      statusCode: 401,
      payload: { status: "unauthorized", code: "invalid_admin_token" }
    }
  );

  assert.deepEqual(
    resolveAdminAccess({ token: "test-secret", headers: { [ADMIN_TOKEN_HEADER]: "test-secret" }, requestIp: "203.0.113.1" }),
    { ok: true, via: "token" }
  );
});

test("header values are trimmed and the first array entry wins", () => {
  assert.equal(normalizeHeaderValue("  value  "), "value");
  assert.equal(normalizeHeaderValue(["first", "second"]), "first");
  assert.equal(normalizeHeaderValue("   "), null);
  assert.equal(normalizeHeaderValue(undefined), null);
});
