import { timingSafeEqual } from "node:crypto";

export const ADMIN_TOKEN_HEADER = "x-relay-admin-token";

function isLoopbackAddress(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return false;
  }

  if (normalized === "localhost" || normalized === "::1") {
    return true;
  }

  const ipv4MappedPrefix = "::ffff:";
  const ipv4Candidate = normalized.startsWith(ipv4MappedPrefix) ? normalized.slice(ipv4MappedPrefix.length) : normalized;
  return ipv4Candidate.startsWith("127.");
}

export function normalizeHeaderValue(value: unknown): string | null {
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === "string" && first.trim().length > 0 ? first.trim() : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

type AdminAccessResolution =
  | {
      ok: true;
      via: "token" | "loopback";
    }
  | {
      ok: false;
      statusCode: number;
      payload: {
        status: "unauthorized" | "forbidden";
        code: string;
      };
    };

/**
 * With a configured token every caller must present it; without one only
 * loopback callers reach the admin API.
 */
export function resolveAdminAccess(input: {
  token: string | null;
  headers: Record<string, unknown>;
  requestIp?: string | null;
}): AdminAccessResolution {
  const expected = input.token?.trim() ?? "";
  if (expected.length === 0) {
    if (!isLoopbackAddress(input.requestIp ?? "")) {
      return {
        ok: false,
        statusCode: 403,
        payload: {
          status: "forbidden",
          code: "admin_remote_forbidden"
        }
      };
    }

    return { ok: true, via: "loopback" };
  }

  const presented = normalizeHeaderValue(input.headers[ADMIN_TOKEN_HEADER]);
  if (!presented) {
    return {
      ok: false,
      statusCode: 401,
      payload: {
        status: "unauthorized",
        code: "missing_admin_token"
      }
    };
  }

  const expectedBuffer = Buffer.from(expected);
  const receivedBuffer = Buffer.from(presented);
  if (expectedBuffer.length !== receivedBuffer.length || !timingSafeEqual(expectedBuffer, receivedBuffer)) {
    return {
      ok: false,
      statusCode: 401,
      payload: {
        status: "unauthorized",
        code: "invalid_admin_token"
      }
    };
  }

  return { ok: true, via: "token" };
}
