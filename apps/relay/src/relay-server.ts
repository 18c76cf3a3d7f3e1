import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { resolveAdminAccess } from "./admin-auth.js";
import type { ActorResolver } from "./actor-resolver.js";
import { cacheSizes } from "./bounded-cache.js";
import { DispatchError } from "./dispatcher.js";
import { isDebugLogLevel } from "./env.js";
import { RelayDatabaseError, domainOf } from "./relay-database.js";
import {
  RequestContext,
  RequestLocals,
  activitySchema,
  type HttpSignature,
  type RelayActor,
  type RelayServices
} from "./request-context.js";
import type { PushMessage, RelayStatus } from "./relay-types.js";

declare module "fastify" {
  interface FastifyRequest {
    relay: RequestContext;
    relayLocals: RequestLocals;
  }
}

/** Decides whether a parsed signature really was produced by the actor's key. */
export type SignatureVerifier = (input: {
  request: FastifyRequest;
  signature: HttpSignature;
  actor: RelayActor;
}) => Promise<boolean>;

export type RelayRouteDeps = {
  services: RelayServices;
  push: (inbox: string, message: PushMessage) => number;
  status: () => RelayStatus;
  resolveActor: ActorResolver;
  verifySignature?: SignatureVerifier;
};

export const RELAYABLE_ACTIVITY_TYPES = new Set(["Announce", "Create", "Delete", "Update", "Undo", "Move"]);

const addInstanceBodySchema = z.object({
  inbox: z.string().url(),
  actor: z.string().url().optional()
});

const instanceParamsSchema = z.object({
  domain: z.string().trim().min(1).max(253)
});

function failure(reply: FastifyReply, statusCode: number, status: string, code: string): { status: string; code: string } {
  reply.code(statusCode);
  return { status, code };
}

export function registerRelayRoutes(server: FastifyInstance, deps: RelayRouteDeps): void {
  server.decorateRequest("relay");
  server.decorateRequest("relayLocals");

  server.addHook("onRequest", async (request) => {
    const locals = new RequestLocals();
    request.relayLocals = locals;
    request.relay = new RequestContext(request.headers, locals, deps.services);
  });

  server.addContentTypeParser(
    /^application\/(activity|ld)\+json/,
    { parseAs: "string" },
    server.getDefaultJsonParser("ignore", "ignore")
  );

  server.get("/health", async () => {
    const status = deps.status();
    return {
      status: "ok",
      state: status.state,
      uptimeSeconds: status.uptimeSeconds
    };
  });

  server.post("/inbox", async (request, reply) => {
    const ctx = request.relay;

    const signature = ctx.signature();
    if (!signature) {
      return failure(reply, 401, "unauthorized", "missing_signature");
    }

    const parsedActivity = activitySchema.safeParse(request.body);
    if (!parsedActivity.success) {
      return failure(reply, 400, "error", "invalid_activity");
    }
    request.relayLocals.set("message", parsedActivity.data);

    const message = ctx.message();
    if (!message) {
      return failure(reply, 400, "error", "invalid_activity");
    }

    if (signature.actorId !== message.actor) {
      return failure(reply, 401, "unauthorized", "signature_actor_mismatch");
    }

    // Only subscribed instances are ever fetched from.
    const actorDomain = domainOf(message.actor);
    const subscribed = actorDomain ? ctx.database.getInstance(actorDomain) : null;
    if (!subscribed) {
      return failure(reply, 403, "forbidden", "instance_not_subscribed");
    }
    request.relayLocals.set("instance", subscribed);

    const instance = ctx.instance();
    if (!instance) {
      return failure(reply, 403, "forbidden", "instance_not_subscribed");
    }

    const resolvedActor = await deps.resolveActor(message.actor);
    if (!resolvedActor || resolvedActor.id !== message.actor) {
      return failure(reply, 401, "unauthorized", "unknown_actor");
    }
    request.relayLocals.set("actor", resolvedActor);

    const actor = ctx.actor();
    if (!actor) {
      return failure(reply, 401, "unauthorized", "unknown_actor");
    }

    if (deps.verifySignature && !(await deps.verifySignature({ request, signature, actor }))) {
      return failure(reply, 401, "unauthorized", "invalid_signature");
    }

    if (!RELAYABLE_ACTIVITY_TYPES.has(message.type)) {
      reply.code(202);
      return { status: "ignored", deliveries: 0 };
    }

    const seen = ctx.cache.objects;
    if (seen.has(message.id)) {
      reply.code(202);
      return { status: "duplicate", deliveries: 0 };
    }

    let deliveries = 0;
    try {
      for (const inbox of ctx.database.inboxes(instance.domain)) {
        deps.push(inbox, message);
        deliveries += 1;
      }
    } catch (error) {
      if (error instanceof DispatchError) {
        request.log.warn({ error: error.message, activityId: message.id }, "relay push rejected");
        return failure(reply, error.statusCode, "error", error.code);
      }
      throw error;
    }
    seen.set(message.id, message.type);

    request.log.debug({ activityId: message.id, type: message.type, origin: instance.domain, deliveries }, "relayed activity");
    reply.code(202);
    return { status: "accepted", deliveries };
  });

  server.register(
    async (api) => {
      api.addHook("onRequest", async (request, reply) => {
        const access = resolveAdminAccess({
          token: deps.services.config.adminToken,
          headers: request.headers,
          requestIp: request.ip
        });
        if (!access.ok) {
          reply.code(access.statusCode).send(access.payload);
          return reply;
        }
      });

      if (isDebugLogLevel(deps.services.config.logLevel)) {
        api.get("/stats", async () => {
          return {
            ...deps.status(),
            caches: cacheSizes(deps.services.cache)
          };
        });
      }

      api.get("/instances", async () => {
        return {
          data: deps.services.database.listInstances()
        };
      });

      api.post("/instances", async (request, reply) => {
        const parsed = addInstanceBodySchema.safeParse(request.body);
        if (!parsed.success) {
          return failure(reply, 400, "error", "invalid_body");
        }

        try {
          const result = await deps.services.database.addInstance({
            inbox: parsed.data.inbox,
            actor: parsed.data.actor ?? null
          });
          reply.code(result.status === "added" ? 201 : 200);
          return result;
        } catch (error) {
          if (error instanceof RelayDatabaseError) {
            return failure(reply, error.statusCode, "error", error.code);
          }
          throw error;
        }
      });

      api.delete("/instances/:domain", async (request, reply) => {
        const params = instanceParamsSchema.safeParse(request.params);
        if (!params.success) {
          return failure(reply, 400, "error", "invalid_domain");
        }

        const removed = await deps.services.database.removeInstance(params.data.domain);
        if (!removed) {
          return failure(reply, 404, "not_found", "instance_not_found");
        }

        return {
          status: "removed",
          instance: removed
        };
      });
    },
    { prefix: "/api" }
  );
}
