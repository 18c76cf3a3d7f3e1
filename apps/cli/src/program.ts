import { Command } from "commander";
import { invokeApi, type FetchLike, type InvokeApiInput } from "./lib/http.js";
import { printError, printSuccess, type BodyRenderer, type CliIo } from "./lib/output.js";
import { DEFAULT_BASE_URL, buildRuntime, type RuntimeContext } from "./lib/runtime.js";

export type ProgramDeps = {
  io: CliIo;
  env: Record<string, string | undefined>;
  fetchImpl?: FetchLike;
  onFailure?: () => void;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(value: unknown, key: string): string | null {
  if (!isRecord(value)) {
    return null;
  }
  const field = value[key];
  return typeof field === "string" ? field : null;
}

const renderHealth: BodyRenderer = (body) => {
  const uptimeSeconds = isRecord(body) ? body.uptimeSeconds : null;
  if (typeof uptimeSeconds !== "number") {
    return null;
  }
  return `relay ${stringField(body, "state") ?? "unknown"} (up ${uptimeSeconds}s)`;
};

const renderInstances: BodyRenderer = (body) => {
  const data: unknown = isRecord(body) ? body.data : null;
  if (!Array.isArray(data)) {
    return null;
  }
  if (data.length === 0) {
    return "no subscribed instances";
  }
  return data
    .map((instance: unknown) =>
      [stringField(instance, "domain"), stringField(instance, "inbox"), stringField(instance, "joinedAt")]
        .map((part) => part ?? "-")
        .join("\t")
    )
    .join("\n");
};

const renderInstanceChange: BodyRenderer = (body) => {
  const status = stringField(body, "status");
  const instance = isRecord(body) ? body.instance : null;
  const domain = stringField(instance, "domain");
  return status && domain ? `${status} ${domain}` : null;
};

export function buildProgram(deps: ProgramDeps): Command {
  const onFailure =
    deps.onFailure ??
    (() => {
      process.exitCode = 1;
    });

  async function runApiCall(ctx: RuntimeContext, input: InvokeApiInput, render?: BodyRenderer): Promise<void> {
    const result = await invokeApi(ctx, input, deps.fetchImpl);
    printSuccess(deps.io, ctx, result, render);
  }

  function withRuntime(
    commandName: string,
    handler: (ctx: RuntimeContext, args: Array<unknown>) => Promise<void>
  ): (...args: Array<unknown>) => Promise<void> {
    return async (...args: Array<unknown>) => {
      const command = args.at(-1);
      if (!(command instanceof Command)) {
        throw new Error("commander command context unavailable");
      }

      let ctx: RuntimeContext | null = null;
      try {
        ctx = buildRuntime(command, deps.env);
        await handler(ctx, args);
      } catch (error) {
        printError(deps.io, ctx, commandName, error);
        onFailure();
      }
    };
  }

  const program = new Command();

  program
    .name("relay-cli")
    .description("Operator CLI for the inbox relay admin API")
    .option("--base-url <url>", `Relay base URL (default ${DEFAULT_BASE_URL})`)
    .option("--timeout-ms <n>", "Request timeout in milliseconds")
    .option("--admin-token <token>", "Admin API token")
    .option("--json", "Emit machine-readable JSON envelope");

  program
    .command("health")
    .description("Relay liveness and uptime")
    .action(
      withRuntime("health", async (ctx) => {
        await runApiCall(ctx, { command: "health", method: "GET", pathTemplate: "/health" }, renderHealth);
      })
    );

  program
    .command("stats")
    .description("Supervisor, worker and cache statistics (relay must log at debug or trace)")
    .action(
      withRuntime("stats", async (ctx) => {
        await runApiCall(ctx, { command: "stats", method: "GET", pathTemplate: "/api/stats" });
      })
    );

  const instances = program.command("instances").description("Subscribed instances");

  instances
    .command("list")
    .description("List subscribed instances")
    .action(
      withRuntime("instances list", async (ctx) => {
        await runApiCall(ctx, { command: "instances list", method: "GET", pathTemplate: "/api/instances" }, renderInstances);
      })
    );

  instances
    .command("add <inbox>")
    .description("Subscribe an instance by its inbox URL")
    .option("--actor <url>", "Relay-facing actor of the instance")
    .action(
      withRuntime("instances add", async (ctx, args) => {
        const inbox = args[0];
        if (typeof inbox !== "string" || inbox.trim().length === 0) {
          throw new Error("inbox is required");
        }
        const actor = stringField(args[1], "actor");

        await runApiCall(
          ctx,
          {
            command: "instances add",
            method: "POST",
            pathTemplate: "/api/instances",
            body: actor ? { inbox: inbox.trim(), actor } : { inbox: inbox.trim() },
            allowStatuses: [200, 201]
          },
          renderInstanceChange
        );
      })
    );

  instances
    .command("remove <domain>")
    .description("Unsubscribe an instance")
    .action(
      withRuntime("instances remove", async (ctx, args) => {
        const domain = args[0];
        if (typeof domain !== "string" || domain.trim().length === 0) {
          throw new Error("domain is required");
        }

        await runApiCall(
          ctx,
          {
            command: "instances remove",
            method: "DELETE",
            pathTemplate: "/api/instances/:domain",
            pathParams: { domain: domain.trim() }
          },
          renderInstanceChange
        );
      })
    );

  return program;
}
