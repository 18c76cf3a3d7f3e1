import path from "node:path";
import { createHttpActorResolver } from "./actor-resolver.js";
import { readRelayConfig } from "./env.js";
import { createHttpDelivery } from "./http-delivery.js";
import { RelayApplication } from "./relay-app.js";
import { RelayDatabase } from "./relay-database.js";
import { FileRelayStore } from "./relay-store.js";

const RELAY_VERSION = "0.1.0";

const config = readRelayConfig();
const userAgent = `inbox-relay/${RELAY_VERSION} (+https://${config.host}/)`;

const app = new RelayApplication({
  config,
  wire: ({ cache, logger }) => ({
    database: new RelayDatabase(new FileRelayStore(path.join(config.dataDir, "relay.json"), logger)),
    deliver: createHttpDelivery({
      userAgent,
      timeoutMs: config.pushTimeoutMs
    }),
    resolveActor: createHttpActorResolver({
      cache: cache.json,
      userAgent,
      timeoutMs: config.pushTimeoutMs,
      logger
    })
  })
});

await app.database.load();
app.server.log.warn("no signature verifier configured; inbound signatures are parsed but not verified");

const removeSignalHandlers = app.installSignalHandlers();

try {
  await app.start();
} catch (error) {
  app.server.log.error({ error }, "relay failed to start");
  removeSignalHandlers();
  process.exit(1);
}

await app.closed();
removeSignalHandlers();
process.exit(0);
