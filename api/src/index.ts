// api/src/index.ts
import { getConfig } from "./config.js"; // <- прогревает env и config
import { createApp } from "./app.js";
import { closePool, q } from "./db.js";
import { InMemoryEventJournal, type EventJournal } from "./eventJournal.js";
import { PgEventJournal } from "./pgEventJournal.js";
import { ViewRegistry } from "./viewRegistry.js";

const config = getConfig();

const journal: EventJournal = config.eventStore === "pg" ? new PgEventJournal(q) : new InMemoryEventJournal();

const registry = new ViewRegistry({
  journal,
  shardCount: config.shardCount,
  refreshIntervalMs: config.refreshIntervalMs,
  passivationTimeoutMs: config.passivationTimeoutMs,
  refreshBatchSize: config.refreshBatchSize,
  verbose: config.nodeEnv !== "production",
});

const app = createApp(registry);

const server = app.listen(config.port, () => {
  console.log(`api:${config.port} (event store: ${config.eventStore}, shards: ${config.shardCount})`);
});

// Background: периодическая догонка журнала и выселение простаивающих представлений
registry.start();

function shutdown(signal: string) {
  console.log(`${signal}: shutting down`);
  registry.stop();
  server.close(() => {
    closePool()
      .catch((e) => console.error("DB: pool close failed", e))
      .finally(() => process.exit(0));
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
