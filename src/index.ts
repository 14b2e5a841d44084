/**
 * pairwise-relay
 *
 * Two-party messaging backend on Cassandra. A send fans out to three
 * denormalized tables; reads stitch them back together.
 */

// Must load before config.js reads process.env
import "dotenv/config";
import { config } from "./config.js";
import { createApp } from "./app.js";
import { CassandraStore } from "./db/index.js";

async function main(): Promise<void> {
  const store = new CassandraStore(config.cassandra);
  await store.connect();

  const app = createApp(store);
  const server = app.listen(config.port, () => {
    console.log(`pairwise-relay listening on port ${config.port} (policy: ${config.conversationPolicy})`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("Store shutdown error:", err);
          process.exit(1);
        }
      );
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("Startup error:", err);
  process.exit(1);
});
