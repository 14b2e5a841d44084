/**
 * Create the keyspace and tables, then exit.
 *
 * Usage: npm run db:setup
 */

import "dotenv/config";
import { config } from "../src/config.js";
import { CassandraStore } from "../src/db/index.js";

async function main(): Promise<void> {
  const store = new CassandraStore({ ...config.cassandra, autoMigrate: true });
  await store.connect();
  await store.close();
  console.log("Cassandra initialization completed");
}

main().catch((err: unknown) => {
  console.error("Setup error:", err);
  process.exit(1);
});
