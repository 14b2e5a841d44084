/**
 * Rebuild the per-user index rows for the given conversations.
 *
 * Usage: npm run db:repair -- <conversationId> [conversationId ...]
 */

import "dotenv/config";
import { config } from "../src/config.js";
import { CassandraStore } from "../src/db/index.js";
import { repairConversationIndex } from "../src/services/repair.js";

async function main(ids: string[]): Promise<void> {
  if (ids.length === 0) {
    console.error("Usage: npm run db:repair -- <conversationId> [conversationId ...]");
    process.exitCode = 1;
    return;
  }

  const store = new CassandraStore(config.cassandra);
  await store.connect();

  try {
    for (const id of ids) {
      const result = await repairConversationIndex(store, id);
      if (!result) {
        console.warn(`${id}: conversation not found`);
      } else if (result.rowsWritten === 0) {
        console.log(`${id}: no messages, nothing to repair`);
      } else {
        console.log(
          `${id}: wrote ${result.rowsWritten} index rows at ${result.lastMessageAt?.toISOString()}`
        );
      }
    }
  } finally {
    await store.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error("Repair error:", err);
  process.exit(1);
});
