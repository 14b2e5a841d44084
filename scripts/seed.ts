/**
 * Fill the tables with random conversations between a handful of users.
 *
 * Messages are backdated with random 1-60 minute gaps, so the data exercises
 * the time-ordered reads. Prints a few ids to try against the API.
 *
 * Usage: npm run db:seed
 */

import "dotenv/config";
import { randomUUID } from "crypto";
import { config } from "../src/config.js";
import { CassandraStore } from "../src/db/index.js";
import { newConversationId, newMessageId } from "../src/services/ids.js";

const NUM_USERS = 10;
const NUM_CONVERSATIONS = 15;
const MIN_MESSAGES = 5;
const MAX_MESSAGES = 50;

function randomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

function pickPair(users: string[]): [string, string] {
  const first = randomInt(0, users.length - 1);
  let second = randomInt(0, users.length - 2);
  if (second >= first) second++;
  return [users[first], users[second]];
}

async function main(): Promise<void> {
  const store = new CassandraStore(config.cassandra);
  await store.connect();

  try {
    const users = Array.from({ length: NUM_USERS }, () => randomUUID());
    const conversationIds: string[] = [];
    let totalMessages = 0;

    for (let i = 0; i < NUM_CONVERSATIONS; i++) {
      const conversationId = newConversationId();
      const participants = pickPair(users);
      const now = Date.now();
      conversationIds.push(conversationId);

      await store.execute("insertConversationDetails", [
        conversationId,
        participants,
        new Date(now),
      ]);

      // Newest first, walking back in time
      const count = randomInt(MIN_MESSAGES, MAX_MESSAGES);
      let at = now;
      let newest: { text: string; at: Date } | null = null;

      for (let n = 0; n < count; n++) {
        const createdAt = new Date(at);
        const text = `Test message ${n + 1} in conversation ${conversationId}`;
        await store.execute("insertMessage", [
          conversationId,
          newMessageId(createdAt),
          participants[randomInt(0, 1)],
          text,
          createdAt,
        ]);
        if (!newest) newest = { text, at: createdAt };
        at -= randomInt(1, 60) * 60_000;
      }

      if (newest) {
        for (const userId of participants) {
          await store.execute("insertUserConversation", [
            userId,
            newest.at,
            conversationId,
            newest.text,
            participants,
          ]);
        }
      }
      totalMessages += count;
    }

    console.log(`Generated ${totalMessages} messages across ${NUM_CONVERSATIONS} conversations`);
    console.log("Sample user ids:");
    users.slice(0, 5).forEach((id, i) => console.log(`  user ${i + 1}: ${id}`));
    console.log("Sample conversation ids:");
    conversationIds.slice(0, 5).forEach((id, i) => console.log(`  conversation ${i + 1}: ${id}`));
  } finally {
    await store.close();
  }
}

main().catch((err: unknown) => {
  console.error("Seed error:", err);
  process.exit(1);
});
