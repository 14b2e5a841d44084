/**
 * Index repair — rewrites the per-user index rows of one conversation from
 * its newest message.
 *
 * A send that failed after the message write leaves the conversation
 * invisible in both users' lists. Re-inserting the index rows at the
 * newest message's timestamp is an upsert, so repairing twice is harmless.
 */

import type { Store } from "../db/index.js";
import { decodeMessage, decodeRows } from "../db/rows.js";
import { TABLES } from "../db/schema.js";
import { readConversationDetails } from "./conversations.js";
import { parseId } from "./ids.js";

export interface RepairResult {
  conversationId: string;
  lastMessageAt: Date | null;
  rowsWritten: number;
}

export async function repairConversationIndex(
  store: Store,
  conversationId: string
): Promise<RepairResult | null> {
  const id = parseId(conversationId, "conversationId");

  const details = await readConversationDetails(store, id);
  if (!details) return null;

  const { rows } = await store.execute("selectMessages", [id], { fetchSize: 1 });
  const [newest] = decodeRows(rows.slice(0, 1), decodeMessage, TABLES.messagesByConversation);
  if (!newest) return { conversationId: id, lastMessageAt: null, rowsWritten: 0 };

  const users = [...new Set(details.participants)];
  for (const userId of users) {
    await store.execute("insertUserConversation", [
      userId,
      newest.createdAt,
      id,
      newest.messageText,
      details.participants,
    ]);
  }

  return { conversationId: id, lastMessageAt: newest.createdAt, rowsWritten: users.length };
}
