/**
 * Conversation reads — rebuilds conversation summaries from
 * conversation_details and the per-user index.
 *
 * The per-user index is insert-only: every send appends a row per
 * participant. Reads merge rows by conversation, newest row wins.
 */

import { fetchAll, type Store } from "../db/index.js";
import {
  decodeConversationDetails,
  decodeRows,
  decodeUserConversation,
  type ConversationDetailsRow,
  type UserConversationRow,
} from "../db/rows.js";
import { TABLES } from "../db/schema.js";
import { parseId } from "./ids.js";
import { pageBounds, paginate, type PagedList } from "./pagination.js";
import { isPair } from "./participants.js";

export interface ConversationSummary {
  id: string;
  /** [sender at creation, receiver at creation] */
  participants: string[];
  lastMessageAt: Date;
  lastMessage: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Index helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Keep the first row seen per conversation. Partition rows arrive newest
 * first, so that is the freshest "last message".
 */
export function latestPerConversation(rows: UserConversationRow[]): UserConversationRow[] {
  const seen = new Set<string>();
  const latest: UserConversationRow[] = [];
  for (const row of rows) {
    if (seen.has(row.conversationId)) continue;
    seen.add(row.conversationId);
    latest.push(row);
  }
  return latest;
}

async function readUserIndex(store: Store, userId: string): Promise<UserConversationRow[]> {
  const rows = await fetchAll(store, "selectUserConversations", [userId]);
  return latestPerConversation(
    decodeRows(rows, decodeUserConversation, TABLES.conversationsByUser)
  );
}

export async function readConversationDetails(
  store: Store,
  conversationId: string
): Promise<ConversationDetailsRow | null> {
  const { rows } = await store.execute("selectConversationDetails", [conversationId]);
  const [details] = decodeRows(rows, decodeConversationDetails, TABLES.conversationDetails);
  return details ?? null;
}

/**
 * Find an existing conversation between two users through userA's index.
 */
export async function findConversationBetween(
  store: Store,
  userA: string,
  userB: string
): Promise<UserConversationRow | null> {
  const rows = await readUserIndex(store, userA);
  return rows.find((row) => isPair(row.participants, userA, userB)) ?? null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reads
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A user's conversations, most recent first. The whole partition is read
 * and merged before the page is cut; total counts merged conversations.
 */
export async function listConversationsForUser(
  store: Store,
  userId: string,
  page: number,
  limit: number
): Promise<PagedList<ConversationSummary>> {
  const id = parseId(userId, "userId");
  pageBounds(page, limit);

  const rows = await readUserIndex(store, id);
  const summaries = rows.map((row) => ({
    id: row.conversationId,
    participants: row.participants,
    lastMessageAt: row.lastMessageTime,
    lastMessage: row.lastMessage,
  }));

  return paginate(summaries, page, limit);
}

/**
 * One conversation's summary, or null when it has no details row.
 *
 * Last-message state lives only in the per-user index, so it is read
 * through the first participant's partition. Without such a row the
 * conversation's creation time stands in.
 */
export async function getConversation(
  store: Store,
  conversationId: string
): Promise<ConversationSummary | null> {
  const id = parseId(conversationId, "conversationId");

  const details = await readConversationDetails(store, id);
  if (!details) return null;

  let lastMessageAt = details.createdAt;
  let lastMessage: string | null = null;

  if (details.participants.length > 0) {
    const { rows } = await store.execute("selectUserConversation", [
      details.participants[0],
      id,
    ]);
    const [latest] = decodeRows(rows, decodeUserConversation, TABLES.conversationsByUser);
    if (latest) {
      lastMessageAt = latest.lastMessageTime;
      lastMessage = latest.lastMessage;
    }
  }

  return {
    id: details.conversationId,
    participants: details.participants,
    lastMessageAt,
    lastMessage,
  };
}
