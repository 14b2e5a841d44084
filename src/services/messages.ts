/**
 * Message service — the send fan-out and the two message reads.
 *
 * A send is three independent writes with no shared transaction:
 *   1. conversation_details      (skipped when an existing conversation is reused)
 *   2. messages_by_conversation
 *   3. conversations_by_user     (sender, then receiver)
 * The first failure is thrown as-is; earlier writes stay in place.
 */

import { config, type ConversationPolicy } from "../config.js";
import { fetchAll, type ResultPage, type Store, type StoreRow } from "../db/index.js";
import { decodeCount, decodeMessage, decodeRows, type MessageRow } from "../db/rows.js";
import { TABLES } from "../db/schema.js";
import { ValidationError } from "../errors.js";
import { findConversationBetween, readConversationDetails } from "./conversations.js";
import { newConversationId, newMessageId, parseId } from "./ids.js";
import { emptyPage, pageBounds, paginate, type PagedList } from "./pagination.js";
import { resolveReceiver } from "./participants.js";

export interface Message {
  id: string;
  conversationId: string;
  senderId: string;
  receiverId: string;
  content: string;
  createdAt: Date;
}

export interface SendMessageInput {
  senderId: string;
  receiverId: string;
  content: string;
}

export interface SendOptions {
  policy?: ConversationPolicy;
}

// ─────────────────────────────────────────────────────────────────────────────
// Send
// ─────────────────────────────────────────────────────────────────────────────

export async function sendMessage(
  store: Store,
  input: SendMessageInput,
  options: SendOptions = {}
): Promise<Message> {
  const senderId = parseId(input.senderId, "senderId");
  const receiverId = parseId(input.receiverId, "receiverId");
  const policy = options.policy ?? config.conversationPolicy;
  const now = new Date();

  const existing =
    policy === "reuse-by-pair"
      ? await findConversationBetween(store, senderId, receiverId)
      : null;

  const conversationId = existing ? existing.conversationId : newConversationId();
  const participants = existing ? existing.participants : [senderId, receiverId];

  if (!existing) {
    await store.execute("insertConversationDetails", [conversationId, participants, now]);
  }

  const messageId = newMessageId(now);
  await store.execute("insertMessage", [
    conversationId,
    messageId,
    senderId,
    input.content,
    now,
  ]);

  for (const userId of [senderId, receiverId]) {
    await store.execute("insertUserConversation", [
      userId,
      now,
      conversationId,
      input.content,
      participants,
    ]);
  }

  return {
    id: messageId,
    conversationId,
    senderId,
    receiverId,
    content: input.content,
    createdAt: now,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Reads
// ─────────────────────────────────────────────────────────────────────────────

function toMessage(row: MessageRow, participants: readonly string[]): Message {
  return {
    id: row.messageId,
    conversationId: row.conversationId,
    senderId: row.senderId,
    receiverId: resolveReceiver(row.senderId, participants),
    content: row.messageText,
    createdAt: row.createdAt,
  };
}

async function loadParticipants(store: Store, conversationId: string): Promise<string[]> {
  const details = await readConversationDetails(store, conversationId);
  return details ? details.participants : [];
}

/** Walk native pages of `limit` rows up to the requested one. */
async function readMessagePage(
  store: Store,
  conversationId: string,
  page: number,
  limit: number
): Promise<StoreRow[]> {
  let pageState: string | null = null;

  for (let current = 1; ; current++) {
    const result: ResultPage = await store.execute("selectMessages", [conversationId], {
      fetchSize: limit,
      pageState,
    });
    if (current === page) return result.rows;
    if (!result.pageState) return [];
    pageState = result.pageState;
  }
}

/**
 * Messages in a conversation, newest first (clustering order).
 */
export async function listMessages(
  store: Store,
  conversationId: string,
  page: number,
  limit: number
): Promise<PagedList<Message>> {
  const id = parseId(conversationId, "conversationId");
  const { start } = pageBounds(page, limit);

  const { rows: countRows } = await store.execute("countMessages", [id]);
  const total = countRows.length > 0 ? decodeCount(countRows[0]) : 0;
  if (start >= total) return { total, page, limit, data: [] };

  const rows = await readMessagePage(store, id, page, limit);
  const participants = await loadParticipants(store, id);
  const data = decodeRows(rows, decodeMessage, TABLES.messagesByConversation).map((row) =>
    toMessage(row, participants)
  );

  return { total, page, limit, data };
}

/**
 * Messages created strictly before `before`, newest first.
 *
 * The filtered scan gives no ordering guarantee, so rows are sorted here.
 * Never throws: any failure yields an empty page.
 */
export async function listMessagesBefore(
  store: Store,
  conversationId: string,
  before: Date,
  page: number,
  limit: number,
  maxScanRows: number = config.maxScanRows
): Promise<PagedList<Message>> {
  try {
    const id = parseId(conversationId, "conversationId");
    pageBounds(page, limit);
    if (Number.isNaN(before.getTime())) {
      throw new ValidationError("before must be a valid timestamp");
    }

    const rows = await fetchAll(store, "selectMessagesBefore", [id, before, maxScanRows]);
    const decoded = decodeRows(rows, decodeMessage, TABLES.messagesByConversation);
    if (decoded.length === 0) return emptyPage(page, limit);

    decoded.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const participants = await loadParticipants(store, id);
    return paginate(
      decoded.map((row) => toMessage(row, participants)),
      page,
      limit
    );
  } catch (err) {
    console.error("List messages before error:", err);
    return emptyPage(page, limit);
  }
}
