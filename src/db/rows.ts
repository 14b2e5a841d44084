/**
 * Typed row decoding, one decoder per table.
 *
 * Rows may be plain records (columns as properties) or driver rows that
 * also expose get(column). A decoder either returns a fully typed row or
 * throws RowDecodeError, and callers skip the row.
 */

import type { StoreRow } from "./index.js";

export class RowDecodeError extends Error {
  constructor(column: string, reason: string) {
    super(`Cannot decode column ${column}: ${reason}`);
    this.name = "RowDecodeError";
  }
}

export interface ConversationDetailsRow {
  conversationId: string;
  participants: string[];
  createdAt: Date;
}

export interface MessageRow {
  conversationId: string;
  messageId: string;
  senderId: string;
  messageText: string;
  createdAt: Date;
}

export interface UserConversationRow {
  userId: string;
  lastMessageTime: Date;
  conversationId: string;
  lastMessage: string | null;
  participants: string[];
}

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

interface KeyedRow {
  get(column: string): unknown;
}

function isKeyedRow(row: StoreRow): row is StoreRow & KeyedRow {
  return typeof row["get"] === "function";
}

function column(row: StoreRow, name: string): unknown {
  try {
    if (Object.prototype.hasOwnProperty.call(row, name)) return row[name];
    if (isKeyedRow(row)) return row.get(name);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RowDecodeError(name, `not readable (${reason})`);
  }
  throw new RowDecodeError(name, "missing");
}

// ─────────────────────────────────────────────────────────────────────────────
// Column values
// ─────────────────────────────────────────────────────────────────────────────

/** uuid / timeuuid: strings or driver Uuid objects, canonicalized to lower case. */
export function toId(value: unknown, name = "id"): string {
  const text = typeof value === "string" ? value : value != null ? String(value) : "";
  if (!UUID_PATTERN.test(text)) throw new RowDecodeError(name, `not a uuid (${text})`);
  return text.toLowerCase();
}

function toDate(value: unknown, name: string): Date {
  const date =
    value instanceof Date
      ? value
      : typeof value === "string" || typeof value === "number"
        ? new Date(value)
        : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new RowDecodeError(name, "not a timestamp");
  }
  return date;
}

function toText(value: unknown, name: string): string {
  if (typeof value !== "string") throw new RowDecodeError(name, "not text");
  return value;
}

// A null list<uuid> reads back as null, not []
function toIdList(value: unknown, name: string): string[] {
  if (value == null) return [];
  if (!Array.isArray(value)) throw new RowDecodeError(name, "not a list");
  return value.map((item) => toId(item, name));
}

/** COUNT(*) comes back as a driver Long; in-process stores return numbers. */
export function toCount(value: unknown, name = "total"): number {
  const count =
    typeof value === "number"
      ? value
      : typeof value === "bigint"
        ? Number(value)
        : value != null
          ? Number(String(value))
          : NaN;
  if (!Number.isInteger(count) || count < 0) throw new RowDecodeError(name, "not a count");
  return count;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

export function decodeConversationDetails(row: StoreRow): ConversationDetailsRow {
  return {
    conversationId: toId(column(row, "conversation_id"), "conversation_id"),
    participants: toIdList(column(row, "participants"), "participants"),
    createdAt: toDate(column(row, "created_at"), "created_at"),
  };
}

export function decodeMessage(row: StoreRow): MessageRow {
  return {
    conversationId: toId(column(row, "conversation_id"), "conversation_id"),
    messageId: toId(column(row, "message_id"), "message_id"),
    senderId: toId(column(row, "sender_id"), "sender_id"),
    messageText: toText(column(row, "message_text"), "message_text"),
    createdAt: toDate(column(row, "created_at"), "created_at"),
  };
}

export function decodeUserConversation(row: StoreRow): UserConversationRow {
  const lastMessage = column(row, "last_message");
  return {
    userId: toId(column(row, "user_id"), "user_id"),
    lastMessageTime: toDate(column(row, "last_message_time"), "last_message_time"),
    conversationId: toId(column(row, "conversation_id"), "conversation_id"),
    lastMessage: lastMessage == null ? null : toText(lastMessage, "last_message"),
    participants: toIdList(column(row, "participants"), "participants"),
  };
}

export function decodeCount(row: StoreRow): number {
  return toCount(column(row, "total"));
}

/**
 * Decode every row, skipping (and logging) the ones that do not decode.
 */
export function decodeRows<T>(
  rows: StoreRow[],
  decode: (row: StoreRow) => T,
  table: string
): T[] {
  const decoded: T[] = [];
  for (const row of rows) {
    try {
      decoded.push(decode(row));
    } catch (err) {
      if (!(err instanceof RowDecodeError)) throw err;
      console.warn(`Skipping ${table} row: ${err.message}`);
    }
  }
  return decoded;
}
