/**
 * In-process stand-in for the Cassandra keyspace.
 *
 * Implements every catalog statement with the tables' partition and
 * clustering semantics:
 * - conversation_details: one row per conversation_id (upsert)
 * - messages_by_conversation: partition conversation_id, message_id DESC
 *   by embedded time UUID timestamp
 * - conversations_by_user: partition user_id,
 *   (last_message_time DESC, conversation_id ASC)
 *
 * Also offers native paging, raw row injection and failure injection.
 */

import type { PageOptions, ResultPage, Store, StoreRow } from "../src/db/index.js";
import type { StatementName, StatementParams } from "../src/db/statements.js";
import { StoreError } from "../src/errors.js";

type Row = Record<string, unknown>;

interface Failure {
  remaining: number;
  error: Error;
}

/** 60-bit timestamp of a version-1 UUID; other UUIDs sort by their raw hex. */
function timeUuidOrder(id: string): bigint {
  const [low, mid, high] = id.split("-");
  if (high?.startsWith("1")) return BigInt(`0x${high.slice(1)}${mid}${low}`);
  return BigInt(`0x${id.replace(/-/g, "")}`) >> 68n;
}

function time(value: unknown): number {
  return value instanceof Date ? value.getTime() : Number.NaN;
}

export class MemoryStore implements Store {
  readonly conversationDetails = new Map<string, Row>();
  readonly messages = new Map<string, Map<string, { row: Row; seq: number }>>();
  readonly userConversations = new Map<string, Map<string, Row>>();
  readonly executed: StatementName[] = [];

  private readonly failures = new Map<StatementName, Failure>();
  private seq = 0;

  // ───────────────────────────────────────────────────────────────────────────
  // Test controls
  // ───────────────────────────────────────────────────────────────────────────

  /** Fail `statement` after `after` more successful runs of it. */
  failOn(statement: StatementName, options: { after?: number; error?: Error } = {}): void {
    this.failures.set(statement, {
      remaining: options.after ?? 0,
      error: options.error ?? new Error(`${statement} unavailable`),
    });
  }

  clearFailures(): void {
    this.failures.clear();
  }

  putMessageRow(row: Row): void {
    const partition = this.partition(this.messages, String(row.conversation_id));
    partition.set(String(row.message_id), { row: { ...row }, seq: this.seq++ });
  }

  putUserConversationRow(row: Row): void {
    const partition = this.partition(this.userConversations, String(row.user_id));
    partition.set(`${time(row.last_message_time)}|${String(row.conversation_id)}`, { ...row });
  }

  putConversationDetailsRow(row: Row): void {
    this.conversationDetails.set(String(row.conversation_id), { ...row });
  }

  messageRows(conversationId: string): Row[] {
    const partition = this.messages.get(conversationId);
    if (!partition) return [];
    return [...partition.values()]
      .sort((a, b) => {
        const byTime = timeUuidOrder(String(b.row.message_id)) - timeUuidOrder(String(a.row.message_id));
        if (byTime !== 0n) return byTime > 0n ? 1 : -1;
        return b.seq - a.seq;
      })
      .map(({ row }) => ({ ...row }));
  }

  userConversationRows(userId: string): Row[] {
    const partition = this.userConversations.get(userId);
    if (!partition) return [];
    return [...partition.values()]
      .sort((a, b) => {
        const byTime = time(b.last_message_time) - time(a.last_message_time);
        if (byTime !== 0) return byTime;
        return String(a.conversation_id).localeCompare(String(b.conversation_id));
      })
      .map((row) => ({ ...row }));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Store
  // ───────────────────────────────────────────────────────────────────────────

  async execute<K extends StatementName>(
    statement: K,
    params: StatementParams[K],
    options: PageOptions = {}
  ): Promise<ResultPage> {
    this.executed.push(statement);

    const failure = this.failures.get(statement);
    if (failure) {
      if (failure.remaining > 0) {
        failure.remaining--;
      } else {
        throw new StoreError(statement, failure.error);
      }
    }

    const rows: StoreRow[] = this.handlers[statement](params);
    if (options.fetchSize === undefined) return { rows, pageState: null };

    const offset = options.pageState ? Number(options.pageState) : 0;
    const next = offset + options.fetchSize;
    return {
      rows: rows.slice(offset, next),
      pageState: next < rows.length ? String(next) : null,
    };
  }

  private readonly handlers: { [K in StatementName]: (params: StatementParams[K]) => Row[] } = {
    insertConversationDetails: ([conversationId, participants, createdAt]) => {
      this.putConversationDetailsRow({
        conversation_id: conversationId,
        participants: [...participants],
        created_at: createdAt,
      });
      return [];
    },

    selectConversationDetails: ([conversationId]) => {
      const row = this.conversationDetails.get(conversationId);
      return row ? [{ ...row }] : [];
    },

    insertMessage: ([conversationId, messageId, senderId, messageText, createdAt]) => {
      this.putMessageRow({
        conversation_id: conversationId,
        message_id: messageId,
        sender_id: senderId,
        message_text: messageText,
        created_at: createdAt,
      });
      return [];
    },

    selectMessages: ([conversationId]) => this.messageRows(conversationId),

    countMessages: ([conversationId]) => [{ total: this.messageRows(conversationId).length }],

    selectMessagesBefore: ([conversationId, before, limit]) =>
      this.messageRows(conversationId)
        .filter((row) => time(row.created_at) < before.getTime())
        .slice(0, limit),

    insertUserConversation: ([userId, lastMessageTime, conversationId, lastMessage, participants]) => {
      this.putUserConversationRow({
        user_id: userId,
        last_message_time: lastMessageTime,
        conversation_id: conversationId,
        last_message: lastMessage,
        participants: [...participants],
      });
      return [];
    },

    selectUserConversations: ([userId]) => this.userConversationRows(userId),

    selectUserConversation: ([userId, conversationId]) =>
      this.userConversationRows(userId)
        .filter((row) => row.conversation_id === conversationId)
        .slice(0, 1),
  };

  private partition<T>(tables: Map<string, Map<string, T>>, key: string): Map<string, T> {
    let partition = tables.get(key);
    if (!partition) {
      partition = new Map();
      tables.set(key, partition);
    }
    return partition;
  }
}
