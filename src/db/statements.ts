/**
 * Statement catalog. The services only ever run these, by name, so any
 * store that understands the names can stand in for Cassandra.
 */

import { TABLES } from "./schema.js";

export const STATEMENTS = {
  insertConversationDetails: `
    INSERT INTO ${TABLES.conversationDetails} (conversation_id, participants, created_at)
    VALUES (?, ?, ?)`,

  selectConversationDetails: `
    SELECT conversation_id, participants, created_at
    FROM ${TABLES.conversationDetails}
    WHERE conversation_id = ?`,

  insertMessage: `
    INSERT INTO ${TABLES.messagesByConversation} (conversation_id, message_id, sender_id, message_text, created_at)
    VALUES (?, ?, ?, ?, ?)`,

  selectMessages: `
    SELECT conversation_id, message_id, sender_id, message_text, created_at
    FROM ${TABLES.messagesByConversation}
    WHERE conversation_id = ?`,

  countMessages: `
    SELECT COUNT(*) AS total
    FROM ${TABLES.messagesByConversation}
    WHERE conversation_id = ?`,

  // created_at is a regular column, so this is a filtered partition scan
  selectMessagesBefore: `
    SELECT conversation_id, message_id, sender_id, message_text, created_at
    FROM ${TABLES.messagesByConversation}
    WHERE conversation_id = ? AND created_at < ?
    LIMIT ?
    ALLOW FILTERING`,

  insertUserConversation: `
    INSERT INTO ${TABLES.conversationsByUser} (user_id, last_message_time, conversation_id, last_message, participants)
    VALUES (?, ?, ?, ?, ?)`,

  selectUserConversations: `
    SELECT user_id, last_message_time, conversation_id, last_message, participants
    FROM ${TABLES.conversationsByUser}
    WHERE user_id = ?`,

  selectUserConversation: `
    SELECT user_id, last_message_time, conversation_id, last_message, participants
    FROM ${TABLES.conversationsByUser}
    WHERE user_id = ? AND conversation_id = ?
    LIMIT 1
    ALLOW FILTERING`,
} as const;

export type StatementName = keyof typeof STATEMENTS;

/** Bind values per statement, in marker order. Ids are canonical UUID strings. */
export interface StatementParams {
  insertConversationDetails: [conversationId: string, participants: string[], createdAt: Date];
  selectConversationDetails: [conversationId: string];
  insertMessage: [
    conversationId: string,
    messageId: string,
    senderId: string,
    messageText: string,
    createdAt: Date,
  ];
  selectMessages: [conversationId: string];
  countMessages: [conversationId: string];
  selectMessagesBefore: [conversationId: string, before: Date, limit: number];
  insertUserConversation: [
    userId: string,
    lastMessageTime: Date,
    conversationId: string,
    lastMessage: string,
    participants: string[],
  ];
  selectUserConversations: [userId: string];
  selectUserConversation: [userId: string, conversationId: string];
}
