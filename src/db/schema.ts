/**
 * pairwise-relay keyspace schema
 *
 * Three denormalized tables, one per read path. None of them is updated in
 * place: a send appends to all three.
 */

export const TABLES = {
  conversationDetails: "conversation_details",
  messagesByConversation: "messages_by_conversation",
  conversationsByUser: "conversations_by_user",
} as const;

export function createKeyspaceCql(keyspace: string, replicationFactor: number): string {
  return `
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH replication = {'class': 'SimpleStrategy', 'replication_factor': ${replicationFactor}}
    AND durable_writes = true
  `;
}

// ─────────────────────────────────────────────────────────────────────────────
// CONVERSATION DETAILS — canonical participant pair, one row per conversation
// ─────────────────────────────────────────────────────────────────────────────

const conversationDetails = (keyspace: string) => `
  CREATE TABLE IF NOT EXISTS ${keyspace}.${TABLES.conversationDetails} (
    conversation_id uuid,
    participants list<uuid>, -- [sender at creation, receiver at creation]
    created_at timestamp,
    PRIMARY KEY (conversation_id)
  )
`;

// ─────────────────────────────────────────────────────────────────────────────
// MESSAGES BY CONVERSATION — append-only, newest first
// ─────────────────────────────────────────────────────────────────────────────

const messagesByConversation = (keyspace: string) => `
  CREATE TABLE IF NOT EXISTS ${keyspace}.${TABLES.messagesByConversation} (
    conversation_id uuid,
    message_id timeuuid,
    sender_id uuid,
    message_text text,
    created_at timestamp,
    PRIMARY KEY (conversation_id, message_id)
  ) WITH CLUSTERING ORDER BY (message_id DESC)
`;

// ─────────────────────────────────────────────────────────────────────────────
// CONVERSATIONS BY USER — one row per participant per send
// ─────────────────────────────────────────────────────────────────────────────

const conversationsByUser = (keyspace: string) => `
  CREATE TABLE IF NOT EXISTS ${keyspace}.${TABLES.conversationsByUser} (
    user_id uuid,
    last_message_time timestamp,
    conversation_id uuid,
    last_message text,
    participants list<uuid>,
    PRIMARY KEY (user_id, last_message_time, conversation_id)
  ) WITH CLUSTERING ORDER BY (last_message_time DESC, conversation_id ASC)
`;

/** Table DDL qualified with the keyspace, so it runs on a keyspace-less session. */
export function tableDdl(keyspace: string): string[] {
  return [
    conversationDetails(keyspace),
    messagesByConversation(keyspace),
    conversationsByUser(keyspace),
  ];
}
