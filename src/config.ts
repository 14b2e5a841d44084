/**
 * pairwise-relay configuration
 *
 * All settings from environment.
 */

export type ConversationPolicy = "always-new" | "reuse-by-pair";

function parsePolicy(value: string | undefined): ConversationPolicy {
  const policy = value || "always-new";
  if (policy === "always-new" || policy === "reuse-by-pair") return policy;
  throw new Error(`Unknown CONVERSATION_POLICY: ${policy}`);
}

export function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  return parsed;
}

export const config = {
  port: parseInt(process.env.PORT || "3002", 10),
  nodeEnv: process.env.NODE_ENV || "development",

  cassandra: {
    contactPoints: (process.env.CASSANDRA_CONTACT_POINTS || "localhost")
      .split(",")
      .map((host) => host.trim())
      .filter(Boolean),
    port: parseInt(process.env.CASSANDRA_PORT || "9042", 10),
    localDataCenter: process.env.CASSANDRA_LOCAL_DC || "datacenter1",
    keyspace: process.env.CASSANDRA_KEYSPACE || "messenger",
    username: process.env.CASSANDRA_USERNAME || null,
    password: process.env.CASSANDRA_PASSWORD || null,
    replicationFactor: parseInt(process.env.CASSANDRA_REPLICATION_FACTOR || "1", 10),

    // Bootstrap
    connectRetries: parseInt(process.env.CASSANDRA_CONNECT_RETRIES || "5", 10),
    retryDelayMs: parseInt(process.env.CASSANDRA_RETRY_DELAY_MS || "5000", 10),
    autoMigrate: (process.env.CASSANDRA_AUTO_MIGRATE || "true") !== "false",
  },

  // Messaging
  conversationPolicy: parsePolicy(process.env.CONVERSATION_POLICY),

  // Limits
  maxScanRows: parsePositiveInt("MAX_SCAN_ROWS", process.env.MAX_SCAN_ROWS, 10000),
  maxPageSize: parsePositiveInt("MAX_PAGE_SIZE", process.env.MAX_PAGE_SIZE, 100),
} as const;

export type CassandraConfig = typeof config.cassandra;
