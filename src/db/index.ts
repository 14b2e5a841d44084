/**
 * Store adapter — runs catalog statements against Cassandra.
 *
 * Rows come back loosely typed; decoding lives in rows.ts. The adapter owns
 * no business logic and never retries a statement. Only the initial
 * connection is retried.
 */

import { setTimeout as sleep } from "node:timers/promises";
import cassandra from "cassandra-driver";
import type { CassandraConfig } from "../config.js";
import { StoreError } from "../errors.js";
import { createKeyspaceCql, tableDdl } from "./schema.js";
import { STATEMENTS, type StatementName, type StatementParams } from "./statements.js";

export type StoreRow = { readonly [column: string]: unknown };

export interface PageOptions {
  fetchSize?: number;
  pageState?: string | null;
}

export interface ResultPage {
  rows: StoreRow[];
  /** Token for the next page; null once the partition is exhausted. */
  pageState: string | null;
}

export interface Store {
  execute<K extends StatementName>(
    statement: K,
    params: StatementParams[K],
    options?: PageOptions
  ): Promise<ResultPage>;
}

/**
 * Run a statement and follow its page state to the end.
 */
export async function fetchAll<K extends StatementName>(
  store: Store,
  statement: K,
  params: StatementParams[K]
): Promise<StoreRow[]> {
  const rows: StoreRow[] = [];
  let pageState: string | null = null;

  do {
    const page: ResultPage = await store.execute(statement, params, { pageState });
    rows.push(...page.rows);
    pageState = page.pageState;
  } while (pageState);

  return rows;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cassandra
// ─────────────────────────────────────────────────────────────────────────────

/** The slice of cassandra-driver's Client the adapter uses. */
export interface CqlClient {
  connect(): Promise<void>;
  execute(
    query: string,
    params?: unknown[],
    options?: { prepare?: boolean; fetchSize?: number; pageState?: string }
  ): Promise<{ rows: StoreRow[]; pageState: string | null | undefined }>;
  shutdown(): Promise<void>;
}

export type CqlClientFactory = (keyspace?: string) => CqlClient;

export function createCqlClient(options: CassandraConfig): CqlClientFactory {
  return (keyspace) =>
    new cassandra.Client({
      contactPoints: [...options.contactPoints],
      protocolOptions: { port: options.port },
      localDataCenter: options.localDataCenter,
      keyspace,
      authProvider:
        options.username && options.password
          ? new cassandra.auth.PlainTextAuthProvider(options.username, options.password)
          : undefined,
    });
}

export class CassandraStore implements Store {
  private client: CqlClient | null = null;

  constructor(
    private readonly options: CassandraConfig,
    private readonly clientFactory: CqlClientFactory = createCqlClient(options)
  ) {}

  /**
   * Connect with retry. With autoMigrate, a keyspace-less session first
   * creates the keyspace and tables.
   */
  async connect(): Promise<void> {
    if (this.client) return;

    if (this.options.autoMigrate) {
      const bootstrap = this.clientFactory();
      try {
        await this.connectWithRetry(bootstrap);
        await this.migrate(bootstrap);
      } finally {
        await bootstrap.shutdown();
      }
    }

    const client = this.clientFactory(this.options.keyspace);
    try {
      await this.connectWithRetry(client);
    } catch (err) {
      await client.shutdown();
      throw err;
    }
    this.client = client;
    console.log(
      `Connected to Cassandra at ${this.options.contactPoints.join(",")}:${this.options.port}, keyspace: ${this.options.keyspace}`
    );
  }

  async close(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    await client.shutdown();
    console.log("Cassandra connection closed");
  }

  async execute<K extends StatementName>(
    statement: K,
    params: StatementParams[K],
    options: PageOptions = {}
  ): Promise<ResultPage> {
    if (!this.client) {
      throw new StoreError(statement, new Error("Store is not connected"));
    }

    try {
      const result = await this.client.execute(STATEMENTS[statement], params, {
        prepare: true,
        fetchSize: options.fetchSize,
        pageState: options.pageState ?? undefined,
      });
      return { rows: result.rows, pageState: result.pageState ?? null };
    } catch (err) {
      throw new StoreError(statement, err);
    }
  }

  private async connectWithRetry(client: CqlClient): Promise<void> {
    const attempts = Math.max(1, this.options.connectRetries);

    for (let attempt = 1; ; attempt++) {
      try {
        console.log(
          `Connecting to Cassandra at ${this.options.contactPoints.join(",")}:${this.options.port}, attempt ${attempt}/${attempts}`
        );
        await client.connect();
        return;
      } catch (err) {
        console.warn(`Connection attempt ${attempt} failed:`, err);
        if (attempt >= attempts) throw err;
        await sleep(this.options.retryDelayMs);
      }
    }
  }

  private async migrate(client: CqlClient): Promise<void> {
    await client.execute(
      createKeyspaceCql(this.options.keyspace, this.options.replicationFactor)
    );
    for (const ddl of tableDdl(this.options.keyspace)) {
      await client.execute(ddl);
    }
    console.log(`Keyspace ${this.options.keyspace} is ready`);
  }
}
