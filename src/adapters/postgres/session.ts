import { AsyncLocalStorage } from "node:async_hooks";
import type { Pool, QueryResult, QueryResultRow } from "pg";

export interface SqlClient {
  query<TRow extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<TRow>>;
}

export interface SqlLeasedClient extends SqlClient {
  release(): void;
}

export interface SqlConnectionSource extends SqlClient {
  connect(): Promise<SqlLeasedClient>;
}

export function poolSource(pool: Pool): SqlConnectionSource {
  return {
    query: <TRow extends QueryResultRow>(text: string, values?: unknown[]) => pool.query<TRow>(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: <TRow extends QueryResultRow>(text: string, values?: unknown[]) => client.query<TRow>(text, values),
        release: () => client.release(),
      };
    },
  };
}

/**
 * Query entry point shared by the Postgres adapters. Inside `withClient`
 * every query, nested `withClient` included, runs on the same leased
 * connection, so a locked operation never waits on the pool for a second one.
 */
export class PgSession implements SqlClient {
  private readonly leased = new AsyncLocalStorage<SqlLeasedClient>();

  constructor(private readonly source: SqlConnectionSource) {}

  query<TRow extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<TRow>> {
    const client = this.leased.getStore();
    return client ? client.query<TRow>(text, values) : this.source.query<TRow>(text, values);
  }

  async withClient<TOutput>(operation: (client: SqlClient) => Promise<TOutput>): Promise<TOutput> {
    const current = this.leased.getStore();
    if (current) {
      return operation(current);
    }
    const client = await this.source.connect();
    try {
      return await this.leased.run(client, () => operation(client));
    } finally {
      client.release();
    }
  }
}
