import { createHash } from "node:crypto";
import type { PgSession } from "./session.js";
import type { ClockPort } from "../../infra/clock.js";
import type {
  IdempotencyRecord,
  IdempotencyState,
  IdempotencyStorePort,
} from "../../ports/idempotency-store.js";
import { mapNullableTimestamp, mapTimestamp } from "./mapping.js";

interface PostgresIdempotencyStoreOptions {
  ttlSeconds: number;
  clock: ClockPort;
}

function advisoryLockId(scope: string, key: string): bigint {
  const digest = createHash("sha256").update(`${scope}:${key}`).digest();
  return digest.readBigInt64BE(0);
}

export class PostgresIdempotencyStore implements IdempotencyStorePort {
  constructor(
    private readonly session: PgSession,
    private readonly options: PostgresIdempotencyStoreOptions,
  ) {}

  async get<TBody>(scope: string, key: string): Promise<IdempotencyRecord<TBody> | null> {
    const result = await this.session.query<{
      fingerprint: string;
      state: IdempotencyState;
      body: TBody | null;
      created_at: unknown;
      completed_at: unknown;
      expires_at: unknown;
    }>(
      `
        SELECT fingerprint, state, body, created_at, completed_at, expires_at
        FROM settle_idempotency_keys
        WHERE scope = $1
          AND key = $2
      `,
      [scope, key],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    if (Date.parse(mapTimestamp(row.expires_at)) <= Date.parse(this.options.clock.nowIso())) {
      await this.delete(scope, key);
      return null;
    }

    return {
      fingerprint: row.fingerprint,
      state: row.state,
      body: row.body,
      createdAt: mapTimestamp(row.created_at),
      completedAt: mapNullableTimestamp(row.completed_at),
    };
  }

  async put<TBody>(scope: string, key: string, record: IdempotencyRecord<TBody>): Promise<void> {
    const expiresAtMs = Date.parse(record.createdAt) + this.options.ttlSeconds * 1000;
    await this.session.query(
      `
        INSERT INTO settle_idempotency_keys (
          scope,
          key,
          fingerprint,
          state,
          body,
          created_at,
          completed_at,
          expires_at
        )
        VALUES ($1, $2, $3, $4, $5::jsonb, $6::timestamptz, $7::timestamptz, $8::timestamptz)
        ON CONFLICT (scope, key) DO UPDATE
        SET fingerprint = EXCLUDED.fingerprint,
            state = EXCLUDED.state,
            body = EXCLUDED.body,
            created_at = EXCLUDED.created_at,
            completed_at = EXCLUDED.completed_at,
            expires_at = EXCLUDED.expires_at
      `,
      [
        scope,
        key,
        record.fingerprint,
        record.state,
        record.body === null ? null : JSON.stringify(record.body),
        record.createdAt,
        record.completedAt,
        new Date(expiresAtMs).toISOString(),
      ],
    );
  }

  async delete(scope: string, key: string): Promise<void> {
    await this.session.query(
      `
        DELETE FROM settle_idempotency_keys
        WHERE scope = $1
          AND key = $2
      `,
      [scope, key],
    );
  }

  /**
   * Session-level advisory lock taken on the session's leased connection; the
   * queries `operation` makes run on that same connection.
   */
  async withKeyLock<TOutput>(
    scope: string,
    key: string,
    operation: () => Promise<TOutput>,
  ): Promise<TOutput> {
    const lockKey = advisoryLockId(scope, key).toString();
    return this.session.withClient(async (client) => {
      await client.query("SELECT pg_advisory_lock($1::bigint)", [lockKey]);
      try {
        return await operation();
      } finally {
        await client.query("SELECT pg_advisory_unlock($1::bigint)", [lockKey]);
      }
    });
  }
}
