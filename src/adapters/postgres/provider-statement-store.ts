import type { PgSession } from "./session.js";
import type {
  ProviderStatementLine,
  ProviderStatementPort,
  ProviderStatementQuery,
} from "../../ports/provider-statement.js";
import { mapTimestamp, toNumber } from "./mapping.js";

export class PostgresProviderStatementStore implements ProviderStatementPort {
  constructor(private readonly session: PgSession) {}

  async saveLine(line: ProviderStatementLine): Promise<void> {
    await this.session.query(
      `
        INSERT INTO settle_provider_statements (
          id, tenant_id, provider, date, currency, total, transaction_count, imported_at
        )
        VALUES ($1, $2, $3, $4::date, $5, $6::bigint, $7, $8::timestamptz)
        ON CONFLICT (tenant_id, provider, date) DO UPDATE
        SET id = EXCLUDED.id,
            currency = EXCLUDED.currency,
            total = EXCLUDED.total,
            transaction_count = EXCLUDED.transaction_count,
            imported_at = EXCLUDED.imported_at
      `,
      [
        line.id,
        line.tenant_id,
        line.provider,
        line.date,
        line.currency,
        line.total,
        line.transaction_count,
        line.imported_at,
      ],
    );
  }

  async listLines(query: ProviderStatementQuery): Promise<ProviderStatementLine[]> {
    const result = await this.session.query<{
      id: string;
      tenant_id: string;
      provider: string;
      date: string;
      currency: string;
      total: unknown;
      transaction_count: unknown;
      imported_at: unknown;
    }>(
      `
        SELECT id, tenant_id, provider, to_char(date, 'YYYY-MM-DD') AS date, currency, total,
               transaction_count, imported_at
        FROM settle_provider_statements
        WHERE tenant_id = $1
          AND provider = $2
          AND date BETWEEN $3::date AND $4::date
        ORDER BY date ASC
      `,
      [query.tenantId, query.provider, query.dateFrom, query.dateTo],
    );
    return result.rows.map((row) => ({
      id: row.id,
      tenant_id: row.tenant_id,
      provider: row.provider,
      date: row.date,
      currency: row.currency,
      total: toNumber(row.total, "total"),
      transaction_count: toNumber(row.transaction_count, "transaction_count"),
      imported_at: mapTimestamp(row.imported_at),
    }));
  }
}
