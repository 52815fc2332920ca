import type { PgSession } from "./session.js";
import type { ReconciliationRecord } from "../../domain/types.js";
import type {
  ReconciliationListInput,
  ReconciliationListResult,
  ReconciliationRepositoryPort,
} from "../../ports/reconciliation-repository.js";
import { paginateByCursor } from "../pagination.js";
import { mapTimestamp, toNumber, WhereClause } from "./mapping.js";

interface ReconciliationRow {
  id: string;
  tenant_id: string;
  provider: string;
  date: string;
  currency: string;
  expected_total: unknown;
  reported_total: unknown;
  discrepancy: unknown;
  resolution: ReconciliationRecord["resolution"];
  resolution_note: string | null;
  created_at: unknown;
  updated_at: unknown;
}

const COLUMNS = `
  id, tenant_id, provider, to_char(date, 'YYYY-MM-DD') AS date, currency, expected_total,
  reported_total, discrepancy, resolution, resolution_note, created_at, updated_at
`;

function mapRecord(row: ReconciliationRow): ReconciliationRecord {
  return {
    id: row.id,
    tenant_id: row.tenant_id,
    provider: row.provider,
    date: row.date,
    currency: row.currency,
    expected_total: toNumber(row.expected_total, "expected_total"),
    reported_total: toNumber(row.reported_total, "reported_total"),
    discrepancy: toNumber(row.discrepancy, "discrepancy"),
    resolution: row.resolution,
    resolution_note: row.resolution_note,
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

export class PostgresReconciliationRepository implements ReconciliationRepositoryPort {
  constructor(private readonly session: PgSession) {}

  async save(record: ReconciliationRecord): Promise<void> {
    await this.session.query(
      `
        INSERT INTO settle_reconciliation_records (
          id, tenant_id, provider, date, currency, expected_total, reported_total, discrepancy,
          resolution, resolution_note, created_at, updated_at
        )
        VALUES ($1, $2, $3, $4::date, $5, $6::bigint, $7::bigint, $8::bigint, $9, $10, $11::timestamptz, $12::timestamptz)
        ON CONFLICT (id) DO UPDATE
        SET expected_total = EXCLUDED.expected_total,
            reported_total = EXCLUDED.reported_total,
            discrepancy = EXCLUDED.discrepancy,
            resolution = EXCLUDED.resolution,
            resolution_note = EXCLUDED.resolution_note,
            updated_at = EXCLUDED.updated_at
      `,
      [
        record.id,
        record.tenant_id,
        record.provider,
        record.date,
        record.currency,
        record.expected_total,
        record.reported_total,
        record.discrepancy,
        record.resolution,
        record.resolution_note,
        record.created_at,
        record.updated_at,
      ],
    );
  }

  async getById(tenantId: string, id: string): Promise<ReconciliationRecord | null> {
    const result = await this.session.query<ReconciliationRow>(
      `SELECT ${COLUMNS} FROM settle_reconciliation_records WHERE tenant_id = $1 AND id = $2`,
      [tenantId, id],
    );
    const row = result.rows[0];
    return row ? mapRecord(row) : null;
  }

  async list(input: ReconciliationListInput): Promise<ReconciliationListResult> {
    const where = new WhereClause()
      .add("tenant_id", "=", input.tenantId)
      .add("provider", "=", input.provider)
      .add("resolution", "=", input.resolution)
      .add("date", ">=", input.dateFrom, "::date")
      .add("date", "<=", input.dateTo, "::date");
    const result = await this.session.query<ReconciliationRow>(
      `
        SELECT ${COLUMNS}
        FROM settle_reconciliation_records
        ${where.toSql()}
        ORDER BY date DESC, id ASC
      `,
      where.values,
    );
    return paginateByCursor(result.rows.map(mapRecord), input);
  }
}
