import type { PgSession, SqlClient } from "./session.js";
import { DuplicateReferenceError } from "../../domain/errors.js";
import type {
  LedgerEntryRecord,
  LedgerTransactionGroup,
  LedgerTransactionKind,
} from "../../domain/types.js";
import type {
  AccountTotals,
  AccountTotalsInput,
  GroupTotals,
  LedgerEntryListInput,
  LedgerEntryListResult,
  LedgerStorePort,
} from "../../ports/ledger-store.js";
import { paginateByCursor } from "../pagination.js";
import { mapTimestamp, toNumber, WhereClause } from "./mapping.js";

const UNIQUE_VIOLATION = "23505";

interface LedgerEntryRow {
  id: string;
  transaction_group_id: string;
  tenant_id: string;
  account: string;
  direction: LedgerEntryRecord["direction"];
  amount: unknown;
  currency: string;
  reference: string;
  created_at: unknown;
}

interface LedgerGroupRow {
  id: string;
  tenant_id: string;
  kind: LedgerTransactionKind;
  reference: string;
  description: string;
  created_at: unknown;
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === UNIQUE_VIOLATION;
}

function mapGroup(row: LedgerGroupRow): LedgerTransactionGroup {
  return {
    id: row.id,
    tenant_id: row.tenant_id,
    kind: row.kind,
    reference: row.reference,
    description: row.description,
    created_at: mapTimestamp(row.created_at),
  };
}

export class PostgresLedgerStore implements LedgerStorePort {
  constructor(private readonly session: PgSession) {}

  async insertTransaction(group: LedgerTransactionGroup, entries: LedgerEntryRecord[]): Promise<void> {
    await this.session.withClient((client) => this.insertOn(client, group, entries));
  }

  private async insertOn(client: SqlClient, group: LedgerTransactionGroup, entries: LedgerEntryRecord[]): Promise<void> {
    try {
      await client.query("BEGIN");
      await client.query(
        `
          INSERT INTO settle_ledger_transactions (id, tenant_id, kind, reference, description, created_at)
          VALUES ($1, $2, $3, $4, $5, $6::timestamptz)
        `,
        [group.id, group.tenant_id, group.kind, group.reference, group.description, group.created_at],
      );
      for (const entry of entries) {
        await client.query(
          `
            INSERT INTO settle_ledger_entries (
              id,
              transaction_group_id,
              tenant_id,
              account,
              direction,
              amount,
              currency,
              reference,
              created_at
            )
            VALUES ($1, $2, $3, $4, $5, $6::bigint, $7, $8, $9::timestamptz)
          `,
          [
            entry.id,
            entry.transaction_group_id,
            entry.tenant_id,
            entry.account,
            entry.direction,
            entry.amount,
            entry.currency,
            entry.reference,
            entry.created_at,
          ],
        );
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      if (isUniqueViolation(error)) {
        throw new DuplicateReferenceError(
          group.id,
          `Ledger transaction '${group.id}' or a ${group.kind} for reference '${group.reference}' already exists.`,
        );
      }
      throw error;
    }
  }

  async hasTransaction(transactionGroupId: string): Promise<boolean> {
    const result = await this.session.query("SELECT 1 FROM settle_ledger_transactions WHERE id = $1", [
      transactionGroupId,
    ]);
    return result.rowCount !== null && result.rowCount > 0;
  }

  async findTransactionByReference(
    kind: LedgerTransactionKind,
    reference: string,
  ): Promise<LedgerTransactionGroup | null> {
    const result = await this.session.query<LedgerGroupRow>(
      `
        SELECT id, tenant_id, kind, reference, description, created_at
        FROM settle_ledger_transactions
        WHERE kind = $1 AND reference = $2
      `,
      [kind, reference],
    );
    const row = result.rows[0];
    return row ? mapGroup(row) : null;
  }

  async listEntries(input: LedgerEntryListInput): Promise<LedgerEntryListResult> {
    const where = new WhereClause()
      .add("tenant_id", "=", input.tenantId)
      .add("account", "=", input.account)
      .add("transaction_group_id", "=", input.transactionGroupId)
      .add("reference", "=", input.reference)
      .add("created_at", ">=", input.createdFrom, "::timestamptz")
      .add("created_at", "<=", input.createdTo, "::timestamptz");
    const result = await this.session.query<LedgerEntryRow>(
      `
        SELECT id, transaction_group_id, tenant_id, account, direction, amount, currency, reference, created_at
        FROM settle_ledger_entries
        ${where.toSql()}
        ORDER BY created_at ASC, id ASC
      `,
      where.values,
    );
    const items = result.rows.map((row) => ({
      id: row.id,
      transaction_group_id: row.transaction_group_id,
      tenant_id: row.tenant_id,
      account: row.account,
      direction: row.direction,
      amount: toNumber(row.amount, "amount"),
      currency: row.currency,
      reference: row.reference,
      created_at: mapTimestamp(row.created_at),
    }));
    return paginateByCursor(items, input);
  }

  async sumAccount(input: AccountTotalsInput): Promise<AccountTotals> {
    const result = await this.session.query<{ debits: unknown; credits: unknown }>(
      `
        SELECT
          COALESCE(SUM(amount) FILTER (WHERE direction = 'debit'), 0) AS debits,
          COALESCE(SUM(amount) FILTER (WHERE direction = 'credit'), 0) AS credits
        FROM settle_ledger_entries
        WHERE tenant_id = $1
          AND account = $2
          AND created_at <= $3::timestamptz
      `,
      [input.tenantId, input.account, input.asOf],
    );
    const row = result.rows[0];
    return {
      debits: toNumber(row?.debits ?? 0, "debits"),
      credits: toNumber(row?.credits ?? 0, "credits"),
    };
  }

  async listGroupTotals(): Promise<GroupTotals[]> {
    const result = await this.session.query<{ transaction_group_id: string; debits: unknown; credits: unknown }>(
      `
        SELECT
          t.id AS transaction_group_id,
          COALESCE(SUM(e.amount) FILTER (WHERE e.direction = 'debit'), 0) AS debits,
          COALESCE(SUM(e.amount) FILTER (WHERE e.direction = 'credit'), 0) AS credits
        FROM settle_ledger_transactions t
        LEFT JOIN settle_ledger_entries e ON e.transaction_group_id = t.id
        GROUP BY t.id
      `,
    );
    return result.rows.map((row) => ({
      transaction_group_id: row.transaction_group_id,
      debits: toNumber(row.debits, "debits"),
      credits: toNumber(row.credits, "credits"),
    }));
  }
}
