export interface ProviderStatementLine {
  id: string;
  tenant_id: string;
  provider: string;
  date: string;
  currency: string;
  total: number;
  transaction_count: number;
  imported_at: string;
}

export interface ProviderStatementQuery {
  tenantId: string;
  provider: string;
  dateFrom: string;
  dateTo: string;
}

/** Settlement totals imported from provider statement exports. */
export interface ProviderStatementPort {
  saveLine(line: ProviderStatementLine): Promise<void>;
  listLines(query: ProviderStatementQuery): Promise<ProviderStatementLine[]>;
}
