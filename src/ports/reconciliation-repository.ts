import type { ReconciliationRecord, ReconciliationResolution } from "../domain/types.js";

export interface ReconciliationListInput {
  tenantId: string;
  limit: number;
  cursor?: string;
  provider?: string;
  resolution?: ReconciliationResolution;
  dateFrom?: string;
  dateTo?: string;
}

export interface ReconciliationListResult {
  data: ReconciliationRecord[];
  hasMore: boolean;
  nextCursor?: string;
}

export interface ReconciliationRepositoryPort {
  save(record: ReconciliationRecord): Promise<void>;
  getById(tenantId: string, id: string): Promise<ReconciliationRecord | null>;
  list(input: ReconciliationListInput): Promise<ReconciliationListResult>;
}
