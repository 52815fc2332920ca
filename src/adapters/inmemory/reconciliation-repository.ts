import type { ReconciliationRecord } from "../../domain/types.js";
import type {
  ReconciliationListInput,
  ReconciliationListResult,
  ReconciliationRepositoryPort,
} from "../../ports/reconciliation-repository.js";
import { paginateByCursor } from "../pagination.js";

export class InMemoryReconciliationRepository implements ReconciliationRepositoryPort {
  private readonly records = new Map<string, ReconciliationRecord>();

  async save(record: ReconciliationRecord): Promise<void> {
    this.records.set(record.id, structuredClone(record));
  }

  async getById(tenantId: string, id: string): Promise<ReconciliationRecord | null> {
    const record = this.records.get(id);
    if (!record || record.tenant_id !== tenantId) {
      return null;
    }
    return structuredClone(record);
  }

  async list(input: ReconciliationListInput): Promise<ReconciliationListResult> {
    const items = [...this.records.values()]
      .filter((record) => {
        if (record.tenant_id !== input.tenantId) {
          return false;
        }
        if (input.provider && record.provider !== input.provider) {
          return false;
        }
        if (input.resolution && record.resolution !== input.resolution) {
          return false;
        }
        if (input.dateFrom && record.date < input.dateFrom) {
          return false;
        }
        if (input.dateTo && record.date > input.dateTo) {
          return false;
        }
        return true;
      })
      .sort((a, b) => {
        const byDate = b.date.localeCompare(a.date);
        return byDate !== 0 ? byDate : a.id.localeCompare(b.id);
      })
      .map((record) => structuredClone(record));
    return paginateByCursor(items, input);
  }
}
