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
import { isWithinRange, paginateByCursor } from "../pagination.js";

export class InMemoryLedgerStore implements LedgerStorePort {
  private readonly groups = new Map<string, LedgerTransactionGroup>();
  private readonly groupsByReference = new Map<string, string>();
  private readonly entries: LedgerEntryRecord[] = [];

  async insertTransaction(group: LedgerTransactionGroup, entries: LedgerEntryRecord[]): Promise<void> {
    const referenceKey = `${group.kind}:${group.reference}`;
    if (this.groups.has(group.id)) {
      throw new DuplicateReferenceError(group.id, `Ledger transaction '${group.id}' already exists.`);
    }
    const existing = this.groupsByReference.get(referenceKey);
    if (existing) {
      throw new DuplicateReferenceError(
        group.id,
        `A ${group.kind} transaction for reference '${group.reference}' already exists as '${existing}'.`,
      );
    }
    // No await between the checks and the writes.
    this.groups.set(group.id, structuredClone(group));
    this.groupsByReference.set(referenceKey, group.id);
    for (const entry of entries) {
      this.entries.push(structuredClone(entry));
    }
  }

  async hasTransaction(transactionGroupId: string): Promise<boolean> {
    return this.groups.has(transactionGroupId);
  }

  async findTransactionByReference(
    kind: LedgerTransactionKind,
    reference: string,
  ): Promise<LedgerTransactionGroup | null> {
    const groupId = this.groupsByReference.get(`${kind}:${reference}`);
    const group = groupId ? this.groups.get(groupId) : undefined;
    return group ? structuredClone(group) : null;
  }

  async listEntries(input: LedgerEntryListInput): Promise<LedgerEntryListResult> {
    const items = this.entries
      .filter((entry) => {
        if (input.tenantId && entry.tenant_id !== input.tenantId) {
          return false;
        }
        if (input.account && entry.account !== input.account) {
          return false;
        }
        if (input.transactionGroupId && entry.transaction_group_id !== input.transactionGroupId) {
          return false;
        }
        if (input.reference && entry.reference !== input.reference) {
          return false;
        }
        return isWithinRange(entry.created_at, input.createdFrom, input.createdTo);
      })
      .sort((a, b) => {
        const byCreatedAt = a.created_at.localeCompare(b.created_at);
        return byCreatedAt !== 0 ? byCreatedAt : a.id.localeCompare(b.id);
      })
      .map((entry) => structuredClone(entry));
    return paginateByCursor(items, input);
  }

  async sumAccount(input: AccountTotalsInput): Promise<AccountTotals> {
    const asOfMs = Date.parse(input.asOf);
    const totals: AccountTotals = { debits: 0, credits: 0 };
    for (const entry of this.entries) {
      if (entry.tenant_id !== input.tenantId || entry.account !== input.account) {
        continue;
      }
      if (Date.parse(entry.created_at) > asOfMs) {
        continue;
      }
      if (entry.direction === "debit") {
        totals.debits += entry.amount;
      } else {
        totals.credits += entry.amount;
      }
    }
    return totals;
  }

  async listGroupTotals(): Promise<GroupTotals[]> {
    const totals = new Map<string, GroupTotals>();
    for (const groupId of this.groups.keys()) {
      totals.set(groupId, { transaction_group_id: groupId, debits: 0, credits: 0 });
    }
    for (const entry of this.entries) {
      const current = totals.get(entry.transaction_group_id) ?? {
        transaction_group_id: entry.transaction_group_id,
        debits: 0,
        credits: 0,
      };
      if (entry.direction === "debit") {
        current.debits += entry.amount;
      } else {
        current.credits += entry.amount;
      }
      totals.set(entry.transaction_group_id, current);
    }
    return [...totals.values()];
  }
}
