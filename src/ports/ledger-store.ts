import type {
  LedgerEntryRecord,
  LedgerTransactionGroup,
  LedgerTransactionKind,
} from "../domain/types.js";

export interface LedgerEntryListInput {
  limit: number;
  cursor?: string;
  tenantId?: string;
  account?: string;
  transactionGroupId?: string;
  reference?: string;
  createdFrom?: string;
  createdTo?: string;
}

export interface LedgerEntryListResult {
  data: LedgerEntryRecord[];
  hasMore: boolean;
  nextCursor?: string;
}

export interface AccountTotalsInput {
  tenantId: string;
  account: string;
  asOf: string;
}

export interface AccountTotals {
  debits: number;
  credits: number;
}

export interface GroupTotals {
  transaction_group_id: string;
  debits: number;
  credits: number;
}

export interface LedgerStorePort {
  /**
   * Stores the group and all of its entries atomically. Rejects with
   * DuplicateReferenceError when the group id, or a group of the same kind
   * for the same reference, already exists.
   */
  insertTransaction(group: LedgerTransactionGroup, entries: LedgerEntryRecord[]): Promise<void>;
  hasTransaction(transactionGroupId: string): Promise<boolean>;
  findTransactionByReference(kind: LedgerTransactionKind, reference: string): Promise<LedgerTransactionGroup | null>;
  listEntries(input: LedgerEntryListInput): Promise<LedgerEntryListResult>;
  sumAccount(input: AccountTotalsInput): Promise<AccountTotals>;
  listGroupTotals(): Promise<GroupTotals[]>;
}
