import { randomUUID } from "node:crypto";
import { UnbalancedTransactionError } from "../domain/errors.js";
import type {
  LedgerDirection,
  LedgerEntryRecord,
  LedgerTransactionGroup,
  LedgerTransactionKind,
} from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type {
  GroupTotals,
  LedgerEntryListInput,
  LedgerEntryListResult,
  LedgerStorePort,
} from "../ports/ledger-store.js";

export interface LedgerLine {
  account: string;
  direction: LedgerDirection;
  amount: number;
}

export interface AppendTransactionInput {
  id: string;
  tenantId: string;
  kind: LedgerTransactionKind;
  reference: string;
  /** Reference stamped on each entry; defaults to the group reference. */
  entryReference?: string;
  description: string;
  currency: string;
  lines: LedgerLine[];
}

export interface LedgerPosting {
  group: LedgerTransactionGroup;
  entries: LedgerEntryRecord[];
}

export interface BalanceQuery {
  tenantId: string;
  account: string;
  asOf?: string;
}

const DEBIT_NORMAL_PREFIXES = ["cash:", "receivable:", "expense:"];

export function normalSide(account: string): LedgerDirection {
  return DEBIT_NORMAL_PREFIXES.some((prefix) => account.startsWith(prefix)) ? "debit" : "credit";
}

export function cashAccount(provider: string): string {
  return `cash:${provider}`;
}

/**
 * Append-only double-entry journal. Corrections are new groups that
 * reference the original; nothing here updates or deletes an entry.
 */
export class LedgerService {
  constructor(
    private readonly store: LedgerStorePort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async append(input: AppendTransactionInput): Promise<LedgerPosting> {
    this.assertBalanced(input);
    const timestamp = this.clock.nowIso();
    const group: LedgerTransactionGroup = {
      id: input.id,
      tenant_id: input.tenantId,
      kind: input.kind,
      reference: input.reference,
      description: input.description,
      created_at: timestamp,
    };
    const entries: LedgerEntryRecord[] = input.lines.map((line) => ({
      id: `le_${randomUUID()}`,
      transaction_group_id: group.id,
      tenant_id: input.tenantId,
      account: line.account,
      direction: line.direction,
      amount: line.amount,
      currency: input.currency,
      reference: input.entryReference ?? input.reference,
      created_at: timestamp,
    }));

    await this.store.insertTransaction(group, entries);
    this.logger.info(
      { transaction_group_id: group.id, kind: group.kind, reference: group.reference, tenant_id: group.tenant_id },
      "ledger transaction posted",
    );
    return { group, entries };
  }

  async hasTransaction(transactionGroupId: string): Promise<boolean> {
    return this.store.hasTransaction(transactionGroupId);
  }

  async balanceOf(query: BalanceQuery): Promise<number> {
    const totals = await this.store.sumAccount({
      tenantId: query.tenantId,
      account: query.account,
      asOf: query.asOf ?? this.clock.nowIso(),
    });
    return normalSide(query.account) === "debit"
      ? totals.debits - totals.credits
      : totals.credits - totals.debits;
  }

  async listEntries(input: LedgerEntryListInput): Promise<LedgerEntryListResult> {
    return this.store.listEntries(input);
  }

  /** Returns every transaction group whose debits and credits differ. */
  async verifyIntegrity(): Promise<GroupTotals[]> {
    const totals = await this.store.listGroupTotals();
    return totals.filter((group) => group.debits !== group.credits || group.debits === 0);
  }

  private assertBalanced(input: AppendTransactionInput): void {
    if (input.lines.length < 2) {
      throw new UnbalancedTransactionError(input.id, `Transaction '${input.id}' needs at least two entries.`);
    }
    let debits = 0;
    let credits = 0;
    for (const line of input.lines) {
      if (!Number.isSafeInteger(line.amount) || line.amount <= 0) {
        throw new UnbalancedTransactionError(
          input.id,
          `Transaction '${input.id}' has a non-positive or fractional amount on '${line.account}'.`,
        );
      }
      if (line.account.trim().length === 0) {
        throw new UnbalancedTransactionError(input.id, `Transaction '${input.id}' has an entry without an account.`);
      }
      if (line.direction === "debit") {
        debits += line.amount;
      } else {
        credits += line.amount;
      }
    }
    if (debits !== credits) {
      throw new UnbalancedTransactionError(
        input.id,
        `Transaction '${input.id}' is unbalanced: debits ${debits} != credits ${credits}.`,
      );
    }
  }
}
