import { isUtcDate, previousUtcDate, utcDayBounds } from "../domain/billing-calendar.js";
import type { ReconciliationRecord } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { deterministicId } from "../infra/fingerprint.js";
import type { Logger } from "../infra/logger.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type {
  ReconciliationListInput,
  ReconciliationListResult,
  ReconciliationRepositoryPort,
} from "../ports/reconciliation-repository.js";
import { buildEvent } from "./events.js";
import { cashAccount, type LedgerService } from "./ledger.js";
import type { ProviderRegistry } from "./provider-registry.js";

export interface ReconciliationRunInput {
  tenantId: string;
  provider: string;
  date: string;
}

export interface ReconciliationBatchResult {
  date: string;
  records: ReconciliationRecord[];
  errors: number;
}

export interface ReconciliationSettings {
  currency: string;
  tenants: string[];
}

/**
 * Compares what the ledger says a provider collected on a UTC day with what
 * the provider reports. Discrepancies are recorded for operators and never
 * corrected automatically.
 */
export class ReconciliationJob {
  private readonly logger: Logger;

  constructor(
    private readonly ledger: LedgerService,
    private readonly providers: ProviderRegistry,
    private readonly repository: ReconciliationRepositoryPort,
    private readonly eventBus: EventBusPort,
    private readonly clock: ClockPort,
    logger: Logger,
    private readonly settings: ReconciliationSettings,
  ) {
    this.logger = logger.child({ component: "reconciliation" });
  }

  async run(input: ReconciliationRunInput): Promise<ReconciliationRecord> {
    if (!isUtcDate(input.date)) {
      throw new AppError(422, "invalid_date", `'${input.date}' is not a YYYY-MM-DD date.`);
    }
    const id = deterministicId("rec", input.tenantId, input.provider, input.date);
    const existing = await this.repository.getById(input.tenantId, id);
    if (existing?.resolution === "resolved") {
      this.logger.info({ reconciliation_id: id, date: input.date }, "reconciliation already resolved");
      return existing;
    }

    const bounds = utcDayBounds(input.date);
    const account = cashAccount(input.provider);
    const closing = await this.ledger.balanceOf({ tenantId: input.tenantId, account, asOf: bounds.end });
    const opening = await this.ledger.balanceOf({ tenantId: input.tenantId, account, asOf: bounds.before });
    const expectedTotal = closing - opening;
    const report = await this.providers.call(input.provider, (provider) =>
      provider.settlementReport({
        tenantId: input.tenantId,
        currency: this.settings.currency,
        from: bounds.start,
        to: bounds.end,
      }),
    );

    const timestamp = this.clock.nowIso();
    const discrepancy = expectedTotal - report.total;
    const record: ReconciliationRecord = {
      id,
      tenant_id: input.tenantId,
      provider: input.provider,
      date: input.date,
      currency: this.settings.currency,
      expected_total: expectedTotal,
      reported_total: report.total,
      discrepancy,
      resolution: discrepancy === 0 ? "matched" : "pending",
      resolution_note: null,
      created_at: existing?.created_at ?? timestamp,
      updated_at: timestamp,
    };
    await this.repository.save(record);

    if (discrepancy !== 0) {
      this.logger.warn(
        {
          tenant_id: input.tenantId,
          provider: input.provider,
          date: input.date,
          expected_total: expectedTotal,
          reported_total: report.total,
          discrepancy,
        },
        "settlement discrepancy",
      );
      await this.eventBus.publish(
        buildEvent(this.clock, "reconciliation.discrepancy", input.tenantId, {
          reconciliation_id: id,
          provider: input.provider,
          date: input.date,
          expected_total: expectedTotal,
          reported_total: report.total,
          discrepancy,
          currency: record.currency,
        }),
      );
    } else {
      this.logger.info({ tenant_id: input.tenantId, provider: input.provider, date: input.date }, "settlement matched");
    }
    return record;
  }

  /** Runs every configured tenant against every enabled provider; defaults to yesterday. */
  async runForDate(date: string = previousUtcDate(this.clock.nowIso())): Promise<ReconciliationBatchResult> {
    const records: ReconciliationRecord[] = [];
    let errors = 0;
    for (const tenantId of this.settings.tenants) {
      for (const provider of this.providers.names()) {
        try {
          records.push(await this.run({ tenantId, provider, date }));
        } catch (error) {
          errors += 1;
          this.logger.error(
            { tenant_id: tenantId, provider, date, err: error instanceof Error ? error.message : String(error) },
            "reconciliation run failed",
          );
        }
      }
    }
    return { date, records, errors };
  }

  async resolve(tenantId: string, recordId: string, note: string): Promise<ReconciliationRecord> {
    const record = await this.repository.getById(tenantId, recordId);
    if (!record) {
      throw new AppError(404, "resource_not_found", `Reconciliation record '${recordId}' not found.`);
    }
    if (record.resolution === "matched") {
      throw new AppError(409, "reconciliation_not_pending", `Reconciliation record '${recordId}' has no discrepancy.`);
    }
    if (record.resolution === "resolved") {
      return record;
    }
    record.resolution = "resolved";
    record.resolution_note = note;
    record.updated_at = this.clock.nowIso();
    await this.repository.save(record);
    this.logger.info({ tenant_id: tenantId, reconciliation_id: recordId }, "discrepancy resolved");
    return record;
  }

  async list(input: ReconciliationListInput): Promise<ReconciliationListResult> {
    return this.repository.list(input);
  }
}
