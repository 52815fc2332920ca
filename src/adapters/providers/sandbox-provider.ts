import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  MalformedCallbackError,
  ProviderRejectedError,
  ProviderUnavailableError,
} from "../../domain/errors.js";
import type { ProviderMode } from "../../domain/types.js";
import type {
  InitiateCollectionInput,
  InitiateCollectionResult,
  NormalizedEvent,
  ProviderAdapterPort,
  ReverseInput,
  ReverseResult,
  SettlementReport,
  SettlementReportInput,
  StatusQueryInput,
  StatusQueryResult,
} from "../../ports/provider-gateway.js";

const sandboxCallbackSchema = z.object({
  event_id: z.string().min(1),
  reference: z.string().min(1),
  status: z.enum(["success", "failure"]),
  amount: z.number().int().positive().optional(),
  failure_reason: z.string().min(1).optional(),
  receipt: z.string().min(1).optional(),
});

export type SandboxCallback = z.infer<typeof sandboxCallbackSchema>;

interface SandboxProviderOptions {
  name?: string;
  mode?: ProviderMode;
  referenceFactory?: () => string;
}

/**
 * Deterministic in-process provider. Subscriber numbers ending in 0000 are
 * rejected and numbers ending in 9999 make the provider unreachable.
 */
export class SandboxProvider implements ProviderAdapterPort {
  public readonly name: string;
  public readonly mode: ProviderMode;
  private readonly referenceFactory: () => string;
  private readonly statuses = new Map<string, StatusQueryResult>();
  private readonly reversalOutcomes = new Map<string, ReverseResult>();
  private readonly settlementTotals = new Map<string, SettlementReport>();
  private readonly initiations: InitiateCollectionInput[] = [];
  private readonly reversals: ReverseInput[] = [];
  private unavailable = false;

  constructor(options: SandboxProviderOptions = {}) {
    this.name = options.name ?? "sandbox";
    this.mode = options.mode ?? "push";
    this.referenceFactory = options.referenceFactory ?? (() => `sbx_${randomUUID()}`);
  }

  async initiate(input: InitiateCollectionInput): Promise<InitiateCollectionResult> {
    this.assertReachable();
    if (input.msisdn.endsWith("9999")) {
      throw new ProviderUnavailableError(this.name, "Sandbox subscriber network is unreachable.");
    }
    if (input.msisdn.endsWith("0000")) {
      throw new ProviderRejectedError(this.name, "invalid_subscriber", "Sandbox rejected the subscriber number.");
    }
    this.initiations.push(input);
    return { providerReference: this.referenceFactory() };
  }

  parseCallback(rawPayload: unknown): NormalizedEvent {
    const parsed = sandboxCallbackSchema.safeParse(rawPayload);
    if (!parsed.success) {
      throw new MalformedCallbackError(this.name, `Invalid sandbox callback: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    const callback = parsed.data;
    return {
      provider: this.name,
      providerEventId: callback.event_id,
      providerReference: callback.reference,
      outcome: callback.status,
      ...(callback.amount !== undefined ? { amount: callback.amount } : {}),
      ...(callback.failure_reason ? { failureReason: callback.failure_reason } : {}),
      ...(callback.receipt ? { receipt: callback.receipt } : {}),
    };
  }

  async queryStatus(input: StatusQueryInput): Promise<StatusQueryResult> {
    this.assertReachable();
    return this.statuses.get(input.providerReference) ?? { outcome: "pending" };
  }

  async reverse(input: ReverseInput): Promise<ReverseResult> {
    this.assertReachable();
    this.reversals.push(input);
    return this.reversalOutcomes.get(input.providerReference) ?? {
      outcome: "success",
      reference: `sbx_rev_${input.reversalId}`,
    };
  }

  async settlementReport(input: SettlementReportInput): Promise<SettlementReport> {
    this.assertReachable();
    return this.settlementTotals.get(`${input.tenantId}:${input.from.slice(0, 10)}`) ?? { total: 0, count: 0 };
  }

  setStatus(providerReference: string, result: StatusQueryResult): void {
    this.statuses.set(providerReference, result);
  }

  setReversalOutcome(providerReference: string, result: ReverseResult): void {
    this.reversalOutcomes.set(providerReference, result);
  }

  setSettlementTotal(tenantId: string, date: string, report: SettlementReport): void {
    this.settlementTotals.set(`${tenantId}:${date}`, report);
  }

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  getInitiations(): InitiateCollectionInput[] {
    return [...this.initiations];
  }

  getReversals(): ReverseInput[] {
    return [...this.reversals];
  }

  private assertReachable(): void {
    if (this.unavailable) {
      throw new ProviderUnavailableError(this.name, "Sandbox provider is unavailable.");
    }
  }
}
