import { randomUUID } from "node:crypto";
import { assertTransition } from "../domain/state-machine.js";
import type {
  NormalizedEventPayload,
  PaymentIntentPurpose,
  PaymentIntentRecord,
  PaymentIntentStatus,
  PaymentRecord,
  SettlementEvent,
  SettlementEventType,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { Logger } from "../infra/logger.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { PaymentRepositoryPort } from "../ports/payment-repository.js";
import { buildEvent, publishAll } from "./events.js";
import type { IdempotencyGuard } from "./idempotency-guard.js";
import { cashAccount, type LedgerLine, type LedgerService } from "./ledger.js";

export const TAX_ACCOUNT = "payable:tax";
const INTENT_LOCK_SCOPE = "payment_intent";

/** A final answer from the provider, whichever channel delivered it. */
export interface ProviderVerdict {
  outcome: "success" | "failure";
  source: "callback" | "status_query" | "reversal_response";
  amount?: number;
  failureReason?: string;
  receipt?: string;
  providerEventId?: string;
  /** Reference for intents that never went through `recordInitiation`. */
  providerReference?: string;
}

export interface SettlementResult {
  intent: PaymentIntentRecord;
  applied: boolean;
  conflict: boolean;
}

export interface SettlementWriterOptions {
  taxRateBasisPoints: number;
}

/** Tax-inclusive split: the part of `amount` owed as tax at the flat rate. */
export function taxPortion(amount: number, taxRateBasisPoints: number): number {
  if (taxRateBasisPoints <= 0) {
    return 0;
  }
  return Math.floor((amount * taxRateBasisPoints) / (10_000 + taxRateBasisPoints));
}

export function revenueAccount(purpose: PaymentIntentPurpose): string {
  return purpose === "renewal" || purpose === "dunning_retry" ? "revenue:subscriptions" : "revenue:sales";
}

export function settlementGroupId(intentId: string): string {
  return `ltx_settle_${intentId}`;
}

export function reversalGroupId(originalIntentId: string): string {
  return `ltx_rev_${originalIntentId}`;
}

function agreesWith(status: PaymentIntentStatus, outcome: ProviderVerdict["outcome"]): boolean {
  if (outcome === "success") {
    return status === "succeeded" || status === "reversed";
  }
  return status === "failed" || status === "expired" || status === "cancelled";
}

/**
 * Sole writer of payment intent status, payments and settlement ledger
 * groups. Every write happens under the intent's key lock, and events are
 * published only after the lock is released.
 */
export class SettlementWriter {
  private readonly logger: Logger;

  constructor(
    private readonly repository: PaymentRepositoryPort,
    private readonly ledger: LedgerService,
    private readonly guard: IdempotencyGuard,
    private readonly eventBus: EventBusPort,
    private readonly clock: ClockPort,
    logger: Logger,
    private readonly options: SettlementWriterOptions,
  ) {
    this.logger = logger.child({ component: "settlement" });
  }

  async recordInitiation(tenantId: string, intentId: string, providerReference: string): Promise<SettlementResult> {
    return this.locked(intentId, async (events) => {
      const intent = await this.getIntentOrThrow(tenantId, intentId);
      if (intent.status !== "created") {
        return { intent, applied: false, conflict: false };
      }
      const timestamp = this.clock.nowIso();
      this.transition(intent, "provider_initiated");
      intent.provider_reference = providerReference;
      intent.initiated_at = timestamp;
      await this.repository.savePaymentIntent(intent);
      await this.repository.savePayment({
        id: `pay_${randomUUID()}`,
        tenant_id: intent.tenant_id,
        intent_id: intent.id,
        provider: intent.provider,
        provider_reference: providerReference,
        provider_event_id: null,
        status: "pending",
        amount: intent.amount,
        currency: intent.currency,
        normalized_payload: null,
        created_at: timestamp,
        updated_at: timestamp,
      });
      events.push(this.intentEvent("payment_intent.provider_initiated", intent));
      return { intent, applied: true, conflict: false };
    });
  }

  /** created → failed when the provider refused or stayed unreachable during initiation. */
  async failBeforeInitiation(tenantId: string, intentId: string, reason: string): Promise<SettlementResult> {
    return this.locked(intentId, async (events) => {
      const intent = await this.getIntentOrThrow(tenantId, intentId);
      if (intent.status !== "created") {
        return { intent, applied: false, conflict: false };
      }
      this.transition(intent, "failed");
      intent.failure_reason = reason;
      await this.repository.savePaymentIntent(intent);
      events.push(this.intentEvent("payment_intent.failed", intent));
      return { intent, applied: true, conflict: false };
    });
  }

  /** Throws invalid_state_transition unless the intent is still `created`. */
  async cancel(tenantId: string, intentId: string, reason: string): Promise<SettlementResult> {
    return this.locked(intentId, async (events) => {
      const intent = await this.getIntentOrThrow(tenantId, intentId);
      this.transition(intent, "cancelled");
      intent.failure_reason = reason;
      await this.repository.savePaymentIntent(intent);
      events.push(this.intentEvent("payment_intent.cancelled", intent));
      return { intent, applied: true, conflict: false };
    });
  }

  async expire(tenantId: string, intentId: string): Promise<SettlementResult> {
    return this.locked(intentId, async (events) => {
      const intent = await this.getIntentOrThrow(tenantId, intentId);
      if (intent.status !== "provider_initiated") {
        return { intent, applied: false, conflict: false };
      }
      this.transition(intent, "expired");
      intent.failure_reason = "callback_timeout";
      await this.repository.savePaymentIntent(intent);
      const payment = await this.openPayment(intent);
      if (payment) {
        payment.status = "failed";
        payment.updated_at = intent.updated_at;
        await this.repository.savePayment(payment);
      }
      events.push(this.intentEvent("payment_intent.expired", intent));
      return { intent, applied: true, conflict: false };
    });
  }

  /**
   * Applies a final provider verdict. The first verdict wins; a later one
   * that disagrees is logged and emitted as an outcome conflict.
   */
  async applyOutcome(tenantId: string, intentId: string, verdict: ProviderVerdict): Promise<SettlementResult> {
    return this.locked(intentId, async (events) => {
      const intent = await this.getIntentOrThrow(tenantId, intentId);
      if (intent.status !== "provider_initiated" && !(intent.purpose === "reversal" && intent.status === "created")) {
        if (agreesWith(intent.status, verdict.outcome)) {
          return { intent, applied: false, conflict: false };
        }
        this.logger.warn(
          {
            tenant_id: tenantId,
            payment_intent_id: intent.id,
            current_status: intent.status,
            reported_outcome: verdict.outcome,
            source: verdict.source,
            provider_event_id: verdict.providerEventId ?? null,
          },
          "conflicting provider outcome discarded",
        );
        events.push(
          this.intentEvent("payment_intent.outcome_conflict", intent, {
            reported_outcome: verdict.outcome,
            source: verdict.source,
            provider_event_id: verdict.providerEventId ?? null,
          }),
        );
        return { intent, applied: false, conflict: true };
      }

      if (intent.purpose === "reversal" && intent.status === "created") {
        // Reversals answered synchronously skip the pending state.
        this.transition(intent, "provider_initiated");
        intent.initiated_at = this.clock.nowIso();
      }
      if (intent.provider_reference === null && verdict.providerReference) {
        intent.provider_reference = verdict.providerReference;
      }

      const payment = (await this.openPayment(intent)) ?? this.newPayment(intent);
      const timestamp = this.clock.nowIso();
      payment.provider_event_id = verdict.providerEventId ?? payment.provider_event_id;
      payment.normalized_payload = this.normalizedPayload(intent, payment, verdict);
      payment.updated_at = timestamp;

      if (verdict.outcome === "failure") {
        payment.status = "failed";
        await this.repository.savePayment(payment);
        this.transition(intent, "failed");
        intent.failure_reason = verdict.failureReason ?? "provider_declined";
        await this.repository.savePaymentIntent(intent);
        events.push(this.intentEvent("payment_intent.failed", intent));
        return { intent, applied: true, conflict: false };
      }

      if (verdict.amount !== undefined && verdict.amount !== intent.amount) {
        this.logger.warn(
          { tenant_id: tenantId, payment_intent_id: intent.id, expected: intent.amount, reported: verdict.amount },
          "provider reported a different amount",
        );
      }

      if (intent.purpose === "reversal") {
        await this.postReversal(intent, payment, events);
      } else {
        await this.postSettlement(intent, payment);
      }
      payment.status = "confirmed";
      await this.repository.savePayment(payment);
      this.transition(intent, "succeeded");
      intent.failure_reason = null;
      await this.repository.savePaymentIntent(intent);
      events.push(this.intentEvent("payment_intent.succeeded", intent));
      return { intent, applied: true, conflict: false };
    });
  }

  private async postSettlement(intent: PaymentIntentRecord, payment: PaymentRecord): Promise<void> {
    const groupId = settlementGroupId(intent.id);
    if (await this.ledger.hasTransaction(groupId)) {
      this.logger.info({ payment_intent_id: intent.id, transaction_group_id: groupId }, "settlement already posted");
      return;
    }
    const tax = taxPortion(intent.amount, this.options.taxRateBasisPoints);
    const lines: LedgerLine[] = [
      { account: cashAccount(intent.provider), direction: "debit", amount: intent.amount },
      { account: revenueAccount(intent.purpose), direction: "credit", amount: intent.amount - tax },
    ];
    if (tax > 0) {
      lines.push({ account: TAX_ACCOUNT, direction: "credit", amount: tax });
    }
    await this.ledger.append({
      id: groupId,
      tenantId: intent.tenant_id,
      kind: "settlement",
      reference: intent.id,
      entryReference: payment.id,
      description: `Settlement of ${intent.purpose} ${intent.id}`,
      currency: intent.currency,
      lines,
    });
  }

  /** Posts the reversing group and moves the original intent to `reversed`. */
  private async postReversal(
    reversal: PaymentIntentRecord,
    payment: PaymentRecord,
    events: SettlementEvent[],
  ): Promise<void> {
    const originalId = reversal.reverses_intent_id;
    if (!originalId) {
      throw new AppError(500, "reversal_without_original", `Reversal '${reversal.id}' has no original intent.`);
    }
    await this.guard.withLock(INTENT_LOCK_SCOPE, originalId, async () => {
      const original = await this.getIntentOrThrow(reversal.tenant_id, originalId);
      const groupId = reversalGroupId(original.id);
      if (!(await this.ledger.hasTransaction(groupId))) {
        const tax = taxPortion(reversal.amount, this.options.taxRateBasisPoints);
        const lines: LedgerLine[] = [
          { account: revenueAccount(original.purpose), direction: "debit", amount: reversal.amount - tax },
          { account: cashAccount(original.provider), direction: "credit", amount: reversal.amount },
        ];
        if (tax > 0) {
          lines.push({ account: TAX_ACCOUNT, direction: "debit", amount: tax });
        }
        await this.ledger.append({
          id: groupId,
          tenantId: original.tenant_id,
          kind: "reversal",
          reference: original.id,
          entryReference: payment.id,
          description: `Reversal of ${original.id}`,
          currency: original.currency,
          lines,
        });
      }

      if (original.status === "reversed") {
        return;
      }
      const timestamp = this.clock.nowIso();
      for (const originalPayment of await this.repository.listPaymentsByIntent(original.tenant_id, original.id)) {
        if (originalPayment.status === "confirmed") {
          originalPayment.status = "reversed";
          originalPayment.updated_at = timestamp;
          await this.repository.savePayment(originalPayment);
        }
      }
      this.transition(original, "reversed");
      await this.repository.savePaymentIntent(original);
      events.push(this.intentEvent("payment_intent.reversed", original, { reversal_intent_id: reversal.id }));
    });
  }

  private async locked<TOutput>(
    intentId: string,
    operation: (events: SettlementEvent[]) => Promise<TOutput>,
  ): Promise<TOutput> {
    const events: SettlementEvent[] = [];
    const result = await this.guard.withLock(INTENT_LOCK_SCOPE, intentId, () => operation(events));
    await publishAll(this.eventBus, events);
    return result;
  }

  private async getIntentOrThrow(tenantId: string, intentId: string): Promise<PaymentIntentRecord> {
    const intent = await this.repository.getPaymentIntentById(tenantId, intentId);
    if (!intent) {
      throw new AppError(404, "resource_not_found", `Payment intent '${intentId}' not found.`);
    }
    return intent;
  }

  private async openPayment(intent: PaymentIntentRecord): Promise<PaymentRecord | null> {
    const payments = await this.repository.listPaymentsByIntent(intent.tenant_id, intent.id);
    // A confirmed payment here means a crash landed between the payment and intent writes.
    return payments.find((payment) => payment.status === "pending" || payment.status === "confirmed") ?? null;
  }

  private newPayment(intent: PaymentIntentRecord): PaymentRecord {
    const timestamp = this.clock.nowIso();
    return {
      id: `pay_${randomUUID()}`,
      tenant_id: intent.tenant_id,
      intent_id: intent.id,
      provider: intent.provider,
      provider_reference: intent.provider_reference,
      provider_event_id: null,
      status: "pending",
      amount: intent.amount,
      currency: intent.currency,
      normalized_payload: null,
      created_at: timestamp,
      updated_at: timestamp,
    };
  }

  private normalizedPayload(
    intent: PaymentIntentRecord,
    payment: PaymentRecord,
    verdict: ProviderVerdict,
  ): NormalizedEventPayload {
    return {
      provider: intent.provider,
      provider_event_id: verdict.providerEventId ?? `${verdict.source}:${payment.id}`,
      provider_reference: intent.provider_reference ?? "",
      outcome: verdict.outcome,
      amount: verdict.amount ?? null,
      failure_reason: verdict.failureReason ?? null,
      receipt: verdict.receipt ?? null,
    };
  }

  private transition(intent: PaymentIntentRecord, next: PaymentIntentStatus): void {
    assertTransition(intent.status, next);
    intent.status = next;
    intent.updated_at = this.clock.nowIso();
  }

  private intentEvent(
    type: SettlementEventType,
    intent: PaymentIntentRecord,
    extra: Record<string, unknown> = {},
  ): SettlementEvent {
    return buildEvent(this.clock, type, intent.tenant_id, {
      payment_intent_id: intent.id,
      subject_id: intent.subject_id,
      subscription_id: intent.subscription_id,
      purpose: intent.purpose,
      amount: intent.amount,
      currency: intent.currency,
      provider: intent.provider,
      status: intent.status,
      failure_reason: intent.failure_reason,
      ...extra,
    });
  }
}
