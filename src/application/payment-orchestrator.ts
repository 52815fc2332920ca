import { randomUUID } from "node:crypto";
import { addSeconds } from "../domain/billing-calendar.js";
import {
  isLedgerInvariantViolation,
  MalformedCallbackError,
  ProviderRejectedError,
  ProviderUnavailableError,
} from "../domain/errors.js";
import type {
  CreatePaymentIntentInput,
  PaymentIntentRecord,
  PaymentRecord,
  RefundPaymentIntentInput,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { RetryPolicyConfig } from "../infra/config.js";
import { fingerprintPayload } from "../infra/fingerprint.js";
import type { Logger } from "../infra/logger.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type {
  PaymentIntentListInput,
  PaymentIntentListResult,
  PaymentRepositoryPort,
} from "../ports/payment-repository.js";
import type { NormalizedEvent, StatusQueryResult } from "../ports/provider-gateway.js";
import { buildEvent } from "./events.js";
import type { IdempotencyGuard, IdempotentResult } from "./idempotency-guard.js";
import type { ProviderRegistry } from "./provider-registry.js";
import { realSleep, withProviderRetry, type Sleep } from "./retry-policy.js";
import type { ProviderVerdict, SettlementWriter } from "./settlement-writer.js";

export type CallbackOutcome =
  | "processed"
  | "duplicate"
  | "malformed"
  | "unknown_reference"
  | "invariant_violation";

export interface CallbackHandlingResult {
  outcome: CallbackOutcome;
  /** Whether the provider should be told the callback was received. */
  ackRequired: boolean;
  paymentIntentId?: string;
  status?: string;
}

export interface PaymentIntentDetails {
  intent: PaymentIntentRecord;
  payments: PaymentRecord[];
}

export interface ExpirySweepResult {
  scanned: number;
  succeeded: number;
  failed: number;
  expired: number;
  cancelled: number;
  errors: number;
}

export interface PaymentOrchestratorSettings {
  intentTtlSeconds: number;
  callbackTimeoutSeconds: number;
  callbackBaseUrl: string;
  retry: RetryPolicyConfig;
  sweepBatchSize?: number;
}

interface PaymentOrchestratorDeps {
  repository: PaymentRepositoryPort;
  guard: IdempotencyGuard;
  writer: SettlementWriter;
  providers: ProviderRegistry;
  eventBus: EventBusPort;
  clock: ClockPort;
  logger: Logger;
  settings: PaymentOrchestratorSettings;
  sleep?: Sleep;
}

const ACCOUNT_REFERENCE_PREFIX = "SET";

export class PaymentOrchestrator {
  private readonly repository: PaymentRepositoryPort;
  private readonly guard: IdempotencyGuard;
  private readonly writer: SettlementWriter;
  private readonly providers: ProviderRegistry;
  private readonly eventBus: EventBusPort;
  private readonly clock: ClockPort;
  private readonly logger: Logger;
  private readonly settings: PaymentOrchestratorSettings;
  private readonly sleep: Sleep;

  constructor(deps: PaymentOrchestratorDeps) {
    this.repository = deps.repository;
    this.guard = deps.guard;
    this.writer = deps.writer;
    this.providers = deps.providers;
    this.eventBus = deps.eventBus;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "payments" });
    this.settings = deps.settings;
    this.sleep = deps.sleep ?? realSleep;
  }

  async createPaymentIntent(
    input: CreatePaymentIntentInput,
    idempotencyKey: string,
  ): Promise<IdempotentResult<PaymentIntentRecord>> {
    this.providers.findByName(input.provider);
    const scope = `create_payment_intent:${input.tenant_id}`;
    const result = await this.guard.execute(scope, idempotencyKey, fingerprintPayload(input), async () => {
      const timestamp = this.clock.nowIso();
      const intent: PaymentIntentRecord = {
        id: `pi_${randomUUID()}`,
        tenant_id: input.tenant_id,
        subject_id: input.subject_id,
        subscription_id: input.subscription_id ?? null,
        purpose: input.purpose ?? "charge",
        reverses_intent_id: null,
        amount: input.amount,
        currency: input.currency.toUpperCase(),
        payer_msisdn: input.payer_msisdn,
        description: input.description ?? null,
        idempotency_key: idempotencyKey,
        status: "created",
        provider: input.provider,
        provider_reference: null,
        failure_reason: null,
        initiated_at: null,
        expires_at: addSeconds(timestamp, this.settings.intentTtlSeconds),
        created_at: timestamp,
        updated_at: timestamp,
      };
      await this.repository.savePaymentIntent(intent);
      await this.eventBus.publish(
        buildEvent(this.clock, "payment_intent.created", intent.tenant_id, {
          payment_intent_id: intent.id,
          subject_id: intent.subject_id,
          subscription_id: intent.subscription_id,
          purpose: intent.purpose,
          amount: intent.amount,
          currency: intent.currency,
          provider: intent.provider,
        }),
      );
      return intent;
    });
    return result.replayed ? { body: await this.latest(result.body), replayed: true } : result;
  }

  async getPaymentIntent(tenantId: string, intentId: string): Promise<PaymentIntentDetails> {
    const intent = await this.getIntentOrThrow(tenantId, intentId);
    const payments = await this.repository.listPaymentsByIntent(tenantId, intentId);
    return { intent, payments };
  }

  async listPaymentIntents(input: PaymentIntentListInput): Promise<PaymentIntentListResult> {
    return this.repository.listPaymentIntents(input);
  }

  /**
   * Asks the provider to collect. The reservation on the intent id means a
   * provider is asked at most once per intent, whoever calls.
   */
  async initiatePaymentIntent(tenantId: string, intentId: string): Promise<PaymentIntentRecord> {
    const scope = `initiate_payment_intent:${tenantId}`;
    const result = await this.guard.execute(scope, intentId, fingerprintPayload({ intentId }), async () => {
      const intent = await this.getIntentOrThrow(tenantId, intentId);
      if (intent.status !== "created") {
        return intent;
      }
      if (Date.parse(intent.expires_at) <= Date.parse(this.clock.nowIso())) {
        return (await this.writer.cancel(tenantId, intentId, "intent_expired")).intent;
      }

      let providerReference: string;
      try {
        const initiation = await withProviderRetry(
          this.settings.retry,
          () =>
            this.providers.call(intent.provider, (provider) =>
              provider.initiate({
                tenantId,
                intentId: intent.id,
                amount: intent.amount,
                currency: intent.currency,
                msisdn: intent.payer_msisdn,
                accountReference: accountReferenceFor(intent),
                description: intent.description ?? intent.purpose,
                callbackUrl: this.callbackUrl(intent.provider),
              }),
            ),
          this.sleep,
          {
            onRetry: (attempt, delayMs, error) => {
              this.logger.warn(
                { payment_intent_id: intent.id, provider: intent.provider, attempt, delay_ms: delayMs, err: error.message },
                "provider unavailable, retrying initiation",
              );
            },
          },
        );
        providerReference = initiation.providerReference;
      } catch (error) {
        if (error instanceof ProviderRejectedError) {
          this.logger.info(
            { payment_intent_id: intent.id, provider: intent.provider, reason: error.reason },
            "provider rejected initiation",
          );
          return (await this.writer.failBeforeInitiation(tenantId, intentId, error.reason)).intent;
        }
        if (error instanceof ProviderUnavailableError) {
          this.logger.warn({ payment_intent_id: intent.id, provider: intent.provider }, "provider unavailable");
          return (await this.writer.failBeforeInitiation(tenantId, intentId, "provider_unavailable")).intent;
        }
        throw error;
      }

      return (await this.writer.recordInitiation(tenantId, intentId, providerReference)).intent;
    });
    return result.replayed ? this.latest(result.body) : result.body;
  }

  async cancelPaymentIntent(tenantId: string, intentId: string): Promise<PaymentIntentRecord> {
    await this.getIntentOrThrow(tenantId, intentId);
    const { intent } = await this.writer.cancel(tenantId, intentId, "cancelled_by_operator");
    this.logger.info({ tenant_id: tenantId, payment_intent_id: intentId }, "payment intent cancelled");
    return intent;
  }

  /**
   * Settles a provider callback. Never throws for payloads the provider
   * should stop redelivering; infrastructure failures propagate so it retries.
   */
  async handleProviderCallback(providerName: string, rawPayload: unknown): Promise<CallbackHandlingResult> {
    if (!this.providers.has(providerName)) {
      throw new AppError(404, "unknown_provider", `Provider '${providerName}' is not configured.`);
    }
    const provider = this.providers.findByName(providerName);

    let event: NormalizedEvent;
    try {
      event = provider.parseCallback(rawPayload);
    } catch (error) {
      if (error instanceof MalformedCallbackError) {
        this.logger.warn({ provider: providerName, err: error.message }, "malformed provider callback");
        return { outcome: "malformed", ackRequired: true };
      }
      throw error;
    }

    const scope = `webhook:${providerName}`;
    try {
      const result = await this.guard.execute<CallbackHandlingResult>(
        scope,
        event.providerEventId,
        fingerprintPayload(event),
        async () => this.settleCallback(event),
        { shouldRecord: (body) => body.outcome !== "unknown_reference" },
      );
      return result.replayed ? { ...result.body, outcome: "duplicate" } : result.body;
    } catch (error) {
      if (error instanceof AppError && error.code === "idempotency_conflict") {
        this.logger.warn(
          { provider: providerName, provider_event_id: event.providerEventId },
          "callback redelivered with a different payload",
        );
        return { outcome: "duplicate", ackRequired: true };
      }
      if (isLedgerInvariantViolation(error)) {
        this.logger.fatal(
          { provider: providerName, provider_event_id: event.providerEventId, transaction_group_id: error.transactionGroupId, err: error.message },
          "ledger invariant violated while settling callback",
        );
        const intent = await this.repository.findPaymentIntentByProviderReference(providerName, event.providerReference);
        await this.eventBus.publish(
          buildEvent(this.clock, "ledger.invariant_violation", intent?.tenant_id ?? "unknown", {
            provider: providerName,
            provider_event_id: event.providerEventId,
            payment_intent_id: intent?.id ?? null,
            transaction_group_id: error.transactionGroupId,
            code: error.code,
          }),
        );
        return { outcome: "invariant_violation", ackRequired: true };
      }
      throw error;
    }
  }

  /** Queries the provider once for an intent still waiting on its callback. */
  async reconcileIntentStatus(tenantId: string, intentId: string): Promise<PaymentIntentRecord> {
    const intent = await this.getIntentOrThrow(tenantId, intentId);
    if (intent.status !== "provider_initiated" || !intent.provider_reference) {
      return intent;
    }
    const status = await this.queryProvider(intent, intent.provider_reference);
    if (status.outcome === "pending") {
      return intent;
    }
    return (await this.writer.applyOutcome(tenantId, intentId, this.verdictFrom(status, status.outcome))).intent;
  }

  /**
   * Finalizes overdue intents: one status query per initiated intent whose
   * callback never came, and cancellation of unstarted intents past expiry.
   */
  async expireStaleIntents(now: string = this.clock.nowIso()): Promise<ExpirySweepResult> {
    const due = await this.repository.listPaymentIntentsDueForExpiry({
      initiatedBefore: addSeconds(now, -this.settings.callbackTimeoutSeconds),
      expiresBefore: now,
      limit: this.settings.sweepBatchSize ?? 500,
    });
    const summary: ExpirySweepResult = { scanned: due.length, succeeded: 0, failed: 0, expired: 0, cancelled: 0, errors: 0 };

    for (const intent of due) {
      try {
        if (intent.status === "created") {
          const { applied } = await this.cancelIfStillCreated(intent);
          summary.cancelled += applied ? 1 : 0;
          continue;
        }
        const finalStatus = await this.finalizeOverdue(intent);
        if (finalStatus === "succeeded") {
          summary.succeeded += 1;
        } else if (finalStatus === "failed") {
          summary.failed += 1;
        } else if (finalStatus === "expired") {
          summary.expired += 1;
        }
      } catch (error) {
        summary.errors += 1;
        this.logger.error(
          { tenant_id: intent.tenant_id, payment_intent_id: intent.id, err: error instanceof Error ? error.message : String(error) },
          "expiry sweep failed for intent",
        );
      }
    }

    this.logger.info({ ...summary, now }, "expiry sweep finished");
    return summary;
  }

  /**
   * Reverses a settled payment through the provider. The reversal is its own
   * intent; on success the original moves to `reversed`.
   */
  async refundPaymentIntent(
    tenantId: string,
    intentId: string,
    input: RefundPaymentIntentInput,
    idempotencyKey: string,
  ): Promise<IdempotentResult<PaymentIntentRecord>> {
    const scope = `refund_payment_intent:${tenantId}`;
    const result = await this.guard.execute(
      scope,
      idempotencyKey,
      fingerprintPayload({ intentId, ...input }),
      async () => {
        const { original, reversal } = await this.guard.withLock("payment_intent", intentId, () =>
          this.createReversalIntent(tenantId, intentId, input, idempotencyKey),
        );
        await this.eventBus.publish(
          buildEvent(this.clock, "payment_intent.created", tenantId, {
            payment_intent_id: reversal.id,
            subject_id: reversal.subject_id,
            purpose: reversal.purpose,
            reverses_intent_id: reversal.reverses_intent_id,
            amount: reversal.amount,
            currency: reversal.currency,
            initiated_by: input.initiated_by,
          }),
        );
        return this.requestReversal(original, reversal, input.reason);
      },
    );
    return result.replayed ? { body: await this.latest(result.body), replayed: true } : result;
  }

  private async settleCallback(event: NormalizedEvent): Promise<CallbackHandlingResult> {
    const intent = await this.repository.findPaymentIntentByProviderReference(event.provider, event.providerReference);
    if (!intent) {
      this.logger.warn(
        { provider: event.provider, provider_reference: event.providerReference, provider_event_id: event.providerEventId },
        "callback for unknown provider reference",
      );
      return { outcome: "unknown_reference", ackRequired: true };
    }
    const settled = await this.writer.applyOutcome(intent.tenant_id, intent.id, {
      outcome: event.outcome,
      source: "callback",
      providerEventId: event.providerEventId,
      ...(event.amount !== undefined ? { amount: event.amount } : {}),
      ...(event.failureReason ? { failureReason: event.failureReason } : {}),
      ...(event.receipt ? { receipt: event.receipt } : {}),
    });
    return {
      outcome: "processed",
      ackRequired: true,
      paymentIntentId: settled.intent.id,
      status: settled.intent.status,
    };
  }

  private async cancelIfStillCreated(intent: PaymentIntentRecord): Promise<{ applied: boolean }> {
    try {
      const { applied } = await this.writer.cancel(intent.tenant_id, intent.id, "intent_expired");
      return { applied };
    } catch (error) {
      // Initiated or settled since it was listed.
      if (error instanceof AppError && error.code === "invalid_state_transition") {
        return { applied: false };
      }
      throw error;
    }
  }

  private async finalizeOverdue(intent: PaymentIntentRecord): Promise<string> {
    let status: StatusQueryResult = { outcome: "pending" };
    if (intent.provider_reference) {
      try {
        status = await this.queryProvider(intent, intent.provider_reference);
      } catch (error) {
        if (!(error instanceof ProviderUnavailableError) && !(error instanceof ProviderRejectedError)) {
          throw error;
        }
        this.logger.warn(
          { payment_intent_id: intent.id, provider: intent.provider, err: error.message },
          "status query failed, expiring intent",
        );
      }
    }
    if (status.outcome === "pending") {
      return (await this.writer.expire(intent.tenant_id, intent.id)).intent.status;
    }
    return (await this.writer.applyOutcome(intent.tenant_id, intent.id, this.verdictFrom(status, status.outcome))).intent.status;
  }

  private async queryProvider(intent: PaymentIntentRecord, providerReference: string): Promise<StatusQueryResult> {
    return this.providers.call(intent.provider, (provider) =>
      provider.queryStatus({
        tenantId: intent.tenant_id,
        providerReference,
        kind: intent.purpose === "reversal" ? "reversal" : "collection",
        callbackUrl: this.callbackUrl(intent.provider),
      }),
    );
  }

  private verdictFrom(status: StatusQueryResult, outcome: ProviderVerdict["outcome"]): ProviderVerdict {
    return {
      outcome,
      source: "status_query",
      ...(status.amount !== undefined ? { amount: status.amount } : {}),
      ...(status.failureReason ? { failureReason: status.failureReason } : {}),
      ...(status.receipt ? { receipt: status.receipt } : {}),
    };
  }

  private async createReversalIntent(
    tenantId: string,
    intentId: string,
    input: RefundPaymentIntentInput,
    idempotencyKey: string,
  ): Promise<{ original: PaymentIntentRecord; reversal: PaymentIntentRecord }> {
    const original = await this.getIntentOrThrow(tenantId, intentId);
    if (original.status !== "succeeded") {
      throw new AppError(
        409,
        "payment_intent_not_refundable",
        `Payment intent '${intentId}' is '${original.status}'; only succeeded intents can be refunded.`,
      );
    }
    const amount = input.amount ?? original.amount;
    if (amount > original.amount) {
      throw new AppError(422, "refund_exceeds_payment", `Refund ${amount} exceeds the settled amount ${original.amount}.`);
    }
    const reversals = await this.repository.listReversalIntents(tenantId, intentId);
    const open = reversals.find((reversal) => reversal.status !== "failed" && reversal.status !== "expired");
    if (open) {
      throw new AppError(409, "reversal_already_exists", `Payment intent '${intentId}' already has reversal '${open.id}'.`);
    }

    const timestamp = this.clock.nowIso();
    const reversal: PaymentIntentRecord = {
      id: `pi_${randomUUID()}`,
      tenant_id: tenantId,
      subject_id: original.subject_id,
      subscription_id: original.subscription_id,
      purpose: "reversal",
      reverses_intent_id: original.id,
      amount,
      currency: original.currency,
      payer_msisdn: original.payer_msisdn,
      description: input.reason,
      idempotency_key: reversalIdempotencyKey(original.id, idempotencyKey),
      status: "created",
      provider: original.provider,
      provider_reference: null,
      failure_reason: null,
      initiated_at: null,
      expires_at: addSeconds(timestamp, this.settings.intentTtlSeconds),
      created_at: timestamp,
      updated_at: timestamp,
    };
    await this.repository.savePaymentIntent(reversal);
    this.logger.info(
      { tenant_id: tenantId, payment_intent_id: original.id, reversal_intent_id: reversal.id, amount, initiated_by: input.initiated_by },
      "reversal requested",
    );
    return { original, reversal };
  }

  private async requestReversal(
    original: PaymentIntentRecord,
    reversal: PaymentIntentRecord,
    reason: string,
  ): Promise<PaymentIntentRecord> {
    const payments = await this.repository.listPaymentsByIntent(original.tenant_id, original.id);
    const settled = payments.find((payment) => payment.status === "confirmed");

    try {
      const response = await withProviderRetry(
        this.settings.retry,
        () =>
          this.providers.call(reversal.provider, (provider) =>
            provider.reverse({
              tenantId: reversal.tenant_id,
              reversalId: reversal.id,
              providerReference: original.provider_reference ?? "",
              receipt: settled?.normalized_payload?.receipt ?? null,
              amount: reversal.amount,
              currency: reversal.currency,
              reason,
              callbackUrl: this.callbackUrl(reversal.provider),
            }),
          ),
        this.sleep,
        {
          onRetry: (attempt, delayMs) => {
            this.logger.warn(
              { reversal_intent_id: reversal.id, provider: reversal.provider, attempt, delay_ms: delayMs },
              "provider unavailable, retrying reversal",
            );
          },
        },
      );
      if (response.outcome === "pending") {
        return (await this.writer.recordInitiation(reversal.tenant_id, reversal.id, response.reference)).intent;
      }
      const settledReversal = await this.writer.applyOutcome(reversal.tenant_id, reversal.id, {
        outcome: response.outcome,
        source: "reversal_response",
        providerReference: response.reference,
        ...(response.failureReason ? { failureReason: response.failureReason } : {}),
      });
      return settledReversal.intent;
    } catch (error) {
      if (error instanceof ProviderRejectedError) {
        return (await this.writer.failBeforeInitiation(reversal.tenant_id, reversal.id, error.reason)).intent;
      }
      if (error instanceof ProviderUnavailableError) {
        return (await this.writer.failBeforeInitiation(reversal.tenant_id, reversal.id, "provider_unavailable")).intent;
      }
      throw error;
    }
  }

  private callbackUrl(provider: string): string {
    return `${this.settings.callbackBaseUrl}/webhooks/${provider}`;
  }

  private async latest(intent: PaymentIntentRecord): Promise<PaymentIntentRecord> {
    return (await this.repository.getPaymentIntentById(intent.tenant_id, intent.id)) ?? intent;
  }

  private async getIntentOrThrow(tenantId: string, intentId: string): Promise<PaymentIntentRecord> {
    const intent = await this.repository.getPaymentIntentById(tenantId, intentId);
    if (!intent) {
      throw new AppError(404, "resource_not_found", `Payment intent '${intentId}' not found.`);
    }
    return intent;
  }
}

/** Short customer-visible reference; M-Pesa truncates past 12 characters. */
function accountReferenceFor(intent: PaymentIntentRecord): string {
  return `${ACCOUNT_REFERENCE_PREFIX}${intent.id.replace(/^pi_/, "").replace(/-/g, "").slice(0, 9).toUpperCase()}`;
}

/** Refund keys live in their own scope; namespacing keeps one intent per stored key. */
export function reversalIdempotencyKey(originalIntentId: string, idempotencyKey: string): string {
  return `refund:${originalIntentId}:${idempotencyKey}`;
}
