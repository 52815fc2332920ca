import { randomUUID } from "node:crypto";
import { z } from "zod";
import { addDays, addInterval, isOnOrBefore } from "../domain/billing-calendar.js";
import { isTerminalStatus } from "../domain/state-machine.js";
import { assertSubscriptionTransition } from "../domain/subscription-state-machine.js";
import type {
  CreateSubscriptionInput,
  DunningAttempt,
  DunningScheduleRecord,
  PaymentIntentRecord,
  SettlementEvent,
  SettlementEventType,
  SubscriptionRecord,
  SubscriptionStatus,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { DowngradePolicy } from "../infra/config.js";
import { deterministicId, fingerprintPayload } from "../infra/fingerprint.js";
import type { Logger } from "../infra/logger.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { SubscriptionRepositoryPort } from "../ports/subscription-repository.js";
import { buildEvent, publishAll } from "./events.js";
import type { IdempotencyGuard, IdempotentResult } from "./idempotency-guard.js";
import type { PaymentOrchestrator } from "./payment-orchestrator.js";
import type { ProviderRegistry } from "./provider-registry.js";

const SUBSCRIPTION_LOCK_SCOPE = "subscription";

const intentOutcomeSchema = z.object({
  payment_intent_id: z.string(),
  subscription_id: z.string().nullable(),
  purpose: z.enum(["renewal", "dunning_retry"]),
});

const OUTCOME_EVENTS: ReadonlySet<SettlementEventType> = new Set([
  "payment_intent.succeeded",
  "payment_intent.failed",
  "payment_intent.expired",
  "payment_intent.cancelled",
]);

export interface SubscriptionEngineSettings {
  dunningOffsetsDays: number[];
  dunningGraceDays: number;
  downgradePolicy: DowngradePolicy;
  defaultDowngradePlanId?: string;
  sweepBatchSize?: number;
}

interface SubscriptionEngineDeps {
  repository: SubscriptionRepositoryPort;
  payments: PaymentOrchestrator;
  providers: ProviderRegistry;
  guard: IdempotencyGuard;
  eventBus: EventBusPort;
  clock: ClockPort;
  logger: Logger;
  settings: SubscriptionEngineSettings;
}

export interface RenewalSweepResult {
  scanned: number;
  initiated: number;
  cancelled: number;
  skipped: number;
  errors: number;
}

export interface DunningSweepResult {
  scanned: number;
  attempted: number;
  recovered: number;
  exhausted: number;
  waiting: number;
  errors: number;
}

export interface CancelSubscriptionOptions {
  atPeriodEnd?: boolean;
}

/** Work decided under the subscription lock and carried out after it is released. */
interface LockedStep<TKind extends string> {
  kind: TKind;
  intent?: PaymentIntentRecord;
}

/**
 * Recurring billing: renewals, dunning and the grace deadline. Provider
 * calls are always made after the subscription lock is released.
 */
export class SubscriptionEngine {
  private readonly repository: SubscriptionRepositoryPort;
  private readonly payments: PaymentOrchestrator;
  private readonly providers: ProviderRegistry;
  private readonly guard: IdempotencyGuard;
  private readonly eventBus: EventBusPort;
  private readonly clock: ClockPort;
  private readonly logger: Logger;
  private readonly settings: SubscriptionEngineSettings;

  constructor(deps: SubscriptionEngineDeps) {
    this.repository = deps.repository;
    this.payments = deps.payments;
    this.providers = deps.providers;
    this.guard = deps.guard;
    this.eventBus = deps.eventBus;
    this.clock = deps.clock;
    this.logger = deps.logger.child({ component: "subscriptions" });
    this.settings = deps.settings;
  }

  /** Wires the engine to payment outcomes. */
  attach(): void {
    this.eventBus.subscribe((event) => this.handleEvent(event));
  }

  async createSubscription(
    input: CreateSubscriptionInput,
    idempotencyKey: string,
  ): Promise<IdempotentResult<SubscriptionRecord>> {
    this.providers.findByName(input.provider);
    const scope = `create_subscription:${input.tenant_id}`;
    const result = await this.guard.execute(scope, idempotencyKey, fingerprintPayload(input), async () => {
      const timestamp = this.clock.nowIso();
      const periodStart = input.period_start ?? timestamp;
      const periodEnd = addInterval(periodStart, input.interval);
      const downgradePlanId = input.downgrade_plan_id
        ?? (this.settings.downgradePolicy === "downgrade_to_free" ? this.settings.defaultDowngradePlanId : undefined);
      const subscription: SubscriptionRecord = {
        id: `sub_${randomUUID()}`,
        tenant_id: input.tenant_id,
        subject_id: input.subject_id,
        plan_id: input.plan_id,
        interval: input.interval,
        amount: input.amount,
        currency: input.currency.toUpperCase(),
        provider: input.provider,
        payer_msisdn: input.payer_msisdn,
        status: "active",
        current_period_start: periodStart,
        current_period_end: periodEnd,
        next_renewal_at: periodEnd,
        downgrade_plan_id: downgradePlanId ?? null,
        cancel_at_period_end: false,
        renewal_intent_id: null,
        last_settled_intent_id: null,
        cancelled_at: null,
        created_at: timestamp,
        updated_at: timestamp,
      };
      await this.repository.saveSubscription(subscription);
      await this.eventBus.publish(this.subscriptionEvent("subscription.created", subscription));
      return subscription;
    });
    if (!result.replayed) {
      return result;
    }
    const current = await this.repository.getSubscriptionById(result.body.tenant_id, result.body.id);
    return { body: current ?? result.body, replayed: true };
  }

  async getSubscription(tenantId: string, subscriptionId: string): Promise<SubscriptionRecord> {
    const subscription = await this.repository.getSubscriptionById(tenantId, subscriptionId);
    if (!subscription) {
      throw new AppError(404, "resource_not_found", `Subscription '${subscriptionId}' not found.`);
    }
    return subscription;
  }

  async listDunning(tenantId: string, subscriptionId: string): Promise<DunningScheduleRecord[]> {
    await this.getSubscription(tenantId, subscriptionId);
    return this.repository.listDunningSchedules(tenantId, subscriptionId);
  }

  async cancelSubscription(
    tenantId: string,
    subscriptionId: string,
    options: CancelSubscriptionOptions = {},
  ): Promise<SubscriptionRecord> {
    return this.locked(subscriptionId, async (events) => {
      const subscription = await this.getSubscription(tenantId, subscriptionId);
      if (options.atPeriodEnd && subscription.status === "active") {
        subscription.cancel_at_period_end = true;
        subscription.updated_at = this.clock.nowIso();
        await this.repository.saveSubscription(subscription);
        this.logger.info({ tenant_id: tenantId, subscription_id: subscriptionId }, "cancellation scheduled for period end");
        return subscription;
      }
      const schedule = await this.repository.getOpenDunningSchedule(tenantId, subscriptionId);
      if (schedule) {
        await this.closeSchedule(schedule, "exhausted");
      }
      this.cancel(subscription, "operator", events);
      await this.repository.saveSubscription(subscription);
      return subscription;
    });
  }

  /** Creates and initiates the renewal charge of every subscription whose period has ended. */
  async processDueRenewals(now: string = this.clock.nowIso()): Promise<RenewalSweepResult> {
    const due = await this.repository.listDueForRenewal(now, this.settings.sweepBatchSize ?? 500);
    const summary: RenewalSweepResult = { scanned: due.length, initiated: 0, cancelled: 0, skipped: 0, errors: 0 };

    for (const candidate of due) {
      try {
        const step = await this.locked(candidate.id, (events) => this.prepareRenewal(candidate, now, events));
        if (step.kind === "initiate" && step.intent) {
          await this.payments.initiatePaymentIntent(step.intent.tenant_id, step.intent.id);
          summary.initiated += 1;
        } else if (step.kind === "cancelled") {
          summary.cancelled += 1;
        } else {
          summary.skipped += 1;
        }
      } catch (error) {
        summary.errors += 1;
        this.logger.error(
          { tenant_id: candidate.tenant_id, subscription_id: candidate.id, err: errorMessage(error) },
          "renewal failed for subscription",
        );
      }
    }

    this.logger.info({ ...summary, now }, "renewal sweep finished");
    return summary;
  }

  /**
   * Advances every open dunning schedule: fires the next due attempt, or at
   * the grace deadline moves the subscription to unpaid and resolves it.
   */
  async processDunning(now: string = this.clock.nowIso()): Promise<DunningSweepResult> {
    const open = await this.repository.listOpenDunningSchedules(this.settings.sweepBatchSize ?? 500);
    const summary: DunningSweepResult = { scanned: open.length, attempted: 0, recovered: 0, exhausted: 0, waiting: 0, errors: 0 };

    for (const candidate of open) {
      try {
        const step = await this.locked(candidate.subscription_id, (events) => this.advanceDunning(candidate, now, events));
        if (step.kind === "attempt" && step.intent) {
          await this.payments.initiatePaymentIntent(step.intent.tenant_id, step.intent.id);
          summary.attempted += 1;
        } else if (step.kind === "recovered") {
          summary.recovered += 1;
        } else if (step.kind === "exhausted") {
          summary.exhausted += 1;
        } else {
          summary.waiting += 1;
        }
      } catch (error) {
        summary.errors += 1;
        this.logger.error(
          { tenant_id: candidate.tenant_id, dunning_schedule_id: candidate.id, err: errorMessage(error) },
          "dunning step failed",
        );
      }
    }

    this.logger.info({ ...summary, now }, "dunning sweep finished");
    return summary;
  }

  async handleEvent(event: SettlementEvent): Promise<void> {
    if (!OUTCOME_EVENTS.has(event.type)) {
      return;
    }
    const parsed = intentOutcomeSchema.safeParse(event.data);
    if (!parsed.success || !parsed.data.subscription_id) {
      return;
    }
    const { subscription_id: subscriptionId, payment_intent_id: intentId } = parsed.data;
    await this.locked(subscriptionId, async (events) => {
      const subscription = await this.repository.getSubscriptionById(event.tenant_id, subscriptionId);
      if (!subscription) {
        return;
      }
      const { intent } = await this.payments.getPaymentIntent(event.tenant_id, intentId);
      const schedule = await this.repository.getOpenDunningSchedule(event.tenant_id, subscriptionId);
      await this.applyIntentOutcome(subscription, schedule, intent, events);
    });
  }

  private async prepareRenewal(
    candidate: SubscriptionRecord,
    now: string,
    events: SettlementEvent[],
  ): Promise<LockedStep<"initiate" | "cancelled" | "skip">> {
    const subscription = await this.repository.getSubscriptionById(candidate.tenant_id, candidate.id);
    if (
      !subscription
      || subscription.status !== "active"
      || subscription.next_renewal_at === null
      || !isOnOrBefore(subscription.next_renewal_at, now)
    ) {
      return { kind: "skip" };
    }

    if (subscription.renewal_intent_id) {
      const { intent } = await this.payments.getPaymentIntent(subscription.tenant_id, subscription.renewal_intent_id);
      if (!isTerminalStatus(intent.status)) {
        return { kind: "skip" };
      }
      // The outcome event was missed; settle the subscription from the intent itself.
      await this.applyIntentOutcome(subscription, null, intent, events);
      return { kind: "skip" };
    }

    if (subscription.cancel_at_period_end) {
      this.cancel(subscription, "period_end", events);
      await this.repository.saveSubscription(subscription);
      return { kind: "cancelled" };
    }

    const { body: intent } = await this.payments.createPaymentIntent(
      {
        tenant_id: subscription.tenant_id,
        subject_id: subscription.subject_id,
        amount: subscription.amount,
        currency: subscription.currency,
        provider: subscription.provider,
        payer_msisdn: subscription.payer_msisdn,
        description: `Renewal ${subscription.plan_id}`,
        subscription_id: subscription.id,
        purpose: "renewal",
      },
      `renewal:${subscription.id}:${subscription.current_period_end}`,
    );
    if (isTerminalStatus(intent.status)) {
      // A previous run already charged this period and its outcome was missed.
      await this.applyIntentOutcome(subscription, null, intent, events);
      return { kind: "skip" };
    }
    subscription.renewal_intent_id = intent.id;
    subscription.updated_at = this.clock.nowIso();
    await this.repository.saveSubscription(subscription);
    return intent.status === "created" ? { kind: "initiate", intent } : { kind: "skip" };
  }

  private async advanceDunning(
    candidate: DunningScheduleRecord,
    now: string,
    events: SettlementEvent[],
  ): Promise<LockedStep<"attempt" | "recovered" | "exhausted" | "wait">> {
    const subscription = await this.repository.getSubscriptionById(candidate.tenant_id, candidate.subscription_id);
    let schedule = await this.repository.getOpenDunningSchedule(candidate.tenant_id, candidate.subscription_id);
    if (!subscription || !schedule || schedule.id !== candidate.id) {
      return { kind: "wait" };
    }
    if (subscription.status !== "past_due") {
      await this.closeSchedule(schedule, subscription.status === "active" ? "recovered" : "exhausted");
      return { kind: "wait" };
    }

    for (const attempt of schedule.attempts) {
      if (attempt.status !== "sent" || !attempt.payment_intent_id) {
        continue;
      }
      const { intent } = await this.payments.getPaymentIntent(schedule.tenant_id, attempt.payment_intent_id);
      if (isTerminalStatus(intent.status)) {
        await this.applyIntentOutcome(subscription, schedule, intent, events);
      }
    }
    if (subscription.status === "active") {
      return { kind: "recovered" };
    }
    schedule = await this.repository.getOpenDunningSchedule(candidate.tenant_id, candidate.subscription_id);
    if (!schedule) {
      return { kind: "wait" };
    }

    const inFlight = schedule.attempts.some((attempt) => attempt.status === "sent");
    if (inFlight) {
      return { kind: "wait" };
    }

    if (isOnOrBefore(schedule.grace_deadline, now)) {
      await this.exhaust(subscription, schedule, events);
      return { kind: "exhausted" };
    }

    const next = schedule.attempts
      .filter((attempt) => attempt.status === "pending")
      .sort((a, b) => a.sequence - b.sequence)[0];
    if (!next || !isOnOrBefore(next.scheduled_at, now)) {
      return { kind: "wait" };
    }

    const { body: intent } = await this.payments.createPaymentIntent(
      {
        tenant_id: subscription.tenant_id,
        subject_id: subscription.subject_id,
        amount: subscription.amount,
        currency: subscription.currency,
        provider: subscription.provider,
        payer_msisdn: subscription.payer_msisdn,
        description: `Retry ${next.sequence} ${subscription.plan_id}`,
        subscription_id: subscription.id,
        purpose: "dunning_retry",
      },
      `dunning:${schedule.id}:${next.sequence}`,
    );
    next.status = "sent";
    next.payment_intent_id = intent.id;
    next.attempted_at = this.clock.nowIso();
    schedule.updated_at = next.attempted_at;
    await this.repository.saveDunningSchedule(schedule);
    events.push(
      this.subscriptionEvent("subscription.dunning_attempt", subscription, {
        dunning_schedule_id: schedule.id,
        attempt: next.sequence,
        offset_days: next.offset_days,
        payment_intent_id: intent.id,
      }),
    );
    return intent.status === "created" ? { kind: "attempt", intent } : { kind: "wait" };
  }

  /** Folds a terminal renewal or retry intent into subscription state. Caller holds the lock. */
  private async applyIntentOutcome(
    subscription: SubscriptionRecord,
    openSchedule: DunningScheduleRecord | null,
    intent: PaymentIntentRecord,
    events: SettlementEvent[],
  ): Promise<void> {
    const succeeded = intent.status === "succeeded" || intent.status === "reversed";

    if (intent.purpose === "renewal") {
      if (subscription.renewal_intent_id !== intent.id || subscription.status !== "active") {
        return;
      }
      subscription.renewal_intent_id = null;
      if (succeeded) {
        this.advancePeriod(subscription, intent);
        await this.repository.saveSubscription(subscription);
        events.push(this.subscriptionEvent("subscription.renewed", subscription, { payment_intent_id: intent.id }));
        return;
      }
      this.transition(subscription, "past_due");
      await this.repository.saveSubscription(subscription);
      const schedule = this.openSchedule(subscription, intent);
      await this.repository.saveDunningSchedule(schedule);
      this.logger.info(
        { tenant_id: subscription.tenant_id, subscription_id: subscription.id, payment_intent_id: intent.id, reason: intent.failure_reason },
        "renewal failed, dunning opened",
      );
      events.push(
        this.subscriptionEvent("subscription.past_due", subscription, {
          payment_intent_id: intent.id,
          dunning_schedule_id: schedule.id,
          grace_deadline: schedule.grace_deadline,
        }),
      );
      return;
    }

    if (intent.purpose !== "dunning_retry" || !openSchedule || subscription.status !== "past_due") {
      return;
    }
    const attempt = openSchedule.attempts.find((candidate) => candidate.payment_intent_id === intent.id);
    if (!attempt || attempt.status !== "sent") {
      return;
    }
    attempt.status = succeeded ? "succeeded" : "failed";
    openSchedule.updated_at = this.clock.nowIso();

    if (!succeeded) {
      await this.repository.saveDunningSchedule(openSchedule);
      this.logger.info(
        { subscription_id: subscription.id, attempt: attempt.sequence, reason: intent.failure_reason },
        "dunning attempt failed",
      );
      return;
    }

    await this.closeSchedule(openSchedule, "recovered");
    this.transition(subscription, "active");
    this.advancePeriod(subscription, intent);
    await this.repository.saveSubscription(subscription);
    events.push(
      this.subscriptionEvent("subscription.recovered", subscription, {
        payment_intent_id: intent.id,
        attempt: attempt.sequence,
      }),
    );
  }

  private async exhaust(
    subscription: SubscriptionRecord,
    schedule: DunningScheduleRecord,
    events: SettlementEvent[],
  ): Promise<void> {
    await this.closeSchedule(schedule, "exhausted");
    this.transition(subscription, "unpaid");
    subscription.next_renewal_at = null;
    events.push(this.subscriptionEvent("subscription.unpaid", subscription, { dunning_schedule_id: schedule.id }));

    if (subscription.downgrade_plan_id) {
      const previousPlanId = subscription.plan_id;
      this.transition(subscription, "active");
      subscription.plan_id = subscription.downgrade_plan_id;
      subscription.amount = 0;
      subscription.renewal_intent_id = null;
      subscription.cancel_at_period_end = false;
      events.push(this.subscriptionEvent("subscription.downgraded", subscription, { previous_plan_id: previousPlanId }));
    } else {
      this.cancel(subscription, "dunning_exhausted", events);
    }
    await this.repository.saveSubscription(subscription);
    this.logger.info(
      { tenant_id: subscription.tenant_id, subscription_id: subscription.id, status: subscription.status, plan_id: subscription.plan_id },
      "grace period ended",
    );
  }

  private openSchedule(subscription: SubscriptionRecord, failedIntent: PaymentIntentRecord): DunningScheduleRecord {
    const startedAt = this.clock.nowIso();
    const attempts: DunningAttempt[] = this.settings.dunningOffsetsDays.map((offsetDays, index) => ({
      sequence: index + 1,
      offset_days: offsetDays,
      scheduled_at: addDays(startedAt, offsetDays),
      status: "pending",
      payment_intent_id: null,
      attempted_at: null,
    }));
    return {
      id: deterministicId("dun", subscription.id, failedIntent.id),
      tenant_id: subscription.tenant_id,
      subscription_id: subscription.id,
      failed_intent_id: failedIntent.id,
      status: "open",
      started_at: startedAt,
      grace_deadline: addDays(startedAt, this.settings.dunningGraceDays),
      closed_at: null,
      attempts,
      created_at: startedAt,
      updated_at: startedAt,
    };
  }

  private async closeSchedule(schedule: DunningScheduleRecord, status: "recovered" | "exhausted"): Promise<void> {
    const timestamp = this.clock.nowIso();
    for (const attempt of schedule.attempts) {
      if (attempt.status === "pending") {
        attempt.status = "cancelled";
      }
    }
    schedule.status = status;
    schedule.closed_at = timestamp;
    schedule.updated_at = timestamp;
    await this.repository.saveDunningSchedule(schedule);
  }

  private advancePeriod(subscription: SubscriptionRecord, intent: PaymentIntentRecord): void {
    subscription.current_period_start = subscription.current_period_end;
    subscription.current_period_end = addInterval(subscription.current_period_end, subscription.interval);
    subscription.next_renewal_at = subscription.current_period_end;
    subscription.renewal_intent_id = null;
    subscription.last_settled_intent_id = intent.id;
    subscription.updated_at = this.clock.nowIso();
  }

  private cancel(subscription: SubscriptionRecord, reason: string, events: SettlementEvent[]): void {
    this.transition(subscription, "cancelled");
    subscription.cancelled_at = subscription.updated_at;
    subscription.next_renewal_at = null;
    events.push(this.subscriptionEvent("subscription.cancelled", subscription, { reason }));
  }

  private transition(subscription: SubscriptionRecord, next: SubscriptionStatus): void {
    assertSubscriptionTransition(subscription.status, next);
    subscription.status = next;
    subscription.updated_at = this.clock.nowIso();
  }

  private async locked<TOutput>(
    subscriptionId: string,
    operation: (events: SettlementEvent[]) => Promise<TOutput>,
  ): Promise<TOutput> {
    const events: SettlementEvent[] = [];
    const result = await this.guard.withLock(SUBSCRIPTION_LOCK_SCOPE, subscriptionId, () => operation(events));
    await publishAll(this.eventBus, events);
    return result;
  }

  private subscriptionEvent(
    type: SettlementEventType,
    subscription: SubscriptionRecord,
    extra: Record<string, unknown> = {},
  ): SettlementEvent {
    return buildEvent(this.clock, type, subscription.tenant_id, {
      subscription_id: subscription.id,
      subject_id: subscription.subject_id,
      plan_id: subscription.plan_id,
      amount: subscription.amount,
      currency: subscription.currency,
      status: subscription.status,
      ...extra,
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
