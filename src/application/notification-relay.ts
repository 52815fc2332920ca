import { z } from "zod";
import type { SettlementEvent, SettlementEventType } from "../domain/types.js";
import type { Logger } from "../infra/logger.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { NotificationKind, NotifierPort } from "../ports/notifier.js";

const KIND_BY_EVENT: Partial<Record<SettlementEventType, NotificationKind>> = {
  "payment_intent.failed": "payment_failed",
  "subscription.past_due": "renewal_failed",
  "subscription.renewed": "renewal_succeeded",
  "subscription.dunning_attempt": "dunning_attempt",
  "subscription.recovered": "subscription_recovered",
  "subscription.unpaid": "subscription_unpaid",
  "subscription.cancelled": "subscription_cancelled",
  "subscription.downgraded": "subscription_downgraded",
};

const notificationDataSchema = z.object({
  subject_id: z.string(),
  amount: z.number(),
  currency: z.string(),
  purpose: z.string().optional(),
  subscription_id: z.string().nullable().optional(),
  payment_intent_id: z.string().optional(),
  attempt: z.number().int().optional(),
});

/** Turns subject-facing settlement events into notifier calls. */
export class NotificationRelay {
  private readonly logger: Logger;

  constructor(
    private readonly notifier: NotifierPort,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "notifications" });
  }

  attach(eventBus: EventBusPort): void {
    eventBus.subscribe((event) => this.relay(event));
  }

  async relay(event: SettlementEvent): Promise<void> {
    const kind = KIND_BY_EVENT[event.type];
    if (!kind) {
      return;
    }
    const parsed = notificationDataSchema.safeParse(event.data);
    if (!parsed.success) {
      this.logger.warn({ event_id: event.id, event_type: event.type }, "event lacks notification fields");
      return;
    }
    const data = parsed.data;
    // Subscription payment failures are told through the dunning notifications.
    if (kind === "payment_failed" && data.purpose !== "charge") {
      return;
    }
    await this.notifier.notify({
      kind,
      tenantId: event.tenant_id,
      subjectId: data.subject_id,
      amount: data.amount,
      currency: data.currency,
      ...(data.subscription_id ? { subscriptionId: data.subscription_id } : {}),
      ...(data.payment_intent_id ? { paymentIntentId: data.payment_intent_id } : {}),
      ...(data.attempt !== undefined ? { attempt: data.attempt } : {}),
    });
  }
}
