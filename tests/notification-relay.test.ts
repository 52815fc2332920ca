import { describe, expect, it } from "vitest";
import { InMemoryEventBus } from "../src/adapters/inmemory/event-bus.js";
import { LoggingNotifier } from "../src/adapters/inmemory/notifier.js";
import { buildEvent } from "../src/application/events.js";
import { NotificationRelay } from "../src/application/notification-relay.js";
import { silentLogger } from "../src/infra/logger.js";
import { MutableClock } from "./helpers.js";

function setup() {
  const clock = new MutableClock("2026-04-01T00:00:00.000Z");
  const eventBus = new InMemoryEventBus();
  const notifier = new LoggingNotifier(silentLogger());
  new NotificationRelay(notifier, silentLogger()).attach(eventBus);
  return { clock, eventBus, notifier };
}

describe("NotificationRelay", () => {
  it("tells the subject about failed one-off charges", async () => {
    const { clock, eventBus, notifier } = setup();

    await eventBus.publish(
      buildEvent(clock, "payment_intent.failed", "tenant_a", {
        payment_intent_id: "pi_1",
        subject_id: "sub_customer_1",
        subscription_id: null,
        purpose: "charge",
        amount: 50000,
        currency: "KES",
      }),
    );

    expect(notifier.getSentNotifications()).toEqual([
      {
        kind: "payment_failed",
        tenantId: "tenant_a",
        subjectId: "sub_customer_1",
        amount: 50000,
        currency: "KES",
        paymentIntentId: "pi_1",
      },
    ]);
  });

  it("leaves subscription payment failures to the dunning notices", async () => {
    const { clock, eventBus, notifier } = setup();

    await eventBus.publish(
      buildEvent(clock, "payment_intent.failed", "tenant_a", {
        payment_intent_id: "pi_2",
        subject_id: "sub_customer_1",
        subscription_id: "subs_1",
        purpose: "dunning_retry",
        amount: 50000,
        currency: "KES",
      }),
    );
    await eventBus.publish(
      buildEvent(clock, "subscription.dunning_attempt", "tenant_a", {
        subscription_id: "subs_1",
        subject_id: "sub_customer_1",
        amount: 50000,
        currency: "KES",
        attempt: 2,
        payment_intent_id: "pi_2",
      }),
    );

    expect(notifier.getSentNotifications()).toEqual([
      {
        kind: "dunning_attempt",
        tenantId: "tenant_a",
        subjectId: "sub_customer_1",
        amount: 50000,
        currency: "KES",
        subscriptionId: "subs_1",
        paymentIntentId: "pi_2",
        attempt: 2,
      },
    ]);
  });

  it("ignores events the subject is not told about", async () => {
    const { clock, eventBus, notifier } = setup();

    await eventBus.publish(
      buildEvent(clock, "payment_intent.succeeded", "tenant_a", {
        payment_intent_id: "pi_3",
        subject_id: "sub_customer_1",
        purpose: "charge",
        amount: 50000,
        currency: "KES",
      }),
    );
    await eventBus.publish(buildEvent(clock, "subscription.cancelled", "tenant_a", { subscription_id: "subs_1" }));

    expect(notifier.getSentNotifications()).toEqual([]);
  });
});
