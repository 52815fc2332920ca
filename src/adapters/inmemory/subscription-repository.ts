import type { DunningScheduleRecord, SubscriptionRecord } from "../../domain/types.js";
import type { SubscriptionRepositoryPort } from "../../ports/subscription-repository.js";

export class InMemorySubscriptionRepository implements SubscriptionRepositoryPort {
  private readonly subscriptions = new Map<string, SubscriptionRecord>();
  private readonly schedules = new Map<string, DunningScheduleRecord>();

  async saveSubscription(subscription: SubscriptionRecord): Promise<void> {
    this.subscriptions.set(subscription.id, structuredClone(subscription));
  }

  async getSubscriptionById(tenantId: string, id: string): Promise<SubscriptionRecord | null> {
    const subscription = this.subscriptions.get(id);
    if (!subscription || subscription.tenant_id !== tenantId) {
      return null;
    }
    return structuredClone(subscription);
  }

  async listDueForRenewal(now: string, limit: number): Promise<SubscriptionRecord[]> {
    const nowMs = Date.parse(now);
    return [...this.subscriptions.values()]
      .filter(
        (subscription) =>
          subscription.status === "active"
          && subscription.next_renewal_at !== null
          && Date.parse(subscription.next_renewal_at) <= nowMs,
      )
      .sort((a, b) => (a.next_renewal_at ?? "").localeCompare(b.next_renewal_at ?? ""))
      .slice(0, Math.max(1, limit))
      .map((subscription) => structuredClone(subscription));
  }

  async saveDunningSchedule(schedule: DunningScheduleRecord): Promise<void> {
    this.schedules.set(schedule.id, structuredClone(schedule));
  }

  async getOpenDunningSchedule(tenantId: string, subscriptionId: string): Promise<DunningScheduleRecord | null> {
    for (const schedule of this.schedules.values()) {
      if (
        schedule.tenant_id === tenantId
        && schedule.subscription_id === subscriptionId
        && schedule.status === "open"
      ) {
        return structuredClone(schedule);
      }
    }
    return null;
  }

  async listDunningSchedules(tenantId: string, subscriptionId: string): Promise<DunningScheduleRecord[]> {
    return [...this.schedules.values()]
      .filter((schedule) => schedule.tenant_id === tenantId && schedule.subscription_id === subscriptionId)
      .sort((a, b) => a.started_at.localeCompare(b.started_at))
      .map((schedule) => structuredClone(schedule));
  }

  async listOpenDunningSchedules(limit: number): Promise<DunningScheduleRecord[]> {
    return [...this.schedules.values()]
      .filter((schedule) => schedule.status === "open")
      .sort((a, b) => a.started_at.localeCompare(b.started_at))
      .slice(0, Math.max(1, limit))
      .map((schedule) => structuredClone(schedule));
  }
}
