import type { DunningScheduleRecord, SubscriptionRecord } from "../domain/types.js";

export interface SubscriptionRepositoryPort {
  saveSubscription(subscription: SubscriptionRecord): Promise<void>;
  getSubscriptionById(tenantId: string, id: string): Promise<SubscriptionRecord | null>;
  /** Active subscriptions with next_renewal_at at or before `now`, oldest first. */
  listDueForRenewal(now: string, limit: number): Promise<SubscriptionRecord[]>;
  saveDunningSchedule(schedule: DunningScheduleRecord): Promise<void>;
  getOpenDunningSchedule(tenantId: string, subscriptionId: string): Promise<DunningScheduleRecord | null>;
  listDunningSchedules(tenantId: string, subscriptionId: string): Promise<DunningScheduleRecord[]>;
  listOpenDunningSchedules(limit: number): Promise<DunningScheduleRecord[]>;
}
