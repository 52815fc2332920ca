export type NotificationKind =
  | "payment_failed"
  | "renewal_failed"
  | "renewal_succeeded"
  | "dunning_attempt"
  | "subscription_recovered"
  | "subscription_unpaid"
  | "subscription_cancelled"
  | "subscription_downgraded";

export interface Notification {
  kind: NotificationKind;
  tenantId: string;
  subjectId: string;
  amount: number;
  currency: string;
  subscriptionId?: string;
  paymentIntentId?: string;
  attempt?: number;
}

export interface NotifierPort {
  notify(notification: Notification): Promise<void>;
}
