export type PaymentIntentStatus =
  | "created"
  | "provider_initiated"
  | "succeeded"
  | "failed"
  | "expired"
  | "cancelled"
  | "reversed";

export type PaymentIntentPurpose = "charge" | "renewal" | "dunning_retry" | "reversal";

export type PaymentStatus = "pending" | "confirmed" | "failed" | "reversed";

export type ProviderMode = "push" | "direct";

export interface PaymentIntentRecord {
  id: string;
  tenant_id: string;
  subject_id: string;
  subscription_id: string | null;
  purpose: PaymentIntentPurpose;
  reverses_intent_id: string | null;
  amount: number;
  currency: string;
  payer_msisdn: string;
  description: string | null;
  idempotency_key: string;
  status: PaymentIntentStatus;
  provider: string;
  provider_reference: string | null;
  failure_reason: string | null;
  initiated_at: string | null;
  expires_at: string;
  created_at: string;
  updated_at: string;
}

export interface NormalizedEventPayload {
  provider: string;
  provider_event_id: string;
  provider_reference: string;
  outcome: "success" | "failure";
  amount: number | null;
  failure_reason: string | null;
  receipt: string | null;
}

export interface PaymentRecord {
  id: string;
  tenant_id: string;
  intent_id: string;
  provider: string;
  provider_reference: string | null;
  provider_event_id: string | null;
  status: PaymentStatus;
  amount: number;
  currency: string;
  normalized_payload: NormalizedEventPayload | null;
  created_at: string;
  updated_at: string;
}

export type LedgerDirection = "debit" | "credit";

export type LedgerTransactionKind = "settlement" | "reversal" | "adjustment";

export interface LedgerTransactionGroup {
  id: string;
  tenant_id: string;
  kind: LedgerTransactionKind;
  reference: string;
  description: string;
  created_at: string;
}

export interface LedgerEntryRecord {
  id: string;
  transaction_group_id: string;
  tenant_id: string;
  account: string;
  direction: LedgerDirection;
  amount: number;
  currency: string;
  reference: string;
  created_at: string;
}

export type SubscriptionStatus = "active" | "past_due" | "unpaid" | "cancelled";

export type BillingInterval = "monthly" | "yearly";

export interface SubscriptionRecord {
  id: string;
  tenant_id: string;
  subject_id: string;
  plan_id: string;
  interval: BillingInterval;
  amount: number;
  currency: string;
  provider: string;
  payer_msisdn: string;
  status: SubscriptionStatus;
  current_period_start: string;
  current_period_end: string;
  next_renewal_at: string | null;
  downgrade_plan_id: string | null;
  cancel_at_period_end: boolean;
  renewal_intent_id: string | null;
  last_settled_intent_id: string | null;
  cancelled_at: string | null;
  created_at: string;
  updated_at: string;
}

export type DunningScheduleStatus = "open" | "recovered" | "exhausted";

export type DunningAttemptStatus = "pending" | "sent" | "failed" | "succeeded" | "cancelled";

export interface DunningAttempt {
  sequence: number;
  offset_days: number;
  scheduled_at: string;
  status: DunningAttemptStatus;
  payment_intent_id: string | null;
  attempted_at: string | null;
}

export interface DunningScheduleRecord {
  id: string;
  tenant_id: string;
  subscription_id: string;
  failed_intent_id: string;
  status: DunningScheduleStatus;
  started_at: string;
  grace_deadline: string;
  closed_at: string | null;
  attempts: DunningAttempt[];
  created_at: string;
  updated_at: string;
}

export type ReconciliationResolution = "matched" | "pending" | "resolved";

export interface ReconciliationRecord {
  id: string;
  tenant_id: string;
  provider: string;
  date: string;
  currency: string;
  expected_total: number;
  reported_total: number;
  discrepancy: number;
  resolution: ReconciliationResolution;
  resolution_note: string | null;
  created_at: string;
  updated_at: string;
}

export type SettlementEventType =
  | "payment_intent.created"
  | "payment_intent.provider_initiated"
  | "payment_intent.succeeded"
  | "payment_intent.failed"
  | "payment_intent.expired"
  | "payment_intent.cancelled"
  | "payment_intent.reversed"
  | "payment_intent.outcome_conflict"
  | "ledger.invariant_violation"
  | "subscription.created"
  | "subscription.renewed"
  | "subscription.past_due"
  | "subscription.dunning_attempt"
  | "subscription.recovered"
  | "subscription.unpaid"
  | "subscription.cancelled"
  | "subscription.downgraded"
  | "reconciliation.discrepancy";

export interface SettlementEvent {
  id: string;
  type: SettlementEventType;
  tenant_id: string;
  occurred_at: string;
  data: Record<string, unknown>;
}

export interface CreatePaymentIntentInput {
  tenant_id: string;
  subject_id: string;
  amount: number;
  currency: string;
  provider: string;
  payer_msisdn: string;
  description?: string;
  subscription_id?: string;
  purpose?: Exclude<PaymentIntentPurpose, "reversal">;
}

export interface RefundPaymentIntentInput {
  amount?: number;
  reason: string;
  initiated_by: "operator" | "dunning";
}

export interface CreateSubscriptionInput {
  tenant_id: string;
  subject_id: string;
  plan_id: string;
  interval: BillingInterval;
  amount: number;
  currency: string;
  provider: string;
  payer_msisdn: string;
  downgrade_plan_id?: string;
  period_start?: string;
}
