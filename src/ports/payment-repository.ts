import type { PaymentIntentRecord, PaymentIntentStatus, PaymentRecord } from "../domain/types.js";

export interface PaymentIntentListInput {
  tenantId: string;
  limit: number;
  cursor?: string;
  status?: PaymentIntentStatus;
  subjectId?: string;
  subscriptionId?: string;
  provider?: string;
  createdFrom?: string;
  createdTo?: string;
}

export interface PaymentIntentListResult {
  data: PaymentIntentRecord[];
  hasMore: boolean;
  nextCursor?: string;
}

export interface DueForExpiryInput {
  /** provider_initiated intents initiated at or before this instant are overdue. */
  initiatedBefore: string;
  /** created intents whose expires_at is at or before this instant are stale. */
  expiresBefore: string;
  limit: number;
}

export interface PaymentRepositoryPort {
  savePaymentIntent(intent: PaymentIntentRecord): Promise<void>;
  getPaymentIntentById(tenantId: string, id: string): Promise<PaymentIntentRecord | null>;
  findPaymentIntentByIdempotencyKey(tenantId: string, idempotencyKey: string): Promise<PaymentIntentRecord | null>;
  findPaymentIntentByProviderReference(provider: string, providerReference: string): Promise<PaymentIntentRecord | null>;
  listPaymentIntents(input: PaymentIntentListInput): Promise<PaymentIntentListResult>;
  listPaymentIntentsDueForExpiry(input: DueForExpiryInput): Promise<PaymentIntentRecord[]>;
  /** Reversal intents pointing at `intentId`, oldest first. */
  listReversalIntents(tenantId: string, intentId: string): Promise<PaymentIntentRecord[]>;
  savePayment(payment: PaymentRecord): Promise<void>;
  listPaymentsByIntent(tenantId: string, intentId: string): Promise<PaymentRecord[]>;
}
