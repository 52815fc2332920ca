import type { PaymentIntentRecord, PaymentRecord } from "../../domain/types.js";
import type {
  DueForExpiryInput,
  PaymentIntentListInput,
  PaymentIntentListResult,
  PaymentRepositoryPort,
} from "../../ports/payment-repository.js";
import { isWithinRange, paginateByCursor } from "../pagination.js";

export class InMemoryPaymentRepository implements PaymentRepositoryPort {
  private readonly paymentIntents = new Map<string, PaymentIntentRecord>();
  private readonly payments = new Map<string, PaymentRecord>();

  async savePaymentIntent(intent: PaymentIntentRecord): Promise<void> {
    this.paymentIntents.set(intent.id, structuredClone(intent));
  }

  async getPaymentIntentById(tenantId: string, id: string): Promise<PaymentIntentRecord | null> {
    const intent = this.paymentIntents.get(id);
    if (!intent || intent.tenant_id !== tenantId) {
      return null;
    }
    return structuredClone(intent);
  }

  async findPaymentIntentByIdempotencyKey(
    tenantId: string,
    idempotencyKey: string,
  ): Promise<PaymentIntentRecord | null> {
    for (const intent of this.paymentIntents.values()) {
      if (intent.tenant_id === tenantId && intent.idempotency_key === idempotencyKey) {
        return structuredClone(intent);
      }
    }
    return null;
  }

  async findPaymentIntentByProviderReference(
    provider: string,
    providerReference: string,
  ): Promise<PaymentIntentRecord | null> {
    for (const intent of this.paymentIntents.values()) {
      if (intent.provider === provider && intent.provider_reference === providerReference) {
        return structuredClone(intent);
      }
    }
    return null;
  }

  async listPaymentIntents(input: PaymentIntentListInput): Promise<PaymentIntentListResult> {
    const items = [...this.paymentIntents.values()]
      .filter((intent) => {
        if (intent.tenant_id !== input.tenantId) {
          return false;
        }
        if (input.status && intent.status !== input.status) {
          return false;
        }
        if (input.subjectId && intent.subject_id !== input.subjectId) {
          return false;
        }
        if (input.subscriptionId && intent.subscription_id !== input.subscriptionId) {
          return false;
        }
        if (input.provider && intent.provider !== input.provider) {
          return false;
        }
        return isWithinRange(intent.created_at, input.createdFrom, input.createdTo);
      })
      .sort((a, b) => {
        const byCreatedAt = b.created_at.localeCompare(a.created_at);
        return byCreatedAt !== 0 ? byCreatedAt : b.id.localeCompare(a.id);
      })
      .map((intent) => structuredClone(intent));
    return paginateByCursor(items, input);
  }

  async listPaymentIntentsDueForExpiry(input: DueForExpiryInput): Promise<PaymentIntentRecord[]> {
    const initiatedBeforeMs = Date.parse(input.initiatedBefore);
    const expiresBeforeMs = Date.parse(input.expiresBefore);
    return [...this.paymentIntents.values()]
      .filter((intent) => {
        if (intent.status === "provider_initiated") {
          return intent.initiated_at !== null && Date.parse(intent.initiated_at) <= initiatedBeforeMs;
        }
        if (intent.status === "created") {
          return Date.parse(intent.expires_at) <= expiresBeforeMs;
        }
        return false;
      })
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .slice(0, Math.max(1, input.limit))
      .map((intent) => structuredClone(intent));
  }

  async listReversalIntents(tenantId: string, intentId: string): Promise<PaymentIntentRecord[]> {
    return [...this.paymentIntents.values()]
      .filter((intent) => intent.tenant_id === tenantId && intent.reverses_intent_id === intentId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((intent) => structuredClone(intent));
  }

  async savePayment(payment: PaymentRecord): Promise<void> {
    this.payments.set(payment.id, structuredClone(payment));
  }

  async listPaymentsByIntent(tenantId: string, intentId: string): Promise<PaymentRecord[]> {
    return [...this.payments.values()]
      .filter((payment) => payment.tenant_id === tenantId && payment.intent_id === intentId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((payment) => structuredClone(payment));
  }
}
