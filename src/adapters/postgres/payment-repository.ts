import type { PgSession } from "./session.js";
import { z } from "zod";
import type {
  NormalizedEventPayload,
  PaymentIntentRecord,
  PaymentRecord,
} from "../../domain/types.js";
import type {
  DueForExpiryInput,
  PaymentIntentListInput,
  PaymentIntentListResult,
  PaymentRepositoryPort,
} from "../../ports/payment-repository.js";
import { paginateByCursor } from "../pagination.js";
import { mapNullableTimestamp, mapTimestamp, toNumber, WhereClause } from "./mapping.js";

interface PaymentIntentRow {
  id: string;
  tenant_id: string;
  subject_id: string;
  subscription_id: string | null;
  purpose: PaymentIntentRecord["purpose"];
  reverses_intent_id: string | null;
  amount: unknown;
  currency: string;
  payer_msisdn: string;
  description: string | null;
  idempotency_key: string;
  status: PaymentIntentRecord["status"];
  provider: string;
  provider_reference: string | null;
  failure_reason: string | null;
  initiated_at: unknown;
  expires_at: unknown;
  created_at: unknown;
  updated_at: unknown;
}

interface PaymentRow {
  id: string;
  tenant_id: string;
  intent_id: string;
  provider: string;
  provider_reference: string | null;
  provider_event_id: string | null;
  status: PaymentRecord["status"];
  amount: unknown;
  currency: string;
  normalized_payload: unknown;
  created_at: unknown;
  updated_at: unknown;
}

const normalizedPayloadSchema = z.object({
  provider: z.string(),
  provider_event_id: z.string(),
  provider_reference: z.string(),
  outcome: z.enum(["success", "failure"]),
  amount: z.number().nullable(),
  failure_reason: z.string().nullable(),
  receipt: z.string().nullable(),
});

const INTENT_COLUMNS = `
  id, tenant_id, subject_id, subscription_id, purpose, reverses_intent_id, amount, currency,
  payer_msisdn, description, idempotency_key, status, provider, provider_reference,
  failure_reason, initiated_at, expires_at, created_at, updated_at
`;

const PAYMENT_COLUMNS = `
  id, tenant_id, intent_id, provider, provider_reference, provider_event_id, status, amount,
  currency, normalized_payload, created_at, updated_at
`;

function mapIntent(row: PaymentIntentRow): PaymentIntentRecord {
  return {
    id: row.id,
    tenant_id: row.tenant_id,
    subject_id: row.subject_id,
    subscription_id: row.subscription_id,
    purpose: row.purpose,
    reverses_intent_id: row.reverses_intent_id,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    payer_msisdn: row.payer_msisdn,
    description: row.description,
    idempotency_key: row.idempotency_key,
    status: row.status,
    provider: row.provider,
    provider_reference: row.provider_reference,
    failure_reason: row.failure_reason,
    initiated_at: mapNullableTimestamp(row.initiated_at),
    expires_at: mapTimestamp(row.expires_at),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

function mapNormalizedPayload(value: unknown): NormalizedEventPayload | null {
  if (value === null || value === undefined) {
    return null;
  }
  return normalizedPayloadSchema.parse(value);
}

function mapPayment(row: PaymentRow): PaymentRecord {
  return {
    id: row.id,
    tenant_id: row.tenant_id,
    intent_id: row.intent_id,
    provider: row.provider,
    provider_reference: row.provider_reference,
    provider_event_id: row.provider_event_id,
    status: row.status,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    normalized_payload: mapNormalizedPayload(row.normalized_payload),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

export class PostgresPaymentRepository implements PaymentRepositoryPort {
  constructor(private readonly session: PgSession) {}

  async savePaymentIntent(intent: PaymentIntentRecord): Promise<void> {
    await this.session.query(
      `
        INSERT INTO settle_payment_intents (
          id,
          tenant_id,
          subject_id,
          subscription_id,
          purpose,
          reverses_intent_id,
          amount,
          currency,
          payer_msisdn,
          description,
          idempotency_key,
          status,
          provider,
          provider_reference,
          failure_reason,
          initiated_at,
          expires_at,
          created_at,
          updated_at
        )
        VALUES (
          $1, $2, $3, $4, $5, $6, $7::bigint, $8, $9, $10, $11, $12, $13, $14, $15,
          $16::timestamptz, $17::timestamptz, $18::timestamptz, $19::timestamptz
        )
        ON CONFLICT (id) DO UPDATE
        SET status = EXCLUDED.status,
            provider_reference = EXCLUDED.provider_reference,
            failure_reason = EXCLUDED.failure_reason,
            initiated_at = EXCLUDED.initiated_at,
            updated_at = EXCLUDED.updated_at
      `,
      [
        intent.id,
        intent.tenant_id,
        intent.subject_id,
        intent.subscription_id,
        intent.purpose,
        intent.reverses_intent_id,
        intent.amount,
        intent.currency,
        intent.payer_msisdn,
        intent.description,
        intent.idempotency_key,
        intent.status,
        intent.provider,
        intent.provider_reference,
        intent.failure_reason,
        intent.initiated_at,
        intent.expires_at,
        intent.created_at,
        intent.updated_at,
      ],
    );
  }

  async getPaymentIntentById(tenantId: string, id: string): Promise<PaymentIntentRecord | null> {
    const result = await this.session.query<PaymentIntentRow>(
      `SELECT ${INTENT_COLUMNS} FROM settle_payment_intents WHERE tenant_id = $1 AND id = $2`,
      [tenantId, id],
    );
    const row = result.rows[0];
    return row ? mapIntent(row) : null;
  }

  async findPaymentIntentByIdempotencyKey(
    tenantId: string,
    idempotencyKey: string,
  ): Promise<PaymentIntentRecord | null> {
    const result = await this.session.query<PaymentIntentRow>(
      `SELECT ${INTENT_COLUMNS} FROM settle_payment_intents WHERE tenant_id = $1 AND idempotency_key = $2`,
      [tenantId, idempotencyKey],
    );
    const row = result.rows[0];
    return row ? mapIntent(row) : null;
  }

  async findPaymentIntentByProviderReference(
    provider: string,
    providerReference: string,
  ): Promise<PaymentIntentRecord | null> {
    const result = await this.session.query<PaymentIntentRow>(
      `SELECT ${INTENT_COLUMNS} FROM settle_payment_intents WHERE provider = $1 AND provider_reference = $2`,
      [provider, providerReference],
    );
    const row = result.rows[0];
    return row ? mapIntent(row) : null;
  }

  async listPaymentIntents(input: PaymentIntentListInput): Promise<PaymentIntentListResult> {
    const where = new WhereClause()
      .add("tenant_id", "=", input.tenantId)
      .add("status", "=", input.status)
      .add("subject_id", "=", input.subjectId)
      .add("subscription_id", "=", input.subscriptionId)
      .add("provider", "=", input.provider)
      .add("created_at", ">=", input.createdFrom, "::timestamptz")
      .add("created_at", "<=", input.createdTo, "::timestamptz");
    const result = await this.session.query<PaymentIntentRow>(
      `
        SELECT ${INTENT_COLUMNS}
        FROM settle_payment_intents
        ${where.toSql()}
        ORDER BY created_at DESC, id DESC
      `,
      where.values,
    );
    return paginateByCursor(result.rows.map(mapIntent), input);
  }

  async listPaymentIntentsDueForExpiry(input: DueForExpiryInput): Promise<PaymentIntentRecord[]> {
    const result = await this.session.query<PaymentIntentRow>(
      `
        SELECT ${INTENT_COLUMNS}
        FROM settle_payment_intents
        WHERE (status = 'provider_initiated' AND initiated_at <= $1::timestamptz)
           OR (status = 'created' AND expires_at <= $2::timestamptz)
        ORDER BY created_at ASC
        LIMIT $3
      `,
      [input.initiatedBefore, input.expiresBefore, Math.max(1, input.limit)],
    );
    return result.rows.map(mapIntent);
  }

  async listReversalIntents(tenantId: string, intentId: string): Promise<PaymentIntentRecord[]> {
    const result = await this.session.query<PaymentIntentRow>(
      `
        SELECT ${INTENT_COLUMNS}
        FROM settle_payment_intents
        WHERE tenant_id = $1 AND reverses_intent_id = $2
        ORDER BY created_at ASC
      `,
      [tenantId, intentId],
    );
    return result.rows.map(mapIntent);
  }

  async savePayment(payment: PaymentRecord): Promise<void> {
    await this.session.query(
      `
        INSERT INTO settle_payments (
          id,
          tenant_id,
          intent_id,
          provider,
          provider_reference,
          provider_event_id,
          status,
          amount,
          currency,
          normalized_payload,
          created_at,
          updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8::bigint, $9, $10::jsonb, $11::timestamptz, $12::timestamptz)
        ON CONFLICT (id) DO UPDATE
        SET provider_reference = EXCLUDED.provider_reference,
            provider_event_id = EXCLUDED.provider_event_id,
            status = EXCLUDED.status,
            normalized_payload = EXCLUDED.normalized_payload,
            updated_at = EXCLUDED.updated_at
      `,
      [
        payment.id,
        payment.tenant_id,
        payment.intent_id,
        payment.provider,
        payment.provider_reference,
        payment.provider_event_id,
        payment.status,
        payment.amount,
        payment.currency,
        payment.normalized_payload === null ? null : JSON.stringify(payment.normalized_payload),
        payment.created_at,
        payment.updated_at,
      ],
    );
  }

  async listPaymentsByIntent(tenantId: string, intentId: string): Promise<PaymentRecord[]> {
    const result = await this.session.query<PaymentRow>(
      `
        SELECT ${PAYMENT_COLUMNS}
        FROM settle_payments
        WHERE tenant_id = $1 AND intent_id = $2
        ORDER BY created_at ASC
      `,
      [tenantId, intentId],
    );
    return result.rows.map(mapPayment);
  }
}
