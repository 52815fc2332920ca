import type { PgSession } from "./session.js";
import { z } from "zod";
import type { DunningAttempt, DunningScheduleRecord, SubscriptionRecord } from "../../domain/types.js";
import type { SubscriptionRepositoryPort } from "../../ports/subscription-repository.js";
import { mapNullableTimestamp, mapTimestamp, toNumber } from "./mapping.js";

interface SubscriptionRow {
  id: string;
  tenant_id: string;
  subject_id: string;
  plan_id: string;
  interval: SubscriptionRecord["interval"];
  amount: unknown;
  currency: string;
  provider: string;
  payer_msisdn: string;
  status: SubscriptionRecord["status"];
  current_period_start: unknown;
  current_period_end: unknown;
  next_renewal_at: unknown;
  downgrade_plan_id: string | null;
  cancel_at_period_end: boolean;
  renewal_intent_id: string | null;
  last_settled_intent_id: string | null;
  cancelled_at: unknown;
  created_at: unknown;
  updated_at: unknown;
}

interface DunningScheduleRow {
  id: string;
  tenant_id: string;
  subscription_id: string;
  failed_intent_id: string;
  status: DunningScheduleRecord["status"];
  started_at: unknown;
  grace_deadline: unknown;
  closed_at: unknown;
  attempts: unknown;
  created_at: unknown;
  updated_at: unknown;
}

const attemptsSchema = z.array(
  z.object({
    sequence: z.number().int(),
    offset_days: z.number().int(),
    scheduled_at: z.string(),
    status: z.enum(["pending", "sent", "failed", "succeeded", "cancelled"]),
    payment_intent_id: z.string().nullable(),
    attempted_at: z.string().nullable(),
  }),
);

const SUBSCRIPTION_COLUMNS = `
  id, tenant_id, subject_id, plan_id, interval, amount, currency, provider, payer_msisdn, status,
  current_period_start, current_period_end, next_renewal_at, downgrade_plan_id, cancel_at_period_end,
  renewal_intent_id, last_settled_intent_id, cancelled_at, created_at, updated_at
`;

const SCHEDULE_COLUMNS = `
  id, tenant_id, subscription_id, failed_intent_id, status, started_at, grace_deadline, closed_at,
  attempts, created_at, updated_at
`;

function mapSubscription(row: SubscriptionRow): SubscriptionRecord {
  return {
    id: row.id,
    tenant_id: row.tenant_id,
    subject_id: row.subject_id,
    plan_id: row.plan_id,
    interval: row.interval,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    provider: row.provider,
    payer_msisdn: row.payer_msisdn,
    status: row.status,
    current_period_start: mapTimestamp(row.current_period_start),
    current_period_end: mapTimestamp(row.current_period_end),
    next_renewal_at: mapNullableTimestamp(row.next_renewal_at),
    downgrade_plan_id: row.downgrade_plan_id,
    cancel_at_period_end: row.cancel_at_period_end,
    renewal_intent_id: row.renewal_intent_id,
    last_settled_intent_id: row.last_settled_intent_id,
    cancelled_at: mapNullableTimestamp(row.cancelled_at),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

function mapSchedule(row: DunningScheduleRow): DunningScheduleRecord {
  const attempts: DunningAttempt[] = attemptsSchema.parse(row.attempts);
  return {
    id: row.id,
    tenant_id: row.tenant_id,
    subscription_id: row.subscription_id,
    failed_intent_id: row.failed_intent_id,
    status: row.status,
    started_at: mapTimestamp(row.started_at),
    grace_deadline: mapTimestamp(row.grace_deadline),
    closed_at: mapNullableTimestamp(row.closed_at),
    attempts,
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

export class PostgresSubscriptionRepository implements SubscriptionRepositoryPort {
  constructor(private readonly session: PgSession) {}

  async saveSubscription(subscription: SubscriptionRecord): Promise<void> {
    await this.session.query(
      `
        INSERT INTO settle_subscriptions (
          id, tenant_id, subject_id, plan_id, interval, amount, currency, provider, payer_msisdn, status,
          current_period_start, current_period_end, next_renewal_at, downgrade_plan_id, cancel_at_period_end,
          renewal_intent_id, last_settled_intent_id, cancelled_at, created_at, updated_at
        )
        VALUES (
          $1, $2, $3, $4, $5, $6::bigint, $7, $8, $9, $10,
          $11::timestamptz, $12::timestamptz, $13::timestamptz, $14, $15,
          $16, $17, $18::timestamptz, $19::timestamptz, $20::timestamptz
        )
        ON CONFLICT (id) DO UPDATE
        SET plan_id = EXCLUDED.plan_id,
            amount = EXCLUDED.amount,
            status = EXCLUDED.status,
            current_period_start = EXCLUDED.current_period_start,
            current_period_end = EXCLUDED.current_period_end,
            next_renewal_at = EXCLUDED.next_renewal_at,
            downgrade_plan_id = EXCLUDED.downgrade_plan_id,
            cancel_at_period_end = EXCLUDED.cancel_at_period_end,
            renewal_intent_id = EXCLUDED.renewal_intent_id,
            last_settled_intent_id = EXCLUDED.last_settled_intent_id,
            cancelled_at = EXCLUDED.cancelled_at,
            updated_at = EXCLUDED.updated_at
      `,
      [
        subscription.id,
        subscription.tenant_id,
        subscription.subject_id,
        subscription.plan_id,
        subscription.interval,
        subscription.amount,
        subscription.currency,
        subscription.provider,
        subscription.payer_msisdn,
        subscription.status,
        subscription.current_period_start,
        subscription.current_period_end,
        subscription.next_renewal_at,
        subscription.downgrade_plan_id,
        subscription.cancel_at_period_end,
        subscription.renewal_intent_id,
        subscription.last_settled_intent_id,
        subscription.cancelled_at,
        subscription.created_at,
        subscription.updated_at,
      ],
    );
  }

  async getSubscriptionById(tenantId: string, id: string): Promise<SubscriptionRecord | null> {
    const result = await this.session.query<SubscriptionRow>(
      `SELECT ${SUBSCRIPTION_COLUMNS} FROM settle_subscriptions WHERE tenant_id = $1 AND id = $2`,
      [tenantId, id],
    );
    const row = result.rows[0];
    return row ? mapSubscription(row) : null;
  }

  async listDueForRenewal(now: string, limit: number): Promise<SubscriptionRecord[]> {
    const result = await this.session.query<SubscriptionRow>(
      `
        SELECT ${SUBSCRIPTION_COLUMNS}
        FROM settle_subscriptions
        WHERE status = 'active'
          AND next_renewal_at IS NOT NULL
          AND next_renewal_at <= $1::timestamptz
        ORDER BY next_renewal_at ASC
        LIMIT $2
      `,
      [now, Math.max(1, limit)],
    );
    return result.rows.map(mapSubscription);
  }

  async saveDunningSchedule(schedule: DunningScheduleRecord): Promise<void> {
    await this.session.query(
      `
        INSERT INTO settle_dunning_schedules (
          id, tenant_id, subscription_id, failed_intent_id, status, started_at, grace_deadline, closed_at,
          attempts, created_at, updated_at
        )
        VALUES (
          $1, $2, $3, $4, $5, $6::timestamptz, $7::timestamptz, $8::timestamptz,
          $9::jsonb, $10::timestamptz, $11::timestamptz
        )
        ON CONFLICT (id) DO UPDATE
        SET status = EXCLUDED.status,
            closed_at = EXCLUDED.closed_at,
            attempts = EXCLUDED.attempts,
            updated_at = EXCLUDED.updated_at
      `,
      [
        schedule.id,
        schedule.tenant_id,
        schedule.subscription_id,
        schedule.failed_intent_id,
        schedule.status,
        schedule.started_at,
        schedule.grace_deadline,
        schedule.closed_at,
        JSON.stringify(schedule.attempts),
        schedule.created_at,
        schedule.updated_at,
      ],
    );
  }

  async getOpenDunningSchedule(tenantId: string, subscriptionId: string): Promise<DunningScheduleRecord | null> {
    const result = await this.session.query<DunningScheduleRow>(
      `
        SELECT ${SCHEDULE_COLUMNS}
        FROM settle_dunning_schedules
        WHERE tenant_id = $1 AND subscription_id = $2 AND status = 'open'
      `,
      [tenantId, subscriptionId],
    );
    const row = result.rows[0];
    return row ? mapSchedule(row) : null;
  }

  async listDunningSchedules(tenantId: string, subscriptionId: string): Promise<DunningScheduleRecord[]> {
    const result = await this.session.query<DunningScheduleRow>(
      `
        SELECT ${SCHEDULE_COLUMNS}
        FROM settle_dunning_schedules
        WHERE tenant_id = $1 AND subscription_id = $2
        ORDER BY started_at ASC
      `,
      [tenantId, subscriptionId],
    );
    return result.rows.map(mapSchedule);
  }

  async listOpenDunningSchedules(limit: number): Promise<DunningScheduleRecord[]> {
    const result = await this.session.query<DunningScheduleRow>(
      `
        SELECT ${SCHEDULE_COLUMNS}
        FROM settle_dunning_schedules
        WHERE status = 'open'
        ORDER BY started_at ASC
        LIMIT $1
      `,
      [Math.max(1, limit)],
    );
    return result.rows.map(mapSchedule);
  }
}
