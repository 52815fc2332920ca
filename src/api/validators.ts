import type {
  BillingInterval,
  CreatePaymentIntentInput,
  CreateSubscriptionInput,
  PaymentIntentStatus,
  ReconciliationResolution,
  RefundPaymentIntentInput,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

export type CreatePaymentIntentBody = Omit<CreatePaymentIntentInput, "tenant_id">;
export type CreateSubscriptionBody = Omit<CreateSubscriptionInput, "tenant_id">;

export interface RefundBody {
  amount?: number;
  reason: string;
}

export interface CancelSubscriptionBody {
  at_period_end?: boolean;
}

export interface ResolveReconciliationBody {
  note: string;
}

export interface SweepJobBody {
  now?: string;
}

export interface ReconciliationJobBody {
  date?: string;
  tenant_id?: string;
  provider?: string;
}

export interface ProviderStatementBody {
  provider: string;
  date: string;
  currency: string;
  total: number;
  transaction_count: number;
}

const PAYMENT_INTENT_STATUSES = [
  "created",
  "provider_initiated",
  "succeeded",
  "failed",
  "expired",
  "cancelled",
  "reversed",
] as const satisfies readonly PaymentIntentStatus[];

const RECONCILIATION_RESOLUTIONS = ["matched", "pending", "resolved"] as const satisfies readonly ReconciliationResolution[];

const BILLING_INTERVALS = ["monthly", "yearly"] as const satisfies readonly BillingInterval[];

const CHARGE_PURPOSES = ["charge", "renewal", "dunning_retry"] as const;

const MSISDN_PATTERN = /^\+?\d{9,15}$/;
const UTC_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TENANT_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;
const ACCOUNT_PATTERN = /^[a-z_]+:[a-z0-9_]+$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function oneOf<TValue extends string>(value: unknown, allowed: readonly TValue[]): TValue | undefined {
  return allowed.find((candidate) => candidate === value);
}

function isCurrency(value: unknown): value is string {
  return isString(value) && /^[A-Za-z]{3}$/.test(value);
}

function requireObject(payload: unknown): Record<string, unknown> {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  return payload;
}

function assertOptionalText(value: unknown, fieldName: string, maxLength: number): void {
  if (value === undefined) {
    return;
  }
  if (!isString(value) || value.length > maxLength) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string of 1 to ${maxLength} characters.`);
  }
}

function isUtcDate(value: unknown): value is string {
  return isString(value) && UTC_DATE_PATTERN.test(value) && Number.isFinite(Date.parse(`${value}T00:00:00.000Z`));
}

function isIsoDateTime(value: unknown): value is string {
  return isString(value) && value.length <= 64 && Number.isFinite(Date.parse(value));
}

export function assertCreatePaymentIntentInput(payload: unknown): asserts payload is CreatePaymentIntentBody {
  const body = requireObject(payload);
  if (!isPositiveInteger(body.amount)) {
    throw new AppError(422, "invalid_amount", "Amount must be an integer greater than zero.");
  }
  if (!isCurrency(body.currency)) {
    throw new AppError(422, "invalid_currency", "Currency must be a 3-letter ISO code.");
  }
  if (!isString(body.subject_id)) {
    throw new AppError(422, "invalid_subject_id", "subject_id is required.");
  }
  if (!isString(body.provider)) {
    throw new AppError(422, "invalid_provider", "provider is required.");
  }
  if (!isString(body.payer_msisdn) || !MSISDN_PATTERN.test(body.payer_msisdn)) {
    throw new AppError(422, "invalid_payer_msisdn", "payer_msisdn must be a phone number of 9 to 15 digits.");
  }
  assertOptionalText(body.description, "description", 255);
  assertOptionalText(body.subscription_id, "subscription_id", 255);
  if (body.purpose !== undefined && !oneOf(body.purpose, CHARGE_PURPOSES)) {
    throw new AppError(422, "invalid_purpose", `purpose must be one of: ${CHARGE_PURPOSES.join(", ")}.`);
  }
}

export function assertRefundInput(payload: unknown): asserts payload is RefundBody {
  const body = requireObject(payload);
  if (body.amount !== undefined && !isPositiveInteger(body.amount)) {
    throw new AppError(422, "invalid_amount", "Refund amount must be an integer greater than zero.");
  }
  if (!isString(body.reason) || body.reason.length > 255) {
    throw new AppError(422, "invalid_refund_reason", "reason is required.");
  }
}

export function toRefundInput(body: RefundBody): RefundPaymentIntentInput {
  return {
    reason: body.reason,
    initiated_by: "operator",
    ...(body.amount !== undefined ? { amount: body.amount } : {}),
  };
}

export function assertCreateSubscriptionInput(payload: unknown): asserts payload is CreateSubscriptionBody {
  const body = requireObject(payload);
  if (!isString(body.subject_id)) {
    throw new AppError(422, "invalid_subject_id", "subject_id is required.");
  }
  if (!isString(body.plan_id)) {
    throw new AppError(422, "invalid_plan_id", "plan_id is required.");
  }
  if (!oneOf(body.interval, BILLING_INTERVALS)) {
    throw new AppError(422, "invalid_interval", "interval must be monthly or yearly.");
  }
  if (!isPositiveInteger(body.amount)) {
    throw new AppError(422, "invalid_amount", "Amount must be an integer greater than zero.");
  }
  if (!isCurrency(body.currency)) {
    throw new AppError(422, "invalid_currency", "Currency must be a 3-letter ISO code.");
  }
  if (!isString(body.provider)) {
    throw new AppError(422, "invalid_provider", "provider is required.");
  }
  if (!isString(body.payer_msisdn) || !MSISDN_PATTERN.test(body.payer_msisdn)) {
    throw new AppError(422, "invalid_payer_msisdn", "payer_msisdn must be a phone number of 9 to 15 digits.");
  }
  assertOptionalText(body.downgrade_plan_id, "downgrade_plan_id", 255);
  if (body.period_start !== undefined && !isIsoDateTime(body.period_start)) {
    throw new AppError(422, "invalid_period_start", "period_start must be a valid ISO-8601 date-time.");
  }
}

export function assertCancelSubscriptionInput(payload: unknown): asserts payload is CancelSubscriptionBody | undefined {
  if (payload === undefined || payload === null) {
    return;
  }
  const body = requireObject(payload);
  if (body.at_period_end !== undefined && typeof body.at_period_end !== "boolean") {
    throw new AppError(422, "invalid_at_period_end", "at_period_end must be a boolean.");
  }
}

export function assertResolveReconciliationInput(payload: unknown): asserts payload is ResolveReconciliationBody {
  const body = requireObject(payload);
  if (!isString(body.note) || body.note.length > 1000) {
    throw new AppError(422, "invalid_note", "note must be a string of 1 to 1000 characters.");
  }
}

export function assertSweepJobInput(payload: unknown): asserts payload is SweepJobBody | undefined {
  if (payload === undefined || payload === null) {
    return;
  }
  const body = requireObject(payload);
  if (body.now !== undefined && !isIsoDateTime(body.now)) {
    throw new AppError(422, "invalid_now", "now must be a valid ISO-8601 date-time.");
  }
}

export function assertReconciliationJobInput(payload: unknown): asserts payload is ReconciliationJobBody | undefined {
  if (payload === undefined || payload === null) {
    return;
  }
  const body = requireObject(payload);
  if (body.date !== undefined && !isUtcDate(body.date)) {
    throw new AppError(422, "invalid_date", "date must be a YYYY-MM-DD date.");
  }
  assertOptionalText(body.tenant_id, "tenant_id", 64);
  assertOptionalText(body.provider, "provider", 64);
  if ((body.tenant_id === undefined) !== (body.provider === undefined)) {
    throw new AppError(422, "invalid_reconciliation_target", "tenant_id and provider must be given together.");
  }
}

export function assertProviderStatementInput(payload: unknown): asserts payload is ProviderStatementBody {
  const body = requireObject(payload);
  if (!isString(body.provider)) {
    throw new AppError(422, "invalid_provider", "provider is required.");
  }
  if (!isUtcDate(body.date)) {
    throw new AppError(422, "invalid_date", "date must be a YYYY-MM-DD date.");
  }
  if (!isCurrency(body.currency)) {
    throw new AppError(422, "invalid_currency", "Currency must be a 3-letter ISO code.");
  }
  if (typeof body.total !== "number" || !Number.isInteger(body.total) || body.total < 0) {
    throw new AppError(422, "invalid_total", "total must be a non-negative integer.");
  }
  if (
    typeof body.transaction_count !== "number"
    || !Number.isInteger(body.transaction_count)
    || body.transaction_count < 0
  ) {
    throw new AppError(422, "invalid_transaction_count", "transaction_count must be a non-negative integer.");
  }
}

export function requireTenantId(headers: Record<string, unknown>): string {
  const header = headers["x-tenant-id"];
  if (typeof header !== "string" || header.trim().length === 0) {
    throw new AppError(400, "missing_tenant_id", "X-Tenant-Id header is required.");
  }
  const tenantId = header.trim();
  if (!TENANT_ID_PATTERN.test(tenantId)) {
    throw new AppError(422, "invalid_tenant_id", "X-Tenant-Id contains invalid characters.");
  }
  return tenantId;
}

export function normalizeLimit(value: unknown, defaultValue: number, max: number): number {
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(422, "invalid_limit", "limit must be a positive integer.");
  }
  return Math.min(parsed, max);
}

export function normalizePaymentIntentStatus(value: unknown): PaymentIntentStatus | undefined {
  if (value === undefined) {
    return undefined;
  }
  const status = oneOf(typeof value === "string" ? value.trim() : value, PAYMENT_INTENT_STATUSES);
  if (!status) {
    throw new AppError(422, "invalid_payment_intent_status", "Unsupported payment intent status.");
  }
  return status;
}

export function normalizeReconciliationResolution(value: unknown): ReconciliationResolution | undefined {
  if (value === undefined) {
    return undefined;
  }
  const resolution = oneOf(typeof value === "string" ? value.trim() : value, RECONCILIATION_RESOLUTIONS);
  if (!resolution) {
    throw new AppError(422, "invalid_resolution", "resolution must be one of: matched, pending, resolved.");
  }
  return resolution;
}

export function normalizeAccount(value: unknown, required: true): string;
export function normalizeAccount(value: unknown, required?: false): string | undefined;
export function normalizeAccount(value: unknown, required = false): string | undefined {
  if (value === undefined) {
    if (required) {
      throw new AppError(422, "invalid_account", "account is required.");
    }
    return undefined;
  }
  if (typeof value !== "string" || !ACCOUNT_PATTERN.test(value.trim())) {
    throw new AppError(422, "invalid_account", "account must look like 'cash:mpesa' or 'revenue:sales'.");
  }
  return value.trim();
}

export function normalizeUtcDate(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isUtcDate(value)) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a YYYY-MM-DD date.`);
  }
  return value;
}

export function normalizeIsoDateTime(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }
  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 64) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 64 characters.`,
    );
  }
  const timestamp = Date.parse(normalized);
  if (!Number.isFinite(timestamp)) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a valid ISO-8601 date-time.`);
  }
  return new Date(timestamp).toISOString();
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}
