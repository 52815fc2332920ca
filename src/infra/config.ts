import type { LevelWithSilent } from "pino";
import { AppError } from "./app-error.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseIntegerListEnv(name: string, defaultValue: number[], min: number, max: number): number[] {
  const items = parseStringListEnv(name, 1, 20);
  if (!items) {
    return defaultValue;
  }
  const parsed = items.map((item) => Number(item));
  for (const value of parsed) {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw invalidConfig(name, `items must be integers between ${min} and ${max}`);
    }
  }
  for (let index = 1; index < parsed.length; index += 1) {
    const previous = parsed[index - 1] ?? min;
    const current = parsed[index] ?? min;
    if (current <= previous) {
      throw invalidConfig(name, "items must be strictly increasing");
    }
  }
  return parsed;
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export const SUPPORTED_PROVIDERS = ["mpesa", "airtel", "sandbox"] as const;
export type SupportedProvider = (typeof SUPPORTED_PROVIDERS)[number];

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LevelWithSilent[];

export type DowngradePolicy = "cancel_subscription" | "downgrade_to_free";

export interface RetryPolicyConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKeys: string[];
  logLevel: LevelWithSilent;
  idempotencyKeyMaxLength: number;
  idempotencyTtlSeconds: number;
  idempotencyLeaseSeconds: number;
  listDefaultLimit: number;
  listMaxLimit: number;
  intentTtlSeconds: number;
  callbackTimeoutSeconds: number;
  providerTimeoutMs: number;
  providerRetry: RetryPolicyConfig;
  providerCircuitBreakerEnabled: boolean;
  providerCircuitBreakerFailureThreshold: number;
  providerCircuitBreakerCooldownSeconds: number;
  providers: SupportedProvider[];
  mpesaEnvironment: "sandbox" | "production";
  airtelEnvironment: "sandbox" | "production";
  callbackBaseUrl: string;
  dunningOffsetsDays: number[];
  dunningGraceDays: number;
  downgradePolicy: DowngradePolicy;
  defaultDowngradePlanId?: string;
  taxRateBasisPoints: number;
  defaultCurrency: string;
  reconciliationTenants: string[];
  metricsEnabled: boolean;
  storageBackend: "memory" | "postgres";
  postgresUrl?: string;
  postgresPool: PostgresPoolConfig;
}

export interface PostgresPoolConfig {
  max: number;
  connectionTimeoutMs: number;
  lockTimeoutMs: number;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("SETTLE_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("SETTLE_API_KEY", "dev_settle_key", 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const logLevel = parseEnumEnv("SETTLE_LOG_LEVEL", LOG_LEVELS, "info");
  const idempotencyKeyMaxLength = parseIntegerEnv("SETTLE_IDEMPOTENCY_KEY_MAX_LENGTH", 128, 32, 1024);
  // Completed keys must outlive provider redelivery windows.
  const idempotencyTtlSeconds = parseIntegerEnv("SETTLE_IDEMPOTENCY_TTL_SECONDS", 2_592_000, 3600, 31_536_000);
  const idempotencyLeaseSeconds = parseIntegerEnv("SETTLE_IDEMPOTENCY_LEASE_SECONDS", 300, 5, 86400);
  const listDefaultLimit = parseIntegerEnv("SETTLE_LIST_DEFAULT_LIMIT", 50, 1, 1000);
  const listMaxLimit = parseIntegerEnv("SETTLE_LIST_MAX_LIMIT", 500, 1, 5000);
  const intentTtlSeconds = parseIntegerEnv("SETTLE_INTENT_TTL_SECONDS", 3600, 60, 604_800);
  const callbackTimeoutSeconds = parseIntegerEnv("SETTLE_CALLBACK_TIMEOUT_SECONDS", 600, 30, 86400);
  const providerTimeoutMs = parseIntegerEnv("SETTLE_PROVIDER_TIMEOUT_MS", 15000, 100, 120000);
  const providerRetry: RetryPolicyConfig = {
    maxAttempts: parseIntegerEnv("SETTLE_PROVIDER_RETRY_MAX_ATTEMPTS", 3, 1, 10),
    baseDelayMs: parseIntegerEnv("SETTLE_PROVIDER_RETRY_BASE_DELAY_MS", 200, 0, 60000),
    maxDelayMs: parseIntegerEnv("SETTLE_PROVIDER_RETRY_MAX_DELAY_MS", 2000, 0, 300000),
  };
  const providerCircuitBreakerEnabled = parseBooleanEnv("SETTLE_PROVIDER_CB_ENABLED", true);
  const providerCircuitBreakerFailureThreshold = parseIntegerEnv(
    "SETTLE_PROVIDER_CB_FAILURE_THRESHOLD",
    5,
    1,
    50,
  );
  const providerCircuitBreakerCooldownSeconds = parseIntegerEnv(
    "SETTLE_PROVIDER_CB_COOLDOWN_SECONDS",
    30,
    1,
    3600,
  );
  const providerNames = parseStringListEnv("SETTLE_PROVIDERS", 3, 10) ?? ["sandbox"];
  const providers: SupportedProvider[] = [];
  for (const name of providerNames) {
    const match = SUPPORTED_PROVIDERS.find((provider) => provider === name);
    if (!match) {
      throw invalidConfig("SETTLE_PROVIDERS", `must only contain: ${SUPPORTED_PROVIDERS.join(", ")}`);
    }
    providers.push(match);
  }
  const mpesaEnvironment = parseEnumEnv("SETTLE_MPESA_ENVIRONMENT", ["sandbox", "production"] as const, "sandbox");
  const airtelEnvironment = parseEnumEnv("SETTLE_AIRTEL_ENVIRONMENT", ["sandbox", "production"] as const, "sandbox");
  const callbackBaseUrl = parseStringEnv("SETTLE_CALLBACK_BASE_URL", "http://localhost:8080", 8).replace(/\/+$/, "");
  const dunningOffsetsDays = parseIntegerListEnv("SETTLE_DUNNING_OFFSETS_DAYS", [0, 1, 3], 0, 60);
  const dunningGraceDays = parseIntegerEnv("SETTLE_DUNNING_GRACE_DAYS", 7, 1, 90);
  const downgradePolicy = parseEnumEnv(
    "SETTLE_DOWNGRADE_POLICY",
    ["cancel_subscription", "downgrade_to_free"] as const,
    "cancel_subscription",
  );
  const defaultDowngradePlanId = parseOptionalStringEnv("SETTLE_DEFAULT_DOWNGRADE_PLAN_ID", 1);
  const taxRateBasisPoints = parseIntegerEnv("SETTLE_TAX_RATE_BASIS_POINTS", 0, 0, 5000);
  const defaultCurrency = parseStringEnv("SETTLE_DEFAULT_CURRENCY", "KES", 3).toUpperCase();
  const reconciliationTenants = parseStringListEnv("SETTLE_RECONCILIATION_TENANTS", 1, 1000) ?? [];
  const metricsEnabled = parseBooleanEnv("SETTLE_METRICS_ENABLED", true);
  const storageBackend = parseEnumEnv("SETTLE_STORAGE_BACKEND", ["memory", "postgres"] as const, "memory");
  const postgresUrl = parseOptionalStringEnv("SETTLE_POSTGRES_URL", 12);
  const postgresPool: PostgresPoolConfig = {
    max: parseIntegerEnv("SETTLE_POSTGRES_POOL_MAX", 10, 1, 500),
    connectionTimeoutMs: parseIntegerEnv("SETTLE_POSTGRES_CONNECTION_TIMEOUT_MS", 5000, 100, 120000),
    lockTimeoutMs: parseIntegerEnv("SETTLE_POSTGRES_LOCK_TIMEOUT_MS", 30000, 100, 600000),
  };

  if (process.env.NODE_ENV === "production" && apiKeys.includes("dev_settle_key")) {
    throw invalidConfig(
      configuredApiKeys ? "SETTLE_API_KEYS" : "SETTLE_API_KEY",
      "must not include default key value in production",
    );
  }
  if (listDefaultLimit > listMaxLimit) {
    throw invalidConfig("SETTLE_LIST_DEFAULT_LIMIT", "must be lower or equal to SETTLE_LIST_MAX_LIMIT");
  }
  if (providerRetry.baseDelayMs > providerRetry.maxDelayMs) {
    throw invalidConfig(
      "SETTLE_PROVIDER_RETRY_BASE_DELAY_MS",
      "must be lower or equal to SETTLE_PROVIDER_RETRY_MAX_DELAY_MS",
    );
  }
  const lastOffset = dunningOffsetsDays.at(-1) ?? 0;
  if (lastOffset >= dunningGraceDays) {
    throw invalidConfig("SETTLE_DUNNING_OFFSETS_DAYS", "must all fall before SETTLE_DUNNING_GRACE_DAYS");
  }
  if (downgradePolicy === "downgrade_to_free" && !defaultDowngradePlanId) {
    throw invalidConfig(
      "SETTLE_DEFAULT_DOWNGRADE_PLAN_ID",
      "is required when SETTLE_DOWNGRADE_POLICY is downgrade_to_free",
    );
  }
  if (storageBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("SETTLE_POSTGRES_URL", "is required when the postgres storage backend is enabled");
  }

  return {
    host,
    port,
    apiKeys,
    logLevel,
    idempotencyKeyMaxLength,
    idempotencyTtlSeconds,
    idempotencyLeaseSeconds,
    listDefaultLimit,
    listMaxLimit,
    intentTtlSeconds,
    callbackTimeoutSeconds,
    providerTimeoutMs,
    providerRetry,
    providerCircuitBreakerEnabled,
    providerCircuitBreakerFailureThreshold,
    providerCircuitBreakerCooldownSeconds,
    providers,
    mpesaEnvironment,
    airtelEnvironment,
    callbackBaseUrl,
    dunningOffsetsDays,
    dunningGraceDays,
    downgradePolicy,
    taxRateBasisPoints,
    defaultCurrency,
    reconciliationTenants,
    metricsEnabled,
    storageBackend,
    postgresPool,
    ...(defaultDowngradePlanId ? { defaultDowngradePlanId } : {}),
    ...(postgresUrl ? { postgresUrl } : {}),
  };
}
