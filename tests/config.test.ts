import { afterEach, describe, expect, it } from "vitest";
import { AppError } from "../src/infra/app-error.js";
import { loadRuntimeConfig } from "../src/infra/config.js";

const originalEnv = { ...process.env };

function resetEnv(): void {
  process.env = { ...originalEnv };
  for (const name of Object.keys(process.env)) {
    if (name.startsWith("SETTLE_") || name === "HOST" || name === "PORT" || name === "NODE_ENV") {
      delete process.env[name];
    }
  }
}

function configError(): AppError {
  try {
    loadRuntimeConfig();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected loadRuntimeConfig to throw");
}

afterEach(() => {
  process.env = { ...originalEnv };
});

describe("Runtime config", () => {
  it("loads defaults", () => {
    resetEnv();
    const config = loadRuntimeConfig();
    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(8080);
    expect(config.apiKeys).toEqual(["dev_settle_key"]);
    expect(config.logLevel).toBe("info");
    expect(config.idempotencyTtlSeconds).toBe(2_592_000);
    expect(config.idempotencyLeaseSeconds).toBe(300);
    expect(config.intentTtlSeconds).toBe(3600);
    expect(config.callbackTimeoutSeconds).toBe(600);
    expect(config.providerTimeoutMs).toBe(15000);
    expect(config.providerRetry).toEqual({ maxAttempts: 3, baseDelayMs: 200, maxDelayMs: 2000 });
    expect(config.providers).toEqual(["sandbox"]);
    expect(config.dunningOffsetsDays).toEqual([0, 1, 3]);
    expect(config.dunningGraceDays).toBe(7);
    expect(config.downgradePolicy).toBe("cancel_subscription");
    expect(config.defaultDowngradePlanId).toBeUndefined();
    expect(config.taxRateBasisPoints).toBe(0);
    expect(config.defaultCurrency).toBe("KES");
    expect(config.reconciliationTenants).toEqual([]);
    expect(config.storageBackend).toBe("memory");
    expect(config.postgresPool).toEqual({ max: 10, connectionTimeoutMs: 5000, lockTimeoutMs: 30000 });
    expect(config.callbackBaseUrl).toBe("http://localhost:8080");
  });

  it("rejects invalid port range", () => {
    resetEnv();
    process.env.PORT = "70000";
    const error = configError();
    expect(error.code).toBe("invalid_runtime_config");
    expect(error.message).toBe("Environment variable 'PORT' must be between 1 and 65535.");
  });

  it("rejects default API key in production", () => {
    resetEnv();
    process.env.NODE_ENV = "production";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_API_KEY' must not include default key value in production.",
    );
  });

  it("supports API key rotation list", () => {
    resetEnv();
    process.env.SETTLE_API_KEYS = "test-key-new,test-key-old,test-key-new";
    expect(loadRuntimeConfig().apiKeys).toEqual(["test-key-new", "test-key-old"]);
  });

  it("rejects empty API key rotation list", () => {
    resetEnv();
    process.env.SETTLE_API_KEYS = " , ";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_API_KEYS' must contain at least one non-empty comma-separated value.",
    );
  });

  it("parses enabled providers and rejects unknown ones", () => {
    resetEnv();
    process.env.SETTLE_PROVIDERS = "mpesa, airtel";
    expect(loadRuntimeConfig().providers).toEqual(["mpesa", "airtel"]);

    process.env.SETTLE_PROVIDERS = "mpesa,paypal";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_PROVIDERS' must only contain: mpesa, airtel, sandbox.",
    );
  });

  it("requires strictly increasing dunning offsets inside the grace period", () => {
    resetEnv();
    process.env.SETTLE_DUNNING_OFFSETS_DAYS = "0,2,5";
    expect(loadRuntimeConfig().dunningOffsetsDays).toEqual([0, 2, 5]);

    process.env.SETTLE_DUNNING_OFFSETS_DAYS = "0,3,1";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_DUNNING_OFFSETS_DAYS' items must be strictly increasing.",
    );

    process.env.SETTLE_DUNNING_OFFSETS_DAYS = "0,1,7";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_DUNNING_OFFSETS_DAYS' must all fall before SETTLE_DUNNING_GRACE_DAYS.",
    );
  });

  it("requires a default plan for the downgrade policy", () => {
    resetEnv();
    process.env.SETTLE_DOWNGRADE_POLICY = "downgrade_to_free";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_DEFAULT_DOWNGRADE_PLAN_ID' is required when SETTLE_DOWNGRADE_POLICY is downgrade_to_free.",
    );

    process.env.SETTLE_DEFAULT_DOWNGRADE_PLAN_ID = "plan_free";
    const config = loadRuntimeConfig();
    expect(config.downgradePolicy).toBe("downgrade_to_free");
    expect(config.defaultDowngradePlanId).toBe("plan_free");
  });

  it("requires a connection string for the postgres backend", () => {
    resetEnv();
    process.env.SETTLE_STORAGE_BACKEND = "postgres";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_POSTGRES_URL' is required when the postgres storage backend is enabled.",
    );
  });

  it("rejects a retry base delay above the cap", () => {
    resetEnv();
    process.env.SETTLE_PROVIDER_RETRY_BASE_DELAY_MS = "5000";
    process.env.SETTLE_PROVIDER_RETRY_MAX_DELAY_MS = "1000";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_PROVIDER_RETRY_BASE_DELAY_MS' must be lower or equal to SETTLE_PROVIDER_RETRY_MAX_DELAY_MS.",
    );
  });

  it("parses booleans and trims the callback base url", () => {
    resetEnv();
    process.env.SETTLE_METRICS_ENABLED = "0";
    process.env.SETTLE_PROVIDER_CB_ENABLED = "false";
    process.env.SETTLE_CALLBACK_BASE_URL = "https://pay.example.test/";
    process.env.SETTLE_TAX_RATE_BASIS_POINTS = "1600";
    const config = loadRuntimeConfig();
    expect(config.metricsEnabled).toBe(false);
    expect(config.providerCircuitBreakerEnabled).toBe(false);
    expect(config.callbackBaseUrl).toBe("https://pay.example.test");
    expect(config.taxRateBasisPoints).toBe(1600);

    process.env.SETTLE_METRICS_ENABLED = "maybe";
    expect(configError().message).toBe(
      "Environment variable 'SETTLE_METRICS_ENABLED' must be a boolean (true/false/1/0).",
    );
  });
});
