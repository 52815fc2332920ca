import type { SettlementEvent } from "../src/domain/types.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import type { SettlementRuntime } from "../src/runtime.js";

export class MutableClock implements ClockPort {
  constructor(private now: string) {}

  nowIso(): string {
    return this.now;
  }

  setNow(nextNow: string): void {
    this.now = nextNow;
  }

  advanceSeconds(seconds: number): void {
    this.now = new Date(Date.parse(this.now) + seconds * 1000).toISOString();
  }

  advanceDays(days: number): void {
    this.advanceSeconds(days * 86_400);
  }
}

export const noSleep = async (): Promise<void> => {};

export function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    apiKeys: ["test-api-key"],
    logLevel: "silent",
    idempotencyKeyMaxLength: 128,
    idempotencyTtlSeconds: 86_400,
    idempotencyLeaseSeconds: 300,
    listDefaultLimit: 50,
    listMaxLimit: 500,
    intentTtlSeconds: 3600,
    callbackTimeoutSeconds: 600,
    providerTimeoutMs: 1000,
    providerRetry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
    providerCircuitBreakerEnabled: false,
    providerCircuitBreakerFailureThreshold: 5,
    providerCircuitBreakerCooldownSeconds: 30,
    providers: ["sandbox"],
    mpesaEnvironment: "sandbox",
    airtelEnvironment: "sandbox",
    callbackBaseUrl: "http://localhost:8080",
    dunningOffsetsDays: [0, 1, 3],
    dunningGraceDays: 7,
    downgradePolicy: "cancel_subscription",
    taxRateBasisPoints: 0,
    defaultCurrency: "KES",
    reconciliationTenants: ["tenant_a"],
    metricsEnabled: true,
    storageBackend: "memory",
    postgresPool: { max: 10, connectionTimeoutMs: 5000, lockTimeoutMs: 30000 },
    ...overrides,
  };
}

export function collectEvents(runtime: SettlementRuntime): SettlementEvent[] {
  const events: SettlementEvent[] = [];
  runtime.eventBus.subscribe(async (event) => {
    events.push(event);
  });
  return events;
}
