import { Pool } from "pg";
import { InMemoryEventBus } from "./adapters/inmemory/event-bus.js";
import { InMemoryIdempotencyStore } from "./adapters/inmemory/idempotency-store.js";
import { InMemoryLedgerStore } from "./adapters/inmemory/ledger-store.js";
import { LoggingNotifier } from "./adapters/inmemory/notifier.js";
import { InMemoryPaymentRepository } from "./adapters/inmemory/payment-repository.js";
import { InMemoryProviderStatementStore } from "./adapters/inmemory/provider-statement-store.js";
import { InMemoryReconciliationRepository } from "./adapters/inmemory/reconciliation-repository.js";
import { InMemorySubscriptionRepository } from "./adapters/inmemory/subscription-repository.js";
import { PostgresIdempotencyStore } from "./adapters/postgres/idempotency-store.js";
import { PostgresLedgerStore } from "./adapters/postgres/ledger-store.js";
import { PostgresPaymentRepository } from "./adapters/postgres/payment-repository.js";
import { PostgresProviderStatementStore } from "./adapters/postgres/provider-statement-store.js";
import { PostgresReconciliationRepository } from "./adapters/postgres/reconciliation-repository.js";
import { PgSession, poolSource } from "./adapters/postgres/session.js";
import { PostgresSubscriptionRepository } from "./adapters/postgres/subscription-repository.js";
import { AirtelProvider } from "./adapters/providers/airtel-provider.js";
import { MpesaProvider } from "./adapters/providers/mpesa-provider.js";
import { SandboxProvider } from "./adapters/providers/sandbox-provider.js";
import { EnvSecretStore } from "./adapters/secrets/env-secret-store.js";
import { IdempotencyGuard } from "./application/idempotency-guard.js";
import { LedgerService } from "./application/ledger.js";
import { NotificationRelay } from "./application/notification-relay.js";
import { PaymentOrchestrator } from "./application/payment-orchestrator.js";
import { ProviderRegistry } from "./application/provider-registry.js";
import { ReconciliationJob } from "./application/reconciliation-job.js";
import type { Sleep } from "./application/retry-policy.js";
import { SettlementWriter } from "./application/settlement-writer.js";
import { SubscriptionEngine } from "./application/subscription-engine.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import type { RuntimeConfig, SupportedProvider } from "./infra/config.js";
import { createLogger, type Logger } from "./infra/logger.js";
import { SettlementMetricsRegistry } from "./infra/metrics.js";
import type { EventBusPort } from "./ports/event-bus.js";
import type { IdempotencyStorePort } from "./ports/idempotency-store.js";
import type { LedgerStorePort } from "./ports/ledger-store.js";
import type { NotifierPort } from "./ports/notifier.js";
import type { PaymentRepositoryPort } from "./ports/payment-repository.js";
import type { ProviderAdapterPort } from "./ports/provider-gateway.js";
import type { ProviderStatementPort } from "./ports/provider-statement.js";
import type { ReconciliationRepositoryPort } from "./ports/reconciliation-repository.js";
import type { SecretStorePort } from "./ports/secret-store.js";
import type { SubscriptionRepositoryPort } from "./ports/subscription-repository.js";

export interface RuntimeOverrides {
  clock?: ClockPort;
  logger?: Logger;
  /** Replaces the adapters built from `config.providers`. */
  providers?: ProviderAdapterPort[];
  secrets?: SecretStorePort;
  notifier?: NotifierPort;
  sleep?: Sleep;
}

export interface SettlementRuntime {
  config: RuntimeConfig;
  clock: ClockPort;
  logger: Logger;
  metrics: SettlementMetricsRegistry;
  eventBus: EventBusPort;
  providers: ProviderRegistry;
  ledger: LedgerService;
  payments: PaymentOrchestrator;
  subscriptions: SubscriptionEngine;
  reconciliation: ReconciliationJob;
  statements: ProviderStatementPort;
  close(): Promise<void>;
}

interface Stores {
  payments: PaymentRepositoryPort;
  subscriptions: SubscriptionRepositoryPort;
  ledger: LedgerStorePort;
  idempotency: IdempotencyStorePort;
  reconciliation: ReconciliationRepositoryPort;
  statements: ProviderStatementPort;
}

function buildStores(config: RuntimeConfig, clock: ClockPort, pool: Pool | null): Stores {
  if (config.storageBackend === "postgres") {
    if (!pool) {
      throw new AppError(500, "invalid_runtime_config", "Postgres storage requested without SETTLE_POSTGRES_URL.");
    }
    const session = new PgSession(poolSource(pool));
    return {
      payments: new PostgresPaymentRepository(session),
      subscriptions: new PostgresSubscriptionRepository(session),
      ledger: new PostgresLedgerStore(session),
      idempotency: new PostgresIdempotencyStore(session, { ttlSeconds: config.idempotencyTtlSeconds, clock }),
      reconciliation: new PostgresReconciliationRepository(session),
      statements: new PostgresProviderStatementStore(session),
    };
  }
  return {
    payments: new InMemoryPaymentRepository(),
    subscriptions: new InMemorySubscriptionRepository(),
    ledger: new InMemoryLedgerStore(),
    idempotency: new InMemoryIdempotencyStore({ ttlSeconds: config.idempotencyTtlSeconds, clock }),
    reconciliation: new InMemoryReconciliationRepository(),
    statements: new InMemoryProviderStatementStore(),
  };
}

function buildProvider(
  name: SupportedProvider,
  config: RuntimeConfig,
  deps: { secrets: SecretStorePort; statements: ProviderStatementPort; clock: ClockPort; logger: Logger },
): ProviderAdapterPort {
  switch (name) {
    case "mpesa":
      return new MpesaProvider({
        environment: config.mpesaEnvironment,
        timeoutMs: config.providerTimeoutMs,
        secrets: deps.secrets,
        clock: deps.clock,
        logger: deps.logger,
      });
    case "airtel":
      return new AirtelProvider({
        environment: config.airtelEnvironment,
        timeoutMs: config.providerTimeoutMs,
        secrets: deps.secrets,
        statements: deps.statements,
        clock: deps.clock,
        logger: deps.logger,
      });
    case "sandbox":
      return new SandboxProvider();
  }
}

/** Composition root shared by the HTTP server and the job runner. */
export function buildRuntime(config: RuntimeConfig, overrides: RuntimeOverrides = {}): SettlementRuntime {
  const clock = overrides.clock ?? new SystemClock();
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const metrics = new SettlementMetricsRegistry();
  const closeActions: Array<() => Promise<void>> = [];

  const pool =
    config.storageBackend === "postgres" && config.postgresUrl
      ? new Pool({
          connectionString: config.postgresUrl,
          max: config.postgresPool.max,
          connectionTimeoutMillis: config.postgresPool.connectionTimeoutMs,
          lock_timeout: config.postgresPool.lockTimeoutMs,
        })
      : null;
  if (pool) {
    closeActions.push(async () => {
      await pool.end();
    });
  }

  const stores = buildStores(config, clock, pool);
  const secrets = overrides.secrets ?? new EnvSecretStore();
  const adapters =
    overrides.providers
    ?? config.providers.map((name) =>
      buildProvider(name, config, { secrets, statements: stores.statements, clock, logger }),
    );

  const providers = new ProviderRegistry(adapters, {
    clock,
    circuitBreaker: {
      enabled: config.providerCircuitBreakerEnabled,
      failureThreshold: config.providerCircuitBreakerFailureThreshold,
      cooldownSeconds: config.providerCircuitBreakerCooldownSeconds,
    },
  });

  const eventBus = new InMemoryEventBus();
  eventBus.subscribe(async (event) => {
    if (config.metricsEnabled) {
      metrics.recordPublishedEvent(event.type);
    }
  });

  const guard = new IdempotencyGuard(stores.idempotency, clock, { leaseSeconds: config.idempotencyLeaseSeconds });
  const ledger = new LedgerService(stores.ledger, clock, logger);
  const writer = new SettlementWriter(stores.payments, ledger, guard, eventBus, clock, logger, {
    taxRateBasisPoints: config.taxRateBasisPoints,
  });

  const payments = new PaymentOrchestrator({
    repository: stores.payments,
    guard,
    writer,
    providers,
    eventBus,
    clock,
    logger,
    settings: {
      intentTtlSeconds: config.intentTtlSeconds,
      callbackTimeoutSeconds: config.callbackTimeoutSeconds,
      callbackBaseUrl: config.callbackBaseUrl,
      retry: config.providerRetry,
    },
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
  });

  const subscriptions = new SubscriptionEngine({
    repository: stores.subscriptions,
    payments,
    providers,
    guard,
    eventBus,
    clock,
    logger,
    settings: {
      dunningOffsetsDays: config.dunningOffsetsDays,
      dunningGraceDays: config.dunningGraceDays,
      downgradePolicy: config.downgradePolicy,
      ...(config.defaultDowngradePlanId ? { defaultDowngradePlanId: config.defaultDowngradePlanId } : {}),
    },
  });
  subscriptions.attach();

  const reconciliation = new ReconciliationJob(ledger, providers, stores.reconciliation, eventBus, clock, logger, {
    currency: config.defaultCurrency,
    tenants: config.reconciliationTenants,
  });

  new NotificationRelay(overrides.notifier ?? new LoggingNotifier(logger), logger).attach(eventBus);

  return {
    config,
    clock,
    logger,
    metrics,
    eventBus,
    providers,
    ledger,
    payments,
    subscriptions,
    reconciliation,
    statements: stores.statements,
    close: async () => {
      for (const closeAction of [...closeActions].reverse()) {
        await closeAction();
      }
    },
  };
}
