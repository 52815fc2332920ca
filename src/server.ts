import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from "fastify";
import {
  assertCancelSubscriptionInput,
  assertCreatePaymentIntentInput,
  assertCreateSubscriptionInput,
  assertProviderStatementInput,
  assertReconciliationJobInput,
  assertRefundInput,
  assertResolveReconciliationInput,
  assertSweepJobInput,
  normalizeAccount,
  normalizeIsoDateTime,
  normalizeLimit,
  normalizePaymentIntentStatus,
  normalizeReconciliationResolution,
  normalizeResourceId,
  normalizeUtcDate,
  requireTenantId,
  toRefundInput,
} from "./api/validators.js";
import type { CallbackOutcome } from "./application/payment-orchestrator.js";
import { previousUtcDate } from "./domain/billing-calendar.js";
import { AppError } from "./infra/app-error.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { deterministicId } from "./infra/fingerprint.js";
import { buildRuntime, type SettlementRuntime } from "./runtime.js";

const IDEMPOTENCY_KEY_PATTERN = /^[A-Za-z0-9._:-]+$/;

interface IdParams {
  id: string;
}

interface ProviderParams {
  provider: string;
}

type QueryString = Record<string, string | undefined>;

interface Page<TItem> {
  data: TItem[];
  hasMore: boolean;
  nextCursor?: string;
}

function setIdempotencyReplayedHeader(
  reply: { header(name: string, value: string): unknown },
  replayed: boolean,
): void {
  reply.header("X-Idempotency-Replayed", replayed ? "true" : "false");
}

function setIdempotencyKeyEchoHeader(
  reply: { header(name: string, value: string): unknown },
  idempotencyKey: string,
): void {
  reply.header("Idempotency-Key", idempotencyKey);
}

function requireIdempotencyKey(headers: Record<string, unknown>, maxLength: number): string {
  const keyHeader = headers["idempotency-key"];
  if (typeof keyHeader !== "string" || keyHeader.trim().length === 0) {
    throw new AppError(400, "missing_idempotency_key", "Idempotency-Key header is required.");
  }
  const key = keyHeader.trim();
  if (key.length > maxLength) {
    throw new AppError(
      422,
      "invalid_idempotency_key",
      `Idempotency-Key length must be <= ${maxLength}.`,
    );
  }
  if (!IDEMPOTENCY_KEY_PATTERN.test(key)) {
    throw new AppError(
      422,
      "invalid_idempotency_key",
      "Idempotency-Key contains invalid characters.",
    );
  }
  return key;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function isPublicRoute(url: string): boolean {
  return url.startsWith("/health/") || url.startsWith("/webhooks/");
}

function createdFromTo(query: QueryString): { createdFrom?: string; createdTo?: string } {
  const createdFrom = normalizeIsoDateTime(query.created_from, "created_from");
  const createdTo = normalizeIsoDateTime(query.created_to, "created_to");
  if (createdFrom && createdTo && Date.parse(createdFrom) > Date.parse(createdTo)) {
    throw new AppError(422, "invalid_created_range", "created_from must be lower or equal to created_to.");
  }
  return {
    ...(createdFrom ? { createdFrom } : {}),
    ...(createdTo ? { createdTo } : {}),
  };
}

function pageBody<TItem>(page: Page<TItem>, limit: number) {
  return {
    data: page.data,
    pagination: {
      limit,
      has_more: page.hasMore,
      next_cursor: page.nextCursor ?? null,
    },
  };
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  runtime: SettlementRuntime = buildRuntime(config),
): FastifyInstance {
  const app = Fastify({ logger: false });
  const { metrics, payments, subscriptions, reconciliation, ledger, clock, logger } = runtime;
  const validApiKeys = new Set<string>(config.apiKeys);
  const requestStarts = new WeakMap<FastifyRequest, bigint>();

  function pageInput(query: QueryString): { limit: number; cursor?: string } {
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeResourceId(query.cursor, "cursor");
    return { limit, ...(cursor ? { cursor } : {}) };
  }

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready", providers: runtime.providers.names() });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStarts.set(request, process.hrtime.bigint());
    if (isPublicRoute(request.url)) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const endNs = process.hrtime.bigint();
    const durationSeconds = Number(endNs - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post<{ Params: ProviderParams }>("/webhooks/:provider", async (request, reply) => {
    const provider = request.params.provider;
    let outcome: CallbackOutcome;
    try {
      outcome = (await payments.handleProviderCallback(provider, request.body)).outcome;
    } catch (error) {
      if (config.metricsEnabled && runtime.providers.has(provider)) {
        metrics.recordWebhookOutcome(provider, "error");
      }
      throw error;
    }
    if (config.metricsEnabled) {
      metrics.recordWebhookOutcome(provider, outcome);
    }
    return reply.status(200).send({ received: true, outcome });
  });

  app.post("/v1/payment-intents", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const idempotencyKey = requireIdempotencyKey(request.headers, config.idempotencyKeyMaxLength);
    setIdempotencyKeyEchoHeader(reply, idempotencyKey);
    assertCreatePaymentIntentInput(request.body);
    const result = await payments.createPaymentIntent({ ...request.body, tenant_id: tenantId }, idempotencyKey);
    setIdempotencyReplayedHeader(reply, result.replayed);
    if (result.replayed) {
      metrics.recordIdempotencyReplay("create_payment_intent");
    }
    return reply.status(result.replayed ? 200 : 201).send(result.body);
  });

  app.get<{ Querystring: QueryString }>("/v1/payment-intents", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const query = request.query;
    const page = pageInput(query);
    const status = normalizePaymentIntentStatus(query.status);
    const subjectId = normalizeResourceId(query.subject_id, "subject_id");
    const subscriptionId = normalizeResourceId(query.subscription_id, "subscription_id");
    const provider = normalizeResourceId(query.provider, "provider");
    const result = await payments.listPaymentIntents({
      tenantId,
      ...page,
      ...(status ? { status } : {}),
      ...(subjectId ? { subjectId } : {}),
      ...(subscriptionId ? { subscriptionId } : {}),
      ...(provider ? { provider } : {}),
      ...createdFromTo(query),
    });
    return reply.status(200).send(pageBody(result, page.limit));
  });

  app.get<{ Params: IdParams }>("/v1/payment-intents/:id", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const details = await payments.getPaymentIntent(tenantId, request.params.id);
    return reply.status(200).send({ ...details.intent, payments: details.payments });
  });

  app.post<{ Params: IdParams }>("/v1/payment-intents/:id/initiate", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const intent = await payments.initiatePaymentIntent(tenantId, request.params.id);
    return reply.status(200).send(intent);
  });

  app.post<{ Params: IdParams }>("/v1/payment-intents/:id/cancel", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const intent = await payments.cancelPaymentIntent(tenantId, request.params.id);
    return reply.status(200).send(intent);
  });

  app.post<{ Params: IdParams }>("/v1/payment-intents/:id/status-query", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const intent = await payments.reconcileIntentStatus(tenantId, request.params.id);
    return reply.status(200).send(intent);
  });

  app.post<{ Params: IdParams }>("/v1/payment-intents/:id/refunds", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const idempotencyKey = requireIdempotencyKey(request.headers, config.idempotencyKeyMaxLength);
    setIdempotencyKeyEchoHeader(reply, idempotencyKey);
    assertRefundInput(request.body);
    const result = await payments.refundPaymentIntent(
      tenantId,
      request.params.id,
      toRefundInput(request.body),
      idempotencyKey,
    );
    setIdempotencyReplayedHeader(reply, result.replayed);
    if (result.replayed) {
      metrics.recordIdempotencyReplay("refund_payment_intent");
    }
    return reply.status(result.replayed ? 200 : 201).send(result.body);
  });

  app.post("/v1/subscriptions", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const idempotencyKey = requireIdempotencyKey(request.headers, config.idempotencyKeyMaxLength);
    setIdempotencyKeyEchoHeader(reply, idempotencyKey);
    assertCreateSubscriptionInput(request.body);
    const result = await subscriptions.createSubscription({ ...request.body, tenant_id: tenantId }, idempotencyKey);
    setIdempotencyReplayedHeader(reply, result.replayed);
    if (result.replayed) {
      metrics.recordIdempotencyReplay("create_subscription");
    }
    return reply.status(result.replayed ? 200 : 201).send(result.body);
  });

  app.get<{ Params: IdParams }>("/v1/subscriptions/:id", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const subscription = await subscriptions.getSubscription(tenantId, request.params.id);
    return reply.status(200).send(subscription);
  });

  app.post<{ Params: IdParams }>("/v1/subscriptions/:id/cancel", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    assertCancelSubscriptionInput(request.body);
    const subscription = await subscriptions.cancelSubscription(tenantId, request.params.id, {
      atPeriodEnd: request.body?.at_period_end === true,
    });
    return reply.status(200).send(subscription);
  });

  app.get<{ Params: IdParams }>("/v1/subscriptions/:id/dunning", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const schedules = await subscriptions.listDunning(tenantId, request.params.id);
    return reply.status(200).send({ data: schedules });
  });

  app.get<{ Querystring: QueryString }>("/v1/ledger/entries", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const query = request.query;
    const page = pageInput(query);
    const account = normalizeAccount(query.account);
    const transactionGroupId = normalizeResourceId(query.transaction_group_id, "transaction_group_id");
    const reference = normalizeResourceId(query.reference, "reference");
    const result = await ledger.listEntries({
      tenantId,
      ...page,
      ...(account ? { account } : {}),
      ...(transactionGroupId ? { transactionGroupId } : {}),
      ...(reference ? { reference } : {}),
      ...createdFromTo(query),
    });
    return reply.status(200).send(pageBody(result, page.limit));
  });

  app.get<{ Querystring: QueryString }>("/v1/ledger/balance", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const account = normalizeAccount(request.query.account, true);
    const asOf = normalizeIsoDateTime(request.query.as_of, "as_of") ?? clock.nowIso();
    const balance = await ledger.balanceOf({ tenantId, account, asOf });
    return reply.status(200).send({ tenant_id: tenantId, account, balance, as_of: asOf });
  });

  app.get<{ Querystring: QueryString }>("/v1/reconciliation-records", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    const query = request.query;
    const page = pageInput(query);
    const provider = normalizeResourceId(query.provider, "provider");
    const resolution = normalizeReconciliationResolution(query.resolution);
    const dateFrom = normalizeUtcDate(query.date_from, "date_from");
    const dateTo = normalizeUtcDate(query.date_to, "date_to");
    const result = await reconciliation.list({
      tenantId,
      ...page,
      ...(provider ? { provider } : {}),
      ...(resolution ? { resolution } : {}),
      ...(dateFrom ? { dateFrom } : {}),
      ...(dateTo ? { dateTo } : {}),
    });
    return reply.status(200).send(pageBody(result, page.limit));
  });

  app.post<{ Params: IdParams }>("/v1/reconciliation-records/:id/resolve", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    assertResolveReconciliationInput(request.body);
    const record = await reconciliation.resolve(tenantId, request.params.id, request.body.note);
    return reply.status(200).send(record);
  });

  app.post("/v1/provider-statements", async (request, reply) => {
    const tenantId = requireTenantId(request.headers);
    assertProviderStatementInput(request.body);
    const body = request.body;
    runtime.providers.findByName(body.provider);
    const line = {
      id: deterministicId("stmt", tenantId, body.provider, body.date),
      tenant_id: tenantId,
      provider: body.provider,
      date: body.date,
      currency: body.currency.toUpperCase(),
      total: body.total,
      transaction_count: body.transaction_count,
      imported_at: clock.nowIso(),
    };
    await runtime.statements.saveLine(line);
    logger.info({ tenant_id: tenantId, provider: line.provider, date: line.date }, "provider statement imported");
    return reply.status(201).send(line);
  });

  app.post("/v1/jobs/renewals", async (request, reply) => {
    assertSweepJobInput(request.body);
    const summary = await subscriptions.processDueRenewals(request.body?.now ?? clock.nowIso());
    if (config.metricsEnabled) {
      metrics.recordJobItems("renewals", { ...summary });
    }
    return reply.status(200).send(summary);
  });

  app.post("/v1/jobs/dunning", async (request, reply) => {
    assertSweepJobInput(request.body);
    const summary = await subscriptions.processDunning(request.body?.now ?? clock.nowIso());
    if (config.metricsEnabled) {
      metrics.recordJobItems("dunning", { ...summary });
    }
    return reply.status(200).send(summary);
  });

  app.post("/v1/jobs/expiry", async (request, reply) => {
    assertSweepJobInput(request.body);
    const summary = await payments.expireStaleIntents(request.body?.now ?? clock.nowIso());
    if (config.metricsEnabled) {
      metrics.recordJobItems("expiry", { ...summary });
    }
    return reply.status(200).send(summary);
  });

  app.post("/v1/jobs/reconciliation", async (request, reply) => {
    assertReconciliationJobInput(request.body);
    const body = request.body;
    if (body?.tenant_id && body.provider) {
      const date = body.date ?? previousUtcDate(clock.nowIso());
      const record = await reconciliation.run({ tenantId: body.tenant_id, provider: body.provider, date });
      return reply.status(200).send({ date, records: [record], errors: 0 });
    }
    const result = await reconciliation.runForDate(body?.date);
    if (config.metricsEnabled) {
      metrics.recordJobItems("reconciliation", { records: result.records.length, errors: result.errors });
    }
    return reply.status(200).send(result);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request_body",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, request_id: request.id, url: request.url }, "unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    await runtime.close();
  });

  return app;
}
