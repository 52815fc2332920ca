import { describe, expect, it, vi } from "vitest";
import { SandboxProvider } from "../src/adapters/providers/sandbox-provider.js";
import type { CreatePaymentIntentInput } from "../src/domain/types.js";
import type { StatusQueryInput } from "../src/ports/provider-gateway.js";
import { silentLogger } from "../src/infra/logger.js";
import { buildRuntime } from "../src/runtime.js";
import { collectEvents, MutableClock, noSleep, testConfig } from "./helpers.js";

function setup() {
  const clock = new MutableClock("2026-05-04T08:00:00.000Z");
  let sequence = 0;
  const sandbox = new SandboxProvider({
    referenceFactory: () => {
      sequence += 1;
      return `sbx_ref_${sequence}`;
    },
  });
  const runtime = buildRuntime(testConfig(), {
    clock,
    logger: silentLogger(),
    providers: [sandbox],
    sleep: noSleep,
  });
  const events = collectEvents(runtime);
  return { clock, sandbox, runtime, events };
}

function chargeInput(overrides: Partial<CreatePaymentIntentInput> = {}): CreatePaymentIntentInput {
  return {
    tenant_id: "tenant_a",
    subject_id: "sub_customer_1",
    amount: 50000,
    currency: "kes",
    provider: "sandbox",
    payer_msisdn: "+254700000001",
    ...overrides,
  };
}

async function settledCharge(context: ReturnType<typeof setup>) {
  const { runtime } = context;
  const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
  const initiated = await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);
  await runtime.payments.handleProviderCallback("sandbox", {
    event_id: "E1",
    reference: "sbx_ref_1",
    status: "success",
    amount: 50000,
    receipt: "RCPT1",
  });
  return initiated;
}

describe("PaymentOrchestrator", () => {
  it("creates intents idempotently per tenant and key", async () => {
    const { runtime, events } = setup();

    const first = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
    const replay = await runtime.payments.createPaymentIntent(chargeInput(), "K1");

    expect(first.replayed).toBe(false);
    expect(first.body.status).toBe("created");
    expect(first.body.currency).toBe("KES");
    expect(first.body.purpose).toBe("charge");
    expect(first.body.expires_at).toBe("2026-05-04T09:00:00.000Z");
    expect(replay.replayed).toBe(true);
    expect(replay.body.id).toBe(first.body.id);
    expect(events.filter((event) => event.type === "payment_intent.created")).toHaveLength(1);

    await expect(
      runtime.payments.createPaymentIntent(chargeInput({ amount: 49000 }), "K1"),
    ).rejects.toMatchObject({ statusCode: 409, code: "idempotency_conflict" });

    const otherTenant = await runtime.payments.createPaymentIntent(chargeInput({ tenant_id: "tenant_b" }), "K1");
    expect(otherTenant.replayed).toBe(false);
    expect(otherTenant.body.id).not.toBe(first.body.id);
  });

  it("rejects intents for providers that are not configured", async () => {
    const { runtime } = setup();

    await expect(
      runtime.payments.createPaymentIntent(chargeInput({ provider: "mpesa" }), "K1"),
    ).rejects.toMatchObject({ statusCode: 422, code: "provider_not_available" });
  });

  it("settles a successful callback once and posts the settlement group", async () => {
    const context = setup();
    const { runtime, events } = context;

    const initiated = await settledCharge(context);
    expect(initiated.status).toBe("provider_initiated");
    expect(initiated.provider_reference).toBe("sbx_ref_1");

    const details = await runtime.payments.getPaymentIntent("tenant_a", initiated.id);
    expect(details.intent.status).toBe("succeeded");
    expect(details.payments).toHaveLength(1);
    expect(details.payments[0]?.status).toBe("confirmed");
    expect(details.payments[0]?.provider_event_id).toBe("E1");
    expect(details.payments[0]?.normalized_payload?.receipt).toBe("RCPT1");

    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(50000);
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "revenue:sales" })).toBe(50000);

    const replay = await runtime.payments.handleProviderCallback("sandbox", {
      event_id: "E1",
      reference: "sbx_ref_1",
      status: "success",
      amount: 50000,
      receipt: "RCPT1",
    });
    expect(replay.outcome).toBe("duplicate");
    expect(replay.ackRequired).toBe(true);

    const entries = await runtime.ledger.listEntries({ tenantId: "tenant_a", limit: 50 });
    expect(entries.data).toHaveLength(2);
    expect(entries.data.every((entry) => entry.transaction_group_id === `ltx_settle_${initiated.id}`)).toBe(true);
    expect(events.filter((event) => event.type === "payment_intent.succeeded")).toHaveLength(1);
  });

  it("settles once when the same event is delivered concurrently", async () => {
    const { runtime, events } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
    await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);

    const deliveries = await Promise.all(
      Array.from({ length: 5 }, () =>
        runtime.payments.handleProviderCallback("sandbox", { event_id: "E1", reference: "sbx_ref_1", status: "success" }),
      ),
    );

    const outcomes = deliveries.map((delivery) => delivery.outcome).sort();
    expect(outcomes).toEqual(["duplicate", "duplicate", "duplicate", "duplicate", "processed"]);
    const entries = await runtime.ledger.listEntries({ tenantId: "tenant_a", limit: 50 });
    expect(entries.data).toHaveLength(2);
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(50000);
    expect((await runtime.payments.getPaymentIntent("tenant_a", created.body.id)).payments).toHaveLength(1);
    expect(events.filter((event) => event.type === "payment_intent.succeeded")).toHaveLength(1);
  });

  it("splits inclusive tax out of revenue", async () => {
    const clock = new MutableClock("2026-05-04T08:00:00.000Z");
    const sandbox = new SandboxProvider({ referenceFactory: () => "sbx_tax_1" });
    const runtime = buildRuntime(testConfig({ taxRateBasisPoints: 1600 }), {
      clock,
      logger: silentLogger(),
      providers: [sandbox],
      sleep: noSleep,
    });

    const created = await runtime.payments.createPaymentIntent(chargeInput({ amount: 11600 }), "K-tax");
    await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);
    await runtime.payments.handleProviderCallback("sandbox", { event_id: "E-tax", reference: "sbx_tax_1", status: "success" });

    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(11600);
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "revenue:sales" })).toBe(10000);
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "payable:tax" })).toBe(1600);
  });

  it("treats a redelivered event id with a different payload as a duplicate", async () => {
    const context = setup();
    await settledCharge(context);

    const result = await context.runtime.payments.handleProviderCallback("sandbox", {
      event_id: "E1",
      reference: "sbx_ref_1",
      status: "failure",
      failure_reason: "insufficient_funds",
    });

    expect(result).toEqual({ outcome: "duplicate", ackRequired: true });
  });

  it("records a failed callback without touching the ledger", async () => {
    const { runtime } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
    await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);

    const result = await runtime.payments.handleProviderCallback("sandbox", {
      event_id: "E2",
      reference: "sbx_ref_1",
      status: "failure",
      failure_reason: "insufficient_funds",
    });

    expect(result.outcome).toBe("processed");
    expect(result.status).toBe("failed");
    const details = await runtime.payments.getPaymentIntent("tenant_a", created.body.id);
    expect(details.intent.failure_reason).toBe("insufficient_funds");
    expect(details.payments[0]?.status).toBe("failed");
    const entries = await runtime.ledger.listEntries({ tenantId: "tenant_a", limit: 50 });
    expect(entries.data).toHaveLength(0);
  });

  it("acknowledges malformed callbacks and unknown references without settling", async () => {
    const { runtime } = setup();

    const malformed = await runtime.payments.handleProviderCallback("sandbox", { event_id: "E3" });
    expect(malformed).toEqual({ outcome: "malformed", ackRequired: true });

    const payload = { event_id: "E4", reference: "sbx_missing", status: "success" };
    const unknown = await runtime.payments.handleProviderCallback("sandbox", payload);
    expect(unknown).toEqual({ outcome: "unknown_reference", ackRequired: true });

    // Unknown references are not remembered, so a redelivery is looked up again.
    const again = await runtime.payments.handleProviderCallback("sandbox", payload);
    expect(again.outcome).toBe("unknown_reference");

    await expect(runtime.payments.handleProviderCallback("airtel", payload)).rejects.toMatchObject({
      statusCode: 404,
      code: "unknown_provider",
    });
  });

  it("keeps the first verdict and flags a conflicting later one", async () => {
    const { runtime, events, clock } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
    await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);

    clock.advanceSeconds(601);
    const sweep = await runtime.payments.expireStaleIntents();
    expect(sweep).toEqual({ scanned: 1, succeeded: 0, failed: 0, expired: 1, cancelled: 0, errors: 0 });

    const late = await runtime.payments.handleProviderCallback("sandbox", {
      event_id: "E5",
      reference: "sbx_ref_1",
      status: "success",
    });

    expect(late.outcome).toBe("processed");
    expect(late.status).toBe("expired");
    const conflicts = events.filter((event) => event.type === "payment_intent.outcome_conflict");
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]?.data.reported_outcome).toBe("success");
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(0);
  });

  it("settles overdue intents from a status query", async () => {
    const { runtime, sandbox, clock } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
    await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);
    sandbox.setStatus("sbx_ref_1", { outcome: "success", amount: 50000, receipt: "RCPT9" });

    clock.advanceSeconds(600);
    const sweep = await runtime.payments.expireStaleIntents();

    expect(sweep.succeeded).toBe(1);
    const details = await runtime.payments.getPaymentIntent("tenant_a", created.body.id);
    expect(details.intent.status).toBe("succeeded");
    expect(details.payments[0]?.normalized_payload?.provider_event_id).toBe(`status_query:${details.payments[0]?.id}`);
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(50000);
  });

  it("leaves intents inside the callback window alone", async () => {
    const { runtime, clock } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
    await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);

    clock.advanceSeconds(599);
    const sweep = await runtime.payments.expireStaleIntents();

    expect(sweep.scanned).toBe(0);
  });

  it("cancels created intents past their expiry", async () => {
    const { runtime, clock } = setup();
    const stale = await runtime.payments.createPaymentIntent(chargeInput(), "K1");

    clock.advanceSeconds(3600);
    const sweep = await runtime.payments.expireStaleIntents();
    expect(sweep.cancelled).toBe(1);
    const details = await runtime.payments.getPaymentIntent("tenant_a", stale.body.id);
    expect(details.intent.status).toBe("cancelled");
    expect(details.intent.failure_reason).toBe("intent_expired");

    const late = await runtime.payments.createPaymentIntent(chargeInput(), "K2");
    clock.advanceSeconds(3600);
    const initiated = await runtime.payments.initiatePaymentIntent("tenant_a", late.body.id);
    expect(initiated.status).toBe("cancelled");
  });

  it("asks the provider at most once for concurrent initiations", async () => {
    const { runtime, sandbox } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");

    const [first, second] = await Promise.all([
      runtime.payments.initiatePaymentIntent("tenant_a", created.body.id),
      runtime.payments.initiatePaymentIntent("tenant_a", created.body.id),
    ]);

    expect(sandbox.getInitiations()).toHaveLength(1);
    expect(first.status).toBe("provider_initiated");
    expect(second.status).toBe("provider_initiated");
    expect(sandbox.getInitiations()[0]?.callbackUrl).toBe("http://localhost:8080/webhooks/sandbox");
  });

  it("fails intents the provider rejects or cannot reach", async () => {
    const { runtime } = setup();

    const rejected = await runtime.payments.createPaymentIntent(chargeInput({ payer_msisdn: "+254700000000" }), "K1");
    const rejectedResult = await runtime.payments.initiatePaymentIntent("tenant_a", rejected.body.id);
    expect(rejectedResult.status).toBe("failed");
    expect(rejectedResult.failure_reason).toBe("invalid_subscriber");

    const unreachable = await runtime.payments.createPaymentIntent(chargeInput({ payer_msisdn: "+254700009999" }), "K2");
    const unreachableResult = await runtime.payments.initiatePaymentIntent("tenant_a", unreachable.body.id);
    expect(unreachableResult.status).toBe("failed");
    expect(unreachableResult.failure_reason).toBe("provider_unavailable");
  });

  it("only cancels intents that have not been initiated", async () => {
    const { runtime } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");
    await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);

    await expect(runtime.payments.cancelPaymentIntent("tenant_a", created.body.id)).rejects.toMatchObject({
      statusCode: 409,
      code: "invalid_state_transition",
    });

    const other = await runtime.payments.createPaymentIntent(chargeInput(), "K2");
    const cancelled = await runtime.payments.cancelPaymentIntent("tenant_a", other.body.id);
    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.failure_reason).toBe("cancelled_by_operator");
  });

  it("hides intents from other tenants", async () => {
    const { runtime } = setup();
    const created = await runtime.payments.createPaymentIntent(chargeInput(), "K1");

    await expect(runtime.payments.getPaymentIntent("tenant_b", created.body.id)).rejects.toMatchObject({
      statusCode: 404,
      code: "resource_not_found",
    });
  });

  it("reverses a settled payment and zeroes its ledger effect", async () => {
    const context = setup();
    const { runtime, sandbox, events } = context;
    const original = await settledCharge(context);

    const refund = await runtime.payments.refundPaymentIntent(
      "tenant_a",
      original.id,
      { reason: "customer request", initiated_by: "operator" },
      "R1",
    );

    expect(refund.replayed).toBe(false);
    expect(refund.body.purpose).toBe("reversal");
    expect(refund.body.status).toBe("succeeded");
    expect(refund.body.reverses_intent_id).toBe(original.id);
    expect(refund.body.provider_reference).toBe(`sbx_rev_${refund.body.id}`);
    expect(sandbox.getReversals()[0]?.receipt).toBe("RCPT1");

    const details = await runtime.payments.getPaymentIntent("tenant_a", original.id);
    expect(details.intent.status).toBe("reversed");
    expect(details.payments[0]?.status).toBe("reversed");
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(0);
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "revenue:sales" })).toBe(0);
    const reversed = events.filter((event) => event.type === "payment_intent.reversed");
    expect(reversed).toHaveLength(1);
    expect(reversed[0]?.data.reversal_intent_id).toBe(refund.body.id);

    const replay = await runtime.payments.refundPaymentIntent(
      "tenant_a",
      original.id,
      { reason: "customer request", initiated_by: "operator" },
      "R1",
    );
    expect(replay.replayed).toBe(true);
    expect(replay.body.id).toBe(refund.body.id);
    expect(sandbox.getReversals()).toHaveLength(1);

    await expect(
      runtime.payments.refundPaymentIntent("tenant_a", original.id, { reason: "again", initiated_by: "operator" }, "R2"),
    ).rejects.toMatchObject({ statusCode: 409, code: "payment_intent_not_refundable" });
  });

  it("keeps one intent per idempotency key when a refund reuses the charge key", async () => {
    const context = setup();
    const { runtime } = context;
    const original = await settledCharge(context);

    const refund = await runtime.payments.refundPaymentIntent(
      "tenant_a",
      original.id,
      { reason: "customer request", initiated_by: "operator" },
      "K1",
    );

    expect(refund.body.idempotency_key).toBe(`refund:${original.id}:K1`);
    const page = await runtime.payments.listPaymentIntents({ tenantId: "tenant_a", limit: 50 });
    const withK1 = page.data.filter((intent) => intent.idempotency_key === "K1");
    expect(withK1.map((intent) => intent.id)).toEqual([original.id]);
  });

  it("posts partial reversals for the refunded amount", async () => {
    const context = setup();
    const { runtime } = context;
    const original = await settledCharge(context);

    await runtime.payments.refundPaymentIntent(
      "tenant_a",
      original.id,
      { amount: 20000, reason: "partial", initiated_by: "operator" },
      "R1",
    );

    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(30000);
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "revenue:sales" })).toBe(30000);
  });

  it("waits for a pending reversal to be confirmed by callback", async () => {
    const context = setup();
    const { runtime, sandbox } = context;
    const original = await settledCharge(context);
    sandbox.setReversalOutcome("sbx_ref_1", { outcome: "pending", reference: "sbx_rev_pending" });

    const refund = await runtime.payments.refundPaymentIntent(
      "tenant_a",
      original.id,
      { reason: "customer request", initiated_by: "operator" },
      "R1",
    );
    expect(refund.body.status).toBe("provider_initiated");
    expect((await runtime.payments.getPaymentIntent("tenant_a", original.id)).intent.status).toBe("succeeded");

    const callback = await runtime.payments.handleProviderCallback("sandbox", {
      event_id: "E-rev",
      reference: "sbx_rev_pending",
      status: "success",
    });

    expect(callback.status).toBe("succeeded");
    expect((await runtime.payments.getPaymentIntent("tenant_a", original.id)).intent.status).toBe("reversed");
    expect(await runtime.ledger.balanceOf({ tenantId: "tenant_a", account: "cash:sandbox" })).toBe(0);
  });

  it("asks about overdue reversals as reversals", async () => {
    const context = setup();
    const { runtime, sandbox, clock } = context;
    const original = await settledCharge(context);
    sandbox.setReversalOutcome("sbx_ref_1", { outcome: "pending", reference: "sbx_rev_pending" });
    await runtime.payments.refundPaymentIntent(
      "tenant_a",
      original.id,
      { reason: "customer request", initiated_by: "operator" },
      "R1",
    );
    const queries: StatusQueryInput[] = [];
    const queryStatus = sandbox.queryStatus.bind(sandbox);
    vi.spyOn(sandbox, "queryStatus").mockImplementation(async (input) => {
      queries.push(input);
      return queryStatus(input);
    });

    clock.advanceSeconds(600);
    await runtime.payments.expireStaleIntents();

    expect(queries).toEqual([
      {
        tenantId: "tenant_a",
        providerReference: "sbx_rev_pending",
        kind: "reversal",
        callbackUrl: "http://localhost:8080/webhooks/sandbox",
      },
    ]);
  });

  it("refuses refunds of unsettled or oversized amounts", async () => {
    const context = setup();
    const { runtime } = context;
    const pending = await runtime.payments.createPaymentIntent(chargeInput(), "K9");

    await expect(
      runtime.payments.refundPaymentIntent("tenant_a", pending.body.id, { reason: "early", initiated_by: "operator" }, "R1"),
    ).rejects.toMatchObject({ statusCode: 409, code: "payment_intent_not_refundable" });

    const original = await settledCharge(context);
    await expect(
      runtime.payments.refundPaymentIntent(
        "tenant_a",
        original.id,
        { amount: 60000, reason: "too much", initiated_by: "operator" },
        "R2",
      ),
    ).rejects.toMatchObject({ statusCode: 422, code: "refund_exceeds_payment" });
  });
});
