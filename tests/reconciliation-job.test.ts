import { describe, expect, it } from "vitest";
import { SandboxProvider } from "../src/adapters/providers/sandbox-provider.js";
import { silentLogger } from "../src/infra/logger.js";
import { buildRuntime } from "../src/runtime.js";
import { collectEvents, MutableClock, noSleep, testConfig } from "./helpers.js";

function setup() {
  const clock = new MutableClock("2026-05-03T10:00:00.000Z");
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

async function settle(runtime: ReturnType<typeof setup>["runtime"], key: string, amount: number, reference: string) {
  const created = await runtime.payments.createPaymentIntent(
    {
      tenant_id: "tenant_a",
      subject_id: "sub_customer_1",
      amount,
      currency: "KES",
      provider: "sandbox",
      payer_msisdn: "+254700000001",
    },
    key,
  );
  await runtime.payments.initiatePaymentIntent("tenant_a", created.body.id);
  await runtime.payments.handleProviderCallback("sandbox", { event_id: `E-${key}`, reference, status: "success" });
}

describe("ReconciliationJob", () => {
  it("records the gap between ledger and provider totals for the day", async () => {
    const { clock, sandbox, runtime, events } = setup();
    await settle(runtime, "K1", 10000, "sbx_ref_1");
    clock.setNow("2026-05-04T01:00:00.000Z");
    await settle(runtime, "K2", 7000, "sbx_ref_2");
    sandbox.setSettlementTotal("tenant_a", "2026-05-03", { total: 9500, count: 1 });

    clock.setNow("2026-05-04T02:00:00.000Z");
    const batch = await runtime.reconciliation.runForDate();

    expect(batch.date).toBe("2026-05-03");
    expect(batch.errors).toBe(0);
    expect(batch.records).toHaveLength(1);
    const [record] = batch.records;
    expect(record?.expected_total).toBe(10000);
    expect(record?.reported_total).toBe(9500);
    expect(record?.discrepancy).toBe(500);
    expect(record?.resolution).toBe("pending");
    expect(record?.currency).toBe("KES");

    const discrepancies = events.filter((event) => event.type === "reconciliation.discrepancy");
    expect(discrepancies).toHaveLength(1);
    expect(discrepancies[0]?.data.discrepancy).toBe(500);
  });

  it("keeps one record per tenant, provider and day across reruns", async () => {
    const { clock, sandbox, runtime } = setup();
    await settle(runtime, "K1", 10000, "sbx_ref_1");
    sandbox.setSettlementTotal("tenant_a", "2026-05-03", { total: 9500, count: 1 });
    clock.setNow("2026-05-04T02:00:00.000Z");

    const first = await runtime.reconciliation.run({ tenantId: "tenant_a", provider: "sandbox", date: "2026-05-03" });
    clock.advanceSeconds(3600);
    sandbox.setSettlementTotal("tenant_a", "2026-05-03", { total: 10000, count: 1 });
    const second = await runtime.reconciliation.run({ tenantId: "tenant_a", provider: "sandbox", date: "2026-05-03" });

    expect(second.id).toBe(first.id);
    expect(second.resolution).toBe("matched");
    expect(second.created_at).toBe("2026-05-04T02:00:00.000Z");
    expect(second.updated_at).toBe("2026-05-04T03:00:00.000Z");
    const page = await runtime.reconciliation.list({ tenantId: "tenant_a", limit: 10 });
    expect(page.data).toHaveLength(1);
  });

  it("lets operators resolve a discrepancy and keeps it resolved", async () => {
    const { clock, sandbox, runtime } = setup();
    await settle(runtime, "K1", 10000, "sbx_ref_1");
    sandbox.setSettlementTotal("tenant_a", "2026-05-03", { total: 9500, count: 1 });
    clock.setNow("2026-05-04T02:00:00.000Z");
    const record = await runtime.reconciliation.run({ tenantId: "tenant_a", provider: "sandbox", date: "2026-05-03" });

    const resolved = await runtime.reconciliation.resolve("tenant_a", record.id, "provider fee withheld");
    expect(resolved.resolution).toBe("resolved");
    expect(resolved.resolution_note).toBe("provider fee withheld");

    const rerun = await runtime.reconciliation.run({ tenantId: "tenant_a", provider: "sandbox", date: "2026-05-03" });
    expect(rerun.resolution).toBe("resolved");
    expect(rerun.discrepancy).toBe(500);

    await expect(runtime.reconciliation.resolve("tenant_b", record.id, "wrong tenant")).rejects.toMatchObject({
      statusCode: 404,
      code: "resource_not_found",
    });
  });

  it("refuses to resolve a matched day", async () => {
    const { clock, sandbox, runtime } = setup();
    await settle(runtime, "K1", 10000, "sbx_ref_1");
    sandbox.setSettlementTotal("tenant_a", "2026-05-03", { total: 10000, count: 1 });
    clock.setNow("2026-05-04T02:00:00.000Z");

    const record = await runtime.reconciliation.run({ tenantId: "tenant_a", provider: "sandbox", date: "2026-05-03" });

    expect(record.resolution).toBe("matched");
    await expect(runtime.reconciliation.resolve("tenant_a", record.id, "nothing to do")).rejects.toMatchObject({
      statusCode: 409,
      code: "reconciliation_not_pending",
    });
  });

  it("rejects malformed dates", async () => {
    const { runtime } = setup();

    await expect(
      runtime.reconciliation.run({ tenantId: "tenant_a", provider: "sandbox", date: "2026-02-30" }),
    ).rejects.toMatchObject({ statusCode: 422, code: "invalid_date" });
  });

  it("counts providers that cannot report as errors", async () => {
    const { sandbox, runtime } = setup();
    sandbox.setUnavailable(true);

    const batch = await runtime.reconciliation.runForDate("2026-05-03");

    expect(batch).toEqual({ date: "2026-05-03", records: [], errors: 1 });
  });
});
