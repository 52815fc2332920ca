import { describe, expect, it } from "vitest";
import { InMemoryProviderStatementStore } from "../src/adapters/inmemory/provider-statement-store.js";
import { AirtelProvider, normalizeAirtelMsisdn } from "../src/adapters/providers/airtel-provider.js";
import { EnvSecretStore } from "../src/adapters/secrets/env-secret-store.js";
import { MalformedCallbackError, ProviderRejectedError } from "../src/domain/errors.js";
import { silentLogger } from "../src/infra/logger.js";
import type { InitiateCollectionInput } from "../src/ports/provider-gateway.js";
import { MutableClock } from "./helpers.js";
import { stubHttp, type RecordedRequest, type StubResponse } from "./http-stub.js";

const CREDENTIALS = {
  SETTLE_AIRTEL_CLIENT_ID: "test-client",
  SETTLE_AIRTEL_CLIENT_SECRET: "test-secret",
};

const TOKEN: StubResponse = { status: 200, data: { access_token: "test-token", expires_in: "180", token_type: "bearer" } };

function setup(route: (request: RecordedRequest) => StubResponse) {
  const clock = new MutableClock("2026-05-04T08:00:00.000Z");
  const statements = new InMemoryProviderStatementStore();
  const stub = stubHttp((request) => (request.url === "/auth/oauth2/token" ? TOKEN : route(request)));
  const provider = new AirtelProvider({
    environment: "sandbox",
    timeoutMs: 1000,
    secrets: new EnvSecretStore(CREDENTIALS),
    statements,
    clock,
    logger: silentLogger(),
    http: stub.http,
  });
  return { provider, statements, clock, requests: stub.requests };
}

function collection(overrides: Partial<InitiateCollectionInput> = {}): InitiateCollectionInput {
  return {
    tenantId: "tenant_a",
    intentId: "pi_1",
    amount: 50000,
    currency: "KES",
    msisdn: "+254733000001",
    accountReference: "SETABCDEF123",
    description: "charge",
    callbackUrl: "https://settle.test/webhooks/airtel",
    ...overrides,
  };
}

describe("AirtelProvider", () => {
  it("uses local numbers with a leading zero", () => {
    expect(normalizeAirtelMsisdn("+254733000001")).toBe("0733000001");
    expect(normalizeAirtelMsisdn("0733000001")).toBe("0733000001");
    expect(() => normalizeAirtelMsisdn("733")).toThrowError(ProviderRejectedError);
  });

  it("collects in major units with country and currency headers", async () => {
    const { provider, requests } = setup(() => ({
      status: 200,
      data: { data: { transaction: { id: "pi_1", status: "Success." } }, status: { success: true, code: "200" } },
    }));

    const result = await provider.initiate(collection());

    expect(result).toEqual({ providerReference: "pi_1" });
    const collect = requests.find((request) => request.url === "/merchant/v1/payments/");
    expect(collect?.headers.Authorization).toBe("Bearer test-token");
    expect(collect?.headers["X-Country"]).toBe("KE");
    expect(collect?.headers["X-Currency"]).toBe("KES");
    expect(collect?.body).toEqual({
      reference: "SETABCDEF123",
      subscriber: { country: "KE", currency: "KES", msisdn: "0733000001" },
      transaction: { amount: 500, country: "KE", currency: "KES", id: "pi_1" },
    });
  });

  it("refreshes the token once its shortened lifetime has passed", async () => {
    const { provider, requests, clock } = setup(() => ({
      status: 200,
      data: { data: { transaction: { id: "pi_1" } }, status: { success: true } },
    }));

    await provider.initiate(collection());
    clock.advanceSeconds(59);
    await provider.initiate(collection());
    clock.advanceSeconds(1);
    await provider.initiate(collection());

    expect(requests.filter((request) => request.url === "/auth/oauth2/token")).toHaveLength(2);
  });

  it("rejects collections Airtel declines", async () => {
    const { provider } = setup(() => ({
      status: 200,
      data: { data: null, status: { success: false, result_code: "ESB000014", message: "Invalid subscriber" } },
    }));

    await expect(provider.initiate(collection())).rejects.toMatchObject({ reason: "ESB000014" });
    await expect(provider.initiate(collection({ currency: "UGX" }))).rejects.toMatchObject({
      reason: "unsupported_currency",
    });
  });

  it("parses final callbacks and refuses interim ones", () => {
    const { provider } = setup(() => ({ status: 200, data: {} }));

    expect(
      provider.parseCallback({
        transaction: { id: "pi_1", status_code: "TS", airtel_money_id: "MP1", message: "Paid" },
      }),
    ).toEqual({
      provider: "airtel",
      providerEventId: "pi_1:TS",
      providerReference: "pi_1",
      outcome: "success",
      receipt: "MP1",
    });
    expect(
      provider.parseCallback({ transaction: { id: "pi_2", status_code: "TF", message: "Insufficient funds" } }),
    ).toEqual({
      provider: "airtel",
      providerEventId: "pi_2:TF",
      providerReference: "pi_2",
      outcome: "failure",
      failureReason: "Insufficient funds",
    });
    expect(() => provider.parseCallback({ transaction: { id: "pi_3", status_code: "TIP" } })).toThrowError(
      MalformedCallbackError,
    );
    expect(() => provider.parseCallback({ transaction: { id: "pi_4" } })).toThrowError(MalformedCallbackError);
  });

  it("answers status enquiries", async () => {
    let response: StubResponse = {
      status: 200,
      data: { data: { transaction: { id: "pi_1", status: "TS", airtel_money_id: "MP1" } }, status: { success: true } },
    };
    const { provider } = setup(() => response);

    expect(await provider.queryStatus({ tenantId: "tenant_a", providerReference: "pi_1" })).toEqual({
      outcome: "success",
      receipt: "MP1",
    });
    response = { status: 200, data: { data: { transaction: { id: "pi_1", status: "TIP" } } } };
    expect(await provider.queryStatus({ tenantId: "tenant_a", providerReference: "pi_1" })).toEqual({
      outcome: "pending",
    });
    response = { status: 404, data: {} };
    expect(await provider.queryStatus({ tenantId: "tenant_a", providerReference: "pi_1" })).toEqual({
      outcome: "failure",
      failureReason: "not_found_at_provider",
    });
  });

  it("refunds by Airtel Money id", async () => {
    const { provider, requests } = setup(() => ({
      status: 200,
      data: { data: { transaction: { airtel_money_id: "MP1", status: "SUCCESS" } }, status: { success: true } },
    }));

    const result = await provider.reverse({
      tenantId: "tenant_a",
      reversalId: "pi_rev_1",
      providerReference: "pi_1",
      receipt: "MP1",
      amount: 50000,
      currency: "KES",
      reason: "customer request",
      callbackUrl: "https://settle.test/webhooks/airtel",
    });

    expect(result).toEqual({ outcome: "success", reference: "MP1" });
    expect(requests.find((request) => request.url === "/standard/v1/payments/refund")?.body).toEqual({
      transaction: { airtel_money_id: "MP1" },
    });
  });

  it("reports settlement totals from imported statements", async () => {
    const { provider, statements } = setup(() => ({ status: 200, data: {} }));
    await statements.saveLine({
      id: "stmt_1",
      tenant_id: "tenant_a",
      provider: "airtel",
      date: "2026-05-03",
      currency: "KES",
      total: 9500,
      transaction_count: 3,
      imported_at: "2026-05-04T06:00:00.000Z",
    });
    await statements.saveLine({
      id: "stmt_2",
      tenant_id: "tenant_a",
      provider: "airtel",
      date: "2026-05-02",
      currency: "KES",
      total: 4000,
      transaction_count: 1,
      imported_at: "2026-05-04T06:00:00.000Z",
    });

    const report = await provider.settlementReport({
      tenantId: "tenant_a",
      currency: "KES",
      from: "2026-05-03T00:00:00.000Z",
      to: "2026-05-03T23:59:59.999Z",
    });

    expect(report).toEqual({ total: 9500, count: 3 });
  });
});
