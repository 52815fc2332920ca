import { describe, expect, it } from "vitest";
import { darajaTimestamp, MpesaProvider, normalizeMpesaMsisdn } from "../src/adapters/providers/mpesa-provider.js";
import { EnvSecretStore } from "../src/adapters/secrets/env-secret-store.js";
import { MalformedCallbackError, ProviderRejectedError, ProviderUnavailableError } from "../src/domain/errors.js";
import type { InitiateCollectionInput } from "../src/ports/provider-gateway.js";
import { silentLogger } from "../src/infra/logger.js";
import { MutableClock } from "./helpers.js";
import { stubHttp, type RecordedRequest, type StubResponse } from "./http-stub.js";

const CREDENTIALS = {
  SETTLE_MPESA_CONSUMER_KEY: "test-key",
  SETTLE_MPESA_CONSUMER_SECRET: "test-secret",
  SETTLE_MPESA_SHORTCODE: "174379",
  SETTLE_MPESA_PASSKEY: "test-passkey",
  SETTLE_MPESA_INITIATOR_NAME: "test-initiator",
  SETTLE_MPESA_SECURITY_CREDENTIAL: "test-credential",
};

const TOKEN: StubResponse = { status: 200, data: { access_token: "test-token", expires_in: "3599" } };

function setup(route: (request: RecordedRequest) => StubResponse, env: NodeJS.ProcessEnv = CREDENTIALS) {
  const clock = new MutableClock("2026-05-04T08:00:00.000Z");
  const stub = stubHttp((request) => (request.url === "/oauth/v1/generate" ? TOKEN : route(request)));
  const provider = new MpesaProvider({
    environment: "sandbox",
    timeoutMs: 1000,
    secrets: new EnvSecretStore(env),
    clock,
    logger: silentLogger(),
    http: stub.http,
  });
  return { provider, requests: stub.requests, clock };
}

function collection(overrides: Partial<InitiateCollectionInput> = {}): InitiateCollectionInput {
  return {
    tenantId: "tenant_a",
    intentId: "pi_1",
    amount: 50000,
    currency: "KES",
    msisdn: "+254700000001",
    accountReference: "SETABCDEF123",
    description: "Renewal plan_pro",
    callbackUrl: "https://settle.test/webhooks/mpesa",
    ...overrides,
  };
}

describe("MpesaProvider", () => {
  it("normalizes Kenyan numbers and Daraja timestamps", () => {
    expect(normalizeMpesaMsisdn("0712345678")).toBe("254712345678");
    expect(normalizeMpesaMsisdn("+254712345678")).toBe("254712345678");
    expect(() => normalizeMpesaMsisdn("12345")).toThrowError(ProviderRejectedError);
    expect(darajaTimestamp("2026-05-04T22:30:15.000Z")).toBe("20260505013015");
  });

  it("sends an STK push in whole shillings and reuses the access token", async () => {
    const { provider, requests } = setup(() => ({
      status: 200,
      data: { MerchantRequestID: "m-1", CheckoutRequestID: "ws_CO_1", ResponseCode: "0" },
    }));

    const first = await provider.initiate(collection());
    await provider.initiate(collection({ intentId: "pi_2" }));

    expect(first).toEqual({ providerReference: "ws_CO_1" });
    expect(requests.filter((request) => request.url === "/oauth/v1/generate")).toHaveLength(1);
    const push = requests[1];
    expect(push?.url).toBe("/mpesa/stkpush/v1/processrequest");
    expect(push?.headers.Authorization).toBe("Bearer test-token");
    expect(push?.body).toEqual({
      BusinessShortCode: "174379",
      Password: Buffer.from("174379test-passkey20260504110000").toString("base64"),
      Timestamp: "20260504110000",
      TransactionType: "CustomerPayBillOnline",
      Amount: 500,
      PartyA: "254700000001",
      PartyB: "174379",
      PhoneNumber: "254700000001",
      CallBackURL: "https://settle.test/webhooks/mpesa",
      AccountReference: "SETABCDEF123",
      TransactionDesc: "Renewal plan_",
    });
  });

  it("refuses amounts M-Pesa cannot collect", async () => {
    const { provider, requests } = setup(() => ({ status: 500, data: {} }));

    await expect(provider.initiate(collection({ amount: 50050 }))).rejects.toMatchObject({
      reason: "fractional_amount",
    });
    await expect(provider.initiate(collection({ currency: "UGX" }))).rejects.toMatchObject({
      reason: "unsupported_currency",
    });
    expect(requests).toHaveLength(0);
  });

  it("maps transport failures onto retryable and terminal errors", async () => {
    let status = 503;
    const { provider } = setup(() => ({ status, data: { errorCode: "500.003.02" } }));

    await expect(provider.initiate(collection())).rejects.toBeInstanceOf(ProviderUnavailableError);
    status = 400;
    await expect(provider.initiate(collection())).rejects.toMatchObject({ reason: "http_400" });
  });

  it("treats a declined push request as a rejection", async () => {
    const { provider } = setup(() => ({
      status: 200,
      data: { MerchantRequestID: "m-1", CheckoutRequestID: "ws_CO_1", ResponseCode: "1", ResponseDescription: "Rejected" },
    }));

    await expect(provider.initiate(collection())).rejects.toMatchObject({ reason: "response_code_1" });
  });

  it("reports missing credentials as a rejection", async () => {
    const { provider } = setup(() => ({ status: 200, data: {} }), {});

    await expect(provider.initiate(collection())).rejects.toMatchObject({ reason: "credentials_missing" });
  });

  it("reports rejected consumer credentials", async () => {
    const clock = new MutableClock("2026-05-04T08:00:00.000Z");
    const stub = stubHttp(() => ({ status: 401, data: {} }));
    const provider = new MpesaProvider({
      environment: "sandbox",
      timeoutMs: 1000,
      secrets: new EnvSecretStore(CREDENTIALS),
      clock,
      logger: silentLogger(),
      http: stub.http,
    });

    await expect(provider.initiate(collection())).rejects.toMatchObject({ reason: "invalid_credentials" });
  });

  it("parses STK callbacks into provider-neutral events", () => {
    const { provider } = setup(() => ({ status: 200, data: {} }));

    const success = provider.parseCallback({
      Body: {
        stkCallback: {
          MerchantRequestID: "m-1",
          CheckoutRequestID: "ws_CO_1",
          ResultCode: 0,
          ResultDesc: "The service request is processed successfully.",
          CallbackMetadata: {
            Item: [
              { Name: "Amount", Value: 500 },
              { Name: "MpesaReceiptNumber", Value: "RCPT1" },
              { Name: "PhoneNumber", Value: 254700000001 },
            ],
          },
        },
      },
    });
    const cancelled = provider.parseCallback({
      Body: { stkCallback: { MerchantRequestID: "m-2", CheckoutRequestID: "ws_CO_2", ResultCode: 1032 } },
    });

    expect(success).toEqual({
      provider: "mpesa",
      providerEventId: "ws_CO_1",
      providerReference: "ws_CO_1",
      outcome: "success",
      amount: 50000,
      receipt: "RCPT1",
    });
    expect(cancelled).toEqual({
      provider: "mpesa",
      providerEventId: "ws_CO_2",
      providerReference: "ws_CO_2",
      outcome: "failure",
      failureReason: "cancelled_by_user",
    });
    expect(() => provider.parseCallback({ Body: {} })).toThrowError(MalformedCallbackError);
    expect(() =>
      provider.parseCallback({
        Body: { stkCallback: { MerchantRequestID: "m-3", CheckoutRequestID: "ws_CO_3", ResultCode: 0 } },
      }),
    ).toThrowError(MalformedCallbackError);
  });

  it("reads STK query results, including payments still in progress", async () => {
    let response: StubResponse = { status: 500, data: { errorCode: "500.001.1001", errorMessage: "still processing" } };
    const { provider } = setup(() => response);

    expect(await provider.queryStatus({ tenantId: "tenant_a", providerReference: "ws_CO_1" })).toEqual({
      outcome: "pending",
    });
    response = { status: 200, data: { ResponseCode: "0", ResultCode: "1", ResultDesc: "Insufficient balance" } };
    expect(await provider.queryStatus({ tenantId: "tenant_a", providerReference: "ws_CO_1" })).toEqual({
      outcome: "failure",
      failureReason: "insufficient_funds",
    });
    response = { status: 200, data: { ResponseCode: "0", ResultCode: "0" } };
    expect(await provider.queryStatus({ tenantId: "tenant_a", providerReference: "ws_CO_1" })).toEqual({
      outcome: "success",
    });
  });

  it("requests reversals by receipt number and waits for the result", async () => {
    const { provider, requests } = setup(() => ({
      status: 200,
      data: { ConversationID: "AG_1", OriginatorConversationID: "oc-1", ResponseCode: "0" },
    }));

    const result = await provider.reverse({
      tenantId: "tenant_a",
      reversalId: "pi_rev_1",
      providerReference: "ws_CO_1",
      receipt: "RCPT1",
      amount: 50000,
      currency: "KES",
      reason: "customer request",
      callbackUrl: "https://settle.test/webhooks/mpesa",
    });

    expect(result).toEqual({ outcome: "pending", reference: "AG_1" });
    const reversal = requests.find((request) => request.url === "/mpesa/reversal/v1/request");
    expect(reversal?.body).toMatchObject({ TransactionID: "RCPT1", Amount: 500, Initiator: "test-initiator" });

    await expect(
      provider.reverse({
        tenantId: "tenant_a",
        reversalId: "pi_rev_2",
        providerReference: "ws_CO_2",
        receipt: null,
        amount: 50000,
        currency: "KES",
        reason: "customer request",
        callbackUrl: "https://settle.test/webhooks/mpesa",
      }),
    ).rejects.toMatchObject({ reason: "missing_receipt" });
  });

  it("parses reversal results posted to the result URL", () => {
    const { provider } = setup(() => ({ status: 200, data: {} }));

    expect(
      provider.parseCallback({
        Result: {
          ResultType: 0,
          ResultCode: 0,
          ResultDesc: "The service request is processed successfully.",
          OriginatorConversationID: "oc-1",
          ConversationID: "AG_1",
          TransactionID: "RV1",
        },
      }),
    ).toEqual({
      provider: "mpesa",
      providerEventId: "AG_1:0",
      providerReference: "AG_1",
      outcome: "success",
      receipt: "RV1",
    });
    expect(
      provider.parseCallback({
        Result: { ResultType: 0, ResultCode: 2001, ResultDesc: "The initiator information is invalid.", ConversationID: "AG_2" },
      }),
    ).toEqual({
      provider: "mpesa",
      providerEventId: "AG_2:2001",
      providerReference: "AG_2",
      outcome: "failure",
      failureReason: "invalid_initiator",
    });
    expect(
      provider.parseCallback({ Result: { ResultCode: "17", ConversationID: "AG_3" } }),
    ).toMatchObject({ outcome: "failure", failureReason: "result_code_17" });
  });

  it("asks for a reversal's status through the transaction status API", async () => {
    const { provider, requests } = setup(() => ({
      status: 200,
      data: { ConversationID: "AG_9", OriginatorConversationID: "oc-9", ResponseCode: "0" },
    }));

    const result = await provider.queryStatus({
      tenantId: "tenant_a",
      providerReference: "AG_1",
      kind: "reversal",
      callbackUrl: "https://settle.test/webhooks/mpesa",
    });

    expect(result).toEqual({ outcome: "pending" });
    expect(requests.find((request) => request.url === "/mpesa/transactionstatus/v1/query")?.body).toEqual({
      Initiator: "test-initiator",
      SecurityCredential: "test-credential",
      CommandID: "TransactionStatusQuery",
      OriginalConversationID: "AG_1",
      PartyA: "174379",
      IdentifierType: "4",
      ResultURL: "https://settle.test/webhooks/mpesa",
      QueueTimeOutURL: "https://settle.test/webhooks/mpesa",
      Remarks: "Reversal status",
      Occasion: "status:AG_1",
    });
    expect(requests.some((request) => request.url === "/mpesa/stkpushquery/v1/query")).toBe(false);
    await expect(
      provider.queryStatus({ tenantId: "tenant_a", providerReference: "AG_1", kind: "reversal" }),
    ).rejects.toMatchObject({ reason: "callback_url_missing" });
  });

  it("settles a reversal from a transaction status result", () => {
    const { provider } = setup(() => ({ status: 200, data: {} }));
    const statusResult = (status: string) => ({
      Result: {
        ResultType: 0,
        ResultCode: 0,
        ConversationID: "AG_9",
        ResultParameters: {
          ResultParameter: [
            { Key: "ReceiptNo", Value: "RV1" },
            { Key: "TransactionStatus", Value: status },
          ],
        },
        ReferenceData: { ReferenceItem: { Key: "Occasion", Value: "status:AG_1" } },
      },
    });

    expect(provider.parseCallback(statusResult("Completed"))).toEqual({
      provider: "mpesa",
      providerEventId: "AG_9:COMPLETED",
      providerReference: "AG_1",
      outcome: "success",
      receipt: "RV1",
    });
    expect(provider.parseCallback(statusResult("Declined"))).toEqual({
      provider: "mpesa",
      providerEventId: "AG_9:DECLINED",
      providerReference: "AG_1",
      outcome: "failure",
      failureReason: "transaction_declined",
    });
    expect(() => provider.parseCallback(statusResult("Pending"))).toThrowError(MalformedCallbackError);
  });

  it("totals pulled transactions page by page", async () => {
    const { provider, requests } = setup((request) => {
      const body = request.body;
      const offset = typeof body === "object" && body !== null && "OffSetValue" in body ? body.OffSetValue : undefined;
      if (offset === "0") {
        return {
          status: 200,
          data: {
            ResponseCode: "1000",
            Response: [[{ transactionId: "T1", amount: "100.00" }, { transactionId: "T2", amount: 50 }]],
          },
        };
      }
      return { status: 200, data: { ResponseCode: "1000", Response: [] } };
    });

    const report = await provider.settlementReport({
      tenantId: "tenant_a",
      currency: "KES",
      from: "2026-05-03T00:00:00.000Z",
      to: "2026-05-03T23:59:59.999Z",
    });

    expect(report).toEqual({ total: 15000, count: 2 });
    const pulls = requests.filter((request) => request.url === "/pulltransactions/v1/query");
    expect(pulls).toHaveLength(2);
    expect(pulls[0]?.body).toEqual({
      ShortCode: "174379",
      StartDate: "2026-05-03 03:00:00",
      EndDate: "2026-05-04 02:59:59",
      OffSetValue: "0",
    });
  });
});
