import type { AxiosInstance } from "axios";
import { z } from "zod";
import {
  MalformedCallbackError,
  ProviderRejectedError,
} from "../../domain/errors.js";
import type { ClockPort } from "../../infra/clock.js";
import type { Logger } from "../../infra/logger.js";
import type {
  InitiateCollectionInput,
  InitiateCollectionResult,
  NormalizedEvent,
  ProviderAdapterPort,
  ReverseInput,
  ReverseResult,
  SettlementReport,
  SettlementReportInput,
  StatusQueryInput,
  StatusQueryResult,
} from "../../ports/provider-gateway.js";
import type { SecretStorePort } from "../../ports/secret-store.js";
import {
  AccessTokenCache,
  createProviderHttpClient,
  httpStatusOf,
  loadCredentials,
  majorUnitsToMinor,
  parseProviderResponse,
  responseBodyOf,
  toProviderError,
} from "./http.js";

const PROVIDER = "mpesa";
const BASE_URLS = {
  sandbox: "https://sandbox.safaricom.co.ke",
  production: "https://api.safaricom.co.ke",
} as const;
// Tokens live for an hour; refresh five minutes early.
const TOKEN_TTL_SECONDS = 55 * 60;
const EAT_OFFSET_MS = 3 * 60 * 60 * 1000;
const PULL_PAGE_LIMIT = 100;

const RESULT_CODE_REASONS: Record<string, string> = {
  "1": "insufficient_funds",
  "17": "risk_limit_exceeded",
  "1001": "subscriber_busy",
  "1019": "transaction_expired",
  "1025": "push_request_failed",
  "1032": "cancelled_by_user",
  "1037": "subscriber_unreachable",
  "2001": "invalid_pin",
};

const REVERSAL_RESULT_REASONS: Record<string, string> = {
  "1": "insufficient_funds",
  "11": "debit_party_invalid_state",
  "2001": "invalid_initiator",
  "R000001": "already_reversed",
  "R000002": "reversal_not_permitted",
};

// Marks the Occasion of a Transaction Status query so its result names the reversal it was about.
const STATUS_QUERY_OCCASION_PREFIX = "status:";
const COMPLETED_TRANSACTION_STATUSES = new Set(["COMPLETED"]);
const FAILED_TRANSACTION_STATUSES = new Set(["FAILED", "DECLINED", "CANCELLED", "EXPIRED"]);

// Daraja answers an STK query for a payment still awaiting the customer with this error code.
const STILL_PROCESSING_ERROR_CODE = "500.001.1001";

const credentialsSchema = z.object({
  consumer_key: z.string().min(1),
  consumer_secret: z.string().min(1),
  shortcode: z.string().min(1),
  passkey: z.string().min(1),
  initiator_name: z.string().min(1).optional(),
  security_credential: z.string().min(1).optional(),
});

type MpesaCredentials = z.infer<typeof credentialsSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.union([z.string(), z.number()]).optional(),
});

const stkPushResponseSchema = z.object({
  MerchantRequestID: z.string(),
  CheckoutRequestID: z.string().min(1),
  ResponseCode: z.union([z.string(), z.number()]),
  ResponseDescription: z.string().optional(),
  CustomerMessage: z.string().optional(),
});

const stkQueryResponseSchema = z.object({
  ResponseCode: z.union([z.string(), z.number()]).optional(),
  ResultCode: z.union([z.string(), z.number()]),
  ResultDesc: z.string().optional(),
});

const errorBodySchema = z.object({
  errorCode: z.string(),
  errorMessage: z.string().optional(),
});

const requestAcceptedSchema = z.object({
  ConversationID: z.string().min(1),
  OriginatorConversationID: z.string().optional(),
  ResponseCode: z.union([z.string(), z.number()]),
  ResponseDescription: z.string().optional(),
});

const pullTransactionsResponseSchema = z.object({
  ResponseCode: z.union([z.string(), z.number()]).optional(),
  Response: z
    .array(
      z.array(
        z.object({
          transactionId: z.string(),
          amount: z.union([z.string(), z.number()]),
          transactiontype: z.string().optional(),
        }),
      ),
    )
    .optional(),
});

const callbackItemSchema = z.object({
  Name: z.string(),
  Value: z.union([z.string(), z.number()]).optional(),
});

const stkCallbackSchema = z.object({
  Body: z.object({
    stkCallback: z.object({
      MerchantRequestID: z.string(),
      CheckoutRequestID: z.string().min(1),
      ResultCode: z.union([z.number(), z.string()]),
      ResultDesc: z.string().optional(),
      CallbackMetadata: z
        .object({
          Item: z.array(callbackItemSchema),
        })
        .optional(),
    }),
  }),
});

const keyValueSchema = z.object({
  Key: z.string(),
  Value: z.union([z.string(), z.number()]).optional(),
});

type DarajaKeyValue = z.infer<typeof keyValueSchema>;

const keyValueListSchema = z.union([z.array(keyValueSchema), keyValueSchema]);

// Reversal and Transaction Status results posted to ResultURL.
const resultCallbackSchema = z.object({
  Result: z.object({
    ResultType: z.union([z.number(), z.string()]).optional(),
    ResultCode: z.union([z.number(), z.string()]),
    ResultDesc: z.string().optional(),
    OriginatorConversationID: z.string().optional(),
    ConversationID: z.string().min(1),
    TransactionID: z.string().optional(),
    ResultParameters: z.object({ ResultParameter: keyValueListSchema }).optional(),
    ReferenceData: z.object({ ReferenceItem: keyValueListSchema }).optional(),
  }),
});

type DarajaResult = z.infer<typeof resultCallbackSchema>["Result"];

function valueOf(items: DarajaKeyValue | DarajaKeyValue[] | undefined, key: string): string | undefined {
  const list = items === undefined ? [] : Array.isArray(items) ? items : [items];
  const match = list.find((item) => item.Key === key);
  return match?.Value === undefined ? undefined : String(match.Value);
}

export function normalizeMpesaMsisdn(msisdn: string): string {
  const digits = msisdn.trim().replace(/^\+/, "").replace(/\s+/g, "");
  const normalized = digits.startsWith("0") ? `254${digits.slice(1)}` : digits;
  if (!/^254\d{9}$/.test(normalized)) {
    throw new ProviderRejectedError(PROVIDER, "invalid_msisdn", `'${msisdn}' is not a valid Kenyan mobile number.`);
  }
  return normalized;
}

function failureReasonFor(resultCode: string): string {
  return RESULT_CODE_REASONS[resultCode] ?? `result_code_${resultCode}`;
}

/** Daraja timestamps are East Africa Time, formatted YYYYMMDDHHmmss. */
export function darajaTimestamp(iso: string): string {
  const eat = new Date(Date.parse(iso) + EAT_OFFSET_MS).toISOString();
  return eat.slice(0, 19).replace(/[-T:]/g, "");
}

function darajaDateTime(iso: string): string {
  const eat = new Date(Date.parse(iso) + EAT_OFFSET_MS).toISOString();
  return `${eat.slice(0, 10)} ${eat.slice(11, 19)}`;
}

function wholeShillings(amount: number, currency: string): number {
  if (currency !== "KES") {
    throw new ProviderRejectedError(PROVIDER, "unsupported_currency", `M-Pesa collects KES only, got '${currency}'.`);
  }
  if (amount % 100 !== 0) {
    throw new ProviderRejectedError(PROVIDER, "fractional_amount", "M-Pesa only accepts whole shilling amounts.");
  }
  return amount / 100;
}

interface MpesaProviderOptions {
  environment: "sandbox" | "production";
  timeoutMs: number;
  secrets: SecretStorePort;
  clock: ClockPort;
  logger: Logger;
  http?: AxiosInstance;
}

/** Lipa Na M-Pesa Online (STK push) over the Daraja API. */
export class MpesaProvider implements ProviderAdapterPort {
  public readonly name = PROVIDER;
  public readonly mode = "push" as const;
  private readonly http: AxiosInstance;
  private readonly tokens: AccessTokenCache;
  private readonly logger: Logger;

  constructor(private readonly options: MpesaProviderOptions) {
    this.http = options.http ?? createProviderHttpClient(BASE_URLS[options.environment], options.timeoutMs);
    this.tokens = new AccessTokenCache(options.clock);
    this.logger = options.logger.child({ provider: PROVIDER });
  }

  async initiate(input: InitiateCollectionInput): Promise<InitiateCollectionResult> {
    const phone = normalizeMpesaMsisdn(input.msisdn);
    const amount = wholeShillings(input.amount, input.currency);
    const credentials = await this.credentials(input.tenantId);
    const token = await this.accessToken(input.tenantId, credentials);
    const { password, timestamp } = this.password(credentials);

    let data: unknown;
    try {
      const response = await this.http.post(
        "/mpesa/stkpush/v1/processrequest",
        {
          BusinessShortCode: credentials.shortcode,
          Password: password,
          Timestamp: timestamp,
          TransactionType: "CustomerPayBillOnline",
          Amount: amount,
          PartyA: phone,
          PartyB: credentials.shortcode,
          PhoneNumber: phone,
          CallBackURL: input.callbackUrl,
          AccountReference: input.accountReference.slice(0, 12),
          TransactionDesc: input.description.slice(0, 13),
        },
        { headers: { Authorization: `Bearer ${token}` } },
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(PROVIDER, "stk push", error);
    }

    const result = parseProviderResponse(PROVIDER, "stk push", stkPushResponseSchema, data);
    if (String(result.ResponseCode) !== "0") {
      throw new ProviderRejectedError(
        PROVIDER,
        `response_code_${String(result.ResponseCode)}`,
        result.ResponseDescription ?? "M-Pesa declined the STK push request.",
      );
    }
    this.logger.info(
      { tenant_id: input.tenantId, intent_id: input.intentId, checkout_request_id: result.CheckoutRequestID },
      "stk push initiated",
    );
    return { providerReference: result.CheckoutRequestID };
  }

  parseCallback(rawPayload: unknown): NormalizedEvent {
    const stk = stkCallbackSchema.safeParse(rawPayload);
    if (stk.success) {
      return this.parseStkCallback(stk.data.Body.stkCallback);
    }
    const result = resultCallbackSchema.safeParse(rawPayload);
    if (result.success) {
      return this.parseResult(result.data.Result);
    }
    throw new MalformedCallbackError(PROVIDER, "Payload is neither an STK push callback nor a Daraja result.");
  }

  private parseStkCallback(callback: z.infer<typeof stkCallbackSchema>["Body"]["stkCallback"]): NormalizedEvent {
    const resultCode = String(callback.ResultCode);
    const base = {
      provider: PROVIDER,
      providerEventId: callback.CheckoutRequestID,
      providerReference: callback.CheckoutRequestID,
    };
    if (resultCode !== "0") {
      return { ...base, outcome: "failure", failureReason: failureReasonFor(resultCode) };
    }

    const items = callback.CallbackMetadata?.Item ?? [];
    const amountItem = items.find((item) => item.Name === "Amount");
    const receiptItem = items.find((item) => item.Name === "MpesaReceiptNumber");
    if (amountItem?.Value === undefined || receiptItem?.Value === undefined) {
      throw new MalformedCallbackError(PROVIDER, "Successful callback is missing Amount or MpesaReceiptNumber.");
    }
    return {
      ...base,
      outcome: "success",
      amount: majorUnitsToMinor(amountItem.Value),
      receipt: String(receiptItem.Value),
    };
  }

  private parseResult(result: DarajaResult): NormalizedEvent {
    const resultCode = String(result.ResultCode);
    const occasion = valueOf(result.ReferenceData?.ReferenceItem, "Occasion");
    if (occasion?.startsWith(STATUS_QUERY_OCCASION_PREFIX)) {
      return this.parseStatusQueryResult(result, resultCode, occasion.slice(STATUS_QUERY_OCCASION_PREFIX.length));
    }

    const base = {
      provider: PROVIDER,
      providerEventId: `${result.ConversationID}:${resultCode}`,
      providerReference: result.ConversationID,
    };
    if (resultCode !== "0") {
      return {
        ...base,
        outcome: "failure",
        failureReason: REVERSAL_RESULT_REASONS[resultCode] ?? `result_code_${resultCode}`,
      };
    }
    return { ...base, outcome: "success", ...(result.TransactionID ? { receipt: result.TransactionID } : {}) };
  }

  private parseStatusQueryResult(result: DarajaResult, resultCode: string, reversalReference: string): NormalizedEvent {
    if (resultCode !== "0") {
      throw new MalformedCallbackError(PROVIDER, `Transaction status query failed with result code ${resultCode}.`);
    }
    const status = (valueOf(result.ResultParameters?.ResultParameter, "TransactionStatus") ?? "").toUpperCase();
    const base = {
      provider: PROVIDER,
      providerEventId: `${result.ConversationID}:${status}`,
      providerReference: reversalReference,
    };
    if (COMPLETED_TRANSACTION_STATUSES.has(status)) {
      const receipt = valueOf(result.ResultParameters?.ResultParameter, "ReceiptNo");
      return { ...base, outcome: "success", ...(receipt ? { receipt } : {}) };
    }
    if (FAILED_TRANSACTION_STATUSES.has(status)) {
      return { ...base, outcome: "failure", failureReason: `transaction_${status.toLowerCase()}` };
    }
    throw new MalformedCallbackError(PROVIDER, `Transaction status '${status}' is not final.`);
  }

  async queryStatus(input: StatusQueryInput): Promise<StatusQueryResult> {
    if (input.kind === "reversal") {
      return this.requestReversalStatus(input);
    }
    const credentials = await this.credentials(input.tenantId);
    const token = await this.accessToken(input.tenantId, credentials);
    const { password, timestamp } = this.password(credentials);

    let data: unknown;
    try {
      const response = await this.http.post(
        "/mpesa/stkpushquery/v1/query",
        {
          BusinessShortCode: credentials.shortcode,
          Password: password,
          Timestamp: timestamp,
          CheckoutRequestID: input.providerReference,
        },
        { headers: { Authorization: `Bearer ${token}` } },
      );
      data = response.data;
    } catch (error) {
      const body = errorBodySchema.safeParse(responseBodyOf(error));
      if (body.success && body.data.errorCode === STILL_PROCESSING_ERROR_CODE) {
        return { outcome: "pending" };
      }
      throw toProviderError(PROVIDER, "stk query", error);
    }

    const result = parseProviderResponse(PROVIDER, "stk query", stkQueryResponseSchema, data);
    const resultCode = String(result.ResultCode);
    if (resultCode === "0") {
      return { outcome: "success" };
    }
    return { outcome: "failure", failureReason: failureReasonFor(resultCode) };
  }

  async reverse(input: ReverseInput): Promise<ReverseResult> {
    if (!input.receipt) {
      throw new ProviderRejectedError(PROVIDER, "missing_receipt", "M-Pesa reversals need the original receipt number.");
    }
    const amount = wholeShillings(input.amount, input.currency);
    const credentials = await this.credentials(input.tenantId);
    const initiator = this.initiator(credentials);
    const token = await this.accessToken(input.tenantId, credentials);

    let data: unknown;
    try {
      const response = await this.http.post(
        "/mpesa/reversal/v1/request",
        {
          Initiator: initiator.name,
          SecurityCredential: initiator.securityCredential,
          CommandID: "TransactionReversal",
          TransactionID: input.receipt,
          Amount: amount,
          ReceiverParty: credentials.shortcode,
          RecieverIdentifierType: "11",
          ResultURL: input.callbackUrl,
          QueueTimeOutURL: input.callbackUrl,
          Remarks: input.reason.slice(0, 100),
          Occasion: input.reversalId.slice(0, 100),
        },
        { headers: { Authorization: `Bearer ${token}` } },
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(PROVIDER, "reversal", error);
    }

    const result = parseProviderResponse(PROVIDER, "reversal", requestAcceptedSchema, data);
    if (String(result.ResponseCode) !== "0") {
      return {
        outcome: "failure",
        reference: result.ConversationID,
        failureReason: `response_code_${String(result.ResponseCode)}`,
      };
    }
    // Daraja only queues the reversal here; the verdict arrives as a Result posted to ResultURL.
    this.logger.info(
      { tenant_id: input.tenantId, reversal_id: input.reversalId, conversation_id: result.ConversationID },
      "reversal requested",
    );
    return { outcome: "pending", reference: result.ConversationID };
  }

  /** Asks Daraja to post the reversal's status to the callback URL; the answer itself is never synchronous. */
  private async requestReversalStatus(input: StatusQueryInput): Promise<StatusQueryResult> {
    if (!input.callbackUrl) {
      throw new ProviderRejectedError(PROVIDER, "callback_url_missing", "Reversal status queries report to a callback URL.");
    }
    const credentials = await this.credentials(input.tenantId);
    const initiator = this.initiator(credentials);
    const token = await this.accessToken(input.tenantId, credentials);

    let data: unknown;
    try {
      const response = await this.http.post(
        "/mpesa/transactionstatus/v1/query",
        {
          Initiator: initiator.name,
          SecurityCredential: initiator.securityCredential,
          CommandID: "TransactionStatusQuery",
          OriginalConversationID: input.providerReference,
          PartyA: credentials.shortcode,
          IdentifierType: "4",
          ResultURL: input.callbackUrl,
          QueueTimeOutURL: input.callbackUrl,
          Remarks: "Reversal status",
          Occasion: `${STATUS_QUERY_OCCASION_PREFIX}${input.providerReference}`,
        },
        { headers: { Authorization: `Bearer ${token}` } },
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(PROVIDER, "transaction status", error);
    }

    const result = parseProviderResponse(PROVIDER, "transaction status", requestAcceptedSchema, data);
    if (String(result.ResponseCode) !== "0") {
      throw new ProviderRejectedError(
        PROVIDER,
        `response_code_${String(result.ResponseCode)}`,
        result.ResponseDescription ?? "M-Pesa declined the transaction status query.",
      );
    }
    return { outcome: "pending" };
  }

  async settlementReport(input: SettlementReportInput): Promise<SettlementReport> {
    const credentials = await this.credentials(input.tenantId);
    const token = await this.accessToken(input.tenantId, credentials);
    let total = 0;
    let count = 0;

    for (let page = 0; page < PULL_PAGE_LIMIT; page += 1) {
      let data: unknown;
      try {
        const response = await this.http.post(
          "/pulltransactions/v1/query",
          {
            ShortCode: credentials.shortcode,
            StartDate: darajaDateTime(input.from),
            EndDate: darajaDateTime(input.to),
            OffSetValue: String(count),
          },
          { headers: { Authorization: `Bearer ${token}` } },
        );
        data = response.data;
      } catch (error) {
        throw toProviderError(PROVIDER, "pull transactions", error);
      }
      const result = parseProviderResponse(PROVIDER, "pull transactions", pullTransactionsResponseSchema, data);
      const rows = result.Response?.flat() ?? [];
      if (rows.length === 0) {
        break;
      }
      for (const row of rows) {
        total += majorUnitsToMinor(row.amount);
      }
      count += rows.length;
    }
    return { total, count };
  }

  private async credentials(tenantId: string): Promise<MpesaCredentials> {
    return loadCredentials(this.options.secrets, PROVIDER, tenantId, credentialsSchema);
  }

  private async accessToken(tenantId: string, credentials: MpesaCredentials): Promise<string> {
    return this.tokens.get(tenantId, async () => {
      const basic = Buffer.from(`${credentials.consumer_key}:${credentials.consumer_secret}`).toString("base64");
      let data: unknown;
      try {
        const response = await this.http.get("/oauth/v1/generate", {
          params: { grant_type: "client_credentials" },
          headers: { Authorization: `Basic ${basic}` },
        });
        data = response.data;
      } catch (error) {
        if (httpStatusOf(error) === 400 || httpStatusOf(error) === 401) {
          throw new ProviderRejectedError(PROVIDER, "invalid_credentials", "M-Pesa rejected the consumer credentials.");
        }
        throw toProviderError(PROVIDER, "oauth", error);
      }
      const token = parseProviderResponse(PROVIDER, "oauth", tokenResponseSchema, data);
      return { token: token.access_token, ttlSeconds: TOKEN_TTL_SECONDS };
    });
  }

  private initiator(credentials: MpesaCredentials): { name: string; securityCredential: string } {
    if (!credentials.initiator_name || !credentials.security_credential) {
      throw new ProviderRejectedError(PROVIDER, "credentials_missing", "M-Pesa reversals need initiator credentials.");
    }
    return { name: credentials.initiator_name, securityCredential: credentials.security_credential };
  }

  private password(credentials: MpesaCredentials): { password: string; timestamp: string } {
    const timestamp = darajaTimestamp(this.options.clock.nowIso());
    const password = Buffer.from(`${credentials.shortcode}${credentials.passkey}${timestamp}`).toString("base64");
    return { password, timestamp };
  }
}
