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
  ProviderOutcome,
  ReverseInput,
  ReverseResult,
  SettlementReport,
  SettlementReportInput,
  StatusQueryInput,
  StatusQueryResult,
} from "../../ports/provider-gateway.js";
import type { ProviderStatementPort } from "../../ports/provider-statement.js";
import type { SecretStorePort } from "../../ports/secret-store.js";
import {
  AccessTokenCache,
  createProviderHttpClient,
  httpStatusOf,
  loadCredentials,
  majorUnitsToMinor,
  parseProviderResponse,
  toProviderError,
} from "./http.js";

const PROVIDER = "airtel";
const BASE_URLS = {
  sandbox: "https://openapiuat.airtel.africa",
  production: "https://openapi.airtel.africa",
} as const;
const TOKEN_REFRESH_MARGIN_SECONDS = 300;

const SUCCESS_STATUSES = new Set(["TS", "SUCCESS"]);
const FAILURE_STATUSES = new Set(["TF", "FAILED", "TE"]);

const credentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  country: z.string().length(2).default("KE"),
  currency: z.string().length(3).default("KES"),
});

type AirtelCredentials = z.infer<typeof credentialsSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.union([z.string(), z.number()]).optional(),
});

const statusBlockSchema = z.object({
  success: z.boolean().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
  result_code: z.string().optional(),
});

const collectResponseSchema = z.object({
  data: z
    .object({
      transaction: z.object({
        id: z.union([z.string(), z.number()]).optional(),
        status: z.string().optional(),
      }),
    })
    .nullable()
    .optional(),
  status: statusBlockSchema,
});

const enquiryResponseSchema = z.object({
  data: z.object({
    transaction: z.object({
      id: z.union([z.string(), z.number()]).optional(),
      status: z.string(),
      message: z.string().optional(),
      airtel_money_id: z.string().optional(),
    }),
  }),
  status: statusBlockSchema.optional(),
});

const refundResponseSchema = z.object({
  data: z
    .object({
      transaction: z.object({
        airtel_money_id: z.string().optional(),
        status: z.string().optional(),
      }),
    })
    .nullable()
    .optional(),
  status: statusBlockSchema,
});

const callbackSchema = z
  .object({
    transaction: z.object({
      id: z.union([z.string(), z.number()]),
      status: z.string().optional(),
      status_code: z.string().optional(),
      message: z.string().optional(),
      airtel_money_id: z.string().optional(),
      amount: z.union([z.string(), z.number()]).optional(),
    }),
  })
  .refine((payload) => payload.transaction.status ?? payload.transaction.status_code, {
    message: "transaction status is required",
  });

/** Airtel expects the local number with a leading zero. */
export function normalizeAirtelMsisdn(msisdn: string): string {
  const digits = msisdn.trim().replace(/^\+/, "").replace(/\s+/g, "");
  const local = digits.startsWith("254") ? `0${digits.slice(3)}` : digits;
  if (!/^0\d{9}$/.test(local)) {
    throw new ProviderRejectedError(PROVIDER, "invalid_msisdn", `'${msisdn}' is not a valid Kenyan mobile number.`);
  }
  return local;
}

function outcomeOf(status: string): ProviderOutcome {
  const normalized = status.toUpperCase();
  if (SUCCESS_STATUSES.has(normalized)) {
    return "success";
  }
  if (FAILURE_STATUSES.has(normalized)) {
    return "failure";
  }
  return "pending";
}

interface AirtelProviderOptions {
  environment: "sandbox" | "production";
  timeoutMs: number;
  secrets: SecretStorePort;
  statements: ProviderStatementPort;
  clock: ClockPort;
  logger: Logger;
  http?: AxiosInstance;
}

/** Airtel Money merchant collections (direct debit against a consented subscriber). */
export class AirtelProvider implements ProviderAdapterPort {
  public readonly name = PROVIDER;
  public readonly mode = "direct" as const;
  private readonly http: AxiosInstance;
  private readonly tokens: AccessTokenCache;
  private readonly logger: Logger;

  constructor(private readonly options: AirtelProviderOptions) {
    this.http = options.http ?? createProviderHttpClient(BASE_URLS[options.environment], options.timeoutMs);
    this.tokens = new AccessTokenCache(options.clock);
    this.logger = options.logger.child({ provider: PROVIDER });
  }

  async initiate(input: InitiateCollectionInput): Promise<InitiateCollectionResult> {
    const msisdn = normalizeAirtelMsisdn(input.msisdn);
    const credentials = await this.credentials(input.tenantId);
    if (input.currency !== credentials.currency) {
      throw new ProviderRejectedError(
        PROVIDER,
        "unsupported_currency",
        `Airtel account collects ${credentials.currency}, got '${input.currency}'.`,
      );
    }
    const headers = await this.headers(input.tenantId, credentials);

    let data: unknown;
    try {
      const response = await this.http.post(
        "/merchant/v1/payments/",
        {
          reference: input.accountReference,
          subscriber: { country: credentials.country, currency: credentials.currency, msisdn },
          transaction: {
            amount: input.amount / 100,
            country: credentials.country,
            currency: credentials.currency,
            id: input.intentId,
          },
        },
        { headers },
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(PROVIDER, "collect", error);
    }

    const result = parseProviderResponse(PROVIDER, "collect", collectResponseSchema, data);
    if (result.status.success === false) {
      throw new ProviderRejectedError(
        PROVIDER,
        result.status.result_code ?? result.status.code ?? "collect_declined",
        result.status.message ?? "Airtel declined the collection request.",
      );
    }
    const providerReference = String(result.data?.transaction.id ?? input.intentId);
    this.logger.info(
      { tenant_id: input.tenantId, intent_id: input.intentId, transaction_id: providerReference },
      "collection initiated",
    );
    return { providerReference };
  }

  parseCallback(rawPayload: unknown): NormalizedEvent {
    const parsed = callbackSchema.safeParse(rawPayload);
    if (!parsed.success) {
      throw new MalformedCallbackError(PROVIDER, "Payload is not an Airtel collection callback.");
    }
    const transaction = parsed.data.transaction;
    const status = (transaction.status ?? transaction.status_code ?? "").toUpperCase();
    const outcome = outcomeOf(status);
    if (outcome === "pending") {
      throw new MalformedCallbackError(PROVIDER, `Callback carries non-final status '${status}'.`);
    }
    const reference = String(transaction.id);
    return {
      provider: PROVIDER,
      providerEventId: `${reference}:${status}`,
      providerReference: reference,
      outcome,
      ...(transaction.amount !== undefined ? { amount: majorUnitsToMinor(transaction.amount) } : {}),
      ...(transaction.airtel_money_id ? { receipt: transaction.airtel_money_id } : {}),
      ...(outcome === "failure" ? { failureReason: transaction.message ?? `status_${status.toLowerCase()}` } : {}),
    };
  }

  async queryStatus(input: StatusQueryInput): Promise<StatusQueryResult> {
    const credentials = await this.credentials(input.tenantId);
    const headers = await this.headers(input.tenantId, credentials);

    let data: unknown;
    try {
      const response = await this.http.get(`/standard/v1/payments/${encodeURIComponent(input.providerReference)}`, {
        headers,
      });
      data = response.data;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return { outcome: "failure", failureReason: "not_found_at_provider" };
      }
      throw toProviderError(PROVIDER, "transaction enquiry", error);
    }

    const result = parseProviderResponse(PROVIDER, "transaction enquiry", enquiryResponseSchema, data);
    const transaction = result.data.transaction;
    const outcome = outcomeOf(transaction.status);
    return {
      outcome,
      ...(transaction.airtel_money_id ? { receipt: transaction.airtel_money_id } : {}),
      ...(outcome === "failure" ? { failureReason: transaction.message ?? `status_${transaction.status.toLowerCase()}` } : {}),
    };
  }

  async reverse(input: ReverseInput): Promise<ReverseResult> {
    if (!input.receipt) {
      throw new ProviderRejectedError(PROVIDER, "missing_receipt", "Airtel refunds need the Airtel Money id.");
    }
    const credentials = await this.credentials(input.tenantId);
    const headers = await this.headers(input.tenantId, credentials);

    let data: unknown;
    try {
      const response = await this.http.post(
        "/standard/v1/payments/refund",
        { transaction: { airtel_money_id: input.receipt } },
        { headers },
      );
      data = response.data;
    } catch (error) {
      throw toProviderError(PROVIDER, "refund", error);
    }

    const result = parseProviderResponse(PROVIDER, "refund", refundResponseSchema, data);
    const reference = result.data?.transaction.airtel_money_id ?? input.receipt;
    if (result.status.success === false) {
      return {
        outcome: "failure",
        reference,
        failureReason: result.status.result_code ?? result.status.message ?? "refund_declined",
      };
    }
    const status = result.data?.transaction.status;
    return { outcome: status ? outcomeOf(status) : "success", reference };
  }

  /** Airtel exposes no settlement API; totals come from imported statement exports. */
  async settlementReport(input: SettlementReportInput): Promise<SettlementReport> {
    const lines = await this.options.statements.listLines({
      tenantId: input.tenantId,
      provider: PROVIDER,
      dateFrom: input.from.slice(0, 10),
      dateTo: input.to.slice(0, 10),
    });
    return lines
      .filter((line) => line.currency === input.currency)
      .reduce<SettlementReport>(
        (report, line) => ({ total: report.total + line.total, count: report.count + line.transaction_count }),
        { total: 0, count: 0 },
      );
  }

  private async credentials(tenantId: string): Promise<AirtelCredentials> {
    return loadCredentials(this.options.secrets, PROVIDER, tenantId, credentialsSchema);
  }

  private async headers(tenantId: string, credentials: AirtelCredentials): Promise<Record<string, string>> {
    const token = await this.tokens.get(tenantId, async () => {
      let data: unknown;
      try {
        const response = await this.http.post("/auth/oauth2/token", {
          client_id: credentials.client_id,
          client_secret: credentials.client_secret,
          grant_type: "client_credentials",
        });
        data = response.data;
      } catch (error) {
        if (httpStatusOf(error) === 400 || httpStatusOf(error) === 401) {
          throw new ProviderRejectedError(PROVIDER, "invalid_credentials", "Airtel rejected the client credentials.");
        }
        throw toProviderError(PROVIDER, "oauth", error);
      }
      const parsed = parseProviderResponse(PROVIDER, "oauth", tokenResponseSchema, data);
      const expiresIn = Number(parsed.expires_in ?? 3600);
      const ttlSeconds = Number.isFinite(expiresIn) ? Math.max(60, expiresIn - TOKEN_REFRESH_MARGIN_SECONDS) : 3300;
      return { token: parsed.access_token, ttlSeconds };
    });
    return {
      Authorization: `Bearer ${token}`,
      "X-Country": credentials.country,
      "X-Currency": credentials.currency,
    };
  }
}
