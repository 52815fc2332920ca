import type { ProviderMode } from "../domain/types.js";

export interface InitiateCollectionInput {
  tenantId: string;
  intentId: string;
  amount: number;
  currency: string;
  msisdn: string;
  accountReference: string;
  description: string;
  callbackUrl: string;
}

export interface InitiateCollectionResult {
  providerReference: string;
}

/** Provider-neutral shape every inbound callback is validated into. */
export interface NormalizedEvent {
  provider: string;
  providerEventId: string;
  providerReference: string;
  outcome: "success" | "failure";
  amount?: number;
  failureReason?: string;
  receipt?: string;
}

export type ProviderOutcome = "success" | "failure" | "pending";

export interface StatusQueryInput {
  tenantId: string;
  providerReference: string;
  /** Reversal references name a refund request rather than a collection. */
  kind?: "collection" | "reversal";
  /** Where a provider that answers status queries asynchronously posts its result. */
  callbackUrl?: string;
}

export interface StatusQueryResult {
  outcome: ProviderOutcome;
  amount?: number;
  failureReason?: string;
  receipt?: string;
}

export interface ReverseInput {
  tenantId: string;
  reversalId: string;
  providerReference: string;
  receipt: string | null;
  amount: number;
  currency: string;
  reason: string;
  callbackUrl: string;
}

export interface ReverseResult {
  outcome: ProviderOutcome;
  reference: string;
  failureReason?: string;
}

export interface SettlementReportInput {
  tenantId: string;
  currency: string;
  from: string;
  to: string;
}

export interface SettlementReport {
  total: number;
  count: number;
}

/**
 * Every method throws ProviderUnavailableError for retryable transport
 * failures and ProviderRejectedError for terminal refusals.
 */
export interface ProviderAdapterPort {
  readonly name: string;
  readonly mode: ProviderMode;
  initiate(input: InitiateCollectionInput): Promise<InitiateCollectionResult>;
  /** Throws MalformedCallbackError when the payload does not match the provider's schema. */
  parseCallback(rawPayload: unknown): NormalizedEvent;
  queryStatus(input: StatusQueryInput): Promise<StatusQueryResult>;
  reverse(input: ReverseInput): Promise<ReverseResult>;
  settlementReport(input: SettlementReportInput): Promise<SettlementReport>;
}
