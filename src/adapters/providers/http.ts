import axios, { type AxiosInstance } from "axios";
import type { ZodType, ZodTypeDef } from "zod";
import { ProviderRejectedError, ProviderUnavailableError } from "../../domain/errors.js";
import type { ClockPort } from "../../infra/clock.js";
import type { SecretStorePort } from "../../ports/secret-store.js";

export function createProviderHttpClient(baseURL: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { "Content-Type": "application/json" },
  });
}

export function httpStatusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

export function responseBodyOf(error: unknown): unknown {
  return axios.isAxiosError(error) ? error.response?.data : undefined;
}

/**
 * Maps a transport failure onto the provider error taxonomy: no response,
 * 5xx and 429 are retryable, any other 4xx is a terminal rejection.
 */
export function toProviderError(provider: string, operation: string, error: unknown): Error {
  if (error instanceof ProviderRejectedError || error instanceof ProviderUnavailableError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined || status >= 500 || status === 429) {
      return new ProviderUnavailableError(
        provider,
        `${provider} ${operation} failed: ${status === undefined ? error.code ?? "network_error" : `HTTP ${status}`}.`,
      );
    }
    return new ProviderRejectedError(provider, `http_${status}`, `${provider} ${operation} rejected with HTTP ${status}.`);
  }
  return error instanceof Error ? error : new Error(String(error));
}

export function parseProviderResponse<TOutput>(
  provider: string,
  operation: string,
  schema: ZodType<TOutput, ZodTypeDef, unknown>,
  data: unknown,
): TOutput {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    // An unreadable response leaves the outcome unknown; the status query settles it later.
    throw new ProviderUnavailableError(provider, `${provider} ${operation} returned an unexpected response.`);
  }
  return parsed.data;
}

export async function loadCredentials<TCredentials>(
  secrets: SecretStorePort,
  provider: string,
  tenantId: string,
  schema: ZodType<TCredentials, ZodTypeDef, unknown>,
): Promise<TCredentials> {
  const raw = await secrets.getProviderCredentials(tenantId, provider);
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ProviderRejectedError(
      provider,
      "credentials_missing",
      `${provider} credentials for tenant '${tenantId}' are missing or incomplete.`,
    );
  }
  return parsed.data;
}

/** Per-tenant OAuth access token cache. */
export class AccessTokenCache {
  private readonly tokens = new Map<string, { token: string; expiresAtMs: number }>();

  constructor(private readonly clock: ClockPort) {}

  async get(cacheKey: string, fetchToken: () => Promise<{ token: string; ttlSeconds: number }>): Promise<string> {
    const nowMs = Date.parse(this.clock.nowIso());
    const cached = this.tokens.get(cacheKey);
    if (cached && cached.expiresAtMs > nowMs) {
      return cached.token;
    }
    const fetched = await fetchToken();
    this.tokens.set(cacheKey, { token: fetched.token, expiresAtMs: nowMs + fetched.ttlSeconds * 1000 });
    return fetched.token;
  }

  invalidate(cacheKey: string): void {
    this.tokens.delete(cacheKey);
  }
}

export function majorUnitsToMinor(value: number | string): number {
  return Math.round(Number(value) * 100);
}
