import { ProviderUnavailableError } from "../domain/errors.js";
import type { RetryPolicyConfig } from "../infra/config.js";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export function backoffDelayMs(policy: RetryPolicyConfig, attempt: number): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, exponential);
}

export interface RetryObserver {
  onRetry?(attempt: number, delayMs: number, error: ProviderUnavailableError): void;
}

/**
 * Retries `operation` while it throws ProviderUnavailableError, up to
 * `maxAttempts` calls in total. Any other error propagates immediately.
 */
export async function withProviderRetry<TOutput>(
  policy: RetryPolicyConfig,
  operation: (attempt: number) => Promise<TOutput>,
  sleep: Sleep = realSleep,
  observer: RetryObserver = {},
): Promise<TOutput> {
  let attempt = 1;
  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof ProviderUnavailableError) || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delayMs = backoffDelayMs(policy, attempt);
      observer.onRetry?.(attempt, delayMs, error);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
