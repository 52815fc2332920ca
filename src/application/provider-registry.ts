import { ProviderUnavailableError } from "../domain/errors.js";
import { AppError } from "../infra/app-error.js";
import { SystemClock, type ClockPort } from "../infra/clock.js";
import type { ProviderAdapterPort } from "../ports/provider-gateway.js";

export interface CircuitBreakerPolicy {
  enabled: boolean;
  failureThreshold: number;
  cooldownSeconds: number;
}

interface ProviderRegistryOptions {
  circuitBreaker?: Partial<CircuitBreakerPolicy>;
  clock?: ClockPort;
}

interface ProviderCircuitState {
  consecutiveFailures: number;
  openedUntilMs?: number;
}

export class ProviderRegistry {
  private readonly clock: ClockPort;
  private readonly circuitBreaker: CircuitBreakerPolicy;
  private readonly circuits = new Map<string, ProviderCircuitState>();
  private readonly providers = new Map<string, ProviderAdapterPort>();

  constructor(providers: ProviderAdapterPort[], options: ProviderRegistryOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
    this.circuitBreaker = {
      enabled: true,
      failureThreshold: 5,
      cooldownSeconds: 30,
      ...(options.circuitBreaker ?? {}),
    };
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  findByName(name: string): ProviderAdapterPort {
    const provider = this.providers.get(name);
    if (provider) {
      return provider;
    }
    throw new AppError(422, "provider_not_available", `Provider '${name}' is not configured.`);
  }

  /**
   * Runs an outbound provider call behind the provider's circuit. Only
   * ProviderUnavailableError counts towards opening it.
   */
  async call<TOutput>(name: string, operation: (provider: ProviderAdapterPort) => Promise<TOutput>): Promise<TOutput> {
    const provider = this.findByName(name);
    if (this.isProviderCircuitOpen(name)) {
      throw new ProviderUnavailableError(name, `Provider '${name}' is temporarily unavailable (circuit open).`);
    }
    try {
      const result = await operation(provider);
      this.recordOutcome(name, true);
      return result;
    } catch (error) {
      this.recordOutcome(name, !(error instanceof ProviderUnavailableError));
      throw error;
    }
  }

  isProviderCircuitOpen(providerName: string): boolean {
    if (!this.circuitBreaker.enabled) {
      return false;
    }
    const state = this.circuits.get(providerName);
    if (!state?.openedUntilMs) {
      return false;
    }

    const now = Date.parse(this.clock.nowIso());
    if (Number.isFinite(now) && now >= state.openedUntilMs) {
      this.circuits.delete(providerName);
      return false;
    }
    return true;
  }

  private recordOutcome(providerName: string, reachable: boolean): void {
    if (!this.circuitBreaker.enabled) {
      return;
    }
    if (reachable) {
      this.circuits.delete(providerName);
      return;
    }

    const state = this.circuits.get(providerName) ?? { consecutiveFailures: 0 };
    state.consecutiveFailures += 1;
    if (state.consecutiveFailures >= this.circuitBreaker.failureThreshold) {
      const now = Date.parse(this.clock.nowIso());
      state.openedUntilMs = now + this.circuitBreaker.cooldownSeconds * 1000;
      state.consecutiveFailures = 0;
    }
    this.circuits.set(providerName, state);
  }
}
