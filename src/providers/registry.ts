import { createSilentLogger, type Logger } from "../core/logging";
import { DuplicateProviderError, UnknownProviderError } from "./errors";
import type { ProviderAdapter, ProviderCapabilities, ProviderError, ProviderHealth, ProviderOperation } from "./types";

interface ProviderState {
  health: ProviderHealth;
  failures: number;
}

const defaultHealth = (): ProviderHealth => ({
  status: "healthy",
  updatedAt: new Date().toISOString()
});

const HEALTH_RANK: Record<ProviderHealth["status"], number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2
};

const UNHEALTHY_AFTER_FAILURES = 3;

/**
 * Holds every adapter by id and tracks which one serves queries that do not
 * name a provider. Owned by the runtime instance, never a module singleton.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, ProviderAdapter>();
  private readonly state = new Map<string, ProviderState>();
  private activeId: string | null = null;

  constructor(private readonly logger: Logger = createSilentLogger("registry")) {}

  register(provider: ProviderAdapter): void {
    if (this.providers.has(provider.id)) {
      throw new DuplicateProviderError(provider.id);
    }

    this.providers.set(provider.id, provider);
    this.state.set(provider.id, {
      health: defaultHealth(),
      failures: 0
    });
    if (this.activeId === null) {
      this.activeId = provider.id;
    }
    this.logger.info("provider.registered", {
      provider: provider.id,
      data: { active: this.activeId === provider.id }
    });
  }

  has(providerId: string): boolean {
    return this.providers.has(providerId);
  }

  get(providerId: string): ProviderAdapter {
    const provider = this.providers.get(providerId);
    if (!provider) {
      throw new UnknownProviderError(providerId);
    }
    return provider;
  }

  list(): ProviderAdapter[] {
    return [...this.providers.values()];
  }

  getActive(): ProviderAdapter {
    if (this.activeId === null) {
      throw new UnknownProviderError("");
    }
    return this.get(this.activeId);
  }

  get activeProviderId(): string | null {
    return this.activeId;
  }

  setActive(providerId: string): void {
    if (!this.providers.has(providerId)) {
      throw new UnknownProviderError(providerId);
    }
    const previous = this.activeId;
    this.activeId = providerId;
    if (previous !== providerId) {
      this.logger.info("provider.active.changed", {
        provider: providerId,
        data: { previous }
      });
    }
  }

  /** Providers that declare the operation, healthiest first, registration order within a tier. */
  listByCapability(operation: ProviderOperation): ProviderAdapter[] {
    return this.list()
      .map((provider, index) => ({ provider, index }))
      .filter(({ provider }) => provider.capabilities().operations[operation])
      .sort((left, right) => {
        const rank = HEALTH_RANK[this.getHealth(left.provider.id).status]
          - HEALTH_RANK[this.getHealth(right.provider.id).status];
        return rank !== 0 ? rank : left.index - right.index;
      })
      .map(({ provider }) => provider);
  }

  capabilities(): ProviderCapabilities[] {
    return this.list().map((provider) => provider.capabilities());
  }

  getHealth(providerId: string): ProviderHealth {
    return this.getState(providerId).health;
  }

  markSuccess(providerId: string, latencyMs: number): void {
    const existing = this.getState(providerId);
    existing.failures = 0;
    existing.health = {
      status: "healthy",
      updatedAt: new Date().toISOString(),
      latencyMs
    };
  }

  markFailure(providerId: string, error: ProviderError): void {
    const existing = this.getState(providerId);
    existing.failures += 1;
    existing.health = {
      status: existing.failures >= UNHEALTHY_AFTER_FAILURES ? "unhealthy" : "degraded",
      updatedAt: new Date().toISOString(),
      reason: error.message
    };
  }

  private getState(providerId: string): ProviderState {
    const state = this.state.get(providerId);
    if (!state) {
      throw new UnknownProviderError(providerId);
    }
    return state;
  }
}
