import { UnsupportedOperationError, isProviderRuntimeError, toProviderError } from "./errors";
import type { ProviderRuntime } from "./index";
import type { ProviderError, ProviderOperation } from "./types";

const FALLBACK_CODES = new Set(["upstream", "timeout", "network"]);

export interface FallbackResult<T> {
  providerId: string;
  value: T;
  /** Upstream failures from providers tried before the one that answered. */
  failures: ProviderError[];
}

/** Active provider first, then every other capable provider, healthiest first. */
export const fallbackOrder = (runtime: ProviderRuntime, operation: ProviderOperation): string[] => {
  const capable = runtime.registry.listByCapability(operation).map((provider) => provider.id);
  const active = runtime.registry.activeProviderId;
  if (active === null || !capable.includes(active)) {
    return capable;
  }
  return [active, ...capable.filter((id) => id !== active)];
};

/**
 * Caller-level policy: retries `call` on the next capable provider only after
 * an upstream, timeout or network failure. Any other error propagates. Each
 * attempt is a separate query, so results stay cached per provider.
 */
export const withProviderFallback = async <T>(
  runtime: ProviderRuntime,
  operation: ProviderOperation,
  call: (providerId: string) => Promise<T>
): Promise<FallbackResult<T>> => {
  const order = fallbackOrder(runtime, operation);
  if (order.length === 0) {
    throw new UnsupportedOperationError(runtime.registry.activeProviderId ?? "runtime", operation);
  }

  const failures: ProviderError[] = [];
  let lastError: unknown;
  for (const providerId of order) {
    try {
      const value = await call(providerId);
      return { providerId, value, failures };
    } catch (error) {
      if (!isProviderRuntimeError(error) || !FALLBACK_CODES.has(error.code)) {
        throw error;
      }
      failures.push(toProviderError(error, { provider: providerId, operation }));
      lastError = error;
    }
  }
  throw lastError;
};
