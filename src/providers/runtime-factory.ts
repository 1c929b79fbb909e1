import { createLogger, type Logger } from "../core/logging";
import type { ProviderConfig, ProviderKind, ReelhubConfig } from "../config";
import { DEFAULT_CACHE_TTLS } from "./cache";
import { createCenguiguiProvider } from "./adapters/cenguigui";
import { createDuanjuSearchProvider } from "./adapters/duanju-search";
import { createUuukaProvider } from "./adapters/uuuka";
import { ProviderRuntime, type RuntimeInit } from "./index";
import type { Fetcher } from "./shared/http";
import { PROVIDER_OPERATIONS, type CacheTtlPolicy, type ProviderAdapter } from "./types";

export interface RuntimeFactoryOptions {
  fetcher?: Fetcher;
  logger?: Logger;
  now?: () => number;
  sleep?: RuntimeInit["sleep"];
}

type AdapterFactory = (config: ProviderConfig, options: RuntimeFactoryOptions) => ProviderAdapter;

const adapterOptions = (config: ProviderConfig, options: RuntimeFactoryOptions) => ({
  id: config.id,
  baseUrl: config.baseUrl,
  timeoutMs: config.timeoutMs,
  qpsBudget: config.qpsBudget,
  qualities: config.qualities,
  fetcher: options.fetcher,
  logger: options.logger
});

const ADAPTER_FACTORIES: Record<ProviderKind, AdapterFactory> = {
  cenguigui: (config, options) => createCenguiguiProvider(adapterOptions(config, options)),
  uuuka: (config, options) => createUuukaProvider(adapterOptions(config, options)),
  "duanju-search": (config, options) => createDuanjuSearchProvider({
    ...adapterOptions(config, options),
    lookbackDays: config.lookbackDays,
    now: options.now
  })
};

const resolveTtls = (overrides: ReelhubConfig["cache"]["ttlMs"]): CacheTtlPolicy["ttlMs"] => {
  const ttlMs = { ...DEFAULT_CACHE_TTLS.ttlMs };
  for (const operation of PROVIDER_OPERATIONS) {
    const override = overrides[operation];
    if (override !== undefined) {
      ttlMs[operation] = override;
    }
  }
  return ttlMs;
};

export const createAdapter = (config: ProviderConfig, options: RuntimeFactoryOptions = {}): ProviderAdapter => {
  return ADAPTER_FACTORIES[config.kind](config, options);
};

/** Builds a runtime holding every enabled provider from the configuration, in file order. */
export const createConfiguredRuntime = (
  config: ReelhubConfig,
  options: RuntimeFactoryOptions = {}
): ProviderRuntime => {
  const logger = options.logger ?? createLogger("provider-runtime");
  const providers = config.providers
    .filter((provider) => provider.enabled)
    .map((provider) => createAdapter(provider, { ...options, logger }));

  return new ProviderRuntime({
    providers,
    activeProvider: config.activeProvider,
    budgets: config.budgets,
    cache: {
      maxEntries: config.cache.maxEntries,
      policy: {
        ttlMs: resolveTtls(config.cache.ttlMs),
        negativeTtlMs: config.cache.negativeTtlMs
      }
    },
    governor: config.governor,
    logger,
    now: options.now,
    sleep: options.sleep
  });
};
