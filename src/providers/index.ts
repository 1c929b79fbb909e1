import { createLogger, createRequestId, type Logger } from "../core/logging";
import { QueryCache, type QueryCacheOptions, type QueryCacheStats } from "./cache";
import {
  ProviderRuntimeError,
  UnsupportedOperationError,
  UpstreamError,
  cancelledError,
  invalidInput,
  isProviderRuntimeError,
  toProviderError
} from "./errors";
import { createFingerprint, createTraceContext } from "./normalize";
import { exceedsQuality, normalizeQuality } from "./quality";
import { RateGovernor, type TokenBucketSnapshot } from "./rate-governor";
import { ProviderRegistry } from "./registry";
import { Semaphore, type ReleaseSlot } from "./semaphore";
import type {
  CategoryQuery,
  CategoryResult,
  DramaInfo,
  EpisodeInfo,
  EpisodesQuery,
  ProviderAdapter,
  ProviderCapabilities,
  ProviderContext,
  ProviderHealth,
  ProviderOperation,
  ProviderRuntimeBudgets,
  QueryOptions,
  QueryParamsByOperation,
  SearchQuery,
  SearchResult,
  TaggedResult,
  TraceContext,
  VideoInfo,
  VideoQuery
} from "./types";

export const DEFAULT_PROVIDER_BUDGETS: ProviderRuntimeBudgets = {
  concurrency: 4,
  retries: 1,
  retryDelayMs: 250
};

export interface RuntimeInit {
  providers?: ProviderAdapter[];
  /** Defaults to the first registered provider. */
  activeProvider?: string;
  budgets?: Partial<ProviderRuntimeBudgets>;
  cache?: Omit<QueryCacheOptions, "logger" | "now">;
  governor?: { maxQueueDepth?: number };
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ProviderListing {
  active: string | null;
  providers: Array<{
    capabilities: ProviderCapabilities;
    health: ProviderHealth;
    active: boolean;
  }>;
}

export interface RuntimeStats {
  cache: QueryCacheStats;
  governor: Record<string, TokenBucketSnapshot>;
  workers: { limit: number; active: number; queued: number };
}

type FetchTagged = (context: ProviderContext) => Promise<TaggedResult>;

const UPSTREAM_CODES = new Set(["upstream", "timeout", "network"]);

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => {
  setTimeout(resolve, ms);
});

const requireText = (value: string | undefined, field: string, operation: ProviderOperation, provider: string): string => {
  const trimmed = typeof value === "string" ? value.trim() : "";
  if (!trimmed) {
    throw invalidInput(`${field} must be a non-empty string`, { provider, operation });
  }
  return trimmed;
};

const requirePosition = (value: number | undefined, field: string, operation: ProviderOperation, provider: string): number => {
  if (value === undefined) return 1;
  if (!Number.isInteger(value) || value < 1) {
    throw invalidInput(`${field} must be an integer >= 1, got ${String(value)}`, { provider, operation });
  }
  return value;
};

const resultMismatch = (expected: ProviderOperation, tagged: TaggedResult): ProviderRuntimeError => {
  return new ProviderRuntimeError("internal", `Cached ${tagged.op} result returned for ${expected}`, {
    operation: expected,
    retryable: false
  });
};

/**
 * Canonical query service. Resolves the provider, checks its capabilities,
 * validates parameters and serves every upstream-backed operation through the
 * shared cache. Each upstream request passes the per-provider rate governor
 * before it takes a slot in the shared worker pool.
 */
export class ProviderRuntime {
  readonly registry: ProviderRegistry;
  readonly cache: QueryCache<TaggedResult>;
  readonly governor: RateGovernor;
  private readonly logger: Logger;
  private budgets: ProviderRuntimeBudgets;
  private readonly workers: Semaphore;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private disposed = false;

  constructor(init: RuntimeInit = {}) {
    this.logger = init.logger ?? createLogger("provider-runtime");
    this.now = init.now ?? (() => Date.now());
    this.sleep = init.sleep ?? defaultSleep;
    this.budgets = mergeBudgets(DEFAULT_PROVIDER_BUDGETS, init.budgets);
    this.registry = new ProviderRegistry(this.logger);
    this.cache = new QueryCache<TaggedResult>({
      ...init.cache,
      now: init.now,
      logger: this.logger
    });
    this.governor = new RateGovernor({ maxQueueDepth: init.governor?.maxQueueDepth, now: init.now }, this.logger);
    this.workers = new Semaphore(this.budgets.concurrency);

    for (const provider of init.providers ?? []) {
      this.register(provider);
    }
    if (init.activeProvider) {
      this.registry.setActive(init.activeProvider);
    }
  }

  register(provider: ProviderAdapter): void {
    this.registry.register(provider);
    this.governor.register(provider.id, provider.capabilities().qpsBudget);
  }

  setActiveProvider(providerId: string): void {
    this.registry.setActive(providerId);
  }

  listProviders(): ProviderListing {
    const active = this.registry.activeProviderId;
    return {
      active,
      providers: this.registry.list().map((provider) => ({
        capabilities: provider.capabilities(),
        health: this.registry.getHealth(provider.id),
        active: provider.id === active
      }))
    };
  }

  getBudgets(): ProviderRuntimeBudgets {
    return this.budgets;
  }

  updateBudgets(partial: Partial<ProviderRuntimeBudgets>): ProviderRuntimeBudgets {
    this.budgets = mergeBudgets(this.budgets, partial);
    this.workers.setLimit(this.budgets.concurrency);
    return this.budgets;
  }

  stats(): RuntimeStats {
    const governor: Record<string, TokenBucketSnapshot> = {};
    for (const provider of this.registry.list()) {
      governor[provider.id] = this.governor.snapshot(provider.id);
    }
    return {
      cache: this.cache.stats(),
      governor,
      workers: this.workers.snapshot()
    };
  }

  async search(params: QueryParamsByOperation["search"], options: QueryOptions = {}): Promise<SearchResult> {
    const provider = this.resolveProvider("search", options.providerId);
    const handler = requireHandler(provider, "search", provider.search);
    const query: SearchQuery = {
      keyword: requireText(params.keyword, "keyword", "search", provider.id),
      page: requirePosition(params.page, "page", "search", provider.id)
    };
    const tagged = await this.execute(provider, "search", query, options, async (context) => ({
      op: "search",
      data: await handler(query, context)
    }));
    if (tagged.op === "search") return tagged.data;
    throw resultMismatch("search", tagged);
  }

  async getCategories(options: QueryOptions = {}): Promise<readonly string[]> {
    const provider = this.resolveProvider("categories", options.providerId);
    const handler = requireHandler(provider, "categories", provider.getCategories);
    const capabilities = provider.capabilities();

    if (!capabilities.dynamicCategories) {
      // Static lists never touch the network, so cache and governor are skipped.
      if (options.signal?.aborted) {
        throw cancelledError();
      }
      return handler(this.createContext(provider, this.createTrace(provider, options), 1));
    }

    const tagged = await this.execute(provider, "categories", {}, options, async (context) => ({
      op: "categories",
      data: await handler(context)
    }));
    if (tagged.op === "categories") return tagged.data;
    throw resultMismatch("categories", tagged);
  }

  async getCategoryDramas(
    params: QueryParamsByOperation["categoryDramas"],
    options: QueryOptions = {}
  ): Promise<CategoryResult> {
    const provider = this.resolveProvider("categoryDramas", options.providerId);
    const handler = requireHandler(provider, "categoryDramas", provider.getCategoryDramas);
    const query: CategoryQuery = {
      category: requireText(params.category, "category", "categoryDramas", provider.id),
      offset: requirePosition(params.offset, "offset", "categoryDramas", provider.id)
    };
    const tagged = await this.execute(provider, "categoryDramas", query, options, async (context) => ({
      op: "categoryDramas",
      data: await handler(query, context)
    }));
    if (tagged.op === "categoryDramas") return tagged.data;
    throw resultMismatch("categoryDramas", tagged);
  }

  async getRecommendations(options: QueryOptions = {}): Promise<readonly DramaInfo[]> {
    const provider = this.resolveProvider("recommendations", options.providerId);
    const handler = requireHandler(provider, "recommendations", provider.getRecommendations);
    const tagged = await this.execute(provider, "recommendations", {}, options, async (context) => ({
      op: "recommendations",
      data: await handler(context)
    }));
    if (tagged.op === "recommendations") return tagged.data;
    throw resultMismatch("recommendations", tagged);
  }

  async getEpisodes(params: QueryParamsByOperation["episodes"], options: QueryOptions = {}): Promise<readonly EpisodeInfo[]> {
    const provider = this.resolveProvider("episodes", options.providerId);
    const handler = requireHandler(provider, "episodes", provider.getEpisodes);
    const query: EpisodesQuery = {
      dramaId: requireText(params.dramaId, "dramaId", "episodes", provider.id)
    };
    const tagged = await this.execute(provider, "episodes", query, options, async (context) => ({
      op: "episodes",
      data: await handler(query, context)
    }));
    if (tagged.op === "episodes") return tagged.data;
    throw resultMismatch("episodes", tagged);
  }

  async getVideoUrl(params: QueryParamsByOperation["videoUrl"], options: QueryOptions = {}): Promise<VideoInfo> {
    const provider = this.resolveProvider("videoUrl", options.providerId);
    const handler = requireHandler(provider, "videoUrl", provider.getVideoUrl);
    const query: VideoQuery = {
      episodeId: requireText(params.episodeId, "episodeId", "videoUrl", provider.id),
      quality: normalizeQuality(params.quality, provider.id)
    };
    const tagged = await this.execute(provider, "videoUrl", query, options, async (context) => {
      const video = await handler(query, context);
      if (exceedsQuality(video.quality, query.quality)) {
        throw new UpstreamError(`Provider returned ${video.quality} for a ${query.quality} request`, {
          provider: provider.id,
          operation: "videoUrl",
          retryable: false
        });
      }
      return { op: "videoUrl", data: video };
    });
    if (tagged.op === "videoUrl") return tagged.data;
    throw resultMismatch("videoUrl", tagged);
  }

  dispose(): void {
    this.disposed = true;
    this.governor.dispose();
    this.workers.dispose(cancelledError("Runtime disposed"));
  }

  private resolveProvider(operation: ProviderOperation, providerId?: string): ProviderAdapter {
    const provider = providerId ? this.registry.get(providerId) : this.registry.getActive();
    if (!provider.capabilities().operations[operation]) {
      throw new UnsupportedOperationError(provider.id, operation);
    }
    return provider;
  }

  private createTrace(provider: ProviderAdapter, options: QueryOptions): TraceContext {
    return createTraceContext({ requestId: options.requestId ?? createRequestId() }, provider.id);
  }

  private createContext(provider: ProviderAdapter, trace: TraceContext, attempt: number): ProviderContext {
    return {
      trace,
      timeoutMs: provider.timeoutMs,
      attempt,
      acquire: () => this.admit(provider.id)
    };
  }

  /** Takes a worker slot only after the governor admits the request. */
  private async admit(providerId: string): Promise<ReleaseSlot> {
    if (this.disposed) {
      throw cancelledError("Runtime disposed");
    }
    await this.governor.acquire(providerId);
    return this.workers.acquire();
  }

  private execute(
    provider: ProviderAdapter,
    operation: ProviderOperation,
    query: object,
    options: QueryOptions,
    fetch: FetchTagged
  ): Promise<TaggedResult> {
    const trace = this.createTrace(provider, options);
    return this.cache.resolve(
      {
        fingerprint: createFingerprint(provider.id, operation, query),
        providerId: provider.id,
        operation,
        signal: options.signal
      },
      () => this.fetchWithRetries(provider, operation, trace, fetch)
    );
  }

  private async fetchWithRetries(
    provider: ProviderAdapter,
    operation: ProviderOperation,
    trace: TraceContext,
    fetch: FetchTagged
  ): Promise<TaggedResult> {
    const maxAttempts = Math.max(1, this.budgets.retries + 1);

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const startedAt = this.now();
      try {
        const result = await fetch(this.createContext(provider, trace, attempt));
        const latencyMs = Math.max(0, this.now() - startedAt);
        this.registry.markSuccess(provider.id, latencyMs);
        this.logger.debug("provider.fetch.succeeded", {
          requestId: trace.requestId,
          provider: provider.id,
          data: { operation, attempt, latencyMs }
        });
        return result;
      } catch (error) {
        const normalized = toProviderError(error, { provider: provider.id, operation });
        if (UPSTREAM_CODES.has(normalized.code)) {
          this.registry.markFailure(provider.id, normalized);
        }

        if (attempt < maxAttempts && normalized.retryable) {
          const delayMs = this.budgets.retryDelayMs * 2 ** (attempt - 1);
          this.logger.warn("provider.fetch.retry", {
            requestId: trace.requestId,
            provider: provider.id,
            data: { operation, attempt, code: normalized.code, delayMs }
          });
          await this.sleep(delayMs);
          continue;
        }

        this.logger.warn("provider.fetch.failed", {
          requestId: trace.requestId,
          provider: provider.id,
          data: { operation, attempt, code: normalized.code, message: normalized.message }
        });
        if (isProviderRuntimeError(error)) {
          throw error;
        }
        throw new ProviderRuntimeError(normalized.code, normalized.message, {
          provider: provider.id,
          operation,
          retryable: normalized.retryable,
          cause: error
        });
      }
    }

    throw new ProviderRuntimeError("internal", "Provider invocation exhausted attempts", {
      provider: provider.id,
      operation
    });
  }
}

function requireHandler<T>(provider: ProviderAdapter, operation: ProviderOperation, handler: T | undefined): T {
  if (handler === undefined) {
    throw new UnsupportedOperationError(provider.id, operation);
  }
  return handler;
}

export const createProviderRuntime = (init: RuntimeInit = {}): ProviderRuntime => {
  return new ProviderRuntime(init);
};

const mergeBudgets = (
  base: ProviderRuntimeBudgets,
  partial: Partial<ProviderRuntimeBudgets> | undefined
): ProviderRuntimeBudgets => {
  if (!partial) return base;
  return {
    concurrency: Math.max(1, Math.floor(partial.concurrency ?? base.concurrency)),
    retries: Math.max(0, Math.floor(partial.retries ?? base.retries)),
    retryDelayMs: Math.max(0, partial.retryDelayMs ?? base.retryDelayMs)
  };
};

export { ProviderRegistry } from "./registry";
export { QueryCache, DEFAULT_CACHE_TTLS, DEFAULT_MAX_ENTRIES } from "./cache";
export { RateGovernor, TokenBucket, DEFAULT_MAX_QUEUE_DEPTH } from "./rate-governor";
export { FetchDispatcher, type CanonicalQuery, type QueryOutcome, type DispatchHandle } from "./dispatcher";
export { withProviderFallback } from "./fallback";
export { createCenguiguiProvider } from "./adapters/cenguigui";
export { createUuukaProvider } from "./adapters/uuuka";
export { createDuanjuSearchProvider } from "./adapters/duanju-search";
export * from "./types";
export * from "./errors";
export * from "./normalize";
export * from "./quality";
