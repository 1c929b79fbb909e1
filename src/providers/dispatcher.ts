import { createSilentLogger, createRequestId, type Logger } from "../core/logging";
import { toProviderError } from "./errors";
import type { ProviderRuntime } from "./index";
import type {
  ProviderError,
  ProviderOperation,
  QueryOptions,
  QueryParamsByOperation,
  ResultByOperation
} from "./types";

/** One typed canonical query; `op` selects the parameter and result shapes. */
export type CanonicalQuery<K extends ProviderOperation = ProviderOperation> = {
  [P in K]: { op: P; params: QueryParamsByOperation[P] };
}[K];

type QueryHandlers = {
  [K in ProviderOperation]: (params: QueryParamsByOperation[K], options: QueryOptions) => Promise<ResultByOperation[K]>;
};

export type QueryOutcome =
  | { status: "fulfilled"; op: ProviderOperation; value: ResultByOperation[ProviderOperation] }
  | { status: "rejected"; op: ProviderOperation; error: ProviderError }
  | { status: "cancelled"; op: ProviderOperation };

export interface DispatchOptions {
  providerId?: string;
  signal?: AbortSignal;
  /** Fires once per query as it settles; never after cancellation. */
  onResult?: (name: string, outcome: QueryOutcome) => void;
}

export interface DispatchHandle {
  results: Promise<Record<string, QueryOutcome>>;
  /** Ends every unsettled wait. Upstream fetches keep running into the cache. */
  cancel: () => void;
}

/**
 * Entry point for callers: runs single queries or named batches against the
 * runtime. Each batch member settles on its own.
 */
export class FetchDispatcher {
  private readonly handlers: QueryHandlers;

  constructor(
    runtime: ProviderRuntime,
    private readonly logger: Logger = createSilentLogger("dispatcher")
  ) {
    this.handlers = {
      search: (params, options) => runtime.search(params, options),
      categories: (_params, options) => runtime.getCategories(options),
      categoryDramas: (params, options) => runtime.getCategoryDramas(params, options),
      recommendations: (_params, options) => runtime.getRecommendations(options),
      episodes: (params, options) => runtime.getEpisodes(params, options),
      videoUrl: (params, options) => runtime.getVideoUrl(params, options)
    };
  }

  run<K extends ProviderOperation>(query: CanonicalQuery<K>, options: QueryOptions = {}): Promise<ResultByOperation[K]> {
    return this.handlers[query.op](query.params, options);
  }

  dispatch(batch: Record<string, CanonicalQuery>, options: DispatchOptions = {}): DispatchHandle {
    const controller = new AbortController();
    const requestId = createRequestId();
    let cancelled = false;

    const cancel = () => {
      if (cancelled) return;
      cancelled = true;
      controller.abort();
      this.logger.debug("dispatch.cancelled", { requestId });
    };

    const external = options.signal;
    if (external?.aborted) {
      cancel();
    } else {
      external?.addEventListener("abort", cancel, { once: true });
    }

    const entries = Object.entries(batch);
    this.logger.debug("dispatch.started", {
      requestId,
      provider: options.providerId,
      data: { queries: entries.map(([name, query]) => ({ name, op: query.op })) }
    });

    const settle = async (name: string, query: CanonicalQuery): Promise<[string, QueryOutcome]> => {
      let outcome: QueryOutcome;
      try {
        const value = await this.run(query, {
          providerId: options.providerId,
          signal: controller.signal,
          requestId
        });
        outcome = cancelled
          ? { status: "cancelled", op: query.op }
          : { status: "fulfilled", op: query.op, value };
      } catch (error) {
        const serialized = toProviderError(error, { provider: options.providerId, operation: query.op });
        outcome = cancelled || serialized.code === "cancelled"
          ? { status: "cancelled", op: query.op }
          : { status: "rejected", op: query.op, error: serialized };
      }
      if (!cancelled && options.onResult) {
        try {
          options.onResult(name, outcome);
        } catch (error) {
          this.logger.warn("dispatch.callback.failed", {
            requestId,
            data: { name, message: error instanceof Error ? error.message : String(error) }
          });
        }
      }
      return [name, outcome];
    };

    const results = Promise.all(entries.map(([name, query]) => settle(name, query))).then((settled) => {
      external?.removeEventListener("abort", cancel);
      return Object.fromEntries(settled);
    });

    return { results, cancel };
  }
}
