import type { ReleaseSlot } from "./semaphore";

export type ProviderOperation =
  | "search"
  | "categories"
  | "categoryDramas"
  | "recommendations"
  | "episodes"
  | "videoUrl";

export const PROVIDER_OPERATIONS: readonly ProviderOperation[] = [
  "search",
  "categories",
  "categoryDramas",
  "recommendations",
  "episodes",
  "videoUrl"
];

/** Vertical resolution label such as `1080p`. */
export type Quality = string;

export type ProviderErrorCode =
  | "invalid_input"
  | "unsupported_operation"
  | "upstream"
  | "timeout"
  | "network"
  | "rate_limit_exceeded"
  | "unknown_provider"
  | "duplicate_provider"
  | "cancelled"
  | "internal";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface DramaInfo {
  readonly id: string;
  readonly title: string;
  readonly coverUrl: string;
  readonly episodeCount: number;
  readonly intro: string;
  readonly category: string;
  readonly author: string;
  readonly playCount: number;
}

export interface EpisodeInfo {
  readonly id: string;
  readonly title: string;
  readonly ordinal: number;
}

export interface VideoInfo {
  readonly statusCode: number;
  readonly playUrl: string;
  readonly coverUrl: string;
  readonly quality: Quality;
  readonly title: string;
  readonly duration: string;
  readonly sizeLabel: string;
}

export interface SearchResult {
  readonly statusCode: number;
  readonly message: string;
  readonly items: readonly DramaInfo[];
  readonly page: number;
}

export interface CategoryResult {
  readonly statusCode: number;
  readonly message: string;
  readonly category: string;
  readonly items: readonly DramaInfo[];
  readonly offset: number;
}

export interface ProviderCapabilities {
  providerId: string;
  name: string;
  description: string;
  operations: Record<ProviderOperation, boolean>;
  qualitySelection: boolean;
  dynamicCategories: boolean;
  pagination: boolean;
  qpsBudget: number;
  /** Ordered from highest to lowest. */
  qualities: readonly Quality[];
}

export interface ProviderError {
  code: ProviderErrorCode;
  message: string;
  retryable: boolean;
  provider?: string;
  operation?: ProviderOperation;
  details?: Record<string, JsonValue>;
}

export interface TraceContext {
  requestId: string;
  provider?: string;
  ts: string;
}

export interface ProviderContext {
  trace: TraceContext;
  timeoutMs: number;
  attempt: number;
  /**
   * Waits for the rate governor to admit one upstream request, then for a
   * worker slot. Call the returned release once the exchange is over.
   */
  acquire: () => Promise<ReleaseSlot>;
}

export interface ProviderHealth {
  status: "healthy" | "degraded" | "unhealthy";
  updatedAt: string;
  reason?: string;
  latencyMs?: number;
}

export type EmptyParams = Record<string, never>;

/** Parameters as callers pass them; optional fields get defaults during validation. */
export interface QueryParamsByOperation {
  search: { keyword: string; page?: number };
  categories: EmptyParams;
  categoryDramas: { category: string; offset?: number };
  recommendations: EmptyParams;
  episodes: { dramaId: string };
  videoUrl: { episodeId: string; quality?: Quality };
}

export interface SearchQuery {
  keyword: string;
  page: number;
}

export interface CategoryQuery {
  category: string;
  offset: number;
}

export interface EpisodesQuery {
  dramaId: string;
}

export interface VideoQuery {
  episodeId: string;
  quality: Quality;
}

export interface ResultByOperation {
  search: SearchResult;
  categories: readonly string[];
  categoryDramas: CategoryResult;
  recommendations: readonly DramaInfo[];
  episodes: readonly EpisodeInfo[];
  videoUrl: VideoInfo;
}

export type TaggedResult = {
  [Op in ProviderOperation]: { op: Op; data: ResultByOperation[Op] };
}[ProviderOperation];

export interface ProviderAdapter {
  id: string;
  /** Per-request upstream timeout. */
  timeoutMs: number;
  capabilities: () => ProviderCapabilities;
  search?: (query: SearchQuery, context: ProviderContext) => Promise<SearchResult>;
  getCategories?: (context: ProviderContext) => Promise<readonly string[]>;
  getCategoryDramas?: (query: CategoryQuery, context: ProviderContext) => Promise<CategoryResult>;
  getRecommendations?: (context: ProviderContext) => Promise<readonly DramaInfo[]>;
  getEpisodes?: (query: EpisodesQuery, context: ProviderContext) => Promise<readonly EpisodeInfo[]>;
  getVideoUrl?: (query: VideoQuery, context: ProviderContext) => Promise<VideoInfo>;
}

export interface QueryOptions {
  /** Overrides the registry's active provider for this call. */
  providerId?: string;
  /** Abandons the caller's wait; the upstream fetch still completes into the cache. */
  signal?: AbortSignal;
  requestId?: string;
}

export interface ProviderRuntimeBudgets {
  concurrency: number;
  retries: number;
  retryDelayMs: number;
}

export interface CacheTtlPolicy {
  ttlMs: Record<ProviderOperation, number>;
  negativeTtlMs: number;
}
