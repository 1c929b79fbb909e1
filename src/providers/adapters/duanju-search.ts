import { createSilentLogger } from "../../core/logging";
import { UpstreamError, isUpstreamFailure } from "../errors";
import {
  createCategoryResult,
  createDramaInfo,
  createSearchResult,
  createStableId,
  isRecord,
  readArray,
  readInteger,
  readRecord,
  readString,
  type UnknownRecord
} from "../normalize";
import { buildUrl, defaultFetcher, requestJson } from "../shared/http";
import type { DramaInfo, ProviderAdapter, ProviderContext, ProviderOperation } from "../types";
import {
  DEFAULT_ADAPTER_QPS,
  DEFAULT_ADAPTER_TIMEOUT_MS,
  buildCapabilities,
  type AdapterOptions
} from "./common";

export const DUANJU_SEARCH_DEFAULT_BASE_URL = "https://kuoapp.com";
export const DUANJU_SEARCH_CATEGORIES = ["今日更新", "热门榜单", "全部短剧"] as const;
export const LOCAL_SEARCH_MESSAGE = "local results (search endpoint unavailable)";

const PAGE_SIZE = 20;
const DEFAULT_LOOKBACK_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;
// Daily lists are keyed by the publisher's calendar day (UTC+8).
const PUBLISHER_UTC_OFFSET_MS = 8 * 60 * 60 * 1000;

export interface DuanjuSearchOptions extends AdapterOptions {
  /** How many days back to look for a non-empty daily list. */
  lookbackDays?: number;
  now?: () => number;
}

export const formatPublisherDay = (epochMs: number): string => {
  return new Date(epochMs + PUBLISHER_UTC_OFFSET_MS).toISOString().slice(0, 10);
};

const paginate = <T>(items: readonly T[], page: number): T[] => {
  const start = (page - 1) * PAGE_SIZE;
  return items.slice(start, start + PAGE_SIZE);
};

/**
 * Deep-link index with a slow keyword search and a per-day publication list.
 * Category listings and the search fallback page through the most recent
 * non-empty daily list locally.
 */
export const createDuanjuSearchProvider = (options: DuanjuSearchOptions = {}): ProviderAdapter => {
  const id = options.id ?? "duanju-search";
  const baseUrl = options.baseUrl ?? DUANJU_SEARCH_DEFAULT_BASE_URL;
  const fetcher = options.fetcher ?? defaultFetcher;
  const logger = options.logger ?? createSilentLogger("provider.duanju-search");
  const now = options.now ?? (() => Date.now());
  const lookbackDays = Math.max(1, Math.floor(options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS));
  const capabilities = buildCapabilities({
    providerId: id,
    name: "Duanju search index",
    description: "Daily index of short dramas published as external storage links",
    operations: ["search", "categories", "categoryDramas", "recommendations"],
    qpsBudget: options.qpsBudget ?? DEFAULT_ADAPTER_QPS,
    qualities: options.qualities ?? []
  });

  const toDrama = (item: UnknownRecord): DramaInfo => {
    const title = readString(item, "name") || readString(item, "title");
    const link = readString(item, "url");
    const addedOn = readString(item, "addtime");
    return createDramaInfo({
      id: link || readString(item, "id") || createStableId(id, title),
      title,
      coverUrl: readString(item, "cover"),
      episodeCount: readInteger(item, "episodes"),
      intro: [link ? `Storage link: ${link}` : "", addedOn ? `Updated: ${addedOn}` : ""].filter(Boolean).join("\n"),
      category: "短剧"
    });
  };

  const readItems = (body: unknown): UnknownRecord[] => {
    const list = Array.isArray(body) ? body : readArray(readRecord(body).data);
    return list.filter(isRecord);
  };

  /** Most recent non-empty daily list, walking back from today. */
  const fetchRecentItems = async (operation: ProviderOperation, context: ProviderContext): Promise<UnknownRecord[]> => {
    const today = now();
    for (let daysAgo = 0; daysAgo < lookbackDays; daysAgo += 1) {
      const day = formatPublisherDay(today - daysAgo * DAY_MS);
      let body: unknown;
      try {
        body = await requestJson({
          provider: id,
          operation,
          url: buildUrl(baseUrl, "duanju/get.php", { day }),
          context,
          fetcher
        });
      } catch (error) {
        // A bad day is skipped; an unreachable host ends the walk.
        if (error instanceof UpstreamError && error.code === "upstream") {
          logger.debug("provider.daily.skipped", {
            requestId: context.trace.requestId,
            provider: id,
            data: { day, reason: error.message }
          });
          continue;
        }
        throw error;
      }

      const items = readItems(body);
      if (items.length > 0) {
        logger.debug("provider.daily.found", {
          requestId: context.trace.requestId,
          provider: id,
          data: { day, count: items.length }
        });
        return items;
      }
    }

    logger.warn("provider.daily.empty", {
      requestId: context.trace.requestId,
      provider: id,
      data: { lookbackDays }
    });
    return [];
  };

  return {
    id,
    timeoutMs: options.timeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS,
    capabilities: () => capabilities,

    search: async (query, context) => {
      try {
        const body = await requestJson({
          provider: id,
          operation: "search",
          url: buildUrl(baseUrl, "duanju/api.php", { param: 1, name: query.keyword, page: query.page }),
          context,
          fetcher
        });
        return createSearchResult(readItems(body).map(toDrama), query.page);
      } catch (error) {
        if (!isUpstreamFailure(error)) throw error;
        logger.warn("provider.search.degraded", {
          requestId: context.trace.requestId,
          provider: id,
          data: { code: error.code, reason: error.message }
        });
      }

      const needle = query.keyword.toLowerCase();
      const matches = (await fetchRecentItems("search", context))
        .map(toDrama)
        .filter((drama) => drama.title.toLowerCase().includes(needle));
      return createSearchResult(paginate(matches, query.page), query.page, LOCAL_SEARCH_MESSAGE);
    },

    getCategories: async () => [...DUANJU_SEARCH_CATEGORIES],

    getCategoryDramas: async (query, context) => {
      const items = (await fetchRecentItems("categoryDramas", context)).map(toDrama);
      return createCategoryResult(query.category, paginate(items, query.offset), query.offset);
    },

    getRecommendations: async (context) => {
      const items = await fetchRecentItems("recommendations", context);
      return items.slice(0, PAGE_SIZE).map(toDrama);
    }
  };
};
