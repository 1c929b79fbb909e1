import { createSilentLogger } from "../../core/logging";
import { UpstreamError } from "../errors";
import {
  createCategoryResult,
  createDramaInfo,
  createSearchResult,
  createStableId,
  readArray,
  readInteger,
  readRecord,
  readString,
  type UnknownRecord
} from "../normalize";
import { buildUrl, defaultFetcher, requestJson, type QueryValue } from "../shared/http";
import type { DramaInfo, ProviderAdapter, ProviderContext, ProviderOperation } from "../types";
import {
  DEFAULT_ADAPTER_QPS,
  DEFAULT_ADAPTER_TIMEOUT_MS,
  buildCapabilities,
  type AdapterOptions
} from "./common";

export const UUUKA_DEFAULT_BASE_URL = "https://api.uuuka.com";
const PAGE_SIZE = 20;

/** Display category to upstream content type. */
export const UUUKA_CONTENT_TYPES: Readonly<Record<string, string>> = {
  "短剧": "post",
  "动漫": "dongman",
  "电影": "movie",
  "电视剧": "tv",
  "学习资源": "xuexi",
  "百度短剧": "baidu"
};

interface Page {
  items: DramaInfo[];
  page: number;
  message: string;
}

/**
 * Deep-link index: items point at external storage links instead of
 * playable media, so episode listing and video resolution are absent.
 */
export const createUuukaProvider = (options: AdapterOptions = {}): ProviderAdapter => {
  const id = options.id ?? "uuuka";
  const baseUrl = options.baseUrl ?? UUUKA_DEFAULT_BASE_URL;
  const fetcher = options.fetcher ?? defaultFetcher;
  const logger = options.logger ?? createSilentLogger("provider.uuuka");
  const capabilities = buildCapabilities({
    providerId: id,
    name: "UuuKa short drama index",
    description: "Index of short dramas published as external storage links",
    operations: ["search", "categories", "categoryDramas", "recommendations"],
    qpsBudget: options.qpsBudget ?? DEFAULT_ADAPTER_QPS,
    qualities: options.qualities ?? []
  });

  const toDrama = (item: UnknownRecord): DramaInfo => {
    const link = readString(item, "source_link");
    const title = readString(item, "title");
    return createDramaInfo({
      id: link || createStableId(id, title),
      title,
      intro: link ? `Storage link: ${link}` : "",
      category: readString(item, "type", "post")
    });
  };

  const requestPage = async (
    operation: ProviderOperation,
    path: string,
    params: Record<string, QueryValue>,
    context: ProviderContext,
    fallbackPage: number
  ): Promise<Page> => {
    const body = readRecord(await requestJson({
      provider: id,
      operation,
      url: buildUrl(baseUrl, path, params),
      context,
      fetcher
    }));
    const message = readString(body, "message");
    if (body.success !== true) {
      throw new UpstreamError(`Upstream rejected ${operation}: ${message || "unknown error"}`, {
        provider: id,
        operation
      });
    }
    const data = readRecord(body.data);
    return {
      items: readArray(data.items).map((item) => toDrama(readRecord(item))),
      page: readInteger(data, "page", fallbackPage),
      message: message || "success"
    };
  };

  return {
    id,
    timeoutMs: options.timeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS,
    capabilities: () => capabilities,

    search: async (query, context) => {
      const result = await requestPage("search", "api/search", {
        keyword: query.keyword,
        content_type: "post",
        page: query.page,
        limit: PAGE_SIZE
      }, context, query.page);
      return createSearchResult(result.items, result.page, result.message);
    },

    getCategories: async () => Object.keys(UUUKA_CONTENT_TYPES),

    getCategoryDramas: async (query, context) => {
      const contentType = Object.hasOwn(UUUKA_CONTENT_TYPES, query.category)
        ? UUUKA_CONTENT_TYPES[query.category]
        : undefined;
      if (!contentType) {
        logger.debug("provider.category.unmapped", {
          requestId: context.trace.requestId,
          provider: id,
          data: { category: query.category }
        });
      }
      const result = await requestPage("categoryDramas", `api/contents/${contentType ?? "post"}`, {
        page: query.offset,
        limit: PAGE_SIZE
      }, context, query.offset);
      return createCategoryResult(query.category, result.items, result.page, result.message);
    },

    getRecommendations: async (context) => {
      const today = await requestPage("recommendations", "api/contents/post", {
        today: "today",
        page: 1,
        limit: PAGE_SIZE
      }, context, 1);
      if (today.items.length > 0) {
        return today.items;
      }

      logger.debug("provider.recommendations.latest", {
        requestId: context.trace.requestId,
        provider: id,
        data: { reason: "no updates today" }
      });
      const latest = await requestPage("recommendations", "api/contents/post", {
        page: 1,
        limit: PAGE_SIZE
      }, context, 1);
      return latest.items;
    }
  };
};
