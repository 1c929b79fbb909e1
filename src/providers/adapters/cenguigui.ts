import { createSilentLogger } from "../../core/logging";
import { UpstreamError, invalidInput } from "../errors";
import {
  assignOrdinals,
  createCategoryResult,
  createDramaInfo,
  createSearchResult,
  createVideoInfo,
  readArray,
  readInteger,
  readRecord,
  readString,
  type UnknownRecord
} from "../normalize";
import { qualityHeight, resolveQuality } from "../quality";
import { buildUrl, defaultFetcher, requestJson, type QueryValue } from "../shared/http";
import type { DramaInfo, ProviderAdapter, ProviderContext, ProviderOperation } from "../types";
import {
  DEFAULT_ADAPTER_QPS,
  DEFAULT_ADAPTER_TIMEOUT_MS,
  buildCapabilities,
  type AdapterOptions
} from "./common";
import CENGUIGUI_CATEGORIES from "./data/cenguigui-categories.json";

export const CENGUIGUI_DEFAULT_BASE_URL = "https://api.cenguigui.cn";
const ENDPOINT = "api/duanju/api.php";
const DEFAULT_QUALITIES = ["1080p", "720p", "360p"];

const toDrama = (item: UnknownRecord): DramaInfo => createDramaInfo({
  id: readString(item, "book_id"),
  title: readString(item, "title"),
  coverUrl: readString(item, "cover"),
  episodeCount: readInteger(item, "episode_cnt"),
  intro: readString(item, "intro"),
  category: readString(item, "type"),
  author: readString(item, "author"),
  playCount: readInteger(item, "play_cnt")
});

/**
 * Direct-media provider behind a single PHP endpoint. The operation is
 * selected by which query parameters are present; every body carries a
 * `code` that must be 200.
 */
export const createCenguiguiProvider = (options: AdapterOptions = {}): ProviderAdapter => {
  const id = options.id ?? "cenguigui";
  const baseUrl = options.baseUrl ?? CENGUIGUI_DEFAULT_BASE_URL;
  const fetcher = options.fetcher ?? defaultFetcher;
  const logger = options.logger ?? createSilentLogger("provider.cenguigui");
  const capabilities = buildCapabilities({
    providerId: id,
    name: "Cenguigui short drama API",
    description: "Direct media provider with searchable catalogue and playable episodes",
    operations: ["search", "categories", "categoryDramas", "recommendations", "episodes", "videoUrl"],
    qpsBudget: options.qpsBudget ?? DEFAULT_ADAPTER_QPS,
    qualities: options.qualities ?? DEFAULT_QUALITIES
  });

  const request = async (
    operation: ProviderOperation,
    params: Record<string, QueryValue>,
    context: ProviderContext
  ): Promise<UnknownRecord> => {
    const body = readRecord(await requestJson({
      provider: id,
      operation,
      url: buildUrl(baseUrl, ENDPOINT, params),
      context,
      fetcher
    }));
    const code = readInteger(body, "code", -1);
    if (code !== 200) {
      const message = readString(body, "msg") || "unknown error";
      logger.warn("provider.upstream.rejected", {
        requestId: context.trace.requestId,
        provider: id,
        data: { operation, code, message }
      });
      throw new UpstreamError(`Upstream rejected ${operation}: ${message}`, {
        provider: id,
        operation,
        details: { upstreamCode: code }
      });
    }
    return body;
  };

  return {
    id,
    timeoutMs: options.timeoutMs ?? DEFAULT_ADAPTER_TIMEOUT_MS,
    capabilities: () => capabilities,

    search: async (query, context) => {
      const body = await request("search", { name: query.keyword, page: query.page }, context);
      const items = readArray(body.data).map((item) => toDrama(readRecord(item)));
      return createSearchResult(items, readInteger(body, "page", query.page), readString(body, "msg") || "success");
    },

    getCategories: async () => [...CENGUIGUI_CATEGORIES],

    getCategoryDramas: async (query, context) => {
      const body = await request("categoryDramas", { classname: query.category, offset: query.offset }, context);
      const items = readArray(body.data).map((entry) => {
        const item = readRecord(entry);
        return createDramaInfo({
          id: readString(item, "book_id"),
          title: readString(item, "title"),
          coverUrl: readString(item, "cover"),
          episodeCount: readInteger(item, "episode_cnt"),
          intro: readString(item, "video_desc"),
          category: readString(item, "sub_title", query.category),
          playCount: readInteger(item, "play_cnt")
        });
      });
      return createCategoryResult(query.category, items, query.offset, readString(body, "msg") || "success");
    },

    getRecommendations: async (context) => {
      const body = await request("recommendations", { type: "recommend" }, context);
      return readArray(body.data).map((entry) => {
        const item = readRecord(entry);
        const book = readRecord(item.book_data);
        return createDramaInfo({
          id: readString(book, "book_id"),
          title: readString(book, "book_name"),
          coverUrl: readString(book, "thumb_url"),
          episodeCount: readInteger(book, "serial_count"),
          category: readString(book, "category"),
          playCount: readInteger(item, "hot")
        });
      });
    },

    getEpisodes: async (query, context) => {
      const body = await request("episodes", { book_id: query.dramaId }, context);
      return assignOrdinals(readArray(body.data).map((entry) => {
        const item = readRecord(entry);
        return { id: readString(item, "video_id"), title: readString(item, "title") };
      }));
    },

    getVideoUrl: async (query, context) => {
      const level = resolveQuality(query.quality, capabilities.qualities);
      if (level === null) {
        throw invalidInput(`No quality at or below ${query.quality}; offered: ${capabilities.qualities.join(", ")}`, {
          provider: id,
          operation: "videoUrl"
        });
      }

      const body = await request("videoUrl", { video_id: query.episodeId, level, type: "json" }, context);
      const data = readRecord(body.data);
      const info = readRecord(data.info);
      const playUrl = readString(data, "url");
      if (!playUrl) {
        throw new UpstreamError(`No playable URL for episode ${query.episodeId}`, {
          provider: id,
          operation: "videoUrl"
        });
      }

      const reported = readString(info, "quality");
      return createVideoInfo({
        playUrl,
        coverUrl: readString(data, "pic"),
        quality: qualityHeight(reported) === null ? level : reported.trim().toLowerCase(),
        title: readString(data, "title"),
        duration: readString(info, "duration"),
        sizeLabel: readString(info, "size_str")
      });
    }
  };
};
