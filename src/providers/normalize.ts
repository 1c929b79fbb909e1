import { createHash, randomUUID } from "crypto";
import type {
  CategoryResult,
  DramaInfo,
  EpisodeInfo,
  ProviderOperation,
  SearchResult,
  TraceContext,
  VideoInfo
} from "./types";

export type UnknownRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is UnknownRecord => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const readRecord = (value: unknown): UnknownRecord => {
  return isRecord(value) ? value : {};
};

export const readArray = (value: unknown): unknown[] => {
  return Array.isArray(value) ? value : [];
};

/** Strings pass through, finite numbers are stringified, anything else becomes the fallback. */
export const readString = (record: UnknownRecord, key: string, fallback = ""): string => {
  const value = record[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return fallback;
};

/** Accepts numbers and integer strings with a short unit suffix such as "90集". */
export const readInteger = (record: UnknownRecord, key: string, fallback = 0): number => {
  const value = record[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string") {
    const match = /^\s*(-?\d+)\s*\D{0,4}\s*$/.exec(value);
    if (match?.[1]) {
      return Number.parseInt(match[1], 10);
    }
  }
  return fallback;
};

export const createTraceContext = (
  seed: Partial<TraceContext> = {},
  provider?: string
): TraceContext => {
  return {
    requestId: seed.requestId ?? randomUUID(),
    ...(provider ?? seed.provider ? { provider: provider ?? seed.provider } : {}),
    ts: seed.ts ?? new Date().toISOString()
  };
};

export const createDramaInfo = (value: Partial<DramaInfo> & Pick<DramaInfo, "id">): DramaInfo => {
  return Object.freeze({
    id: value.id,
    title: value.title ?? "",
    coverUrl: value.coverUrl ?? "",
    episodeCount: value.episodeCount ?? 0,
    intro: value.intro ?? "",
    category: value.category ?? "",
    author: value.author ?? "",
    playCount: value.playCount ?? 0
  });
};

export const createEpisodeInfo = (value: EpisodeInfo): EpisodeInfo => {
  return Object.freeze({ id: value.id, title: value.title, ordinal: value.ordinal });
};

export const createVideoInfo = (value: Partial<VideoInfo> & Pick<VideoInfo, "playUrl" | "quality">): VideoInfo => {
  return Object.freeze({
    statusCode: value.statusCode ?? 200,
    playUrl: value.playUrl,
    coverUrl: value.coverUrl ?? "",
    quality: value.quality,
    title: value.title ?? "",
    duration: value.duration ?? "",
    sizeLabel: value.sizeLabel ?? ""
  });
};

export const createSearchResult = (
  items: readonly DramaInfo[],
  page: number,
  message = "success"
): SearchResult => {
  return Object.freeze({
    statusCode: 200,
    message,
    items: Object.freeze([...items]),
    page
  });
};

export const createCategoryResult = (
  category: string,
  items: readonly DramaInfo[],
  offset: number,
  message = "success"
): CategoryResult => {
  return Object.freeze({
    statusCode: 200,
    message,
    category,
    items: Object.freeze([...items]),
    offset
  });
};

const EPISODE_NUMBER_RE = /第\s*(\d+)\s*集/;

/**
 * Uses the episode numbers declared in titles when every title carries a
 * distinct one, otherwise numbers episodes by response position.
 */
export const assignOrdinals = (
  episodes: ReadonlyArray<{ id: string; title: string }>
): EpisodeInfo[] => {
  const declared = episodes.map((episode) => {
    const match = EPISODE_NUMBER_RE.exec(episode.title);
    return match?.[1] ? Number.parseInt(match[1], 10) : null;
  });
  const usable = declared.every((value) => value !== null && value > 0)
    && new Set(declared).size === declared.length;

  return episodes.map((episode, index) => createEpisodeInfo({
    id: episode.id,
    title: episode.title,
    ordinal: usable ? declared[index] ?? index + 1 : index + 1
  }));
};

export const stableStringify = (value: unknown): string => {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  if (!isRecord(value)) return JSON.stringify(String(value));

  const entries = Object.entries(value)
    .filter(([, entryValue]) => entryValue !== undefined)
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, entryValue]) => `${JSON.stringify(key)}:${stableStringify(entryValue)}`);
  return `{${entries.join(",")}}`;
};

/** Cache key for one query: readable provider/operation prefix plus a digest of the parameters. */
export const createFingerprint = (
  providerId: string,
  operation: ProviderOperation,
  params: object
): string => {
  const digest = createHash("sha1").update(stableStringify(params)).digest("hex").slice(0, 16);
  return `${providerId}:${operation}:${digest}`;
};

/** Stable id for items that carry no upstream identifier. */
export const createStableId = (provider: string, seed: string): string => {
  return createHash("sha1").update(`${provider}\u0000${seed}`).digest("hex").slice(0, 16);
};
