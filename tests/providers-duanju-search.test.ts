import { describe, expect, it } from "vitest";
import {
  LOCAL_SEARCH_MESSAGE,
  createDuanjuSearchProvider,
  formatPublisherDay
} from "../src/providers/adapters/duanju-search";
import { createStableId } from "../src/providers/normalize";
import { createRouteFetcher, createTestContext, jsonResponse, silentLogger } from "./provider-fixtures";

const requireHandler = <T>(handler: T | undefined): T => {
  if (handler === undefined) throw new Error("handler missing");
  return handler;
};

// 2026-01-16 in the publisher's time zone.
const NOW = Date.UTC(2026, 0, 15, 20, 0, 0);

const daily = (count: number, prefix = "剧") => Array.from({ length: count }, (_, index) => ({
  name: `${prefix}${index + 1}`,
  url: `https://pan.test/d/${index + 1}`
}));

const callUrls = (fetcher: ReturnType<typeof createRouteFetcher>): string[] => {
  return fetcher.mock.calls.map(([url]) => url);
};

describe("formatPublisherDay", () => {
  it("rolls over at midnight UTC+8", () => {
    expect(formatPublisherDay(Date.UTC(2026, 0, 15, 15, 59, 59))).toBe("2026-01-15");
    expect(formatPublisherDay(Date.UTC(2026, 0, 15, 16, 0, 0))).toBe("2026-01-16");
  });
});

describe("duanju-search provider", () => {
  it("maps keyword search results", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse({
      data: [
        { name: "总裁归来", url: "https://pan.test/1", addtime: "2026-01-16", episodes: "90集", cover: "https://img.test/1.jpg" },
        "not an item"
      ]
    }));
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW });

    const result = await requireHandler(provider.search)({ keyword: "总裁", page: 1 }, createTestContext());

    const url = new URL(callUrls(fetcher)[0] ?? "");
    expect(url.origin + url.pathname).toBe("https://kuoapp.com/duanju/api.php");
    expect(url.searchParams.get("param")).toBe("1");
    expect(url.searchParams.get("name")).toBe("总裁");
    expect(result).toMatchObject({ statusCode: 200, message: "success", page: 1 });
    expect(result.items).toEqual([
      {
        id: "https://pan.test/1",
        title: "总裁归来",
        coverUrl: "https://img.test/1.jpg",
        episodeCount: 90,
        intro: "Storage link: https://pan.test/1\nUpdated: 2026-01-16",
        category: "短剧",
        author: "",
        playCount: 0
      }
    ]);
  });

  it("falls back to filtering the latest daily list when search fails", async () => {
    const fetcher = createRouteFetcher((url) => {
      if (url.pathname === "/duanju/api.php") {
        return new Response("unavailable", { status: 500 });
      }
      if (url.searchParams.get("day") === "2026-01-16") {
        return jsonResponse([]);
      }
      return jsonResponse([
        { name: "霸道总裁", url: "https://pan.test/a" },
        { name: "穿越千年", url: "https://pan.test/b" },
        { title: "总裁的秘密", id: "id-c" }
      ]);
    });
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW });

    const result = await requireHandler(provider.search)({ keyword: "总裁", page: 1 }, createTestContext());

    expect(callUrls(fetcher)).toEqual([
      "https://kuoapp.com/duanju/api.php?param=1&name=%E6%80%BB%E8%A3%81&page=1",
      "https://kuoapp.com/duanju/get.php?day=2026-01-16",
      "https://kuoapp.com/duanju/get.php?day=2026-01-15"
    ]);
    expect(result.message).toBe(LOCAL_SEARCH_MESSAGE);
    expect(result.items.map((item) => item.id)).toEqual(["https://pan.test/a", "id-c"]);
  });

  it("matches local results without regard to case", async () => {
    const fetcher = createRouteFetcher((url) => {
      if (url.pathname === "/duanju/api.php") {
        return new Response("unavailable", { status: 502 });
      }
      return jsonResponse({ data: [{ name: "CEO Returns" }, { name: "Other" }] });
    });
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW });

    const result = await requireHandler(provider.search)({ keyword: "ceo", page: 1 }, createTestContext());

    expect(result.items).toEqual([
      expect.objectContaining({ id: createStableId("duanju-search", "CEO Returns"), title: "CEO Returns", intro: "" })
    ]);
  });

  it("skips days the publisher rejects", async () => {
    const fetcher = createRouteFetcher((url) => {
      if (url.searchParams.get("day") === "2026-01-16") {
        return new Response("error", { status: 502 });
      }
      return jsonResponse(daily(2));
    });
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW });

    const result = await requireHandler(provider.getCategoryDramas)({ category: "今日更新", offset: 1 }, createTestContext());

    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({ category: "今日更新", offset: 1, message: "success" });
    expect(result.items.map((item) => item.title)).toEqual(["剧1", "剧2"]);
  });

  it("stops walking back when the host is unreachable", async () => {
    const fetcher = createRouteFetcher(() => {
      throw new TypeError("fetch failed");
    });
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW });

    await expect(requireHandler(provider.getRecommendations)(createTestContext())).rejects.toMatchObject({
      code: "network",
      message: "Failed to reach https://kuoapp.com/duanju/get.php?day=2026-01-16"
    });
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it("returns nothing once the lookback window is exhausted", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse([]));
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW, lookbackDays: 3 });

    await expect(requireHandler(provider.getRecommendations)(createTestContext())).resolves.toEqual([]);
    expect(callUrls(fetcher)).toEqual([
      "https://kuoapp.com/duanju/get.php?day=2026-01-16",
      "https://kuoapp.com/duanju/get.php?day=2026-01-15",
      "https://kuoapp.com/duanju/get.php?day=2026-01-14"
    ]);
  });

  it("pages category listings twenty at a time", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse(daily(25)));
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW });
    const getCategoryDramas = requireHandler(provider.getCategoryDramas);

    const first = await getCategoryDramas({ category: "全部短剧", offset: 1 }, createTestContext());
    const second = await getCategoryDramas({ category: "全部短剧", offset: 2 }, createTestContext());

    expect(first.items).toHaveLength(20);
    expect(second.items.map((item) => item.title)).toEqual(["剧21", "剧22", "剧23", "剧24", "剧25"]);
  });

  it("recommends the first twenty items of the latest list", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse(daily(25)));
    const provider = createDuanjuSearchProvider({ fetcher, logger: silentLogger, now: () => NOW });

    const items = await requireHandler(provider.getRecommendations)(createTestContext());

    expect(items).toHaveLength(20);
    expect(items[0]?.id).toBe("https://pan.test/d/1");
    expect(items[19]?.id).toBe("https://pan.test/d/20");
  });

  it("serves its fixed category list", async () => {
    const provider = createDuanjuSearchProvider();
    await expect(requireHandler(provider.getCategories)(createTestContext())).resolves.toEqual(["今日更新", "热门榜单", "全部短剧"]);
  });
});
