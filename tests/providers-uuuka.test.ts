import { describe, expect, it } from "vitest";
import { UUUKA_CONTENT_TYPES, createUuukaProvider } from "../src/providers/adapters/uuuka";
import { createStableId } from "../src/providers/normalize";
import { createRouteFetcher, createTestContext, jsonResponse, silentLogger } from "./provider-fixtures";

const requireHandler = <T>(handler: T | undefined): T => {
  if (handler === undefined) throw new Error("handler missing");
  return handler;
};

const page = (items: unknown[], pageNumber = 1, message = "") => ({
  success: true,
  message,
  data: { items, page: pageNumber }
});

const callUrls = (fetcher: ReturnType<typeof createRouteFetcher>): URL[] => {
  return fetcher.mock.calls.map(([url]) => new URL(url));
};

describe("uuuka provider", () => {
  it("declares listing operations only", () => {
    const capabilities = createUuukaProvider().capabilities();
    expect(capabilities.operations).toEqual({
      search: true,
      categories: true,
      categoryDramas: true,
      recommendations: true,
      episodes: false,
      videoUrl: false
    });
    expect(capabilities.qualitySelection).toBe(false);
    expect(capabilities.qualities).toEqual([]);
  });

  it("searches short dramas and maps storage links", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse(page([
      { title: "总裁驾到", source_link: "https://pan.test/s/1", type: "post" },
      { title: "无链接" }
    ])));
    const provider = createUuukaProvider({ fetcher, logger: silentLogger });

    const result = await requireHandler(provider.search)({ keyword: "总裁", page: 1 }, createTestContext());

    const [url] = callUrls(fetcher);
    expect(url?.pathname).toBe("/api/search");
    expect(Object.fromEntries(url?.searchParams ?? [])).toEqual({
      keyword: "总裁",
      content_type: "post",
      page: "1",
      limit: "20"
    });
    expect(result).toMatchObject({ statusCode: 200, message: "success", page: 1 });
    expect(result.items).toEqual([
      {
        id: "https://pan.test/s/1",
        title: "总裁驾到",
        coverUrl: "",
        episodeCount: 0,
        intro: "Storage link: https://pan.test/s/1",
        category: "post",
        author: "",
        playCount: 0
      },
      {
        id: createStableId("uuuka", "无链接"),
        title: "无链接",
        coverUrl: "",
        episodeCount: 0,
        intro: "",
        category: "post",
        author: "",
        playCount: 0
      }
    ]);
  });

  it("rejects unsuccessful bodies", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse({ success: false, message: "quota exceeded" }));
    const provider = createUuukaProvider({ fetcher, logger: silentLogger });

    await expect(requireHandler(provider.search)({ keyword: "x", page: 1 }, createTestContext())).rejects.toMatchObject({
      code: "upstream",
      message: "Upstream rejected search: quota exceeded",
      provider: "uuuka"
    });
  });

  it("lists display categories", async () => {
    const provider = createUuukaProvider();
    await expect(requireHandler(provider.getCategories)(createTestContext())).resolves.toEqual(Object.keys(UUUKA_CONTENT_TYPES));
  });

  it("maps display categories to content types", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse(page([{ title: "动画", source_link: "https://pan.test/s/2" }], 3)));
    const provider = createUuukaProvider({ fetcher, logger: silentLogger });
    const getCategoryDramas = requireHandler(provider.getCategoryDramas);

    const result = await getCategoryDramas({ category: "动漫", offset: 3 }, createTestContext());
    await getCategoryDramas({ category: "其他", offset: 1 }, createTestContext());

    const [mapped, unmapped] = callUrls(fetcher);
    expect(mapped?.pathname).toBe("/api/contents/dongman");
    expect(mapped?.searchParams.get("page")).toBe("3");
    expect(mapped?.searchParams.get("limit")).toBe("20");
    expect(unmapped?.pathname).toBe("/api/contents/post");
    expect(result).toMatchObject({ category: "动漫", offset: 3, message: "success" });
    expect(result.items.map((item) => item.id)).toEqual(["https://pan.test/s/2"]);
  });

  it("treats inherited object keys as unmapped categories", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse(page([], 1)));
    const provider = createUuukaProvider({ fetcher, logger: silentLogger });
    const getCategoryDramas = requireHandler(provider.getCategoryDramas);

    await getCategoryDramas({ category: "constructor", offset: 1 }, createTestContext());
    await getCategoryDramas({ category: "toString", offset: 1 }, createTestContext());

    expect(callUrls(fetcher).map((url) => url.pathname)).toEqual(["/api/contents/post", "/api/contents/post"]);
  });

  it("recommends today's updates and falls back to the latest list", async () => {
    const fetcher = createRouteFetcher((url) => {
      if (url.searchParams.get("today") === "today") {
        return jsonResponse(page([]));
      }
      return jsonResponse(page([{ title: "最新", source_link: "https://pan.test/s/3" }]));
    });
    const provider = createUuukaProvider({ fetcher, logger: silentLogger });

    const items = await requireHandler(provider.getRecommendations)(createTestContext());

    expect(callUrls(fetcher).map((url) => url.search)).toEqual([
      "?today=today&page=1&limit=20",
      "?page=1&limit=20"
    ]);
    expect(items.map((item) => item.title)).toEqual(["最新"]);
  });

  it("returns today's updates when there are any", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse(page([{ title: "今日", source_link: "https://pan.test/s/4" }])));
    const provider = createUuukaProvider({ fetcher, logger: silentLogger });

    const items = await requireHandler(provider.getRecommendations)(createTestContext());

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(items.map((item) => item.id)).toEqual(["https://pan.test/s/4"]);
  });
});
