import { describe, expect, it, vi } from "vitest";
import { fallbackOrder, withProviderFallback } from "../src/providers/fallback";
import {
  ProviderRuntime,
  UpstreamError,
  createDramaInfo,
  createSearchResult,
  invalidInput
} from "../src/providers";
import type { SearchQuery, SearchResult } from "../src/providers/types";
import { createFakeAdapter, silentLogger } from "./provider-fixtures";

type SearchHandler = (query: SearchQuery) => Promise<SearchResult>;

const answer = (id: string): SearchHandler => async (query) => {
  return createSearchResult([createDramaInfo({ id })], query.page);
};

const failWith = (error: Error): SearchHandler => async () => {
  throw error;
};

const createRuntime = (handlers: Record<string, SearchHandler>) => {
  return new ProviderRuntime({
    providers: Object.entries(handlers).map(([id, search]) => createFakeAdapter(id, { search })),
    budgets: { retries: 0 },
    logger: silentLogger
  });
};

describe("withProviderFallback", () => {
  it("moves to the next provider after an upstream failure", async () => {
    const runtime = createRuntime({
      a: failWith(new UpstreamError("Upstream responded 503", { status: 503 })),
      b: answer("from-b")
    });

    const result = await withProviderFallback(runtime, "search", (providerId) => {
      return runtime.search({ keyword: "x" }, { providerId });
    });

    expect(result.providerId).toBe("b");
    expect(result.value.items[0]?.id).toBe("from-b");
    expect(result.failures).toEqual([
      {
        code: "upstream",
        message: "Upstream responded 503",
        retryable: true,
        provider: "a",
        operation: "search",
        details: { status: 503 }
      }
    ]);
    runtime.dispose();
  });

  it("returns the active provider's answer without trying others", async () => {
    const second = vi.fn(answer("from-b"));
    const runtime = createRuntime({ a: answer("from-a"), b: second });

    const result = await withProviderFallback(runtime, "search", (providerId) => {
      return runtime.search({ keyword: "x" }, { providerId });
    });

    expect(result).toMatchObject({ providerId: "a", failures: [] });
    expect(second).not.toHaveBeenCalled();
    runtime.dispose();
  });

  it("propagates errors another provider cannot fix", async () => {
    const second = vi.fn(answer("from-b"));
    const runtime = createRuntime({ a: failWith(invalidInput("bad keyword")), b: second });

    await expect(withProviderFallback(runtime, "search", (providerId) => {
      return runtime.search({ keyword: "x" }, { providerId });
    })).rejects.toMatchObject({ code: "invalid_input", message: "bad keyword" });
    expect(second).not.toHaveBeenCalled();
    runtime.dispose();
  });

  it("throws the last failure when every provider fails", async () => {
    const last = new UpstreamError("Timed out", { code: "timeout" });
    const runtime = createRuntime({
      a: failWith(new UpstreamError("Upstream responded 500", { status: 500 })),
      b: failWith(last)
    });

    await expect(withProviderFallback(runtime, "search", (providerId) => {
      return runtime.search({ keyword: "x" }, { providerId });
    })).rejects.toBe(last);
    runtime.dispose();
  });

  it("reports an unsupported operation when nobody declares it", async () => {
    const runtime = createRuntime({ a: answer("from-a") });

    await expect(withProviderFallback(runtime, "episodes", async () => [])).rejects.toMatchObject({
      code: "unsupported_operation",
      message: "Provider a does not support episodes"
    });
    runtime.dispose();
  });
});

describe("fallbackOrder", () => {
  it("puts the active provider first and the rest by health", () => {
    const runtime = createRuntime({ a: answer("a"), b: answer("b"), c: answer("c") });
    runtime.registry.markFailure("a", { code: "upstream", message: "down", retryable: true });
    runtime.setActiveProvider("b");

    expect(fallbackOrder(runtime, "search")).toEqual(["b", "c", "a"]);
    expect(fallbackOrder(runtime, "videoUrl")).toEqual([]);
    runtime.dispose();
  });
});
