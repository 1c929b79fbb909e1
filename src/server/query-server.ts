import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { z } from "zod";
import { createLogger, createRequestId, type Logger } from "../core/logging";
import { invalidInput } from "../providers/errors";
import type { ProviderRuntime } from "../providers";
import { isRecord } from "../providers/normalize";
import type { QueryOptions } from "../providers/types";
import { errorEnvelope, successEnvelope, type Envelope } from "./envelope";

export interface QueryServerOptions {
  runtime: ProviderRuntime;
  host?: string;
  port?: number;
  logger?: Logger;
}

export interface QueryServerHandle {
  url: string;
  port: number;
  stop: () => Promise<void>;
}

const MAX_BODY_BYTES = 64 * 1024;

const providerParam = z.string().trim().min(1).optional();
const positionParam = z.coerce.number().int().min(1).default(1);

const searchParams = z.object({
  keyword: z.string().trim().min(1),
  page: positionParam,
  provider: providerParam
});

const categoryDramasParams = z.object({
  category: z.string().trim().min(1),
  offset: positionParam,
  provider: providerParam
});

const providerOnlyParams = z.object({
  provider: providerParam
});

const videoParams = z.object({
  quality: z.string().trim().min(1).optional(),
  provider: providerParam
});

const activeProviderBody = z.object({
  id: z.string().trim().min(1)
});

const EPISODES_ROUTE = /^\/drama\/([^/]+)\/episodes$/;
const VIDEO_ROUTE = /^\/episode\/([^/]+)\/video$/;

function sendJson(response: ServerResponse, status: number, payload: unknown): void {
  response.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Cache-Control": "no-store"
  });
  response.end(JSON.stringify(payload));
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw invalidInput(`Malformed path segment: ${segment}`);
  }
}

function readJson(request: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    let data = "";
    request.setEncoding("utf8");
    request.on("data", (chunk: string) => {
      data += chunk;
      if (data.length > MAX_BODY_BYTES) {
        reject(invalidInput("Request body too large"));
        request.destroy();
      }
    });
    request.on("end", () => {
      try {
        const parsed: unknown = JSON.parse(data || "{}");
        if (!isRecord(parsed)) {
          reject(invalidInput("Request body must be a JSON object"));
          return;
        }
        resolve(parsed);
      } catch (error) {
        reject(invalidInput(`Invalid JSON body: ${error instanceof Error ? error.message : String(error)}`));
      }
    });
    request.on("error", reject);
  });
}

type Route = (args: {
  url: URL;
  request: IncomingMessage;
  query: Record<string, string>;
  options: QueryOptions;
}) => Promise<Envelope | null>;

const createRouter = (runtime: ProviderRuntime): Route => {
  return async ({ url, request, query, options }) => {
    const withProvider = (provider: string | undefined): QueryOptions => ({ ...options, providerId: provider });
    const path = url.pathname.replace(/\/+$/, "") || "/";

    if (request.method === "GET") {
      if (path === "/search") {
        const params = searchParams.parse(query);
        const result = await runtime.search({ keyword: params.keyword, page: params.page }, withProvider(params.provider));
        return successEnvelope(result.items, { page: result.page }, result.message);
      }
      if (path === "/categories") {
        const params = providerOnlyParams.parse(query);
        return successEnvelope(await runtime.getCategories(withProvider(params.provider)));
      }
      if (path === "/categoryDramas") {
        const params = categoryDramasParams.parse(query);
        const result = await runtime.getCategoryDramas(
          { category: params.category, offset: params.offset },
          withProvider(params.provider)
        );
        return successEnvelope(result.items, { category: result.category, offset: result.offset }, result.message);
      }
      if (path === "/recommendations") {
        const params = providerOnlyParams.parse(query);
        return successEnvelope(await runtime.getRecommendations(withProvider(params.provider)));
      }
      const episodes = EPISODES_ROUTE.exec(path);
      if (episodes?.[1]) {
        const params = providerOnlyParams.parse(query);
        const data = await runtime.getEpisodes({ dramaId: decodeSegment(episodes[1]) }, withProvider(params.provider));
        return successEnvelope(data);
      }
      const video = VIDEO_ROUTE.exec(path);
      if (video?.[1]) {
        const params = videoParams.parse(query);
        const data = await runtime.getVideoUrl(
          { episodeId: decodeSegment(video[1]), quality: params.quality },
          withProvider(params.provider)
        );
        return successEnvelope(data);
      }
      if (path === "/providers") {
        const listing = runtime.listProviders();
        return successEnvelope(listing.providers, { active: listing.active });
      }
      if (path === "/stats") {
        return successEnvelope(runtime.stats());
      }
    }

    if (request.method === "POST" && path === "/providers/active") {
      const body = activeProviderBody.parse(await readJson(request));
      runtime.setActiveProvider(body.id);
      return successEnvelope({ active: body.id });
    }

    return null;
  };
};

/** Serves the canonical query surface as JSON over HTTP. */
export async function startQueryServer(options: QueryServerOptions): Promise<QueryServerHandle> {
  const logger = options.logger ?? createLogger("query-server");
  const host = options.host ?? "127.0.0.1";
  const route = createRouter(options.runtime);

  const handle = async (request: IncomingMessage, response: ServerResponse): Promise<void> => {
    const requestId = createRequestId();
    const startedAt = Date.now();
    const url = new URL(request.url ?? "/", `http://${host}`);
    const controller = new AbortController();
    response.on("close", () => {
      if (!response.writableEnded) {
        controller.abort();
      }
    });

    let status = 200;
    try {
      const envelope = await route({
        url,
        request,
        query: Object.fromEntries(url.searchParams),
        options: { signal: controller.signal, requestId }
      });
      if (envelope) {
        sendJson(response, 200, envelope);
      } else {
        status = 404;
        sendJson(response, 404, { status_code: 404, message: `No route for ${request.method ?? "GET"} ${url.pathname}`, data: null });
      }
    } catch (error) {
      const envelope = errorEnvelope(error);
      status = envelope.status_code;
      if (status >= 500) {
        logger.error("http.request.failed", {
          requestId,
          data: { path: url.pathname, status, message: envelope.message }
        });
      }
      if (!response.writableEnded && !response.destroyed) {
        sendJson(response, status, envelope);
      }
    }

    logger.debug("http.request", {
      requestId,
      data: { method: request.method, path: url.pathname, status, latencyMs: Date.now() - startedAt }
    });
  };

  const server = createServer((request, response) => {
    handle(request, response).catch((error: unknown) => {
      logger.error("http.handler.crashed", {
        data: { message: error instanceof Error ? error.message : String(error) }
      });
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? 0, host, () => resolve());
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port ?? 0;
  const url = `http://${host}:${port}`;
  logger.info("http.listening", { data: { url } });

  const stop = async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  };

  return { url, port, stop };
}
