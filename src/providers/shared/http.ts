import { UpstreamError } from "../errors";
import type { ProviderContext, ProviderOperation } from "../types";

export type Fetcher = (url: string, init: RequestInit) => Promise<Response>;

const DEFAULT_USER_AGENT = "Mozilla/5.0 (Linux; Android 13) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Mobile Safari/537.36";

const normalizeHeaderValue = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
};

export const providerRequestHeaders = {
  "user-agent": normalizeHeaderValue(process.env.REELHUB_PROVIDER_USER_AGENT, DEFAULT_USER_AGENT),
  accept: "application/json, text/plain;q=0.9, */*;q=0.5"
} as const;

export const defaultFetcher: Fetcher = (url, init) => fetch(url, init);

export type QueryValue = string | number | undefined;

export const buildUrl = (baseUrl: string, path: string, params: Record<string, QueryValue> = {}): string => {
  const url = new URL(path, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
};

export interface RequestJsonArgs {
  provider: string;
  operation: ProviderOperation;
  url: string;
  context: ProviderContext;
  fetcher: Fetcher;
  headers?: Record<string, string>;
}

const fetchText = async (args: RequestJsonArgs, controller: AbortController): Promise<string> => {
  const { provider, operation } = args;
  const timeoutMs = args.context.timeoutMs;
  let response: Response;
  try {
    response = await args.fetcher(args.url, {
      method: "GET",
      headers: { ...providerRequestHeaders, ...(args.headers ?? {}) },
      redirect: "follow",
      signal: controller.signal
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new UpstreamError(`Timed out after ${timeoutMs}ms requesting ${args.url}`, {
        code: "timeout",
        provider,
        operation,
        cause: error
      });
    }
    throw new UpstreamError(`Failed to reach ${args.url}`, {
      code: "network",
      provider,
      operation,
      cause: error
    });
  }

  if (!response.ok) {
    throw new UpstreamError(`Upstream responded ${response.status} for ${args.url}`, {
      provider,
      operation,
      status: response.status
    });
  }

  try {
    return await response.text();
  } catch (error) {
    const timedOut = controller.signal.aborted;
    throw new UpstreamError(timedOut ? `Timed out after ${timeoutMs}ms reading ${args.url}` : `Failed to read ${args.url}`, {
      code: timedOut ? "timeout" : "network",
      provider,
      operation,
      cause: error
    });
  }
};

/**
 * One governed upstream GET. Waits for a rate-governor token and a worker
 * slot, then applies the per-request timeout to the HTTP exchange only.
 */
export const requestJson = async (args: RequestJsonArgs): Promise<unknown> => {
  const release = await args.context.acquire();

  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort("timeout");
  }, args.context.timeoutMs);

  let text: string;
  try {
    text = await fetchText(args, controller);
  } finally {
    clearTimeout(timeoutId);
    release();
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UpstreamError(`Malformed JSON from ${args.url}`, {
      provider: args.provider,
      operation: args.operation,
      cause: error,
      details: { malformed: true }
    });
  }
};
