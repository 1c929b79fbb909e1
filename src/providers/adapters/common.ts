import type { Logger } from "../../core/logging";
import { sortQualities } from "../quality";
import type { Fetcher } from "../shared/http";
import type { ProviderCapabilities, ProviderOperation, Quality } from "../types";

/** Static configuration record shared by every reference adapter factory. */
export interface AdapterOptions {
  id?: string;
  baseUrl?: string;
  timeoutMs?: number;
  qpsBudget?: number;
  qualities?: readonly Quality[];
  fetcher?: Fetcher;
  logger?: Logger;
}

export const DEFAULT_ADAPTER_TIMEOUT_MS = 10_000;
export const DEFAULT_ADAPTER_QPS = 2;

export const buildCapabilities = (args: {
  providerId: string;
  name: string;
  description: string;
  operations: readonly ProviderOperation[];
  qpsBudget: number;
  qualities?: readonly Quality[];
  dynamicCategories?: boolean;
  pagination?: boolean;
}): ProviderCapabilities => {
  const supported = new Set(args.operations);
  const qualities = sortQualities(args.qualities ?? []);
  return {
    providerId: args.providerId,
    name: args.name,
    description: args.description,
    operations: {
      search: supported.has("search"),
      categories: supported.has("categories"),
      categoryDramas: supported.has("categoryDramas"),
      recommendations: supported.has("recommendations"),
      episodes: supported.has("episodes"),
      videoUrl: supported.has("videoUrl")
    },
    qualitySelection: supported.has("videoUrl") && qualities.length > 1,
    dynamicCategories: args.dynamicCategories ?? false,
    pagination: args.pagination ?? true,
    qpsBudget: args.qpsBudget,
    qualities
  };
};
