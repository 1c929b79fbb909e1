export * from "./providers";
export { createConfiguredRuntime, createAdapter, type RuntimeFactoryOptions } from "./providers/runtime-factory";
export { formatPublisherDay, LOCAL_SEARCH_MESSAGE } from "./providers/adapters/duanju-search";
export type { AdapterOptions } from "./providers/adapters/common";
export type { Fetcher } from "./providers/shared/http";
export { loadConfig, parseConfig, getConfigPath, PROVIDER_KINDS, type ReelhubConfig, type ProviderConfig, type ProviderKind } from "./config";
export { startQueryServer, type QueryServerHandle, type QueryServerOptions } from "./server/query-server";
export { createLogger, createSilentLogger, type Logger, type LogEnvelope, type LogSink } from "./core/logging";
