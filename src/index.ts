export { TtlCache, type TtlCacheOptions } from "./cache/memory-cache";
export type { Cache, CacheEntry, CacheLookup } from "./cache/types";
export { DEFAULT_CONFIG, loadConfig, type LoadConfigOptions } from "./config";
export { buildGateway, type BuildGatewayOptions, type GatewayRuntime } from "./gateway";
export { createMetrics, PrometheusSink, type GatewayMetrics } from "./metrics/prometheus";
export type { MetricsSink } from "./metrics/types";
export { createGateway, type Gateway, type GatewayDeps, type PokemonFetcher } from "./server/app";
export { closeServer, createRequestListener, startServer } from "./server/node-adapter";
export { decodePokemon } from "./upstream/decode";
export type { FetchError, FetchErrorKind } from "./upstream/errors";
export { FetchOrchestrator, type FetchOrchestratorOptions } from "./upstream/orchestrator";
export { transition, type AttemptOutcome, type FetchState } from "./upstream/state";
export { PokeApiTransport, type RawResponse, type UpstreamTransport } from "./upstream/transport";
export { createLogger, type Logger, type LogLevel } from "./utils/logger";
export type { Result } from "./utils/result";
export { backoffDelay, classify, DEFAULT_BACKOFF, shouldRetry, type Classification } from "./utils/retry";
export * from "./types";
