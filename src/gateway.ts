import { TtlCache } from "./cache/memory-cache";
import { createMetrics, PrometheusSink, type GatewayMetrics } from "./metrics/prometheus";
import { createGateway, type Gateway } from "./server/app";
import type { GatewayConfig, Pokemon } from "./types";
import type { Logger } from "./utils/logger";
import { FetchOrchestrator } from "./upstream/orchestrator";
import { PokeApiTransport, type UpstreamTransport } from "./upstream/transport";

export interface GatewayRuntime {
  gateway: Gateway;
  cache: TtlCache<Pokemon>;
  orchestrator: FetchOrchestrator;
  metrics: GatewayMetrics;
}

export interface BuildGatewayOptions {
  logger: Logger;
  /** Replaces the HTTP transport; tests pass an in-process stub */
  transport?: UpstreamTransport;
  metrics?: GatewayMetrics;
  /** Clock for cache expiry, epoch milliseconds */
  now?: () => number;
}

/** Wire cache, upstream orchestrator, metrics and routes from a loaded config. */
export function buildGateway(config: GatewayConfig, opts: BuildGatewayOptions): GatewayRuntime {
  const metrics = opts.metrics ?? createMetrics();
  const cache = new TtlCache<Pokemon>({ ttlSeconds: config.cache.ttlSeconds, now: opts.now });
  const transport =
    opts.transport ??
    new PokeApiTransport({ baseUrl: config.upstream.baseUrl, timeoutMs: config.upstream.timeoutMs });

  const orchestrator = new FetchOrchestrator({
    transport,
    metrics: new PrometheusSink(metrics),
    maxAttempts: config.upstream.maxAttempts,
    backoff: config.backoff,
    logger: opts.logger,
  });

  const gateway = createGateway({
    cache,
    fetcher: orchestrator,
    metrics,
    logger: opts.logger,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  return { gateway, cache, orchestrator, metrics };
}
