import { Counter, Histogram, Registry } from "prom-client";
import type { MetricsSink } from "./types";

type HttpLabels = "route" | "method" | "status";
type ExternalLabels = "target" | "status";

export interface GatewayMetrics {
  registry: Registry;
  httpRequestsTotal: Counter<HttpLabels>;
  httpRequestDuration: Histogram<"route" | "method">;
  externalRequestsTotal: Counter<ExternalLabels>;
  externalRequestDuration: Histogram<"target">;
}

/**
 * Register the gateway's metrics on `registry`.
 * A fresh Registry per call keeps instances (and tests) from sharing the global default.
 */
export function createMetrics(registry: Registry = new Registry()): GatewayMetrics {
  const registers = [registry];
  return {
    registry,
    httpRequestsTotal: new Counter({
      name: "http_requests_total",
      help: "Total HTTP requests",
      labelNames: ["route", "method", "status"],
      registers,
    }),
    httpRequestDuration: new Histogram({
      name: "http_request_duration_seconds",
      help: "HTTP request duration",
      labelNames: ["route", "method"],
      registers,
    }),
    externalRequestsTotal: new Counter({
      name: "external_api_requests_total",
      help: "External API requests",
      labelNames: ["target", "status"],
      registers,
    }),
    externalRequestDuration: new Histogram({
      name: "external_api_request_duration_seconds",
      help: "External API call duration",
      labelNames: ["target"],
      registers,
    }),
  };
}

/** Records upstream attempts into the external API metrics. */
export class PrometheusSink implements MetricsSink {
  private readonly metrics: GatewayMetrics;

  constructor(metrics: GatewayMetrics) {
    this.metrics = metrics;
  }

  recordRequest(target: string, status: string): void {
    this.metrics.externalRequestsTotal.inc({ target, status });
  }

  observeDuration(target: string, seconds: number): void {
    this.metrics.externalRequestDuration.observe({ target }, seconds);
  }
}

export function recordHttpRequest(
  metrics: GatewayMetrics,
  labels: { route: string; method: string; status: number },
  seconds: number,
): void {
  metrics.httpRequestsTotal.inc({ route: labels.route, method: labels.method, status: String(labels.status) });
  metrics.httpRequestDuration.observe({ route: labels.route, method: labels.method }, seconds);
}
