/**
 * Narrow recording interface the upstream orchestrator writes to.
 * Implementations must not block; callers still guard against throws.
 */
export interface MetricsSink {
  recordRequest(target: string, status: string): void;
  observeDuration(target: string, seconds: number): void;
}
