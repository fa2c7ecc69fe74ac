import type { LogLevel } from "./utils/logger";

/** Normalized upstream record returned to callers. Frozen once decoded. */
export interface Pokemon {
  readonly name: string;
  readonly height: number;
  readonly weight: number;
  readonly baseExperience: number;
}

/** Exponential backoff shape, all values in milliseconds. */
export interface BackoffShape {
  baseMs: number;
  capMs: number;
  /** Upper bound (exclusive) of the random amount subtracted from each delay */
  jitterMs: number;
}

export interface UpstreamConfig {
  baseUrl: string;
  /** Per-attempt timeout */
  timeoutMs: number;
  maxAttempts: number;
}

export interface GatewayConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  /** Deadline for a whole inbound request, retries included */
  requestTimeoutMs: number;
  upstream: UpstreamConfig;
  cache: { ttlSeconds: number };
  backoff: BackoffShape;
}

export interface RuntimeOptions {
  cwd: string;
  env: Record<string, string | undefined>;
}
