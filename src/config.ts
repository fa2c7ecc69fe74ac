import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import type { BackoffShape, GatewayConfig } from "./types";
import { errorMessage } from "./utils/error";
import { createLogger, envLogLevel, isLogLevel, type LogLevel, type Logger } from "./utils/logger";
import { DEFAULT_BACKOFF } from "./utils/retry";

/** Maximum allowed timeout in milliseconds (5 minutes) */
const MAX_TIMEOUT_MS = 300000;
/** Maximum allowed cache TTL in seconds (24 hours) */
const MAX_CACHE_TTL_SECONDS = 86400;
/** Upper bound on upstream attempts per lookup */
const MAX_ATTEMPTS_LIMIT = 10;

export const DEFAULT_CONFIG_FILE = "gateway.yaml";
export const DEFAULT_BASE_URL = "https://pokeapi.co/api/v2";

export const DEFAULT_CONFIG: GatewayConfig = {
  host: "0.0.0.0",
  port: 8080,
  logLevel: "info",
  requestTimeoutMs: 10000,
  upstream: {
    baseUrl: DEFAULT_BASE_URL,
    timeoutMs: 5000,
    maxAttempts: 3,
  },
  cache: { ttlSeconds: 300 },
  backoff: { ...DEFAULT_BACKOFF },
};

export interface LoadConfigOptions {
  cwd: string;
  env: Record<string, string | undefined>;
  logger?: Logger;
}

/** Type guard for NodeJS.ErrnoException */
function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Validate a path to prevent path traversal attacks.
 * Rejects absolute paths or any path containing ".." segments.
 */
function isValidRelativePath(p: string): boolean {
  if (path.isAbsolute(p)) return false;
  const normalized = path.posix.normalize(p.replace(/\\/g, "/"));
  const segments = normalized.split("/");
  return !segments.includes("..");
}

/**
 * Validate the upstream base URL.
 * An explicitly configured URL that is not http(s) is a hard error, never silently replaced.
 */
export function parseBaseUrl(value: string, source: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`Invalid upstream base URL in ${source}: "${value}"`);
  }
  if (!["http:", "https:"].includes(parsed.protocol)) {
    throw new Error(
      `Invalid upstream base URL protocol "${parsed.protocol}" in ${source}: only http: and https: are allowed`,
    );
  }
  return value.replace(/\/+$/, "");
}

interface NumberBounds {
  min: number;
  max: number;
  integer?: boolean;
}

export async function loadConfig(opts: LoadConfigOptions): Promise<GatewayConfig> {
  const { env } = opts;
  const logger = opts.logger ?? createLogger(envLogLevel(env));

  let configPath: string;
  if (env.GATEWAY_CONFIG_PATH) {
    if (!isValidRelativePath(env.GATEWAY_CONFIG_PATH)) {
      throw new Error(`Invalid GATEWAY_CONFIG_PATH: path traversal or absolute paths not allowed`);
    }
    configPath = path.resolve(opts.cwd, env.GATEWAY_CONFIG_PATH);
  } else {
    configPath = path.resolve(opts.cwd, DEFAULT_CONFIG_FILE);
  }

  let raw: Record<string, unknown> = {};
  try {
    const parsed: unknown = YAML.parse(await fs.readFile(configPath, "utf-8")) ?? {};
    if (!isRecord(parsed)) throw new Error("top level must be a mapping");
    raw = parsed;
  } catch (e: unknown) {
    if (isNodeError(e) && e.code === "ENOENT") {
      logger.debug(`No config file found at ${configPath}, using defaults`);
    } else {
      throw new Error(`Failed to read config: ${errorMessage(e)}`);
    }
  }

  const num = (label: string, value: unknown, fallback: number, b: NumberBounds): number => {
    if (value === undefined || value === null) return fallback;
    const text = typeof value === "string" ? value.trim() : undefined;
    if (text === "") return fallback;
    const n = typeof value === "number" ? value : text !== undefined ? Number(text) : NaN;
    if (!Number.isFinite(n) || n < b.min || n > b.max || (b.integer && !Number.isInteger(n))) {
      logger.warn(`Invalid ${label} value ${JSON.stringify(value)}, using ${fallback}`);
      return fallback;
    }
    return n;
  };

  const level = (label: string, value: unknown, fallback: LogLevel): LogLevel => {
    if (value === undefined || value === "") return fallback;
    const v = String(value).toLowerCase();
    if (isLogLevel(v)) return v;
    logger.warn(`Invalid ${label} value ${JSON.stringify(value)}, using ${fallback}`);
    return fallback;
  };

  const section = (key: string): Record<string, unknown> => {
    const v = raw[key];
    return isRecord(v) ? v : {};
  };
  const upstream = section("upstream");
  const cache = section("cache");
  const backoffRaw = section("backoff");

  const D = DEFAULT_CONFIG;

  // File layer over defaults
  const file: GatewayConfig = {
    host: typeof raw.host === "string" && raw.host !== "" ? raw.host : D.host,
    port: num("port", raw.port, D.port, { min: 0, max: 65535, integer: true }),
    logLevel: level("logLevel", raw.logLevel, D.logLevel),
    requestTimeoutMs: num("requestTimeoutMs", raw.requestTimeoutMs, D.requestTimeoutMs, {
      min: 1,
      max: MAX_TIMEOUT_MS,
    }),
    upstream: {
      baseUrl:
        typeof upstream.baseUrl === "string"
          ? parseBaseUrl(upstream.baseUrl, configPath)
          : D.upstream.baseUrl,
      timeoutMs: num("upstream.timeoutMs", upstream.timeoutMs, D.upstream.timeoutMs, {
        min: 1,
        max: MAX_TIMEOUT_MS,
      }),
      maxAttempts: num("upstream.maxAttempts", upstream.maxAttempts, D.upstream.maxAttempts, {
        min: 1,
        max: MAX_ATTEMPTS_LIMIT,
        integer: true,
      }),
    },
    cache: {
      ttlSeconds: num("cache.ttlSeconds", cache.ttlSeconds, D.cache.ttlSeconds, {
        min: 0,
        max: MAX_CACHE_TTL_SECONDS,
      }),
    },
    backoff: parseBackoff(backoffRaw, D.backoff, num),
  };

  // Environment layer over file; backoff is deliberately file-only
  const timeoutSec = num("HTTP_TIMEOUT_SEC", env.HTTP_TIMEOUT_SEC, file.upstream.timeoutMs / 1000, {
    min: 0.001,
    max: MAX_TIMEOUT_MS / 1000,
  });

  return {
    host: env.HOST || file.host,
    port: num("PORT", env.PORT, file.port, { min: 0, max: 65535, integer: true }),
    logLevel: level("LOG_LEVEL", env.POKEGATE_LOG_LEVEL || env.LOG_LEVEL, file.logLevel),
    requestTimeoutMs: num("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS, file.requestTimeoutMs, {
      min: 1,
      max: MAX_TIMEOUT_MS,
    }),
    upstream: {
      baseUrl: env.POKEAPI_BASE_URL
        ? parseBaseUrl(env.POKEAPI_BASE_URL, "POKEAPI_BASE_URL")
        : file.upstream.baseUrl,
      timeoutMs: Math.round(timeoutSec * 1000),
      maxAttempts: num("UPSTREAM_MAX_ATTEMPTS", env.UPSTREAM_MAX_ATTEMPTS, file.upstream.maxAttempts, {
        min: 1,
        max: MAX_ATTEMPTS_LIMIT,
        integer: true,
      }),
    },
    cache: {
      ttlSeconds: num("POKEMON_CACHE_TTL_SEC", env.POKEMON_CACHE_TTL_SEC, file.cache.ttlSeconds, {
        min: 0,
        max: MAX_CACHE_TTL_SECONDS,
      }),
    },
    backoff: file.backoff,
  };
}

function parseBackoff(
  v: Record<string, unknown>,
  fallback: BackoffShape,
  num: (label: string, value: unknown, fallback: number, b: NumberBounds) => number,
): BackoffShape {
  const bounds: NumberBounds = { min: 0, max: MAX_TIMEOUT_MS, integer: true };
  return {
    baseMs: num("backoff.baseMs", v.baseMs, fallback.baseMs, bounds),
    capMs: num("backoff.capMs", v.capMs, fallback.capMs, bounds),
    jitterMs: num("backoff.jitterMs", v.jitterMs, fallback.jitterMs, bounds),
  };
}
