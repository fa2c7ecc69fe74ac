import { performance } from "node:perf_hooks";
import type { Cache } from "../cache/types";
import { recordHttpRequest, type GatewayMetrics } from "../metrics/prometheus";
import type { Pokemon } from "../types";
import { errorMessage } from "../utils/error";
import type { Logger } from "../utils/logger";
import { REQUEST_ID_HEADER, resolveRequestId } from "../utils/request-id";
import type { Result } from "../utils/result";
import type { FetchError } from "../upstream/errors";
import { errorResponse, fetchErrorResponse, jsonResponse, pokemonBody, textResponse } from "./response";

/** What the lookup route needs from the upstream side. `FetchOrchestrator` satisfies it. */
export interface PokemonFetcher {
  fetch(key: string, signal?: AbortSignal): Promise<Result<Pokemon, FetchError>>;
}

export interface GatewayDeps {
  cache: Cache<Pokemon>;
  fetcher: PokemonFetcher;
  metrics: GatewayMetrics;
  logger: Logger;
  /** Deadline for each inbound request, retries and backoff included */
  requestTimeoutMs: number;
}

export interface Gateway {
  /** Serve one request. `signal` aborts when the client goes away. */
  handle(req: Request, signal?: AbortSignal): Promise<Response>;
  /**
   * Answer a request whose target could not be turned into a `Request`,
   * with the same request ID, access log and metrics as a routed one.
   */
  rejectMalformed(method: string, target: string, requestIdHeader: string | undefined): Response;
}

interface RouteContext {
  readonly req: Request;
  readonly url: URL;
  readonly requestId: string;
  readonly signal: AbortSignal;
}

type RouteHandler = (ctx: RouteContext) => Promise<Response>;

interface RouteMatch {
  /** Route template used for logs and metrics labels */
  route: string;
  handler: RouteHandler;
}

interface RouteMiss {
  /** Absent when nothing matched the path */
  route?: string;
  status: 404 | 405;
}

const POKEMON_PREFIX = "/pokemon/";
const POKEMON_ROUTE = "/pokemon/:name";
/** Metrics label for paths no route matched; keeps label cardinality bounded */
export const UNMATCHED_ROUTE = "unmatched";

export function createGateway(deps: GatewayDeps): Gateway {
  const { cache, fetcher, metrics, logger } = deps;

  const lookup = async (ctx: RouteContext, name: string): Promise<Response> => {
    if (name === "") return errorResponse(400, "bad_request", "name is required", ctx.requestId);

    const cached = cache.get(name);
    if (cached.found) {
      logger.debug("Cache hit", { rid: ctx.requestId, key: name });
      return jsonResponse(pokemonBody(cached.value), 200, { "x-cache": "HIT" });
    }

    const result = await fetcher.fetch(name, ctx.signal);
    if (!result.ok) return fetchErrorResponse(result.error, ctx.requestId);

    cache.set(name, result.value);
    return jsonResponse(pokemonBody(result.value), 200, { "x-cache": "MISS" });
  };

  /** Static route table: "METHOD /path" -> handler */
  const routes = new Map<string, RouteHandler>([
    ["GET /health", async () => textResponse("ok")],
    [
      "GET /hello",
      async ({ url }) => jsonResponse({ message: `hello ${url.searchParams.get("name") || "world"}` }),
    ],
    [
      "GET /metrics",
      async () => textResponse(await metrics.registry.metrics(), 200, metrics.registry.contentType),
    ],
  ]);
  const knownPaths = new Set([...routes.keys()].map((k) => k.slice(k.indexOf(" ") + 1)));

  const match = (method: string, path: string): RouteMatch | RouteMiss => {
    const handler = routes.get(`${method} ${path}`);
    if (handler) return { route: path, handler };

    if (path.startsWith(POKEMON_PREFIX)) {
      const rest = path.slice(POKEMON_PREFIX.length);
      if (!rest.includes("/")) {
        if (method !== "GET") return { route: POKEMON_ROUTE, status: 405 };
        return {
          route: POKEMON_ROUTE,
          handler: async (ctx) => {
            let name: string;
            try {
              name = decodeURIComponent(rest).trim();
            } catch {
              return errorResponse(400, "bad_request", "name is not valid percent-encoding", ctx.requestId);
            }
            return lookup(ctx, name);
          },
        };
      }
    }

    if (knownPaths.has(path)) return { route: path, status: 405 };
    return { status: 404 };
  };

  /** Stamp the request ID, then record metrics and the access log line. */
  const finish = (
    res: Response,
    info: { requestId: string; method: string; route?: string; path: string; started: number },
  ): Response => {
    res.headers.set(REQUEST_ID_HEADER, info.requestId);

    const seconds = (performance.now() - info.started) / 1000;
    recordHttpRequest(
      metrics,
      { route: info.route ?? UNMATCHED_ROUTE, method: info.method, status: res.status },
      seconds,
    );
    logger.info("request", {
      rid: info.requestId,
      method: info.method,
      route: info.route ?? info.path,
      status: res.status,
      durationMs: Math.round(seconds * 1000 * 100) / 100,
    });

    return res;
  };

  return {
    async handle(req, signal) {
      const started = performance.now();
      const url = new URL(req.url);
      const requestId = resolveRequestId(req.headers.get(REQUEST_ID_HEADER));
      const m = match(req.method, url.pathname);

      const deadline = new AbortController();
      const timer = setTimeout(() => {
        const e = new Error(`request exceeded ${deps.requestTimeoutMs}ms`);
        e.name = "TimeoutError";
        deadline.abort(e);
      }, deps.requestTimeoutMs);
      const onClientAbort = () => deadline.abort(signal?.reason);
      if (signal?.aborted) onClientAbort();
      else signal?.addEventListener("abort", onClientAbort, { once: true });

      let res: Response;
      try {
        if ("handler" in m) {
          res = await m.handler({ req, url, requestId, signal: deadline.signal });
        } else if (m.status === 405) {
          res = errorResponse(405, "method_not_allowed", `${req.method} not allowed on ${url.pathname}`, requestId, {
            allow: "GET",
          });
        } else {
          res = errorResponse(404, "route_not_found", `${req.method} ${url.pathname} not found`, requestId);
        }
      } catch (e) {
        logger.error("Unhandled error while serving request", { rid: requestId, error: errorMessage(e) });
        res = errorResponse(500, "internal_error", "internal server error", requestId);
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onClientAbort);
      }

      return finish(res, { requestId, method: req.method, route: m.route, path: url.pathname, started });
    },

    rejectMalformed(method, target, requestIdHeader) {
      const started = performance.now();
      const requestId = resolveRequestId(requestIdHeader);
      const res = errorResponse(400, "bad_request", "malformed request target", requestId);
      return finish(res, { requestId, method, path: target, started });
    },
  };
}
