/**
 * Classified failure of an upstream lookup. Every kind is returned as a value;
 * retryable conditions are resolved inside the orchestrator and never appear here.
 */
export type FetchError =
  | { kind: "not_found"; message: string; status: 404 }
  | { kind: "upstream_status"; message: string; status?: number }
  | { kind: "upstream_unavailable"; message: string; lastReason: string; lastStatus?: number }
  | { kind: "cancelled"; message: string }
  | { kind: "decode_failure"; message: string; reason: string };

export type FetchErrorKind = FetchError["kind"];

export const notFound = (key: string): FetchError => ({
  kind: "not_found",
  message: `${key} not found upstream`,
  status: 404,
});

export const upstreamStatus = (reason: string, status?: number): FetchError => ({
  kind: "upstream_status",
  message: reason,
  status,
});

export const upstreamUnavailable = (lastReason: string, lastStatus?: number): FetchError => ({
  kind: "upstream_unavailable",
  message: `upstream retries exhausted: ${lastReason}`,
  lastReason,
  lastStatus,
});

export const cancelled = (): FetchError => ({
  kind: "cancelled",
  message: "request cancelled before upstream lookup completed",
});

export const decodeFailure = (reason: string): FetchError => ({
  kind: "decode_failure",
  message: `failed to parse upstream response: ${reason}`,
  reason,
});
