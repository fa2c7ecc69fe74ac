import type { BackoffShape } from "../types";
import { errorCode, errorMessage } from "./error";

/** Backoff used when the caller passes no shape: 100ms doubling up to 1s, minus up to 30ms of jitter. */
export const DEFAULT_BACKOFF: Readonly<BackoffShape> = Object.freeze({
  baseMs: 100,
  capMs: 1000,
  jitterMs: 30,
});

/** A failed attempt: either a response status or a transport-level error. */
export type Failure = { status: number } | { error: unknown };

export type Classification =
  | { kind: "retryable"; reason: string; status?: number }
  | { kind: "not_found" }
  | { kind: "terminal"; reason: string; status?: number };

/**
 * Transport error codes that cannot succeed on a later attempt.
 * Anything not listed here is treated as transient.
 */
const NON_TRANSIENT_CODES = new Set([
  "ERR_INVALID_URL",
  "ERR_INVALID_ARG_TYPE",
  "ERR_INVALID_ARG_VALUE",
  "ERR_INVALID_PROTOCOL",
  "ERR_UNSUPPORTED_PROTOCOL",
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

export function classify(failure: Failure): Classification {
  if ("status" in failure) {
    const { status } = failure;
    if (status >= 500) return { kind: "retryable", reason: `upstream status ${status}`, status };
    if (status === 404) return { kind: "not_found" };
    return { kind: "terminal", reason: `upstream returned status ${status}`, status };
  }

  const code = errorCode(failure.error);
  const reason = code
    ? `${errorMessage(failure.error)} (${code})`
    : errorMessage(failure.error);
  if (code !== undefined && NON_TRANSIENT_CODES.has(code)) {
    return { kind: "terminal", reason };
  }
  return { kind: "retryable", reason };
}

export function shouldRetry(attempt: number, maxAttempts: number, c: Classification): boolean {
  return c.kind === "retryable" && attempt < maxAttempts;
}

/**
 * Delay before the attempt after `attempt` (1-based):
 * min(cap, base * 2^(attempt-1)) minus a random amount in [0, jitter), never below zero.
 */
export function backoffDelay(
  attempt: number,
  shape: BackoffShape = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const n = Math.max(1, Math.floor(attempt));
  const exp = Math.min(shape.capMs, shape.baseMs * 2 ** (n - 1));
  const jitter = Math.floor(random() * shape.jitterMs);
  return Math.max(0, exp - jitter);
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const e = new Error("The operation was aborted");
  e.name = "AbortError";
  return e;
}

/** Wait `ms`; rejects with the signal's reason as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
