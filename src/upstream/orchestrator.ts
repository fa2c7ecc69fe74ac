import { performance } from "node:perf_hooks";
import type { MetricsSink } from "../metrics/types";
import type { BackoffShape, Pokemon } from "../types";
import { errorMessage } from "../utils/error";
import { silentLogger, type Logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";
import { backoffDelay, classify, DEFAULT_BACKOFF, sleep } from "../utils/retry";
import { decodePokemon } from "./decode";
import {
  cancelled,
  decodeFailure,
  notFound,
  upstreamStatus,
  upstreamUnavailable,
  type FetchError,
} from "./errors";
import {
  initialState,
  transition,
  type AttemptOutcome,
  type FetchState,
  type Settled,
} from "./state";
import type { UpstreamTransport } from "./transport";

export const DEFAULT_TARGET = "pokeapi";

export interface FetchOrchestratorOptions {
  transport: UpstreamTransport;
  metrics: MetricsSink;
  maxAttempts: number;
  logger?: Logger;
  /** Metrics label for the upstream */
  target?: string;
  backoff?: BackoffShape;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  /** Monotonic clock in milliseconds, used for attempt latency */
  clock?: () => number;
}

const CANCELLED: AttemptOutcome = { type: "cancelled" };

/**
 * Drives sequential upstream attempts for one key through the retry state machine.
 * Holds no per-request state and never touches the cache: callers read the cache
 * before `fetch` and store a successful result after it.
 */
export class FetchOrchestrator {
  private readonly transport: UpstreamTransport;
  private readonly metrics: MetricsSink;
  private readonly maxAttempts: number;
  private readonly logger: Logger;
  private readonly target: string;
  private readonly backoff: BackoffShape;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly clock: () => number;

  constructor(opts: FetchOrchestratorOptions) {
    if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer (got ${opts.maxAttempts})`);
    }
    this.transport = opts.transport;
    this.metrics = opts.metrics;
    this.maxAttempts = opts.maxAttempts;
    this.logger = opts.logger ?? silentLogger;
    this.target = opts.target ?? DEFAULT_TARGET;
    this.backoff = opts.backoff ?? DEFAULT_BACKOFF;
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
    this.clock = opts.clock ?? (() => performance.now());
  }

  async fetch(key: string, signal?: AbortSignal): Promise<Result<Pokemon, FetchError>> {
    let state: FetchState = initialState();

    while (state.state === "attempting") {
      const attempt: number = state.attempt;
      const outcome = signal?.aborted ? CANCELLED : await this.attempt(key, signal);
      state = transition(state, outcome, this.maxAttempts);
      this.count(outcome, state);

      if (state.state === "attempting") {
        const delayMs = backoffDelay(attempt, this.backoff, this.random);
        this.logger.debug(`Retrying ${this.target} lookup`, {
          key,
          attempt,
          delayMs,
          reason: state.lastReason,
        });
        try {
          await this.sleep(delayMs, signal);
        } catch (e) {
          if (!signal?.aborted) throw e;
          state = { state: "cancelled", attempts: attempt };
        }
      }
    }

    return this.settle(key, state);
  }

  private async attempt(key: string, signal: AbortSignal | undefined): Promise<AttemptOutcome> {
    const started = this.clock();
    try {
      const raw = await this.transport.request(key, signal);
      if (raw.status === 200) {
        const decoded = decodePokemon(raw.body);
        return decoded.ok
          ? { type: "success", value: decoded.value }
          : { type: "decode_failure", reason: decoded.error };
      }
      return { type: "failure", classification: classify({ status: raw.status }) };
    } catch (e) {
      if (signal?.aborted) return CANCELLED;
      return { type: "failure", classification: classify({ error: e }) };
    } finally {
      const seconds = (this.clock() - started) / 1000;
      this.emit(() => this.metrics.observeDuration(this.target, seconds));
    }
  }

  private count(outcome: AttemptOutcome, next: FetchState): void {
    const record = (status: string) => this.emit(() => this.metrics.recordRequest(this.target, status));

    switch (outcome.type) {
      case "success":
        record("200");
        return;
      case "decode_failure":
        record("parse_error");
        return;
      case "cancelled":
        return;
      case "failure": {
        const c = outcome.classification;
        if (c.kind === "not_found") record("404");
        else if (c.kind === "terminal") record(c.status !== undefined ? String(c.status) : "error");
        else {
          record("retryable_error");
          if (next.state === "exhausted") record("error");
        }
        return;
      }
    }
  }

  private settle(key: string, state: Settled): Result<Pokemon, FetchError> {
    switch (state.state) {
      case "success":
        return ok(state.value);
      case "not_found":
        return err(notFound(key));
      case "terminal_error":
        this.logger.warn(`${this.target} lookup failed`, { key, status: state.status, reason: state.reason });
        return err(upstreamStatus(state.reason, state.status));
      case "decode_failure":
        this.logger.warn(`${this.target} returned an undecodable body`, { key, reason: state.reason });
        return err(decodeFailure(state.reason));
      case "exhausted":
        this.logger.warn(`${this.target} lookup gave up after ${state.attempts} attempt(s)`, {
          key,
          lastReason: state.lastReason,
        });
        return err(upstreamUnavailable(state.lastReason, state.lastStatus));
      case "cancelled":
        this.logger.debug(`${this.target} lookup cancelled`, { key, attempts: state.attempts });
        return err(cancelled());
    }
  }

  /** Metrics are fire-and-forget: a failing sink is reported, never propagated. */
  private emit(fn: () => void): void {
    try {
      fn();
    } catch (e) {
      this.logger.warn("Metrics sink failed", { target: this.target, error: errorMessage(e) });
    }
  }
}
