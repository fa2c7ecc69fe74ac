import type { Pokemon } from "../types";
import { shouldRetry, type Classification } from "../utils/retry";

/** What a single attempt produced. Consumed immediately by `transition`, never stored. */
export type AttemptOutcome =
  | { type: "success"; value: Pokemon }
  | { type: "failure"; classification: Classification }
  | { type: "decode_failure"; reason: string }
  | { type: "cancelled" };

export type FetchState =
  | { state: "attempting"; attempt: number; lastReason?: string; lastStatus?: number }
  | { state: "success"; attempts: number; value: Pokemon }
  | { state: "not_found"; attempts: number }
  | { state: "terminal_error"; attempts: number; reason: string; status?: number }
  | { state: "decode_failure"; attempts: number; reason: string }
  | { state: "exhausted"; attempts: number; lastReason: string; lastStatus?: number }
  | { state: "cancelled"; attempts: number };

export type Attempting = Extract<FetchState, { state: "attempting" }>;
export type Settled = Exclude<FetchState, Attempting>;

export const initialState = (): Attempting => ({ state: "attempting", attempt: 1 });

/**
 * Next state after `current.attempt` produced `outcome`.
 * Only a retryable failure below `maxAttempts` leads back to `attempting`.
 */
export function transition(current: Attempting, outcome: AttemptOutcome, maxAttempts: number): FetchState {
  const attempts = current.attempt;

  if (outcome.type === "success") return { state: "success", attempts, value: outcome.value };
  if (outcome.type === "decode_failure") return { state: "decode_failure", attempts, reason: outcome.reason };
  if (outcome.type === "cancelled") return { state: "cancelled", attempts };

  const c = outcome.classification;
  if (c.kind === "not_found") return { state: "not_found", attempts };
  if (c.kind === "terminal") return { state: "terminal_error", attempts, reason: c.reason, status: c.status };

  if (shouldRetry(attempts, maxAttempts, c)) {
    return { state: "attempting", attempt: attempts + 1, lastReason: c.reason, lastStatus: c.status };
  }
  return { state: "exhausted", attempts, lastReason: c.reason, lastStatus: c.status };
}
