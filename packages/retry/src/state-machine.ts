import { backoffDelay, type RetryPolicy } from "./policy.js";
import type { AttemptResult, RetryState, TerminalRetryState } from "./types.js";

export const INITIAL_STATE: RetryState = { status: "attempting", attemptIndex: 0 };

/**
 * Decide what follows attempt `attemptIndex` given how it ended.
 *
 * - success: succeeded
 * - rate limited, attempts left: backoff for baseDelayMs * 2^attemptIndex
 * - rate limited, none left: exhausted
 * - anything else: fatal, whatever attempts remain
 */
export function nextState(attemptIndex: number, result: AttemptResult, policy: RetryPolicy): RetryState {
  const attempts = attemptIndex + 1;
  if (result.ok) return { status: "succeeded", attempts };
  if (result.classification === "other") return { status: "fatal", attempts };
  if (attempts < policy.maxAttempts) {
    return { status: "backoff", attemptIndex, delayMs: backoffDelay(policy, attemptIndex) };
  }
  return { status: "exhausted", attempts };
}

export function afterBackoff(state: Extract<RetryState, { status: "backoff" }>): RetryState {
  return { status: "attempting", attemptIndex: state.attemptIndex + 1 };
}

export function isTerminal(state: RetryState): state is TerminalRetryState {
  return state.status === "succeeded" || state.status === "exhausted" || state.status === "fatal";
}
