export { runWithRetry, sleep } from "./coordinator.js";
export type { RetryOptions } from "./coordinator.js";
export { backoffDelay, createRetryPolicy, DEFAULT_RETRY_POLICY } from "./policy.js";
export type { RetryPolicy } from "./policy.js";
export { afterBackoff, INITIAL_STATE, isTerminal, nextState } from "./state-machine.js";
export type {
  AttemptResult,
  ErrorClassification,
  RetryLogger,
  RetryOutcome,
  RetryState,
  TerminalRetryState,
} from "./types.js";
