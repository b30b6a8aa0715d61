import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./policy.js";
import { afterBackoff, INITIAL_STATE, nextState } from "./state-machine.js";
import type { AttemptResult, ErrorClassification, RetryLogger, RetryOutcome, RetryState } from "./types.js";

export interface RetryOptions {
  /** Human-readable operation name used in every log line. */
  name: string;
  classifyError: (error: unknown) => ErrorClassification;
  logger: RetryLogger;
  policy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describe(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * Run `operation` under the retry policy. Rate-limited failures back off
 * exponentially until attempts run out; any other failure ends the run at once.
 * Never throws: the caller gets a success flag plus the failure classification.
 */
export async function runWithRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<RetryOutcome<T>> {
  const { name, classifyError, logger } = options;
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? sleep;

  // A classifier that throws marks the failure as fatal rather than escaping.
  const classify = (error: unknown): ErrorClassification => {
    try {
      return classifyError(error);
    } catch (classifierError) {
      logger.warn(
        { operation: name, error: describe(classifierError) },
        `Could not classify error for ${name}; treating it as fatal`,
      );
      return "other";
    }
  };

  let state: RetryState = INITIAL_STATE;
  let completed: { value: T } | undefined;
  let lastError: unknown;

  for (;;) {
    switch (state.status) {
      case "attempting": {
        const attempt = state.attemptIndex + 1;
        logger.info({ operation: name, attempt, maxAttempts: policy.maxAttempts }, `Attempt ${attempt}/${policy.maxAttempts} for ${name}`);

        let result: AttemptResult;
        try {
          completed = { value: await operation() };
          result = { ok: true };
        } catch (err) {
          lastError = err;
          result = { ok: false, classification: classify(err) };
        }
        state = nextState(state.attemptIndex, result, policy);
        break;
      }

      case "backoff": {
        const attempt = state.attemptIndex + 1;
        logger.warn(
          { operation: name, attempt, maxAttempts: policy.maxAttempts, delayMs: state.delayMs },
          `Rate limit hit for ${name}. Retrying in ${(state.delayMs / 1000).toFixed(1)}s... (Attempt ${attempt}/${policy.maxAttempts})`,
        );
        await wait(state.delayMs);
        state = afterBackoff(state);
        break;
      }

      case "succeeded":
        if (!completed) throw new Error(`Retry state for ${name} reached success without a value`);
        logger.info({ operation: name, attempts: state.attempts }, `Successfully completed ${name}`);
        return { success: true, attempts: state.attempts, value: completed.value };

      case "exhausted":
        logger.error(
          { operation: name, attempts: state.attempts, error: describe(lastError) },
          `Failed ${name} after ${state.attempts} attempts due to rate limiting.`,
        );
        return { success: false, attempts: state.attempts, failure: "rate_limited" };

      case "fatal":
        logger.error(
          { operation: name, attempts: state.attempts, error: describe(lastError) },
          `Unexpected error during ${name}: ${describe(lastError)}`,
        );
        return { success: false, attempts: state.attempts, failure: "other" };
    }
  }
}
