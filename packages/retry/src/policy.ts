import { z } from "zod";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 2000,
});

const retryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1),
  baseDelayMs: z.number().finite().min(0),
});

/** Build a frozen policy from the defaults plus overrides; rejects values that break the invariants. */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return Object.freeze(retryPolicySchema.parse({ ...DEFAULT_RETRY_POLICY, ...overrides }));
}

/** Wait before the retry that follows attempt `attemptIndex` (0-based). */
export function backoffDelay(policy: RetryPolicy, attemptIndex: number): number {
  return policy.baseDelayMs * 2 ** attemptIndex;
}
