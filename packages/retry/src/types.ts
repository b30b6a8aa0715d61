export type ErrorClassification = "rate_limited" | "other";

export type AttemptResult =
  | { ok: true }
  | { ok: false; classification: ErrorClassification };

export type RetryState =
  | { status: "attempting"; attemptIndex: number }
  | { status: "backoff"; attemptIndex: number; delayMs: number }
  | { status: "succeeded"; attempts: number }
  | { status: "exhausted"; attempts: number }
  | { status: "fatal"; attempts: number };

export type TerminalRetryState = Extract<RetryState, { status: "succeeded" | "exhausted" | "fatal" }>;

export type RetryOutcome<T> =
  | { success: true; attempts: number; value: T }
  | { success: false; attempts: number; failure: ErrorClassification };

/** The slice of a pino logger the coordinator writes to. */
export interface RetryLogger {
  info(context: Record<string, unknown>, message: string): void;
  warn(context: Record<string, unknown>, message: string): void;
  error(context: Record<string, unknown>, message: string): void;
}
