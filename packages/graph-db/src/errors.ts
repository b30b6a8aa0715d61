/**
 * Raised when the model provider throttles a request. The only error callers
 * are expected to retry.
 */
export class RateLimitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RateLimitError";
  }
}

/** The language model returned output that is not a valid extraction. */
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExtractionError";
  }
}

/** A `json` episode whose body is not a serialized JSON object. */
export class EpisodeParseError extends Error {
  constructor(
    message: string,
    public readonly episodeName: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "EpisodeParseError";
  }
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
