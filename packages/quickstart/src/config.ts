import { DEFAULT_ANTHROPIC_MODEL } from "@episode-graph/graph-db";
import { createRetryPolicy, type RetryPolicy } from "@episode-graph/retry";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const BILLING_URL = "https://console.anthropic.com/settings/billing";

// Empty strings count as unset.
const blankToUndefined = (value: unknown): unknown => (value === "" ? undefined : value);

const required = z.preprocess(blankToUndefined, z.string({ required_error: "is required" }));
const optionalString = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));
const optionalInt = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const envSchema = z.object({
  NEO4J_URI: required,
  NEO4J_USER: required,
  NEO4J_PASSWORD: required,
  ANTHROPIC_API_KEY: required,
  ANTHROPIC_MODEL: optionalString(DEFAULT_ANTHROPIC_MODEL),
  KG_GROUP_ID: optionalString("quickstart"),
  EPISODE_MAX_ATTEMPTS: optionalInt(3, 1),
  EPISODE_BASE_DELAY_MS: optionalInt(2000, 0),
  EPISODE_PACING_MS: optionalInt(1000, 0),
});

export interface QuickstartConfig {
  neo4j: { uri: string; username: string; password: string };
  anthropic: { apiKey: string; model: string };
  groupId: string;
  retryPolicy: RetryPolicy;
  pacingMs: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): QuickstartConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({
        variable: issue.path.join("."),
        problem: issue.message,
      })),
    );
  }

  const vars = parsed.data;
  return {
    neo4j: { uri: vars.NEO4J_URI, username: vars.NEO4J_USER, password: vars.NEO4J_PASSWORD },
    anthropic: { apiKey: vars.ANTHROPIC_API_KEY, model: vars.ANTHROPIC_MODEL },
    groupId: vars.KG_GROUP_ID,
    retryPolicy: createRetryPolicy({
      maxAttempts: vars.EPISODE_MAX_ATTEMPTS,
      baseDelayMs: vars.EPISODE_BASE_DELAY_MS,
    }),
    pacingMs: vars.EPISODE_PACING_MS,
  };
}

/** First 8 characters, then an ellipsis. */
export function maskSecret(secret: string): string {
  return `${secret.slice(0, 8)}...`;
}
