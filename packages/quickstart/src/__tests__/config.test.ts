import { describe, it, expect } from "vitest";
import { loadConfig, maskSecret } from "../config.js";
import { ConfigurationError } from "../errors.js";

const baseEnv = {
  NEO4J_URI: "bolt://localhost:7687",
  NEO4J_USER: "neo4j",
  NEO4J_PASSWORD: "test-password",
  ANTHROPIC_API_KEY: "test-secret-key",
};

function configError(env: Record<string, string | undefined>): ConfigurationError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected loadConfig to fail");
}

describe("loadConfig", () => {
  it("fills defaults for optional variables", () => {
    const config = loadConfig(baseEnv);
    expect(config).toEqual({
      neo4j: { uri: "bolt://localhost:7687", username: "neo4j", password: "test-password" },
      anthropic: { apiKey: "test-secret-key", model: "claude-haiku-4-5-20251001" },
      groupId: "quickstart",
      retryPolicy: { maxAttempts: 3, baseDelayMs: 2000 },
      pacingMs: 1000,
    });
  });

  it("reads numeric overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      EPISODE_MAX_ATTEMPTS: "5",
      EPISODE_BASE_DELAY_MS: "250",
      EPISODE_PACING_MS: "0",
      KG_GROUP_ID: "demo",
    });
    expect(config.retryPolicy).toEqual({ maxAttempts: 5, baseDelayMs: 250 });
    expect(config.pacingMs).toBe(0);
    expect(config.groupId).toBe("demo");
  });

  it("reports every missing variable", () => {
    const err = configError({ NEO4J_URI: "bolt://localhost:7687" });
    expect(err.variables).toEqual(["NEO4J_USER", "NEO4J_PASSWORD", "ANTHROPIC_API_KEY"]);
  });

  it("treats empty strings as missing", () => {
    const err = configError({ ...baseEnv, ANTHROPIC_API_KEY: "" });
    expect(err.variables).toEqual(["ANTHROPIC_API_KEY"]);
  });

  it("rejects a zero attempt count", () => {
    const err = configError({ ...baseEnv, EPISODE_MAX_ATTEMPTS: "0" });
    expect(err.variables).toEqual(["EPISODE_MAX_ATTEMPTS"]);
  });

  it("rejects a non-numeric delay", () => {
    const err = configError({ ...baseEnv, EPISODE_BASE_DELAY_MS: "soon" });
    expect(err.variables).toEqual(["EPISODE_BASE_DELAY_MS"]);
  });
});

describe("maskSecret", () => {
  it("keeps the first eight characters", () => {
    expect(maskSecret("test-secret-key")).toBe("test-sec...");
  });
});
